/**
 * ComparatorRegistry
 *
 * Maps column positions to comparators. Selectors are resolved against the
 * header once, at registration; lookups are by position only.
 */

import type { Header } from '@tablediff/core';
import type { ColumnSelector, ComparatorName } from '../types/index.js';
import { resolveColumn } from '../columns/index.js';
import {
  BUILT_IN_COMPARATORS,
  normalizedComparator,
  type ComparatorFn,
} from './comparators.js';

/** Read-only view handed to the classifier and aggregator */
export interface ComparatorLookup {
  resolve(position: number): ComparatorFn;
  compare(position: number, a: string, b: string): boolean;
}

export class ComparatorRegistry implements ComparatorLookup {
  private readonly overrides = new Map<number, ComparatorFn>();

  constructor(
    private readonly header: Header,
    private readonly label: string,
    private readonly fallback: ComparatorFn = normalizedComparator
  ) {}

  /**
   * Register a comparator for a column; a later registration for the same
   * position replaces an earlier one.
   * @returns the resolved position
   */
  register(selector: ColumnSelector, fn: ComparatorFn): number {
    const position = resolveColumn(this.header, selector, this.label);
    this.overrides.set(position, fn);
    return position;
  }

  /**
   * Register one of the built-in comparators by name
   */
  registerBuiltIn(selector: ColumnSelector, name: ComparatorName): number {
    return this.register(selector, BUILT_IN_COMPARATORS[name]);
  }

  resolve(position: number): ComparatorFn {
    return this.overrides.get(position) ?? this.fallback;
  }

  compare(position: number, a: string, b: string): boolean {
    return this.resolve(position)(a, b);
  }
}
