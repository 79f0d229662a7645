/**
 * Column selectors and their one-time resolution against a header
 */

import type { Header } from '@tablediff/core';
import type { ColumnSelector } from '../types/index.js';
import { ReconcileError } from '../errors/index.js';

export function byPosition(position: number): ColumnSelector {
  return { kind: 'position', position };
}

export function byName(name: string): ColumnSelector {
  return { kind: 'name', name };
}

/**
 * Resolve a selector to a 0-based position in `header`
 * @throws ReconcileError COLUMN_NOT_FOUND
 */
export function resolveColumn(header: Header, selector: ColumnSelector, label: string): number {
  if (selector.kind === 'name') {
    const position = header.indexOf(selector.name);
    if (position === -1) {
      throw new ReconcileError({
        code: 'COLUMN_NOT_FOUND',
        message: `Column '${selector.name}' is not in the header of ${label}.`,
        suggestion: 'Check the column name for typos and surrounding whitespace.',
        context: { column: selector.name, tables: [label, label] },
      });
    }
    return position;
  }

  const { position } = selector;
  if (!Number.isInteger(position) || position < 0 || position >= header.length) {
    throw new ReconcileError({
      code: 'COLUMN_NOT_FOUND',
      message: `Column position ${position} is outside the ${header.length} columns of ${label}.`,
      context: { position, tables: [label, label] },
    });
  }
  return position;
}
