/**
 * DifferenceAggregator
 *
 * Compares every cell of comparable rows and collects the disagreements.
 */

import type { Row } from '@tablediff/core';
import type { ComparatorLookup } from './comparator-registry.js';
import { DifferenceMap } from './difference-map.js';

export class DifferenceAggregator {
  private readonly differences = new DifferenceMap();
  private processed = 0;

  constructor(private readonly comparators: ComparatorLookup) {}

  /**
   * Compare one comparable row cell by cell
   * @returns number of disagreeing cells in the row
   */
  addRow(row: number, aRow: Row, bRow: Row): number {
    let found = 0;

    for (let column = 0; column < aRow.length; column++) {
      const aValue = aRow[column] ?? '';
      const bValue = bRow[column] ?? '';
      if (!this.comparators.compare(column, aValue, bValue)) {
        this.differences.record(column, row, [aValue, bValue]);
        found++;
      }
    }

    this.processed++;
    return found;
  }

  /** Rows passed to addRow() */
  get processedCount(): number {
    return this.processed;
  }

  result(): DifferenceMap {
    return this.differences;
  }
}
