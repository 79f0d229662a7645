/**
 * DifferenceMap
 *
 * Two-level mapping column position -> row -> pair of disagreeing values.
 * Iteration always yields columns in ascending position (header order) and,
 * within a column, rows in ascending order, whatever the insertion order.
 */

import type { CellPair, DifferenceRecord } from '../types/index.js';

export interface DifferenceColumn {
  column: number;
  records: DifferenceRecord[];
}

const ascending = (x: number, y: number): number => x - y;

export class DifferenceMap {
  private readonly byColumn = new Map<number, Map<number, CellPair>>();
  private count = 0;

  record(column: number, row: number, values: CellPair): void {
    let rows = this.byColumn.get(column);
    if (!rows) {
      rows = new Map<number, CellPair>();
      this.byColumn.set(column, rows);
    }
    if (!rows.has(row)) {
      this.count++;
    }
    rows.set(row, values);
  }

  get(column: number, row: number): CellPair | undefined {
    return this.byColumn.get(column)?.get(row);
  }

  /** Total number of recorded cells */
  get size(): number {
    return this.count;
  }

  /** Positions of columns with at least one difference, ascending */
  columns(): number[] {
    return [...this.byColumn.keys()].sort(ascending);
  }

  /** Records of one column, rows ascending */
  recordsFor(column: number): DifferenceRecord[] {
    const rows = this.byColumn.get(column);
    if (!rows) return [];

    return [...rows.keys()].sort(ascending).map((row) => ({
      column,
      row,
      values: rows.get(row) ?? ['', ''],
    }));
  }

  /** Non-empty column groups in header order */
  groups(): DifferenceColumn[] {
    return this.columns().map((column) => ({ column, records: this.recordsFor(column) }));
  }

  *[Symbol.iterator](): IterableIterator<DifferenceRecord> {
    for (const column of this.columns()) {
      yield* this.recordsFor(column);
    }
  }
}
