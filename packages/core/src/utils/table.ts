/**
 * Utility functions for working with tables
 */

import type { Header, Row, Table } from '../types/index.js';

/**
 * A row is blank when every cell is empty
 */
export function isBlankRow(row: readonly (string | null | undefined)[]): boolean {
  return row.every((cell) => cell === null || cell === undefined || cell === '');
}

/**
 * Header row of a table (empty for an empty table)
 */
export function headerOf(table: Table): Header {
  return table[0] ?? [];
}

/**
 * Number of rows excluding the header
 */
export function dataRowCount(table: Table): number {
  return Math.max(table.length - 1, 0);
}

/**
 * Cell at (row, column), or '' when the table is too small
 */
export function cellAt(table: Table, row: number, column: number): string {
  return table[row]?.[column] ?? '';
}

/**
 * Pad every row with empty cells up to the widest row
 */
export function padRows(rows: Row[]): Table {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return rows.map((row) =>
    row.length === width ? row : [...row, ...Array<string>(width - row.length).fill('')]
  );
}

/**
 * Deep copy, so callers can edit a table without touching the source
 */
export function cloneTable(table: Table): Table {
  return table.map((row) => [...row]);
}
