/**
 * ColumnFilter
 *
 * Deletes columns from a table. Every operation returns a new table.
 */

import type { Table } from '@tablediff/core';
import { headerOf } from '@tablediff/core';
import type { ColumnSelector, EngineLogger } from '../types/index.js';
import { ReconcileError } from '../errors/index.js';
import { resolveColumn } from './column-selector.js';

export interface WhitelistResult {
  table: Table;
  /** Names of the deleted columns, in header order */
  removed: string[];
}

/**
 * Delete the given positions from every row, highest position first
 * @throws ReconcileError ROW_TOO_SHORT when a row lacks one of the cells
 */
function removePositions(table: Table, positions: readonly number[], label: string): Table {
  const descending = [...new Set(positions)].sort((x, y) => y - x);
  const header = headerOf(table);

  return table.map((row, rowIndex) => {
    const copy = [...row];
    for (const position of descending) {
      if (position >= copy.length) {
        throw new ReconcileError({
          code: 'ROW_TOO_SHORT',
          message:
            `Cannot delete cell ${position + 1} from row ${rowIndex} of ${label}: the row has ${row.length} cells. ` +
            'Either the table is not rectangular or the column does not exist.',
          context: {
            column: header[position],
            position,
            row: rowIndex,
            tables: [label, label],
          },
        });
      }
      copy.splice(position, 1);
    }
    return copy;
  });
}

/**
 * Delete one column, selected by name or position in this table's own header
 */
export function deleteColumn(table: Table, selector: ColumnSelector, label: string): Table {
  const position = resolveColumn(headerOf(table), selector, label);
  return removePositions(table, [position], label);
}

/**
 * Delete every column whose header name is not whitelisted.
 * Applying the same whitelist twice changes nothing the second time.
 */
export function applyWhitelist(
  table: Table,
  whitelist: Iterable<string>,
  label: string,
  logger?: EngineLogger
): WhitelistResult {
  const keep = new Set(whitelist);
  const header = headerOf(table);

  const removedPositions: number[] = [];
  header.forEach((name, position) => {
    if (!keep.has(name)) {
      removedPositions.push(position);
    }
  });

  const removed = removedPositions.map((position) => header[position] ?? '');
  const filtered = removePositions(table, removedPositions, label);

  for (const name of removed) {
    logger?.info(`Deleted column '${name}' from ${label}, not in whitelist.`);
  }

  return { table: filtered, removed };
}
