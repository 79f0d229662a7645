/**
 * Report Builder
 *
 * Renders differences and suspicious rows as output tables. The differences
 * table numbers rows as sheet rows (header is sheet row 1, so data row i is
 * sheet row i + 1); the suspicious table keeps the data row index i.
 */

import type { Header, Row, Table } from '@tablediff/core';
import { cellAt } from '@tablediff/core';
import type { IdentifierPositions, SuspiciousRow } from '../types/index.js';
import type { DifferenceMap } from '../comparison/index.js';
import { TITLE_COLUMN } from '../columns/index.js';

export interface ReportLabels {
  a: string;
  b: string;
  original: string;
}

/** The original table and where its identifying columns are */
export interface CrossReference {
  table: Table;
  positions: IdentifierPositions;
}

export function sheetRowNumber(row: number): string {
  return String(row + 1);
}

function crossReferenceCells(reference: CrossReference, row: number): Row {
  const { table, positions } = reference;
  return [
    cellAt(table, row, positions.PMCID),
    cellAt(table, row, positions.PMID),
    cellAt(table, row, positions.DOI),
    cellAt(table, row, positions.title),
  ];
}

/**
 * One group per column with differences: labeled sub-header, one row per
 * difference, blank separator row.
 */
export function buildDifferencesTable(
  differences: DifferenceMap,
  headers: { a: Header; b: Header },
  labels: ReportLabels,
  reference: CrossReference
): Table {
  const rows: Table = [];

  for (const { column, records } of differences.groups()) {
    rows.push([
      'Row #',
      `${labels.a} ${headers.a[column] ?? ''}`,
      `${labels.b} ${headers.b[column] ?? ''}`,
      `${labels.original} PMCID`,
      `${labels.original} PMID`,
      `${labels.original} DOI`,
      `${labels.original} ${TITLE_COLUMN}`,
    ]);

    for (const { row, values } of records) {
      rows.push([sheetRowNumber(row), values[0], values[1], ...crossReferenceCells(reference, row)]);
    }

    rows.push([]);
  }

  return rows;
}

export function suspiciousHeader(labels: Pick<ReportLabels, 'a' | 'b'>): Row {
  return [
    'Row #',
    `${labels.a} PMCID`,
    `${labels.b} PMCID`,
    `${labels.a} PMID`,
    `${labels.b} PMID`,
    `${labels.a} DOI`,
    `${labels.b} DOI`,
    `${labels.a} ${TITLE_COLUMN}`,
    `${labels.b} ${TITLE_COLUMN}`,
  ];
}

/**
 * Fixed header plus one row per suspicious record, numbered by data row
 */
export function buildSuspiciousTable(
  suspicious: readonly SuspiciousRow[],
  labels: Pick<ReportLabels, 'a' | 'b'>
): Table {
  return [
    suspiciousHeader(labels),
    ...suspicious.map(({ row, values }) => [
      String(row),
      ...values.PMCID,
      ...values.PMID,
      ...values.DOI,
      ...values.title,
    ]),
  ];
}
