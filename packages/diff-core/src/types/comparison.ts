/**
 * Comparison run types
 */

import type { LabeledTable, Table } from '@tablediff/core';

/** Names of the built-in comparators selectable from settings */
export type ComparatorName = 'normalized' | 'exact' | 'accession';

/** Minimal logging surface the engine writes diagnostics to */
export interface EngineLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
}

/** Run configuration, already merged and validated */
export interface ComparisonSettings {
  /** Columns to keep; everything else is deleted from A and B */
  whitelist?: readonly string[];
  /** Groups of interchangeable header names */
  synonymGroups?: readonly (readonly string[])[];
  /** Comparator overrides by column name (resolved against A's header) */
  columnComparators?: Readonly<Record<string, ComparatorName>>;
  /** Log the three headers after whitelisting */
  printHeaders?: boolean;
}

export interface ComparisonInput {
  a: LabeledTable;
  b: LabeledTable;
  original: LabeledTable;
  settings?: ComparisonSettings;
}

/** Run statistics */
export interface ComparisonSummary {
  /** Rows in the original table, header included */
  originalRowCount: number;
  /** Rows in table A, header included */
  aRowCount: number;
  /** Rows in table B, header included */
  bRowCount: number;
  /** Data rows visited (A's data rows) */
  comparedRowCount: number;
  /** Comparable rows that went through cell comparison */
  processedCount: number;
  suspiciousCount: number;
  /** Total disagreeing cells */
  differenceCount: number;
}

/** The two rendered output tables */
export interface ComparisonReport {
  differences: Table;
  suspicious: Table;
}
