/**
 * Difference and suspicious-row types
 */

/** Values of one cell in table A and table B, in that order */
export type CellPair = readonly [a: string, b: string];

/** One disagreeing cell */
export interface DifferenceRecord {
  /** 0-based column position (header order) */
  column: number;
  /** Row index, header being row 0 */
  row: number;
  values: CellPair;
}

/** Raw identifier and title values of one row, per table */
export interface IdentifierValues {
  PMCID: CellPair;
  PMID: CellPair;
  DOI: CellPair;
  title: CellPair;
}

/** A row whose identifiers all disagree, left out of cell comparison */
export interface SuspiciousRow {
  /** Row index, header being row 0 */
  row: number;
  values: IdentifierValues;
}

/** Outcome of classifying one row */
export type RowClassification =
  | { kind: 'comparable'; row: number }
  | { kind: 'suspicious'; row: number; suspicious: SuspiciousRow };
