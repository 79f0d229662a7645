/**
 * Table types shared by connectors and the diff engine
 */

/** A single row of string cells */
export type Row = string[];

/**
 * Rectangular grid of cells. Row 0 is the header row, rows 1..N are data rows.
 */
export type Table = Row[];

/** Column names, in table order */
export type Header = readonly string[];

/** A table together with the label used for it in logs and reports */
export interface LabeledTable {
  /** Display label, usually the file's base name */
  label: string;
  table: Table;
}
