/**
 * Column selection
 */

/**
 * Refers to a column either by its 0-based position or by its header name.
 * Resolved to a position once, against one table's header.
 */
export type ColumnSelector =
  | { kind: 'position'; position: number }
  | { kind: 'name'; name: string };

/** Names of the columns every input must carry */
export type IdentifierColumn = 'PMCID' | 'PMID' | 'DOI';

/** Positions of the identifying columns and the title, resolved from one header */
export interface IdentifierPositions {
  PMCID: number;
  PMID: number;
  DOI: number;
  title: number;
}
