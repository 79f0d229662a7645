/**
 * RowClassifier
 *
 * A row is comparable when at least one of PMCID, PMID and DOI agrees
 * between the two tables. When all three disagree the rows most likely
 * describe different records and the row is suspicious.
 */

import type { Row } from '@tablediff/core';
import type {
  CellPair,
  IdentifierColumn,
  IdentifierPositions,
  RowClassification,
} from '../types/index.js';
import type { ComparatorLookup } from './comparator-registry.js';

const IDENTIFIER_COLUMNS: readonly IdentifierColumn[] = ['PMCID', 'PMID', 'DOI'];

export class RowClassifier {
  constructor(
    private readonly comparators: ComparatorLookup,
    private readonly positions: IdentifierPositions
  ) {}

  /**
   * Classify data row `row` (header being row 0)
   */
  classify(row: number, aRow: Row, bRow: Row): RowClassification {
    const corroborated = IDENTIFIER_COLUMNS.some((column) => {
      const position = this.positions[column];
      return this.comparators.compare(position, aRow[position] ?? '', bRow[position] ?? '');
    });

    if (corroborated) {
      return { kind: 'comparable', row };
    }

    const pair = (position: number): CellPair => [aRow[position] ?? '', bRow[position] ?? ''];

    return {
      kind: 'suspicious',
      row,
      suspicious: {
        row,
        values: {
          PMCID: pair(this.positions.PMCID),
          PMID: pair(this.positions.PMID),
          DOI: pair(this.positions.DOI),
          title: pair(this.positions.title),
        },
      },
    };
  }
}
