/**
 * Resolution of the identifying columns every input must carry
 */

import type { Header } from '@tablediff/core';
import type { IdentifierPositions } from '../types/index.js';
import { ReconcileError } from '../errors/index.js';

export const TITLE_COLUMN = 'Article title';

export const REQUIRED_COLUMNS = ['DOI', 'PMID', 'PMCID', TITLE_COLUMN] as const;

function requirePosition(header: Header, column: string, label: string): number {
  const position = header.indexOf(column);
  if (position === -1) {
    throw new ReconcileError({
      code: 'MISSING_REQUIRED_COLUMN',
      message: `${label} has no '${column}' column. All inputs need ${REQUIRED_COLUMNS.map((c) => `'${c}'`).join(', ')} column headers.`,
      suggestion: 'Add the column, or add it to WHITELIST_COLUMNS if the whitelist removed it.',
      context: { column, tables: [label, label] },
    });
  }
  return position;
}

/**
 * Positions of PMCID, PMID, DOI and the title in `header`
 * @throws ReconcileError MISSING_REQUIRED_COLUMN
 */
export function resolveIdentifierPositions(header: Header, label: string): IdentifierPositions {
  return {
    DOI: requirePosition(header, 'DOI', label),
    PMID: requirePosition(header, 'PMID', label),
    PMCID: requirePosition(header, 'PMCID', label),
    title: requirePosition(header, TITLE_COLUMN, label),
  };
}
