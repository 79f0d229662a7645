/**
 * @tablediff/diff-core
 *
 * Reconciles two tables derived from a shared original: header alignment,
 * column filtering, identifier-based row classification, per-cell
 * comparison and report rendering.
 */

// Types
export * from './types/index.js';

// Errors
export { ReconcileError } from './errors/index.js';
export type {
  ReconcileErrorCode,
  ReconcileErrorContext,
  ReconcileErrorDetails,
} from './errors/index.js';

// Headers
export { buildSynonymMap, isAcceptedVariant, reconcileHeaders } from './headers/index.js';
export type { SynonymMap, HeaderLabels } from './headers/index.js';

// Columns
export {
  REQUIRED_COLUMNS,
  TITLE_COLUMN,
  applyWhitelist,
  byName,
  byPosition,
  deleteColumn,
  resolveColumn,
  resolveIdentifierPositions,
} from './columns/index.js';
export type { WhitelistResult } from './columns/index.js';

// Comparison
export {
  ACCESSION_PREFIX,
  BUILT_IN_COMPARATORS,
  COMPARATOR_NAMES,
  ComparatorRegistry,
  DifferenceAggregator,
  DifferenceMap,
  RowClassifier,
  accessionComparator,
  exactComparator,
  normalize,
  normalizedComparator,
  stripPrefixComparator,
} from './comparison/index.js';
export type { ComparatorFn, ComparatorLookup, DifferenceColumn } from './comparison/index.js';

// Report
export {
  buildDifferencesTable,
  buildSuspiciousTable,
  sheetRowNumber,
  suspiciousHeader,
} from './report/index.js';
export type { CrossReference, ReportLabels } from './report/index.js';

// Engine
export { ComparisonEngine, createComparisonEngine } from './engine/index.js';
export type { ComparisonResult } from './engine/index.js';
