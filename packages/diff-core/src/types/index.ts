/**
 * Type exports for diff-core
 */

export type {
  ColumnSelector,
  IdentifierColumn,
  IdentifierPositions,
} from './columns.js';

export type {
  CellPair,
  DifferenceRecord,
  IdentifierValues,
  SuspiciousRow,
  RowClassification,
} from './differences.js';

export type {
  ComparatorName,
  EngineLogger,
  ComparisonSettings,
  ComparisonInput,
  ComparisonSummary,
  ComparisonReport,
} from './comparison.js';
