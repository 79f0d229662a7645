/**
 * Report module exports
 */

export {
  buildDifferencesTable,
  buildSuspiciousTable,
  sheetRowNumber,
  suspiciousHeader,
} from './report-builder.js';
export type { CrossReference, ReportLabels } from './report-builder.js';
