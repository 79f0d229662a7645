/**
 * Error exports for diff-core
 */

export { ReconcileError } from './reconcile-error.js';
export type {
  ReconcileErrorCode,
  ReconcileErrorContext,
  ReconcileErrorDetails,
} from './reconcile-error.js';
