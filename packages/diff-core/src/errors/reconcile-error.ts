/**
 * Reconciliation Error Types
 */

export type ReconcileErrorCode =
  | 'CONFIG_ERROR'
  | 'MISSING_REQUIRED_COLUMN'
  | 'COLUMN_COUNT_MISMATCH'
  | 'SYNONYM_COUNT_MISMATCH'
  | 'UNEXPECTED_HEADER_DIFFERENCE'
  | 'UNRECONCILED_HEADER_DIFFERENCE'
  | 'ROW_COUNT_EXCEEDED'
  | 'COLUMN_NOT_FOUND'
  | 'ROW_TOO_SHORT';

/** Where the problem is. Only the fields relevant to the code are set. */
export interface ReconcileErrorContext {
  /** Offending column name */
  column?: string;
  /** Column found at the same position in the other table */
  otherColumn?: string;
  /** 0-based column position */
  position?: number;
  /** Row index (header is row 0) */
  row?: number;
  /** Labels of the tables involved, A first */
  tables?: readonly [string, string];
  /** The two disagreeing values, A first */
  values?: readonly [string, string];
  /** Row or column counts of the two tables, A first */
  lengths?: readonly [number, number];
  /** Settings file that failed to load */
  file?: string;
}

export interface ReconcileErrorDetails {
  code: ReconcileErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: ReconcileErrorContext;
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly suggestion?: string;
  readonly context: ReconcileErrorContext;

  constructor(details: ReconcileErrorDetails) {
    super(details.message);
    this.name = 'ReconcileError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context ?? {};

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for the operator log
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
