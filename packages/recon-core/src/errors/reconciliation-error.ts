/**
 * Reconciliation Error Types
 */

export type ReconciliationErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_RUN_STATE'
  | 'RECONCILIATION_ERROR'
  | 'RUN_LOG_ERROR'
  | 'DISCREPANCY_LOG_ERROR';

export interface ReconciliationErrorDetails {
  code: ReconciliationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconciliationErrorDetails) {
    super(details.message);
    this.name = 'ReconciliationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for operator-facing output
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

/**
 * Shorthand for the validation failures raised throughout the engine
 */
export function validationError(
  message: string,
  context?: Record<string, unknown>
): ReconciliationError {
  return new ReconciliationError({ code: 'VALIDATION_ERROR', message, context });
}
