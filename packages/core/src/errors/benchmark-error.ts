/**
 * Error type for call-contract violations.
 *
 * Problems inside annotation data never raise: they show up as score
 * degradation. These errors are for callers holding the API wrong.
 */

export type BenchmarkErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_OPTIONS'
  | 'INVALID_SCHEMA'
  | 'UNKNOWN_EVALUATOR'
  | 'UNKNOWN_SCHEMA'
  | 'CONFIGURATION_ERROR'
  | 'EVALUATION_FAILED';

export interface BenchmarkErrorDetails {
  /** Error code for programmatic handling */
  code: BenchmarkErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class BenchmarkError extends Error {
  readonly code: BenchmarkErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: BenchmarkErrorDetails) {
    super(details.message);
    this.name = 'BenchmarkError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error as a short, structured message
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
 * Helper to wrap unknown errors as BenchmarkError
 */
export function wrapError(
  error: unknown,
  defaultCode: BenchmarkErrorCode = 'EVALUATION_FAILED'
): BenchmarkError {
  if (error instanceof BenchmarkError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new BenchmarkError({
    code: defaultCode,
    message,
    cause,
  });
}
