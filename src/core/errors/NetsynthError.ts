/**
 * Core error handling for netsynth
 *
 * Every failure the library raises is a NetsynthError carrying:
 * - a structured error code for the failure category
 * - an optional context record describing the offending values
 */

/**
 * Error codes covering every failure category in netsynth
 */
export enum ErrorCode {
  // Caller errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Model errors
  NUMERIC_DEGENERACY = 'NUMERIC_DEGENERACY',

  // Data errors
  INVALID_DATA = 'INVALID_DATA',
  DATA_QUALITY = 'DATA_QUALITY',
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',

  // System errors
  IO_ERROR = 'IO_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class for netsynth with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new NetsynthError(
 *   ErrorCode.INVALID_ARGUMENT,
 *   'Sample count must be a positive integer',
 *   { sampleCount: 0 }
 * );
 * ```
 */
export class NetsynthError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional values for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'NetsynthError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetsynthError);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

export function isNetsynthError(error: unknown): error is NetsynthError {
  return error instanceof NetsynthError;
}

/**
 * Wrap an unknown thrown value as a NetsynthError.
 * NetsynthErrors pass through unchanged.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): NetsynthError {
  if (isNetsynthError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new NetsynthError(code, message, context);
}
