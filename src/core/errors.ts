/**
 * Error Hierarchy for the Table Controller
 *
 * Usage errors (bad indexes, bad options, a disposed controller) are thrown
 * synchronously. Fetch errors are never thrown out of the fetch path; they are
 * normalized to FetchError and stored as controller state.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class TableError extends Error {
  public readonly name: string;
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  protected constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  public toString(): string {
    const contextStr = this.context
      ? ` | Context: ${JSON.stringify(this.context)}`
      : '';
    return `[${this.code}] ${this.name}: ${this.message}${contextStr}`;
  }
}

// ============================================================================
// Usage Errors
// ============================================================================

export class IndexOutOfRangeError extends TableError {
  public readonly index: number;
  public readonly length: number;

  public constructor(
    index: number,
    length: number,
    message?: string,
    context?: Record<string, unknown>
  ) {
    super(
      message ?? `Index ${index} is out of range for a dataset of ${length} items`,
      'TABLE_INDEX_OUT_OF_RANGE',
      { ...context, index, length }
    );
    this.index = index;
    this.length = length;
  }
}

export class ValidationError extends TableError {
  public readonly field?: string;
  public readonly validationErrors?: readonly string[];

  public constructor(
    message: string,
    field?: string,
    validationErrors?: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'TABLE_VALIDATION_ERROR', {
      ...context,
      field,
      validationErrors,
    });
    this.field = field;
    this.validationErrors = validationErrors;
  }
}

export class ConfigValidationError extends TableError {
  public readonly field?: string;

  public constructor(
    message: string,
    field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'TABLE_CONFIG_VALIDATION_ERROR', { ...context, field, subtype: 'config' });
    this.field = field;
  }
}

export class ControllerStateError extends TableError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TABLE_CONTROLLER_STATE', context);
  }
}

// ============================================================================
// Fetch Errors
// ============================================================================

export class FetchError extends TableError {
  public readonly pageIndex: number;
  public readonly cause: unknown;

  public constructor(
    message: string,
    pageIndex: number,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'TABLE_FETCH_ERROR', { ...context, pageIndex });
    this.pageIndex = pageIndex;
    this.cause = cause;
  }
}

export class TimeoutError extends TableError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TABLE_TIMEOUT_ERROR', { ...context, subtype: 'timeout' });
  }
}

/**
 * Wraps whatever the fetch capability rejected with into a FetchError.
 * A FetchError is passed through untouched.
 */
export function toFetchError(error: unknown, pageIndex: number): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new FetchError(`Failed to fetch page ${pageIndex}: ${detail}`, pageIndex, error);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isTableError(error: unknown): error is TableError {
  return error instanceof TableError;
}

export function isIndexOutOfRangeError(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}
