/**
 * Error Classification System
 *
 * Typed error classes for classifying reconciliation failures by root cause.
 * The classification decides how an item-level failure is reported:
 *
 * - ValidationError → operator must fix answers/options in the document
 * - NotFoundError → target already absent; success for deletes
 * - TransientError → left for the next pass (or a retrying stepper)
 * - ConflictError → instance exists under different tracking; operator must resolve
 * - AuthError → host rejected credentials
 * - StateStoreError → fatal for the whole pass
 * - InternalError → unclassified throw, a bug in an adapter or in this code
 */

/** Error type enum for classification */
export type ErrorType =
  | 'validation'
  | 'not_found'
  | 'transient'
  | 'conflict'
  | 'auth'
  | 'state'
  | 'internal';

/** Base class for classified errors */
export abstract class ClassifiedError extends Error {
  abstract readonly type: ErrorType;

  /** Original error that caused this classified error */
  readonly cause?: Error;

  /** Adapter or component that produced this error */
  readonly source?: string;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;
    this.source = options?.source;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Convert to a plain object for serialization */
  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      name: this.name,
      message: this.message,
      source: this.source,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - the stepper rejected answers or options.
 *
 * Carries the offending field and the zero-based step index when the stepper
 * can name them. The message is surfaced verbatim in the report.
 */
export class ValidationError extends ClassifiedError {
  readonly type = 'validation' as const;

  /** Field the stepper complained about, if known */
  readonly field?: string;

  /** Zero-based index of the answers/options step, if known */
  readonly step?: number;

  constructor(
    message: string,
    options?: { cause?: Error; source?: string; field?: string; step?: number }
  ) {
    super(message, options);
    this.field = options?.field;
    this.step = options?.step;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      step: this.step,
    };
  }
}

/**
 * Not found - the target instance or flow no longer exists.
 *
 * Deletes treat it as success: the goal state (absence) already holds.
 */
export class NotFoundError extends ClassifiedError {
  readonly type = 'not_found' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Transient error - network failure, timeout, host unavailable.
 *
 * Reported and left for the next pass.
 * HTTP triggers: 5xx, 408, 429, connection refused
 */
export class TransientError extends ClassifiedError {
  readonly type = 'transient' as const;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: Error; source?: string; statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

/**
 * Conflict - the external system already has this integration under
 * different tracking (set up out of band). Never treated as success.
 */
export class ConflictError extends ClassifiedError {
  readonly type = 'conflict' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Authentication error - host rejected the access token.
 *
 * HTTP triggers: 401, 403
 */
export class AuthError extends ClassifiedError {
  readonly type = 'auth' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * State store failure - load/save/remove could not complete.
 *
 * Aborts the whole pass: no safe decision can be made without accurate prior state.
 */
export class StateStoreError extends ClassifiedError {
  readonly type = 'state' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Internal error - unclassified throw from an adapter or from our own code.
 */
export class InternalError extends ClassifiedError {
  readonly type = 'internal' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Check if an error is a ClassifiedError
 */
export function isClassifiedError(error: unknown): error is ClassifiedError {
  return error instanceof ClassifiedError;
}

/**
 * Check if an error is of a specific type
 */
export function isErrorType<T extends ErrorType>(
  error: unknown,
  type: T
): error is ClassifiedError & { type: T } {
  return isClassifiedError(error) && error.type === type;
}

/**
 * Classify an HTTP response error into typed error
 *
 * @param statusCode HTTP status code
 * @param message Error message
 * @param options Additional error options
 */
export function classifyHttpError(
  statusCode: number,
  message: string,
  options?: { cause?: Error; source?: string }
): ClassifiedError {
  if (statusCode === 400 || statusCode === 422) {
    return new ValidationError(message, options);
  }

  if (statusCode === 401 || statusCode === 403) {
    return new AuthError(message, options);
  }

  if (statusCode === 404) {
    return new NotFoundError(message, options);
  }

  if (statusCode === 409) {
    return new ConflictError(message, options);
  }

  if (statusCode >= 500 || statusCode === 408 || statusCode === 429) {
    // 5xx server errors, 408 timeout, 429 rate limit - all infrastructure
    return new TransientError(message, { ...options, statusCode });
  }

  return new InternalError(message, options);
}

/**
 * Wrap an error in a ClassifiedError if it isn't already classified.
 *
 * No pattern matching on messages: an adapter that throws an unclassified
 * error has a bug, so the result is an InternalError.
 *
 * @param err The error to wrap
 * @param source The adapter or component that produced the error
 */
export function ensureClassified(err: unknown, source?: string): ClassifiedError {
  if (isClassifiedError(err)) {
    return err;
  }

  const message =
    err instanceof Error
      ? err.message
      : typeof err === 'string'
        ? err
        : String(err);

  return new InternalError(
    source ? `Unclassified error in ${source}: ${message}` : `Unclassified error: ${message}`,
    { cause: err instanceof Error ? err : undefined, source }
  );
}
