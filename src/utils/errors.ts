import type { ErrorCode, ErrorEntry } from '../types';

/**
 * 🧱 Base class for application-specific errors.
 * All operational errors should extend this.
 */
export class ApiError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code: string;

  constructor(statusCode: number, message: string, code = 'API_ERROR', isOperational = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

/**
 * 🕵️ Not found error (404)
 * Example: `throw new NotFoundError('Job abc')`
 */
export class NotFoundError extends ApiError {
  constructor(resource = 'Resource') {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * 🧾 Request rejected before any job is created.
 */
export class ValidationError extends ApiError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(400, message, 'INVALID_PARAMS');
    this.name = 'ValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * ⚔️ A compare-and-update lost: the job is no longer in the expected status.
 * Callers re-read and decide again.
 */
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, message, 'CONFLICT');
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * 🚧 Transition outside the job lifecycle (or one that breaks a job invariant).
 */
export class IllegalTransitionError extends ApiError {
  constructor(message: string) {
    super(409, message, 'ILLEGAL_TRANSITION');
    this.name = 'IllegalTransitionError';
    Object.setPrototypeOf(this, IllegalTransitionError.prototype);
  }
}

// ---------------------------------------------------------------------------
// Fetch errors
// ---------------------------------------------------------------------------

export type TransientFetchCode = Extract<ErrorCode, 'RATE_LIMITED' | 'NETWORK' | 'PROXY' | 'TIMEOUT'>;
export type FatalFetchCode = Extract<ErrorCode, 'BLOCKED' | 'NOT_FOUND'>;

export abstract class FetchError extends Error {
  public abstract readonly retryable: boolean;
  public readonly details: string | null;

  protected constructor(
    public readonly code: TransientFetchCode | FatalFetchCode,
    message: string,
    details: string | null = null,
  ) {
    super(message);
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Retried at page granularity. */
export class TransientFetchError extends FetchError {
  public readonly retryable = true;

  constructor(
    code: TransientFetchCode,
    message: string,
    details: string | null = null,
    public readonly retryAfterMs: number | null = null,
  ) {
    super(code, message, details);
    this.name = 'TransientFetchError';
  }
}

/** Aborts the whole job. */
export class FatalFetchError extends FetchError {
  public readonly retryable = false;

  constructor(code: FatalFetchCode, message: string, details: string | null = null) {
    super(code, message, details);
    this.name = 'FatalFetchError';
  }
}

// ---------------------------------------------------------------------------
// Delivery errors
// ---------------------------------------------------------------------------

/**
 * 📮 Failure of a single webhook attempt. Never escapes the dispatcher.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly httpStatus: number | null = null,
    public readonly errorClass = 'DeliveryError',
  ) {
    super(message);
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Builds a job error entry. Fetch errors keep their own code and details.
 */
export const toErrorEntry = (error: unknown, occurredAt: Date, fatal?: boolean): ErrorEntry => {
  if (error instanceof FetchError) {
    return {
      code: error.code,
      message: error.message,
      details: error.details,
      occurredAt: occurredAt.toISOString(),
      fatal: fatal ?? !error.retryable,
    };
  }

  return {
    code: 'INTERNAL_ERROR',
    message: errorMessage(error),
    details: error instanceof Error ? error.name : null,
    occurredAt: occurredAt.toISOString(),
    fatal: fatal ?? true,
  };
};

export const errorEntry = (
  code: ErrorCode,
  message: string,
  occurredAt: Date,
  options: { details?: string | null; fatal?: boolean } = {},
): ErrorEntry => ({
  code,
  message,
  details: options.details ?? null,
  occurredAt: occurredAt.toISOString(),
  fatal: options.fatal ?? false,
});
