/**
 * Transfer Errors
 *
 * Every failure the pipeline distinguishes. API clients map HTTP responses
 * onto these; the Import Stage decides per class whether the run continues.
 */

export type TransferErrorCode =
  | 'api_error'
  | 'authentication'
  | 'not_found'
  | 'validation_mismatch'
  | 'rate_limited'
  | 'transient'
  | 'permanent_write'
  | 'cancelled'
  | 'snapshot_integrity';

export class TransferError extends Error {
  readonly code: TransferErrorCode;

  constructor(code: TransferErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferError';
    this.code = code;
  }
}

// ─── API errors ──────────────────────────────────────────────

export interface ApiErrorDetails {
  status?: number;
  /** Server-advised wait before retrying */
  retryAfterMs?: number;
  cause?: unknown;
}

export class ApiError extends TransferError {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, details: ApiErrorDetails = {}, code: TransferErrorCode = 'api_error') {
    super(code, message, { cause: details.cause });
    this.name = 'ApiError';
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/** Bad or expired token, or missing scope. */
export class AuthenticationError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, 'authentication');
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, 'rate_limited');
    this.name = 'RateLimitError';
  }
}

/** 5xx, timeout or network failure on any call. */
export class TransientApiError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, 'transient');
    this.name = 'TransientApiError';
  }
}

/** 5xx, timeout or network failure on a mutating call. */
export class TransientWriteError extends TransientApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details);
    this.name = 'TransientWriteError';
  }
}

/** 4xx on a mutating call: the request itself is wrong, retrying will not help. */
export class PermanentWriteError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details, 'permanent_write');
    this.name = 'PermanentWriteError';
  }
}

// ─── Pipeline errors ─────────────────────────────────────────

export class ValidationMismatchError extends TransferError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super('validation_mismatch', `Source and destination do not look related: ${reasons.join('; ')}`);
    this.name = 'ValidationMismatchError';
    this.reasons = reasons;
  }
}

export class TransferCancelledError extends TransferError {
  constructor(message = 'Transfer cancelled') {
    super('cancelled', message);
    this.name = 'TransferCancelledError';
  }
}

export class SnapshotIntegrityError extends TransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('snapshot_integrity', message, options);
    this.name = 'SnapshotIntegrityError';
  }
}

// ─── Classification ──────────────────────────────────────────

/**
 * Errors the Rate Limiter may retry.
 */
export function isRetryable(error: unknown): error is RateLimitError | TransientApiError {
  return error instanceof RateLimitError || error instanceof TransientApiError;
}

/**
 * Errors that abort the whole run instead of failing one entity.
 */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof RateLimitError ||
    error instanceof AuthenticationError ||
    error instanceof TransferCancelledError ||
    error instanceof SnapshotIntegrityError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Cancellation point: called between entities, never mid-call.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TransferCancelledError();
  }
}
