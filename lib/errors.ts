/**
 * Typed error classes for the collection pipeline.
 *
 * Fetch and parse errors are absorbed by the source pipeline and surface only
 * as `{ category, message }` entries in run metrics. `ConfigurationError` is
 * the one error meant to stop a caller, and it is raised at load time.
 */

export type ErrorCategory = 'transient' | 'permanent' | 'parse' | 'cancelled' | 'unavailable';

/**
 * Base error class for all collector errors
 */
export class CollectorError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** URL being processed when the error occurred */
  readonly url?: string;

  constructor(message: string, options?: { code?: string; cause?: Error; url?: string }) {
    // Original error travels as the standard `cause`
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CollectorError';
    this.code = options?.code ?? 'COLLECTOR_ERROR';
    this.url = options?.url;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Retryable fetch failure: timeout, 5xx, rate-limit status, connection reset
 */
export class TransientFetchError extends CollectorError {
  /** HTTP status code if the server answered */
  readonly statusCode?: number;
  /** Delay requested by the server via Retry-After (ms) */
  readonly retryAfter?: number;

  constructor(
    message: string,
    options: { url?: string; statusCode?: number; retryAfter?: number; cause?: Error; code?: string } = {}
  ) {
    super(message, { ...options, code: options.code ?? 'TRANSIENT_FETCH_ERROR' });
    this.name = 'TransientFetchError';
    this.statusCode = options.statusCode;
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Thrown when a single attempt exceeds its timeout
 */
export class RequestTimeoutError extends TransientFetchError {
  /** Timeout duration in milliseconds */
  readonly timeout: number;

  constructor(message: string, options: { timeout: number; url?: string; cause?: Error }) {
    super(message, { code: 'REQUEST_TIMEOUT', ...options });
    this.name = 'RequestTimeoutError';
    this.timeout = options.timeout;
  }
}

/**
 * Non-retryable fetch failure (4xx other than rate limiting)
 */
export class PermanentFetchError extends CollectorError {
  readonly statusCode?: number;

  constructor(message: string, options: { url?: string; statusCode?: number; cause?: Error } = {}) {
    super(message, { code: 'PERMANENT_FETCH_ERROR', ...options });
    this.name = 'PermanentFetchError';
    this.statusCode = options.statusCode;
  }
}

/**
 * Thrown when a request or a rate-limiter wait is aborted via AbortSignal
 */
export class RequestAbortedError extends CollectorError {
  constructor(message = 'Request was aborted', options?: { url?: string }) {
    super(message, { code: 'REQUEST_ABORTED', ...options });
    this.name = 'RequestAbortedError';
  }
}

/**
 * Malformed feed or HTML document
 */
export class ParseError extends CollectorError {
  /** Which parser rejected the payload */
  readonly format: 'feed' | 'html';

  constructor(message: string, options: { format: 'feed' | 'html'; url?: string; cause?: Error }) {
    super(message, { code: 'PARSE_ERROR', ...options });
    this.name = 'ParseError';
    this.format = options.format;
  }
}

/**
 * Invalid configuration, detected once at load time
 */
export class ConfigurationError extends CollectorError {
  /** Human-readable issue list, one per invalid field */
  readonly issues: string[];

  constructor(message: string, options: { issues: string[]; cause?: Error }) {
    super(message, { code: 'INVALID_CONFIGURATION', cause: options.cause });
    this.name = 'ConfigurationError';
    this.issues = options.issues;
  }
}

/**
 * Type guard to check if an error is a CollectorError
 */
export function isCollectorError(error: unknown): error is CollectorError {
  return error instanceof CollectorError;
}

/**
 * Type guard to check if error was caused by abort
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof RequestAbortedError) return true;
  if (error instanceof Error && error.name === 'AbortError') return true;
  return false;
}

/**
 * Map any error to the category reported in run metrics
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (isAbortError(error)) return 'cancelled';
  if (error instanceof TransientFetchError) return 'transient';
  if (error instanceof PermanentFetchError) return 'permanent';
  if (error instanceof ParseError) return 'parse';
  return 'transient';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
