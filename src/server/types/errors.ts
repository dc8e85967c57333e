/**
 * Centralized error type definitions for DeepSearch
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  PROVIDER_EMPTY = 'PROVIDER_EMPTY',
  POLICY_DISALLOWED = 'POLICY_DISALLOWED',
  FETCH_TIMEOUT = 'FETCH_TIMEOUT',
  FETCH_TRANSPORT_ERROR = 'FETCH_TRANSPORT_ERROR',
  UNPARSEABLE_CONTENT = 'UNPARSEABLE_CONTENT',
  SIGNAL_ANALYSIS_ERROR = 'SIGNAL_ANALYSIS_ERROR',
  INVALID_SEARCH_OPTIONS = 'INVALID_SEARCH_OPTIONS',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  REPUTATION_TABLE_INVALID = 'REPUTATION_TABLE_INVALID',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  /** Operational errors degrade a document or a run; the rest are programming faults */
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The search service could not be reached after its retry policy. Aborts the run.
 */
export class ProviderUnavailableError extends AppError {
  constructor(provider: string, message: string, context?: Record<string, unknown>) {
    super(`Search provider ${provider} unavailable: ${message}`, ErrorCode.PROVIDER_UNAVAILABLE, true, {
      provider,
      ...context,
    });
  }
}

/**
 * The search service answered with zero hits.
 */
export class ProviderEmptyError extends AppError {
  constructor(provider: string, query: string) {
    super(`Search provider ${provider} returned no hits`, ErrorCode.PROVIDER_EMPTY, true, { provider, query });
  }
}

/**
 * The crawl policy forbids the URL. Recorded on a skipped outcome, never thrown past the fetcher.
 */
export class PolicyDisallowedError extends AppError {
  constructor(url: string) {
    super(`Fetching ${url} is disallowed by robots.txt`, ErrorCode.POLICY_DISALLOWED, true, { url });
  }
}

export class FetchTimeoutError extends AppError {
  constructor(url: string, timeoutMs: number) {
    super(`Fetching ${url} timed out after ${timeoutMs}ms`, ErrorCode.FETCH_TIMEOUT, true, { url, timeoutMs });
  }
}

export class FetchTransportError extends AppError {
  /** Short machine-readable reason, e.g. `transport` or `http_503` */
  public readonly reason: string;

  constructor(url: string, reason: string, message: string, context?: Record<string, unknown>) {
    super(`Fetching ${url} failed: ${message}`, ErrorCode.FETCH_TRANSPORT_ERROR, true, { url, reason, ...context });
    this.reason = reason;
  }
}

export class UnparseableContentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.UNPARSEABLE_CONTENT, true, context);
  }
}

export class SignalAnalysisError extends AppError {
  constructor(signal: string, cause: unknown) {
    super(
      `Signal ${signal} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.SIGNAL_ANALYSIS_ERROR,
      true,
      { signal }
    );
  }
}

export class InvalidSearchOptionsError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_SEARCH_OPTIONS, true, context);
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid pipeline transition ${from} -> ${to}`, ErrorCode.INVALID_STATE_TRANSITION, false, { from, to });
  }
}

export class ReputationTableError extends AppError {
  constructor(source: string, message: string) {
    super(`Domain reputation table ${source} is invalid: ${message}`, ErrorCode.REPUTATION_TABLE_INVALID, true, {
      source,
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message of an unknown thrown value, for log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
