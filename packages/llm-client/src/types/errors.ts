/**
 * Errors raised at the model-service boundary.
 *
 * The orchestrator only asks two things of an error: its `name`, which ends up
 * in the failure report, and `retryable`, which decides whether `retry()` gets
 * another attempt. Subclasses exist so callers can branch with `instanceof`;
 * each one takes its `name` from its class.
 */

export class SDKError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// Errors reported by a provider over HTTP
// ---------------------------------------------------------------------------

export interface ProviderErrorOptions {
  provider: string;
  status_code?: number;
  /** Seconds to wait, from `Retry-After`. */
  retry_after?: number;
  /** Parsed error body, when it was JSON. */
  raw?: Record<string, unknown>;
  cause?: unknown;
  /** Overrides the status-based default. */
  retryable?: boolean;
}

/** 408, 429 and 5xx are worth another attempt; other statuses are not. */
export function isRetryableStatus(status: number | undefined): boolean {
  return status === 408 || status === 429 || (status !== undefined && status >= 500);
}

export class ProviderError extends SDKError {
  readonly provider: string;
  readonly status_code?: number;
  readonly retry_after?: number;
  readonly raw?: Record<string, unknown>;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? isRetryableStatus(options.status_code),
    });
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
  }
}

/** 401, or a body that complains about the key. */
export class AuthenticationError extends ProviderError {}

/** 403. */
export class AccessDeniedError extends ProviderError {}

/** 404, or Ollama's "model not found, try pulling it first". */
export class NotFoundError extends ProviderError {}

/** 400, 413 and 422. */
export class InvalidRequestError extends ProviderError {}

/** 429. Retryable whatever status it was built with. */
export class RateLimitError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { retryable: true, ...options });
  }
}

/** 5xx. Retryable whatever status it was built with. */
export class ServerError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { retryable: true, ...options });
  }
}

// ---------------------------------------------------------------------------
// Errors raised on this side of the connection
// ---------------------------------------------------------------------------

/** The request never got an HTTP answer. Retryable. */
export class TransportError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
  }
}

export class RequestTimeoutError extends TransportError {}

/** Connection refused, DNS failure or socket reset. */
export class NetworkError extends TransportError {}

/** The caller's signal fired. */
export class AbortError extends SDKError {}

/** A 2xx answer whose body the adapter cannot read. */
export class InvalidResponseError extends SDKError {}

/** Unknown provider or no default provider. */
export class ConfigurationError extends SDKError {}
