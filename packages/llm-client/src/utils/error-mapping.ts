/**
 * Error mapping for provider HTTP responses.
 *
 * Maps HTTP status codes and response bodies onto the typed error hierarchy.
 * Ollama reports errors as `{ "error": "..." }`; OpenAI-style servers nest
 * them under `error.message`.
 */

import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
} from "../types/index.js";
import type { ProviderErrorOptions } from "../types/index.js";
import { isRecord } from "./http.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Try to extract a human-readable error message from a provider response body. */
function extractMessage(body: unknown): string {
  if (isRecord(body)) {
    const nested = body["error"];
    if (isRecord(nested) && typeof nested["message"] === "string") {
      return nested["message"];
    }
    if (typeof body["message"] === "string") {
      return body["message"];
    }
    if (typeof nested === "string") {
      return nested;
    }
  }

  if (typeof body === "string") return body;
  if (body === undefined) return "empty response body";
  return JSON.stringify(body);
}

/**
 * Parse the `Retry-After` header value (integer seconds only; dates are
 * uncommon for model servers).
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

/** Patterns checked against the message when the status code is ambiguous. */
const MESSAGE_PATTERNS: Array<{
  pattern: RegExp;
  classify: (message: string, opts: ProviderErrorOptions) => ProviderError;
}> = [
  {
    pattern: /not found|does not exist|try pulling it first/i,
    classify: (msg, opts) => new NotFoundError(msg, opts),
  },
  {
    pattern: /unauthorized|invalid (api )?key/i,
    classify: (msg, opts) => new AuthenticationError(msg, opts),
  },
];

function classifyByMessage(
  message: string,
  opts: ProviderErrorOptions,
): ProviderError | undefined {
  const match = MESSAGE_PATTERNS.find(({ pattern }) => pattern.test(message));
  return match?.classify(message, opts);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `ProviderError`.
 *
 * @param status  - HTTP status code from the provider response.
 * @param body    - Parsed JSON body (or raw text) from the response.
 * @param provider - Provider name (e.g. "ollama").
 * @param headers - Response headers (used to extract Retry-After).
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): ProviderError | RequestTimeoutError {
  const message = extractMessage(body);
  const opts: ProviderErrorOptions = {
    provider,
    status_code: status,
    retry_after: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
    case 413:
    case 422:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message);
    case 429:
      return new RateLimitError(message, opts);
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(message, opts);
  }

  // Unknown statuses default to retryable.
  return (
    classifyByMessage(message, opts) ??
    new ProviderError(message, { ...opts, retryable: true })
  );
}
