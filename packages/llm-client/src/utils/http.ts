/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * Provides a JSON-oriented POST helper used by every provider adapter.
 * Transport failures are raised as typed SDK errors so the retry layer can
 * tell them apart from HTTP error statuses.
 */

import { AbortError, NetworkError, RequestTimeoutError } from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

export interface HttpRequestOptions {
  /** Request timeout in milliseconds. Combined with any user-provided signal. */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      Object.assign(merged, set);
    }
  }
  return merged;
}

function buildSignal(
  options?: HttpRequestOptions,
): AbortSignal | undefined {
  const signals: AbortSignal[] = [];

  if (options?.signal) {
    signals.push(options.signal);
  }
  if (options?.timeout != null && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

/**
 * Translate a rejected `fetch` into the SDK vocabulary.
 *
 * `AbortSignal.timeout` rejects with a `TimeoutError` DOMException; a caller
 * abort rejects with `AbortError`; everything else is a transport failure.
 */
function toTransportError(
  err: unknown,
  url: string,
  options?: HttpRequestOptions,
): Error {
  const name = err instanceof Error ? err.name : undefined;
  const detail = err instanceof Error ? err.message : String(err);

  if (name === "TimeoutError") {
    return new RequestTimeoutError(
      `Request to ${url} timed out after ${options?.timeout ?? 0}ms`,
      { cause: err },
    );
  }
  if (name === "AbortError") {
    return new AbortError(`Request to ${url} was aborted`, { cause: err });
  }
  return new NetworkError(`Request to ${url} failed: ${detail}`, { cause: err });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * On non-2xx status codes the promise still resolves -- it is the caller's
 * responsibility to inspect `status` and map it through `mapHttpError`.
 *
 * @throws {RequestTimeoutError} When the timeout elapses.
 * @throws {AbortError} When the caller's signal fires.
 * @throws {NetworkError} On DNS failures, refused connections and the like.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const merged = mergeHeaders(headers);
  const signal = buildSignal(options);

  let res: globalThis.Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: merged,
      body: JSON.stringify(body),
      signal,
    });
    text = await res.text();
  } catch (err) {
    throw toTransportError(err, url, options);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  return {
    status: res.status,
    headers: res.headers,
    body: parsed,
    text,
  };
}

/** Narrow an unknown JSON value to a plain record. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}
