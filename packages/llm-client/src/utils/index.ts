/**
 * Barrel re-export for provider utility modules.
 */

// HTTP client wrapper
export { httpPost, mergeHeaders, isRecord } from "./http.js";
export type { HttpResponse, HttpRequestOptions } from "./http.js";

// Retry utility
export { retry, calculateDelay, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Error mapping utility
export { mapHttpError } from "./error-mapping.js";
