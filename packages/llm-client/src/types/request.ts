/**
 * Request types for the model-service client.
 */

import type { ResponseFormatType } from "./enums.js";
import type { Message } from "./message.js";

/** Controls the format of the model's response. */
export interface ResponseFormat {
  readonly type: ResponseFormatType;
}

/**
 * The single input type for `complete()`.
 */
export interface Request {
  /** Required; provider's native model ID. */
  readonly model: string;
  /** Required; the conversation. */
  readonly messages: readonly Message[];
  /** Optional; uses default provider if omitted. */
  readonly provider?: string;
  /** Optional; text or json. */
  readonly response_format?: ResponseFormat;
  /** Sampling temperature. */
  readonly temperature?: number;
  /** Maximum tokens to generate. */
  readonly max_tokens?: number;
  /** Abort the HTTP call after this many milliseconds. */
  readonly timeout_ms?: number;
  /** Caller-provided abort signal. */
  readonly signal?: AbortSignal;
}
