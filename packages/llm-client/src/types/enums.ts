/**
 * Core enums for the model-service client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The roles a plain-text conversation needs. */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Input from the host application or the end user. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// ResponseFormatType
// ---------------------------------------------------------------------------

/** What shape of output the request asks the provider for. */
export const ResponseFormatType = {
  TEXT: "text",
  /** Provider-side JSON mode (Ollama `format: "json"`, OpenAI `json_object`). */
  JSON: "json",
} as const satisfies Record<string, string>;

export type ResponseFormatType =
  (typeof ResponseFormatType)[keyof typeof ResponseFormatType];
