/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, ResponseFormatType } from "./enums.js";

// Message types
export type { Message } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  splitSystemMessages,
} from "./message.js";

// Request types
export type { Request, ResponseFormat } from "./request.js";

// Response types
export type { FinishReason, Response } from "./response.js";
export { Usage } from "./response.js";

// Error types
export type { ProviderErrorOptions } from "./errors.js";
export {
  isRetryableStatus,
  SDKError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  TransportError,
  RequestTimeoutError,
  AbortError,
  NetworkError,
  InvalidResponseError,
  ConfigurationError,
} from "./errors.js";
