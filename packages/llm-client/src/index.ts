export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export provider utilities
export * from "./utils/index.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Re-export Client class and related types
export { Client } from "./client.js";
export type { ClientConfig, CompletionClient, Middleware } from "./client.js";
