/**
 * Barrel re-export for all provider adapters.
 */

// Adapter interface
export type { ProviderAdapter } from "./adapter.js";

// Ollama adapter (native /api/generate)
export { OllamaAdapter, DEFAULT_OLLAMA_BASE_URL } from "./ollama/index.js";
export type { OllamaAdapterOptions } from "./ollama/index.js";

// OpenAI-compatible adapter (Chat Completions API)
export { OpenAICompatibleAdapter } from "./openai-compatible/index.js";
export type { OpenAICompatibleAdapterOptions } from "./openai-compatible/index.js";
