// ============================================
// Toolgate configuration
// ============================================

import { DEFAULT_RETRY_POLICY } from "@toolgate/llm-client";
import { DEFAULT_MAX_ITERATIONS, DEFAULT_MODEL_TIMEOUT_MS } from "./orchestrator.js";
import { DEFAULT_TOOL_TIMEOUT_MS } from "./tool-executor.js";
import { DEFAULT_DOCS_DIR } from "./tools/search-docs.js";

export interface ToolgateConfig {
  /** Model identifier passed to the provider (e.g. llama3.2) */
  model: string;

  /** Provider name; the client's default when unset */
  provider: string | undefined;

  /** Model requests per question */
  maxIterations: number;

  /** Bound on one model request in milliseconds */
  modelTimeoutMs: number;

  /** Bound on one tool invocation in milliseconds */
  toolTimeoutMs: number;

  /** Retries of a failed model request (0 = single attempt) */
  modelRetries: number;

  /** Directory searched by search_docs (default: bundled samples) */
  docsDir: string;

  /** Accept tool_calls batches */
  allowMultipleToolCalls: boolean;
}

export const DEFAULT_MODEL = "llama3.2";

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables.
 * Call dotenv.config() before invoking this function.
 */
export function loadConfig(source: Env = process.env): ToolgateConfig {
  const env = (key: string, fallback: string): string => source[key]?.trim() || fallback;

  /** Integers at or above `min`; anything else falls back. */
  const envInt = (key: string, fallback: number, min = 1): number => {
    const raw = source[key]?.trim();
    if (!raw || !/^\d+$/.test(raw)) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return parsed >= min ? parsed : fallback;
  };

  const envBool = (key: string, fallback: boolean): boolean => {
    const raw = source[key]?.trim().toLowerCase();
    if (raw === "1" || raw === "true" || raw === "yes") return true;
    if (raw === "0" || raw === "false" || raw === "no") return false;
    return fallback;
  };

  return {
    model: env("TOOLGATE_MODEL", DEFAULT_MODEL),
    provider: source.TOOLGATE_PROVIDER?.trim() || undefined,
    maxIterations: envInt("TOOLGATE_MAX_ITERATIONS", DEFAULT_MAX_ITERATIONS),
    modelTimeoutMs: envInt("TOOLGATE_MODEL_TIMEOUT_MS", DEFAULT_MODEL_TIMEOUT_MS),
    toolTimeoutMs: envInt("TOOLGATE_TOOL_TIMEOUT_MS", DEFAULT_TOOL_TIMEOUT_MS),
    modelRetries: envInt("TOOLGATE_MODEL_RETRIES", DEFAULT_RETRY_POLICY.maxRetries, 0),
    docsDir: env("TOOLGATE_DOCS_DIR", DEFAULT_DOCS_DIR),
    allowMultipleToolCalls: envBool("TOOLGATE_PARALLEL_TOOLS", false),
  };
}
