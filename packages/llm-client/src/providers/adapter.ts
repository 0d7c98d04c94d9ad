/**
 * ProviderAdapter interface — the contract every model provider implements.
 */

import type { Request, Response } from "../types/index.js";

/**
 * Translates the unified Request/Response types to and from a provider's
 * native HTTP API.
 */
export interface ProviderAdapter {
  /** Provider name, e.g. "ollama", "openai-compatible". */
  readonly name: string;

  /**
   * Send a request and block until the model finishes.
   * Raises SDK errors; does not retry.
   */
  complete(request: Request): Promise<Response>;

  /**
   * Release resources (HTTP connections, etc.). Called by Client.close().
   */
  close?(): Promise<void>;
}
