/**
 * Ollama provider adapter (native `/api/generate` endpoint).
 */

import type { ProviderAdapter } from "../adapter.js";
import type { Request, Response } from "../../types/index.js";
import { httpPost, mapHttpError } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

export interface OllamaAdapterOptions {
  baseUrl?: string;
  providerName?: string;
  defaultHeaders?: Record<string, string>;
}

export class OllamaAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: OllamaAdapterOptions = {}) {
    this.name = options.providerName ?? "ollama";
    this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/$/, "");
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  async complete(request: Request): Promise<Response> {
    const body = translateRequest(request);
    const url = `${this.baseUrl}/api/generate`;

    const httpRes = await httpPost(url, body, this.defaultHeaders, {
      timeout: request.timeout_ms,
      signal: request.signal,
    });

    if (httpRes.status < 200 || httpRes.status >= 300) {
      throw mapHttpError(
        httpRes.status,
        httpRes.body ?? httpRes.text,
        this.name,
        httpRes.headers,
      );
    }

    return translateResponse(httpRes.body, this.name, request.model);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export type { OllamaGenerateBody } from "./translate-request.js";
