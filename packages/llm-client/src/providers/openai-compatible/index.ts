/**
 * OpenAI-compatible provider adapter for the Chat Completions API.
 *
 * Uses the /v1/chat/completions endpoint with the standard chat format.
 */

import type { ProviderAdapter } from "../adapter.js";
import type { Request, Response } from "../../types/index.js";
import { httpPost, mapHttpError, mergeHeaders } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export interface OpenAICompatibleAdapterOptions {
  /** Optional; local servers usually need none. */
  apiKey?: string;
  baseUrl: string;
  providerName?: string;
  defaultHeaders?: Record<string, string>;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: OpenAICompatibleAdapterOptions) {
    this.name = options.providerName ?? "openai-compatible";
    this.apiKey = options.apiKey ?? "";
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return mergeHeaders(headers, this.defaultHeaders);
  }

  async complete(request: Request): Promise<Response> {
    const body = translateRequest(request);
    const url = `${this.baseUrl}/v1/chat/completions`;

    const httpRes = await httpPost(url, body, this.buildHeaders(), {
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
export type {
  ChatCompletionMessage,
  ChatCompletionRequestBody,
} from "./translate-request.js";
