/**
 * Translate a unified Request into the OpenAI Chat Completions format.
 *
 * For third-party endpoints that speak `/v1/chat/completions` (vLLM, LM
 * Studio, llama.cpp server, Ollama's compatibility layer).
 */

import {
  ResponseFormatType,
  type Request,
} from "../../types/index.js";

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" | "text" };
  stream?: false;
}

export function translateRequest(request: Request): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
  };

  if (request.temperature !== undefined) {
    body.temperature = request.temperature;
  }
  if (request.max_tokens !== undefined) {
    body.max_tokens = request.max_tokens;
  }
  if (request.response_format?.type === ResponseFormatType.JSON) {
    body.response_format = { type: "json_object" };
  }

  return body;
}
