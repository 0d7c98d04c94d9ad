/**
 * Translate a unified Request into Ollama's `/api/generate` body.
 *
 * `/api/generate` takes a single prompt plus a separate system field, so the
 * non-system messages are flattened into one labelled transcript.
 */

import {
  ResponseFormatType,
  Role,
  splitSystemMessages,
  type Message,
  type Request,
} from "../../types/index.js";

export interface OllamaGenerateBody {
  model: string;
  prompt: string;
  system?: string;
  stream: false;
  format?: "json";
  options?: {
    temperature?: number;
    num_predict?: number;
  };
}

function flatten(conversation: readonly Message[]): string {
  // A lone user message goes through verbatim.
  if (conversation.length === 1 && conversation[0]?.role === Role.USER) {
    return conversation[0].content;
  }
  return conversation
    .map((m) => `${m.role === Role.ASSISTANT ? "Assistant" : "User"}: ${m.content}`)
    .join("\n\n");
}

export function translateRequest(request: Request): OllamaGenerateBody {
  const { system, conversation } = splitSystemMessages(request.messages);

  const body: OllamaGenerateBody = {
    model: request.model,
    prompt: flatten(conversation),
    stream: false,
  };

  if (system) {
    body.system = system;
  }
  if (request.response_format?.type === ResponseFormatType.JSON) {
    body.format = "json";
  }

  const options: NonNullable<OllamaGenerateBody["options"]> = {};
  if (request.temperature !== undefined) {
    options.temperature = request.temperature;
  }
  if (request.max_tokens !== undefined) {
    options.num_predict = request.max_tokens;
  }
  if (Object.keys(options).length > 0) {
    body.options = options;
  }

  return body;
}
