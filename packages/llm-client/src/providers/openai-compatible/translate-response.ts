/**
 * Translate an OpenAI Chat Completions response into the unified Response.
 */

import {
  InvalidResponseError,
  Usage,
  type FinishReason,
  type Response,
} from "../../types/index.js";
import { isRecord } from "../../utils/http.js";

function mapFinishReason(raw: unknown): FinishReason {
  if (typeof raw !== "string") return { reason: "other" };

  switch (raw) {
    case "stop":
      return { reason: "stop", raw };
    case "length":
      return { reason: "length", raw };
    default:
      return { reason: "other", raw };
  }
}

function count(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

export function translateResponse(
  raw: unknown,
  providerName: string,
  requestedModel: string,
): Response {
  const choices = isRecord(raw) ? raw["choices"] : undefined;
  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(choice) ? choice["message"] : undefined;

  if (!isRecord(raw) || !isRecord(choice) || !isRecord(message)) {
    throw new InvalidResponseError(
      `${providerName} returned a body without choices[0].message`,
    );
  }

  const content = message["content"];
  const usage = raw["usage"];

  return {
    id: typeof raw["id"] === "string" ? raw["id"] : `${providerName}-${Date.now()}`,
    model: typeof raw["model"] === "string" ? raw["model"] : requestedModel,
    provider: providerName,
    text: typeof content === "string" ? content.trim() : "",
    finish_reason: mapFinishReason(choice["finish_reason"]),
    usage: new Usage(
      isRecord(usage)
        ? {
            input_tokens: count(usage["prompt_tokens"]),
            output_tokens: count(usage["completion_tokens"]),
          }
        : undefined,
    ),
  };
}
