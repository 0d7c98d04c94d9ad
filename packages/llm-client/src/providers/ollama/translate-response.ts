/**
 * Translate an Ollama `/api/generate` response into the unified Response.
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
  if (!isRecord(raw) || typeof raw["response"] !== "string") {
    throw new InvalidResponseError(
      `${providerName} returned a body without a "response" string`,
    );
  }

  const model = typeof raw["model"] === "string" ? raw["model"] : requestedModel;
  const createdAt =
    typeof raw["created_at"] === "string" ? raw["created_at"] : String(Date.now());

  return {
    id: `${providerName}-${createdAt}`,
    model,
    provider: providerName,
    text: raw["response"].trim(),
    finish_reason: mapFinishReason(raw["done_reason"]),
    usage: new Usage({
      input_tokens: count(raw["prompt_eval_count"]),
      output_tokens: count(raw["eval_count"]),
    }),
  };
}
