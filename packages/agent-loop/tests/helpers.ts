/**
 * Shared test helpers: a scripted model client and transcript builders.
 */

import { Usage } from "@toolgate/llm-client";
import type { CompletionClient, Request, Response } from "@toolgate/llm-client";
import type { ToolResultTurn } from "../src/turns.js";
import type { ExecutionResult } from "../src/types.js";

export function textResponse(text: string): Response {
  return {
    id: "resp-test",
    model: "test-model",
    provider: "scripted",
    text,
    finish_reason: { reason: "stop" },
    usage: new Usage({ input_tokens: 10, output_tokens: 5 }),
  };
}

/**
 * Replays a fixed list of replies. An Error entry is thrown instead of
 * returned; running out of replies throws "No more scripted replies".
 */
export class ScriptedClient implements CompletionClient {
  readonly requests: Request[] = [];
  private _index = 0;

  constructor(private readonly _replies: readonly (string | Error)[]) {}

  async complete(request: Request): Promise<Response> {
    this.requests.push(request);
    const reply = this._replies[this._index];
    this._index += 1;
    if (reply === undefined) throw new Error("No more scripted replies");
    if (reply instanceof Error) throw reply;
    return textResponse(reply);
  }
}

export function toolCall(tool: string, args: Record<string, unknown>): string {
  return JSON.stringify({ tool, arguments: args });
}

export function done(answer: string): string {
  return JSON.stringify({ done: true, answer });
}

export function toolResultTurn(
  toolName: string,
  args: Record<string, unknown> = {},
  result: ExecutionResult = { ok: true, value: "ok" },
): ToolResultTurn {
  return { type: "tool_result", toolName, arguments: args, result, timestamp: 0 };
}
