/**
 * Example: answering a question with the built-in tools.
 *
 * This script demonstrates how to:
 *   1. Register a provider adapter with the Client
 *   2. Build a ToolRegistry from the built-in demo tools
 *   3. Run a question through the Orchestrator and print its trace
 *
 * NOTE: This example runs in "simulation mode": no model service is
 * required. A scripted adapter replays canned replies, including one
 * malformed reply and one contract violation, so every recovery path shows
 * up in the trace. Point the Client at Ollama (`Client.fromEnv()`) to use a
 * real model instead.
 *
 * Usage:
 *   npx tsx examples/run-example.ts
 */

import { Client, Usage } from "@toolgate/llm-client";
import type { ProviderAdapter, Request, Response } from "@toolgate/llm-client";
import {
  Orchestrator,
  ToolRegistry,
  builtinTools,
  formatEvent,
  formatOutcome,
} from "@toolgate/agent-loop";

// ---------------------------------------------------------------------------
// A provider adapter that replays canned replies
// ---------------------------------------------------------------------------

const REPLIES = [
  '{"tool": "web_fetch", "arguments": {"url": "https://www.nodejs.org", "extract": "title"}}',
  "The page title is probably 'Node'.",
  '{"tool": "calculator", "arguments": {"operation": "add", "a": "1991", "b": 35}}',
  '{"tool": "calculator", "arguments": {"operation": "add", "a": 1991, "b": 35}}',
  '{"done": true, "answer": "nodejs.org is titled \\"Node.js\\"; 1991 + 35 = 2026."}',
];

function createScriptedAdapter(replies: readonly string[]): ProviderAdapter {
  let index = 0;
  return {
    name: "scripted",
    async complete(request: Request): Promise<Response> {
      const text = replies[Math.min(index, replies.length - 1)] ?? "";
      index += 1;
      return {
        id: `scripted-${index}`,
        model: request.model,
        provider: "scripted",
        text,
        finish_reason: { reason: "stop" },
        usage: new Usage({ input_tokens: 0, output_tokens: 0 }),
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log("=== Toolgate Example ===\n");

  // 1. A client with one adapter and a middleware that counts requests
  let requests = 0;
  const client = new Client({
    providers: { scripted: createScriptedAdapter(REPLIES) },
    defaultProvider: "scripted",
    middleware: [
      async (request, next) => {
        requests += 1;
        return next(request);
      },
    ],
  });

  // 2. The orchestrator over the demo tools
  const orchestrator = new Orchestrator({
    registry: new ToolRegistry(builtinTools()),
    client,
    model: "scripted-model",
    maxIterations: 5,
  });

  orchestrator.events.onAny((event) => {
    const line = formatEvent(event);
    if (line !== undefined) console.log(line);
  });

  // 3. Run and print the outcome
  const outcome = await orchestrator.run(
    "What is the title of nodejs.org, and what is 1991 + 35?",
  );

  console.log("");
  console.log(formatOutcome(outcome));
  console.log(`\nModel requests: ${requests}`);
  console.log(`Transcript turns: ${outcome.transcript.length}`);

  await client.close();
}

main().catch((err) => {
  console.error("Example failed:", err);
  process.exit(1);
});
