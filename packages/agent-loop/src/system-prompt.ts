/**
 * Prompt assembly.
 *
 * Every model request carries the same system prompt (reply contract plus
 * tool catalog) followed by the transcript rendered as chat messages:
 *
 *   user       the question, tool results, corrective and steering notes
 *   assistant  the model's own earlier replies, verbatim
 */

import {
  createAssistantMessage,
  createSystemMessage,
  createUserMessage,
} from "@toolgate/llm-client";
import type { Message } from "@toolgate/llm-client";
import type { ExecutionResult, ParameterSpec, ToolDescriptor } from "./types.js";
import type { ToolResultTurn, Turn } from "./turns.js";

export interface PromptOptions {
  /** Describe the `tool_calls` batch shape as well. */
  allowMultipleToolCalls?: boolean;
  /** Host instructions appended after the catalog. */
  extraInstructions?: string;
}

const PREAMBLE =
  "You answer questions by calling the tools listed below. You cannot see " +
  "tool results until they are sent back to you, so never state a result " +
  "you have not received.";

/**
 * The legal reply shapes, stated the same way in the system prompt and in
 * every corrective instruction.
 */
export function describeReplyContract(allowMultipleToolCalls = false): string {
  const lines = [
    "Reply with exactly one JSON object and nothing else, in one of these shapes:",
    '- Call a tool: {"tool": "<tool name>", "arguments": {"<parameter>": <value>}}',
  ];
  if (allowMultipleToolCalls) {
    lines.push(
      '- Call several independent tools at once: {"tool_calls": [{"tool": "<tool name>", "arguments": {...}}, ...]}',
    );
  }
  lines.push(
    '- Give the final answer: {"done": true, "answer": "<answer text>"}',
    '- Decline the question: {"refuse": true, "reason": "<why>"}',
    "Use no other fields. Argument values must have the declared type: numbers as JSON numbers, not strings.",
  );
  return lines.join("\n");
}

function renderParameter(parameter: ParameterSpec): string {
  const facts: string[] = [parameter.type, parameter.required ? "required" : "optional"];
  if (parameter.enum !== undefined) {
    facts.push(`one of ${parameter.enum.map((value) => JSON.stringify(value)).join(", ")}`);
  }
  if (parameter.default !== undefined) {
    facts.push(`default ${JSON.stringify(parameter.default)}`);
  }
  const head = `  - ${parameter.name} (${facts.join(", ")})`;
  return parameter.description ? `${head}: ${parameter.description}` : head;
}

/**
 * Render the tool catalog in registry order.
 */
export function renderCatalog(tools: readonly ToolDescriptor[]): string {
  if (tools.length === 0) return "No tools are available.";

  const blocks = tools.map((tool) => {
    const lines = [`### ${tool.name}`, tool.description];
    if (tool.parameterContract.length === 0) {
      lines.push("Parameters: none");
    } else {
      lines.push("Parameters:", ...tool.parameterContract.map(renderParameter));
    }
    return lines.join("\n");
  });

  return ["## Available Tools", "", blocks.join("\n\n")].join("\n");
}

/**
 * Assemble the system prompt: preamble, reply contract, catalog and any
 * host instructions, separated by blank lines.
 */
export function buildSystemPrompt(
  tools: readonly ToolDescriptor[],
  options: PromptOptions = {},
): string {
  const parts = [
    PREAMBLE,
    describeReplyContract(options.allowMultipleToolCalls),
    renderCatalog(tools),
  ];
  const extra = options.extraInstructions?.trim();
  if (extra) parts.push(extra);
  return parts.join("\n\n");
}

/**
 * The instruction appended after a malformed reply.
 */
export function buildCorrection(problem: string, allowMultipleToolCalls = false): string {
  return `Your previous reply was rejected: ${problem}.\n${describeReplyContract(allowMultipleToolCalls)}`;
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "null";
  } catch {
    return JSON.stringify(String(value));
  }
}

/**
 * Serialize an execution result exactly as the model will see it.
 */
export function serializeResult(result: ExecutionResult): string {
  if (result.ok) {
    return `{"ok":true,"value":${stringify(result.value)}}`;
  }
  return stringify({ ok: false, error: result.errorKind, message: result.message });
}

export function renderToolResult(turn: ToolResultTurn): string {
  return `Result of ${turn.toolName} ${stringify(turn.arguments)}: ${serializeResult(turn.result)}`;
}

/**
 * Convert the transcript to chat messages, preceded by the system prompt.
 */
export function buildMessages(systemPrompt: string, transcript: readonly Turn[]): Message[] {
  const messages: Message[] = [createSystemMessage(systemPrompt)];

  for (const turn of transcript) {
    switch (turn.type) {
      case "user":
        messages.push(createUserMessage(turn.content));
        break;
      case "assistant":
        messages.push(createAssistantMessage(turn.content));
        break;
      case "tool_result":
        messages.push(createUserMessage(renderToolResult(turn)));
        break;
      case "corrective":
      case "steering":
        messages.push(createUserMessage(turn.content));
        break;
    }
  }

  return messages;
}
