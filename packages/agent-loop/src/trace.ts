/**
 * Human-readable rendering of orchestrator events and run outcomes.
 */

import type { AgentEvent } from "./events.js";
import type { RunOutcome } from "./orchestrator.js";
import { serializeResult } from "./system-prompt.js";

function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * One trace line per event, or undefined for events the trace skips.
 */
export function formatEvent(event: AgentEvent): string | undefined {
  switch (event.kind) {
    case "RUN_START":
      return (
        `[RUN] ${oneLine(event.data.question)} ` +
        `(max ${event.data.maxIterations} iterations; tools: ${event.data.tools.join(", ") || "none"})`
      );
    case "MODEL_REQUEST":
      return `[ITERATION ${event.data.iteration}] asking ${event.data.model}`;
    case "MODEL_RETRY":
      return `  [RETRY] attempt ${event.data.attempt} in ${Math.round(event.data.delayMs)}ms: ${event.data.error}`;
    case "MODEL_REPLY":
      return `  [MODEL] ${oneLine(event.data.text)}`;
    case "MALFORMED_REPLY":
      return `  [MALFORMED] ${event.data.problem}`;
    case "AMBIGUOUS_REPLY":
      return `  [AMBIGUOUS] reply matched several shapes; treated as ${event.data.chosen}`;
    case "TOOL_CALL_START":
      return `  [TOOL] ${event.data.toolName} ${JSON.stringify(event.data.arguments)}`;
    case "TOOL_CALL_END":
      return event.data.result.ok
        ? `  [RESULT] ${serializeResult(event.data.result)}`
        : `  [FAILED] ${event.data.result.errorKind}: ${event.data.result.message}`;
    case "LOOP_DETECTION":
      return `  [LOOP] ${event.data.message}`;
    case "RUN_END":
      return (
        `[RUN] ended: ${event.data.status} after ${event.data.iterationCount} iteration(s), ` +
        `${event.data.toolExecutions} tool execution(s)`
      );
    case "ERROR":
      return `[ERROR] ${event.data.errorName}: ${event.data.message}`;
    case "USER_INPUT":
    case "SCHEMA_VIOLATION":
    case "ITERATION_END":
      return undefined;
  }
}

/**
 * The closing block printed after a run. A fatal error is labelled as a
 * failure, never as an answer.
 */
export function formatOutcome(outcome: RunOutcome): string {
  switch (outcome.status) {
    case "answered":
      return ["=== FINAL ANSWER ===", outcome.answer].join("\n");
    case "refused":
      return ["=== FINAL ANSWER ===", `The model declined to answer: ${outcome.reason}`].join(
        "\n",
      );
    case "iteration_limit_exceeded":
      return [
        "=== FINAL ANSWER ===",
        `No answer: the iteration limit was reached after ${outcome.iterationCount} iteration(s).`,
      ].join("\n");
    case "cancelled":
      return [
        "=== FINAL ANSWER ===",
        `No answer: the run was cancelled after ${outcome.iterationCount} iteration(s).`,
      ].join("\n");
    case "fatal_error":
      return [
        "=== FAILURE ===",
        `The model service failed (${outcome.error.errorName}): ${outcome.error.message}`,
      ].join("\n");
  }
}
