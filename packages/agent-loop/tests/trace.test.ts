import { describe, it, expect } from "vitest";
import { formatEvent, formatOutcome } from "../src/trace.js";
import type { RunOutcome } from "../src/orchestrator.js";

const base = { runId: "run-1", iterationCount: 2, toolExecutions: 1, transcript: [] };

describe("formatEvent", () => {
  it("renders the run header", () => {
    expect(
      formatEvent({
        kind: "RUN_START",
        runId: "run-1",
        timestamp: 0,
        data: { question: "What is\n2 + 2?", maxIterations: 5, tools: ["calculator", "web_fetch"] },
      }),
    ).toBe("[RUN] What is 2 + 2? (max 5 iterations; tools: calculator, web_fetch)");
  });

  it("renders tool results and failures", () => {
    expect(
      formatEvent({
        kind: "TOOL_CALL_END",
        runId: "run-1",
        timestamp: 0,
        data: { iteration: 1, toolName: "calculator", result: { ok: true, value: 4 } },
      }),
    ).toBe('  [RESULT] {"ok":true,"value":4}');
    expect(
      formatEvent({
        kind: "TOOL_CALL_END",
        runId: "run-1",
        timestamp: 0,
        data: {
          iteration: 1,
          toolName: "calculator",
          result: { ok: false, errorKind: "ToolExecutionFailure", message: "division by zero" },
        },
      }),
    ).toBe("  [FAILED] ToolExecutionFailure: division by zero");
  });

  it("rounds retry delays", () => {
    expect(
      formatEvent({
        kind: "MODEL_RETRY",
        runId: "run-1",
        timestamp: 0,
        data: { iteration: 1, attempt: 1, delayMs: 1234.56, error: "busy" },
      }),
    ).toBe("  [RETRY] attempt 1 in 1235ms: busy");
  });

  it("skips bookkeeping events", () => {
    expect(formatEvent({ kind: "ITERATION_END", runId: "run-1", timestamp: 0, data: { iterationCount: 1 } })).toBeUndefined();
    expect(formatEvent({ kind: "USER_INPUT", runId: "run-1", timestamp: 0, data: { content: "x" } })).toBeUndefined();
  });
});

describe("formatOutcome", () => {
  it.each<[RunOutcome, string]>([
    [{ ...base, status: "answered", answer: "4" }, "=== FINAL ANSWER ===\n4"],
    [
      { ...base, status: "refused", reason: "out of scope" },
      "=== FINAL ANSWER ===\nThe model declined to answer: out of scope",
    ],
    [
      { ...base, status: "iteration_limit_exceeded" },
      "=== FINAL ANSWER ===\nNo answer: the iteration limit was reached after 2 iteration(s).",
    ],
    [
      { ...base, status: "cancelled" },
      "=== FINAL ANSWER ===\nNo answer: the run was cancelled after 2 iteration(s).",
    ],
    [
      {
        ...base,
        status: "fatal_error",
        error: { errorName: "NetworkError", message: "connection refused" },
      },
      "=== FAILURE ===\nThe model service failed (NetworkError): connection refused",
    ],
  ])("renders %#", (outcome, expected) => {
    expect(formatOutcome(outcome)).toBe(expected);
  });
});
