/**
 * Loop detection for the orchestrator.
 *
 * Checks the most recent invocations in the transcript for a repeating
 * pattern: the same call over and over (AAAA) or two calls alternating
 * (ABAB). Calls are compared by tool name and canonical arguments.
 */

import type { Turn } from "./turns.js";

export const DEFAULT_LOOP_DETECTION_WINDOW = 4;

/** Containers below this depth are replaced by a marker in signatures. */
const MAX_SIGNATURE_DEPTH = 16;

function canonicalize(value: unknown, depth = 0): unknown {
  if (value == null || typeof value !== "object") return value;
  if (depth >= MAX_SIGNATURE_DEPTH) return "[nested]";
  if (Array.isArray(value)) return value.map((inner) => canonicalize(inner, depth + 1));
  return Object.fromEntries(
    Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, inner]) => [key, canonicalize(inner, depth + 1)]),
  );
}

/**
 * Identity of one invocation, independent of argument key order.
 */
export function invocationSignature(
  toolName: string,
  args: Readonly<Record<string, unknown>>,
): string {
  return `${toolName}:${JSON.stringify(canonicalize(args))}`;
}

/**
 * Detect repeating patterns over the last `windowSize` invocations.
 *
 * Returns false while fewer invocations than the window have happened, and
 * always when `windowSize` is zero or negative.
 */
export function detectLoop(
  transcript: readonly Turn[],
  windowSize: number = DEFAULT_LOOP_DETECTION_WINDOW,
): boolean {
  if (windowSize <= 1) return false;

  const signatures: string[] = [];
  for (const turn of transcript) {
    if (turn.type === "tool_result") {
      signatures.push(invocationSignature(turn.toolName, turn.arguments));
    }
  }

  if (signatures.length < windowSize) {
    return false;
  }
  const recent = signatures.slice(-windowSize);

  for (const patternLen of [1, 2]) {
    if (windowSize % patternLen !== 0) continue;
    if (recent.every((signature, i) => signature === recent[i % patternLen])) {
      return true;
    }
  }

  return false;
}
