/**
 * Response interpreter: classifies one raw model reply into a TurnIntent.
 *
 * The model is untrusted. Whatever it sends, `interpret` returns a value and
 * never throws; anything outside the legal reply shapes is `malformed`.
 *
 * Legal shapes:
 *
 *   {"tool": "<name>", "arguments": {...}}
 *   {"tool_calls": [{"tool": ..., "arguments": ...}, ...]}   (opt-in)
 *   {"done": true, "answer": "<text>"}
 *   {"refuse": true, "reason": "<text>"}
 *
 * When one object satisfies several shapes, refusal wins over completion,
 * which wins over a tool call; the intent is then marked `ambiguous`.
 */

import type { Invocation, TurnIntent } from "./types.js";

export interface InterpreterOptions {
  /** Accept the `tool_calls` batch shape. Default: false. */
  allowMultipleToolCalls?: boolean;
}

const SINGLE_CALL_KEYS: ReadonlySet<string> = new Set(["tool", "arguments"]);
const BASE_KEYS = new Set<string>([...SINGLE_CALL_KEYS, "done", "answer", "refuse", "reason"]);

/** Container levels allowed in `arguments`, the arguments object included. */
export const MAX_ARGUMENT_DEPTH = 8;

type Parsed<T> = { ok: true; value: T } | { ok: false; problem: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function nestsDeeperThan(value: unknown, levels: number): boolean {
  if (value == null || typeof value !== "object") return false;
  if (levels === 0) return true;
  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  return children.some((child) => nestsDeeperThan(child, levels - 1));
}

function tryParse(text: string): Parsed<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, problem: "the reply is not valid JSON" };
  }
}

/**
 * Locate the structured payload in a reply.
 *
 * The whole reply is tried first; failing that, the span from the first `{`
 * to the last `}`, which tolerates prose or code fences around one object.
 */
export function extractPayload(rawText: string): Parsed<unknown> {
  const text = rawText.trim();
  if (text === "") {
    return { ok: false, problem: "the reply was empty" };
  }

  const whole = tryParse(text);
  if (whole.ok) return whole;

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return { ok: false, problem: "the reply contains no JSON object" };
  }
  return tryParse(text.slice(start, end + 1));
}

function parseCall(value: unknown, where: string): Parsed<Invocation> {
  if (!isRecord(value)) {
    return { ok: false, problem: `${where} must be a JSON object` };
  }
  const tool = value["tool"];
  const args = value["arguments"];
  if (typeof tool !== "string" || tool.trim() === "") {
    return { ok: false, problem: `${where} needs a non-empty "tool" string` };
  }
  if (!isRecord(args)) {
    return { ok: false, problem: `${where} needs an "arguments" object` };
  }
  if (nestsDeeperThan(args, MAX_ARGUMENT_DEPTH)) {
    return {
      ok: false,
      problem: `${where} nests "arguments" deeper than ${MAX_ARGUMENT_DEPTH} levels`,
    };
  }
  return { ok: true, value: { toolName: tool, rawArguments: args } };
}

function parseBatch(value: unknown): Parsed<Invocation[]> {
  if (!Array.isArray(value) || value.length === 0) {
    return { ok: false, problem: '"tool_calls" must be a non-empty array' };
  }
  const invocations: Invocation[] = [];
  for (const [index, entry] of value.entries()) {
    const where = `tool_calls[${index}]`;
    if (isRecord(entry)) {
      const extra = Object.keys(entry).filter(
        (key) => !SINGLE_CALL_KEYS.has(key),
      );
      if (extra.length > 0) {
        return { ok: false, problem: `${where} has unrecognised field(s): ${extra.join(", ")}` };
      }
    }
    const call = parseCall(entry, where);
    if (!call.ok) return call;
    invocations.push(call.value);
  }
  return { ok: true, value: invocations };
}

function malformed(rawText: string, problem: string): TurnIntent {
  return { kind: "malformed", rawText, problem };
}

/**
 * Classify a raw model reply. Never throws.
 */
export function interpret(rawText: string, options: InterpreterOptions = {}): TurnIntent {
  const extracted = extractPayload(rawText);
  if (!extracted.ok) {
    return malformed(rawText, extracted.problem);
  }

  const payload = extracted.value;
  if (!isRecord(payload)) {
    return malformed(rawText, "the reply must be a single JSON object");
  }

  const allowed = new Set(BASE_KEYS);
  if (options.allowMultipleToolCalls) allowed.add("tool_calls");
  const unknownKeys = Object.keys(payload).filter((key) => !allowed.has(key));
  if (unknownKeys.length > 0) {
    return malformed(rawText, `unrecognised field(s): ${unknownKeys.join(", ")}`);
  }

  const reason = payload["reason"];
  const answer = payload["answer"];
  const isRefusal =
    payload["refuse"] === true && typeof reason === "string" && reason.trim() !== "";
  const isCompletion = payload["done"] === true && typeof answer === "string";

  let call: Parsed<Invocation[]> | undefined;
  if ("tool_calls" in payload) {
    call =
      "tool" in payload || "arguments" in payload
        ? { ok: false, problem: 'use either "tool" or "tool_calls", not both' }
        : parseBatch(payload["tool_calls"]);
  } else if ("tool" in payload || "arguments" in payload) {
    const single = parseCall(payload, "a tool call");
    call = single.ok ? { ok: true, value: [single.value] } : single;
  }

  const satisfied = [isRefusal, isCompletion, call?.ok === true].filter(Boolean).length;
  const ambiguous = satisfied > 1;

  if (isRefusal && typeof reason === "string") {
    return { kind: "refusal", reason, ambiguous };
  }
  if (isCompletion && typeof answer === "string") {
    return { kind: "completion", answer, ambiguous };
  }
  if (call?.ok) {
    return { kind: "tool_call", invocations: call.value, ambiguous };
  }

  // No shape matched: say what was closest so the correction is specific.
  if (payload["refuse"] === true) {
    return malformed(rawText, '"refuse": true requires a non-empty "reason" string');
  }
  if (payload["done"] === true) {
    return malformed(rawText, '"done": true requires an "answer" string');
  }
  if (call !== undefined && !call.ok) {
    return malformed(rawText, call.problem);
  }
  return malformed(rawText, "the object matches none of the allowed reply shapes");
}
