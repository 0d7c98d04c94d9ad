/**
 * Tests for loop detection.
 */

import { describe, it, expect } from "vitest";
import { detectLoop, invocationSignature } from "../src/loop-detection.js";
import type { Turn } from "../src/turns.js";
import { toolResultTurn } from "./helpers.js";

function calls(...names: string[]): Turn[] {
  return names.map((name) => toolResultTurn(name, { q: name }));
}

describe("detectLoop", () => {
  it("detects the same call repeated (AAAA)", () => {
    expect(detectLoop(calls("a", "a", "a", "a"))).toBe(true);
  });

  it("detects two calls alternating (ABAB)", () => {
    expect(detectLoop(calls("a", "b", "a", "b"))).toBe(true);
  });

  it("needs a full window of calls", () => {
    expect(detectLoop(calls("a", "a", "a"))).toBe(false);
  });

  it.each([
    [["a", "b", "c", "a"]],
    [["a", "b", "b", "a"]],
    [["a", "a", "a", "b"]],
  ])("does not flag %j", (names) => {
    expect(detectLoop(calls(...names))).toBe(false);
  });

  it("only looks at the most recent window", () => {
    expect(detectLoop(calls("x", "y", "a", "a", "a", "a"))).toBe(true);
    expect(detectLoop(calls("a", "a", "a", "a", "b"))).toBe(false);
  });

  it("compares arguments as well as names", () => {
    const transcript: Turn[] = [
      toolResultTurn("calc", { a: 1 }),
      toolResultTurn("calc", { a: 2 }),
      toolResultTurn("calc", { a: 3 }),
      toolResultTurn("calc", { a: 4 }),
    ];
    expect(detectLoop(transcript)).toBe(false);
  });

  it("ignores argument key order", () => {
    const transcript: Turn[] = [
      toolResultTurn("calc", { a: 1, b: 2 }),
      toolResultTurn("calc", { b: 2, a: 1 }),
      toolResultTurn("calc", { a: 1, b: 2 }),
      toolResultTurn("calc", { b: 2, a: 1 }),
    ];
    expect(detectLoop(transcript)).toBe(true);
  });

  it("skips turns that are not tool results", () => {
    const transcript: Turn[] = [
      toolResultTurn("a"),
      { type: "assistant", content: "{}", intent: "tool_call", timestamp: 0 },
      toolResultTurn("a"),
      { type: "steering", content: "note", timestamp: 0 },
      toolResultTurn("a"),
      toolResultTurn("a"),
    ];
    expect(detectLoop(transcript)).toBe(true);
  });

  it("honours a custom window and can be disabled", () => {
    expect(detectLoop(calls("a", "a"), 2)).toBe(true);
    expect(detectLoop(calls("a", "a", "a", "a"), 0)).toBe(false);
    expect(detectLoop(calls("a", "b", "a", "b", "a", "b"), 6)).toBe(true);
  });
});

describe("invocationSignature", () => {
  it("sorts keys at every level", () => {
    expect(invocationSignature("calc", { b: 1, a: { d: 1, c: 2 } })).toBe(
      'calc:{"a":{"c":2,"d":1},"b":1}',
    );
  });

  it("replaces very deep values with a marker", () => {
    let deep: unknown = 0;
    for (let i = 0; i < 20000; i++) deep = [deep];

    expect(invocationSignature("calc", { x: deep })).toBe(
      `calc:{"x":${"[".repeat(15)}"[nested]"${"]".repeat(15)}}`,
    );
  });
});
