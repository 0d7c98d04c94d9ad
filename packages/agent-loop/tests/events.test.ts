/**
 * Tests for the event emitter.
 */

import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "../src/events.js";
import type { AgentEvent } from "../src/events.js";

function userInput(content: string): AgentEvent {
  return { kind: "USER_INPUT", runId: "run-1", timestamp: 1, data: { content } };
}

function errorEvent(message: string): AgentEvent {
  return { kind: "ERROR", runId: "run-1", timestamp: 2, data: { errorName: "Error", message } };
}

describe("EventEmitter", () => {
  it("delivers events to handlers of the matching kind only", () => {
    const emitter = new EventEmitter();
    const seen: string[] = [];
    emitter.on("USER_INPUT", (event) => seen.push(event.data.content));

    emitter.emit(userInput("hello"));
    emitter.emit(errorEvent("ignored"));

    expect(seen).toEqual(["hello"]);
  });

  it("delivers every event to onAny handlers, after specific ones", () => {
    const emitter = new EventEmitter();
    const order: string[] = [];
    emitter.onAny((event) => order.push(`any:${event.kind}`));
    emitter.on("ERROR", () => order.push("specific:ERROR"));

    emitter.emit(userInput("a"));
    emitter.emit(errorEvent("b"));

    expect(order).toEqual(["any:USER_INPUT", "specific:ERROR", "any:ERROR"]);
  });

  it("supports several handlers per kind in subscription order", () => {
    const emitter = new EventEmitter();
    const order: number[] = [];
    emitter.on("ERROR", () => order.push(1));
    emitter.on("ERROR", () => order.push(2));

    emitter.emit(errorEvent("x"));

    expect(order).toEqual([1, 2]);
  });

  it("removes all listeners", () => {
    const emitter = new EventEmitter();
    const specific = vi.fn();
    const any = vi.fn();
    emitter.on("USER_INPUT", specific);
    emitter.onAny(any);

    emitter.removeAllListeners();
    emitter.emit(userInput("x"));

    expect(specific).not.toHaveBeenCalled();
    expect(any).not.toHaveBeenCalled();
  });
});
