/**
 * Tests for ConversationState bookkeeping.
 */

import { describe, it, expect } from "vitest";
import { ConversationState } from "../src/conversation-state.js";
import { InvalidStateError } from "../src/errors.js";

describe("ConversationState", () => {
  it("starts open with no iterations", () => {
    const state = new ConversationState(3);
    expect(state.iterationCount).toBe(0);
    expect(state.transcript).toEqual([]);
    expect(state.terminalStatus).toBeUndefined();
    expect(state.isTerminal).toBe(false);
    expect(state.canIssueRequest()).toBe(true);
  });

  it("counts iterations up to the bound", () => {
    const state = new ConversationState(2);
    expect(state.completeIteration()).toBe(1);
    expect(state.canIssueRequest()).toBe(true);
    expect(state.completeIteration()).toBe(2);
    expect(state.canIssueRequest()).toBe(false);
    expect(() => state.completeIteration()).toThrow(InvalidStateError);
    expect(state.iterationCount).toBe(2);
  });

  it("rejects a non-positive bound", () => {
    expect(() => new ConversationState(0)).toThrow(RangeError);
    expect(() => new ConversationState(1.5)).toThrow(RangeError);
  });

  it("hands out transcript snapshots of frozen turns", () => {
    const state = new ConversationState(3);
    state.append({ type: "user", content: "hi", timestamp: 1 });
    const snapshot = state.transcript;

    state.append({ type: "steering", content: "note", timestamp: 2 });

    expect(snapshot).toHaveLength(1);
    expect(state.transcript.map((t) => t.type)).toEqual(["user", "steering"]);
    expect(Object.isFrozen(state.transcript[0])).toBe(true);
  });

  it("sets the terminal status once", () => {
    const state = new ConversationState(3);
    state.finish("answered");
    state.finish("answered");
    expect(state.terminalStatus).toBe("answered");
    expect(state.canIssueRequest()).toBe(false);
    expect(() => state.finish("refused")).toThrow(
      "Conversation already ended as answered; cannot end it as refused",
    );
  });

  it("forbids further changes after the terminal status", () => {
    const state = new ConversationState(3);
    state.finish("fatal_error");
    expect(() => state.append({ type: "user", content: "again", timestamp: 0 })).toThrow(
      new InvalidStateError("Cannot append to a conversation that ended as fatal_error"),
    );
    expect(() => state.completeIteration()).toThrow(
      "Cannot advance a conversation that ended as fatal_error",
    );
  });
});
