/**
 * Tests for the ToolExecutor failure boundary.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { ToolExecutor } from "../src/tool-executor.js";
import { ToolRegistry } from "../src/tool-registry.js";
import { ToolError } from "../src/errors.js";
import { calculatorTool } from "../src/tools/calculator.js";
import type { Capability, ToolDescriptor } from "../src/types.js";

function makeTool(name: string, capability: Capability): ToolDescriptor {
  return { name, description: name, parameterContract: [], capability };
}

describe("ToolExecutor", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the capability's value as a success", async () => {
    const executor = new ToolExecutor(new ToolRegistry([calculatorTool]));
    const result = await executor.execute({
      toolName: "calculator",
      typedArguments: { operation: "add", a: 234, b: 567 },
    });
    expect(result).toEqual({ ok: true, value: 801 });
  });

  it("turns a ToolError into a ToolExecutionFailure", async () => {
    const executor = new ToolExecutor(new ToolRegistry([calculatorTool]));
    const result = await executor.execute({
      toolName: "calculator",
      typedArguments: { operation: "divide", a: 10, b: 0 },
    });
    expect(result).toEqual({
      ok: false,
      errorKind: "ToolExecutionFailure",
      message: "division by zero",
    });
  });

  it("passes the typed arguments through", async () => {
    const capability = vi.fn<Capability>().mockReturnValue("done");
    const executor = new ToolExecutor(new ToolRegistry([makeTool("spy", capability)]));
    await executor.execute({ toolName: "spy", typedArguments: { q: "x", n: 2 } });
    expect(capability).toHaveBeenCalledWith({ q: "x", n: 2 });
  });

  it("catches synchronous throws of any value", async () => {
    const executor = new ToolExecutor(
      new ToolRegistry([
        makeTool("boom", () => {
          throw "boom";
        }),
      ]),
    );
    expect(await executor.execute({ toolName: "boom", typedArguments: {} })).toEqual({
      ok: false,
      errorKind: "ToolExecutionFailure",
      message: "boom",
    });
  });

  it("catches rejected promises", async () => {
    const executor = new ToolExecutor(
      new ToolRegistry([
        makeTool("fails", async () => {
          throw new ToolError("host unreachable");
        }),
      ]),
    );
    expect(await executor.execute({ toolName: "fails", typedArguments: {} })).toEqual({
      ok: false,
      errorKind: "ToolExecutionFailure",
      message: "host unreachable",
    });
  });

  it("reports a Timeout when the capability outlives its bound", async () => {
    vi.useFakeTimers();
    const executor = new ToolExecutor(
      new ToolRegistry([makeTool("slow", () => new Promise(() => undefined))]),
      { timeoutMs: 50 },
    );

    const pending = executor.execute({ toolName: "slow", typedArguments: {} });
    await vi.advanceTimersByTimeAsync(50);

    expect(await pending).toEqual({
      ok: false,
      errorKind: "Timeout",
      message: 'Tool "slow" did not finish within 50ms',
    });
  });

  it("waits without a bound when the timeout is zero", async () => {
    vi.useFakeTimers();
    const executor = new ToolExecutor(
      new ToolRegistry([
        makeTool(
          "late",
          () => new Promise((resolve) => setTimeout(() => resolve("finally"), 60_000)),
        ),
      ]),
      { timeoutMs: 0 },
    );

    const pending = executor.execute({ toolName: "late", typedArguments: {} });
    await vi.advanceTimersByTimeAsync(60_000);

    expect(await pending).toEqual({ ok: true, value: "finally" });
  });

  it("reports an UnknownTool for a name outside the registry", async () => {
    const executor = new ToolExecutor(new ToolRegistry([]));
    expect(await executor.execute({ toolName: "ghost", typedArguments: {} })).toEqual({
      ok: false,
      errorKind: "UnknownTool",
      message: 'Unknown tool "ghost"',
    });
  });
});
