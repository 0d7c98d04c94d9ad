/**
 * Tests for prompt assembly and transcript rendering.
 */

import { describe, it, expect } from "vitest";
import {
  buildCorrection,
  buildMessages,
  buildSystemPrompt,
  describeReplyContract,
  renderCatalog,
  serializeResult,
} from "../src/system-prompt.js";
import { calculatorTool } from "../src/tools/calculator.js";
import { createSearchDocsTool } from "../src/tools/search-docs.js";
import type { Turn } from "../src/turns.js";
import { toolResultTurn } from "./helpers.js";

describe("renderCatalog", () => {
  it("renders each parameter with its type, requirement and enum", () => {
    expect(renderCatalog([calculatorTool])).toBe(
      [
        "## Available Tools",
        "",
        "### calculator",
        "Performs basic arithmetic (add, subtract, multiply, divide) on two numbers.",
        "Parameters:",
        '  - operation (string, required, one of "add", "subtract", "multiply", "divide"): The arithmetic operation to perform',
        "  - a (number, required): First operand",
        "  - b (number, required): Second operand",
      ].join("\n"),
    );
  });

  it("shows defaults of optional parameters", () => {
    expect(renderCatalog([createSearchDocsTool("/tmp")])).toContain(
      "  - max_results (integer, optional, default 3): Maximum number of matching documents to return",
    );
  });

  it("handles tools without parameters and empty catalogs", () => {
    const tool = {
      name: "now",
      description: "Current time",
      parameterContract: [],
      capability: () => 0,
    };
    expect(renderCatalog([tool])).toBe("## Available Tools\n\n### now\nCurrent time\nParameters: none");
    expect(renderCatalog([])).toBe("No tools are available.");
  });
});

describe("describeReplyContract", () => {
  it("lists the three reply shapes", () => {
    const contract = describeReplyContract();
    expect(contract).toContain('{"tool": "<tool name>", "arguments": {"<parameter>": <value>}}');
    expect(contract).toContain('{"done": true, "answer": "<answer text>"}');
    expect(contract).toContain('{"refuse": true, "reason": "<why>"}');
    expect(contract).not.toContain("tool_calls");
  });

  it("adds the batch shape when enabled", () => {
    expect(describeReplyContract(true)).toContain('{"tool_calls": [');
  });
});

describe("buildSystemPrompt", () => {
  it("joins preamble, contract, catalog and host instructions", () => {
    const prompt = buildSystemPrompt([calculatorTool], { extraInstructions: "  Be brief.  " });
    const sections = prompt.split("\n\n");
    expect(sections[0]).toMatch(/^You answer questions by calling the tools listed below\./);
    expect(sections[1]).toBe(describeReplyContract());
    expect(prompt).toContain("### calculator");
    expect(sections[sections.length - 1]).toBe("Be brief.");
  });

  it("omits blank host instructions", () => {
    const prompt = buildSystemPrompt([], { extraInstructions: "   " });
    expect(prompt.endsWith("No tools are available.")).toBe(true);
  });
});

describe("buildCorrection", () => {
  it("names the problem and restates the contract", () => {
    expect(buildCorrection("the reply was empty")).toBe(
      `Your previous reply was rejected: the reply was empty.\n${describeReplyContract()}`,
    );
  });
});

describe("serializeResult", () => {
  it("serializes successes and failures", () => {
    expect(serializeResult({ ok: true, value: 801 })).toBe('{"ok":true,"value":801}');
    expect(serializeResult({ ok: true, value: undefined })).toBe('{"ok":true,"value":null}');
    expect(
      serializeResult({ ok: false, errorKind: "ToolExecutionFailure", message: "division by zero" }),
    ).toBe('{"ok":false,"error":"ToolExecutionFailure","message":"division by zero"}');
  });

  it("falls back to text for values JSON cannot hold", () => {
    expect(serializeResult({ ok: true, value: BigInt(10) })).toBe('{"ok":true,"value":"10"}');
  });
});

describe("buildMessages", () => {
  it("maps transcript turns to chat roles", () => {
    const transcript: Turn[] = [
      { type: "user", content: "What is 1 + 2?", timestamp: 0 },
      { type: "assistant", content: "calling", intent: "malformed", timestamp: 0 },
      { type: "corrective", content: "fix it", problem: "x", timestamp: 0 },
      {
        type: "assistant",
        content: '{"tool":"calculator","arguments":{"operation":"add","a":1,"b":2}}',
        intent: "tool_call",
        timestamp: 0,
      },
      toolResultTurn("calculator", { operation: "add", a: 1, b: 2 }, { ok: true, value: 3 }),
      { type: "steering", content: "stop repeating", timestamp: 0 },
    ];

    const messages = buildMessages("SYSTEM", transcript);

    expect(messages).toEqual([
      { role: "system", content: "SYSTEM" },
      { role: "user", content: "What is 1 + 2?" },
      { role: "assistant", content: "calling" },
      { role: "user", content: "fix it" },
      {
        role: "assistant",
        content: '{"tool":"calculator","arguments":{"operation":"add","a":1,"b":2}}',
      },
      {
        role: "user",
        content: 'Result of calculator {"operation":"add","a":1,"b":2}: {"ok":true,"value":3}',
      },
      { role: "user", content: "stop repeating" },
    ]);
  });
});
