/**
 * Tests for the command-line front end. The model service is a scripted
 * client; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { Request, Response } from "@toolgate/llm-client";
import { runCli } from "../src/cli.js";
import type { CliDeps } from "../src/cli.js";
import { ScriptedClient, done, toolCall } from "./helpers.js";

function harness(replies: readonly (string | Error)[]) {
  const client = new ScriptedClient(replies);
  const close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const stdout: string[] = [];
  const stderr: string[] = [];
  const deps: CliDeps = {
    env: {},
    createClient: () => ({
      complete: (request: Request): Promise<Response> => client.complete(request),
      close,
    }),
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };
  return { client, close, stdout, stderr, deps };
}

const argv = (...args: string[]) => ["node", "toolgate", ...args];

describe("runCli", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the trace and the final answer", async () => {
    const h = harness([toolCall("calculator", { operation: "add", a: 234, b: 567 }), done("801")]);

    const code = await runCli(argv("What is 234 + 567?"), h.deps);

    expect(code).toBe(0);
    expect(h.stdout).toEqual([
      "[RUN] What is 234 + 567? (max 5 iterations; tools: calculator, search_docs, web_fetch)",
      "[ITERATION 1] asking llama3.2",
      '  [MODEL] {"tool":"calculator","arguments":{"operation":"add","a":234,"b":567}}',
      '  [TOOL] calculator {"operation":"add","a":234,"b":567}',
      '  [RESULT] {"ok":true,"value":801}',
      "[ITERATION 2] asking llama3.2",
      '  [MODEL] {"done":true,"answer":"801"}',
      "[RUN] ended: answered after 1 iteration(s), 1 tool execution(s)",
      "",
      "=== FINAL ANSWER ===\n801",
    ]);
    expect(h.stderr).toEqual([]);
    expect(h.close).toHaveBeenCalledOnce();
  });

  it("joins unquoted words into one question", async () => {
    const h = harness([done("hi")]);
    await runCli(argv("say", "hello", "--quiet"), h.deps);
    expect(h.client.requests[0]?.messages[1]?.content).toBe("say hello");
  });

  it("prints only the answer with --quiet", async () => {
    const h = harness([done("hi")]);
    const code = await runCli(argv("Hello?", "--quiet"), h.deps);
    expect(code).toBe(0);
    expect(h.stdout).toEqual(["", "=== FINAL ANSWER ===\nhi"]);
  });

  it("applies --model, --provider and --max-iterations", async () => {
    const h = harness(["not json"]);
    const code = await runCli(
      argv("Hello?", "--model", "mistral", "--provider", "ollama", "--max-iterations", "1", "--quiet"),
      h.deps,
    );

    expect(code).toBe(0);
    expect(h.client.requests).toHaveLength(1);
    expect(h.client.requests[0]?.model).toBe("mistral");
    expect(h.client.requests[0]?.provider).toBe("ollama");
    expect(h.stdout[1]).toBe(
      "=== FINAL ANSWER ===\nNo answer: the iteration limit was reached after 1 iteration(s).",
    );
  });

  it("reads settings from the environment", async () => {
    const h = harness([done("hi")]);
    await runCli(argv("Hello?", "--quiet"), {
      ...h.deps,
      env: { TOOLGATE_MODEL: "phi3", TOOLGATE_PROVIDER: "openai-compatible" },
    });
    expect(h.client.requests[0]?.model).toBe("phi3");
    expect(h.client.requests[0]?.provider).toBe("openai-compatible");
  });

  it("searches the directory given by --docs-dir", async () => {
    const h = harness([toolCall("search_docs", { query: "kettle" }), done("nothing found")]);
    await runCli(argv("Find kettles", "--docs-dir", "/nonexistent/toolgate-docs"), h.deps);
    expect(h.stdout).toContain(
      "  [FAILED] ToolExecutionFailure: document directory /nonexistent/toolgate-docs is not readable",
    );
  });

  it("exits 1 and labels the failure when the model service fails", async () => {
    const h = harness([]);
    const code = await runCli(argv("Hello?"), h.deps);

    expect(code).toBe(1);
    expect(h.stdout).toContain("[ERROR] Error: No more scripted replies");
    expect(h.stdout[h.stdout.length - 1]).toBe(
      "=== FAILURE ===\nThe model service failed (Error): No more scripted replies",
    );
    expect(h.close).toHaveBeenCalledOnce();
  });

  it("exits 1 on an invalid --max-iterations", async () => {
    const h = harness([]);
    const code = await runCli(argv("Hello?", "--max-iterations", "abc"), h.deps);
    expect(code).toBe(1);
    expect(h.stderr).toEqual(['error: --max-iterations must be a positive integer, got "abc"']);
    expect(h.client.requests).toHaveLength(0);
  });

  it("exits 1 on an unknown option", async () => {
    const h = harness([]);
    const code = await runCli(argv("Hello?", "--bogus"), h.deps);
    expect(code).toBe(1);
    expect(h.stderr[0]).toMatch(/^error: Unknown option `--bogus`/);
  });

  it("exits 1 without a question", async () => {
    const h = harness([]);
    const code = await runCli(argv(), h.deps);
    expect(code).toBe(1);
    expect(h.stderr).toHaveLength(1);
  });

  it("prints help and exits 0", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const h = harness([]);
    const code = await runCli(argv("--help"), h.deps);
    expect(code).toBe(0);
    expect(log).toHaveBeenCalled();
    expect(h.client.requests).toHaveLength(0);
  });
});
