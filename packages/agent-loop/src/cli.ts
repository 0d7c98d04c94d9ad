/**
 * Command-line front end: one question in, a trace and a final answer out.
 *
 *   toolgate "What is 234 + 567?" --max-iterations 3
 *
 * Exit code 0 for every terminal status except a fatal model-service
 * failure; 1 for that and for bad arguments.
 */

import { cac } from "cac";
import { Client, VERSION } from "@toolgate/llm-client";
import type { CompletionClient } from "@toolgate/llm-client";
import { loadConfig } from "./config.js";
import { Orchestrator } from "./orchestrator.js";
import { ToolRegistry } from "./tool-registry.js";
import { builtinTools } from "./tools/index.js";
import { formatEvent, formatOutcome } from "./trace.js";
import { TerminalStatus } from "./types.js";

export interface CliDeps {
  env?: Record<string, string | undefined>;
  /** Builds the model-service client; `Client.fromEnv` by default. */
  createClient?: (env: Record<string, string | undefined>) => CompletionClient & {
    close?(): Promise<void>;
  };
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  /** Cancels the run at the next iteration boundary. */
  signal?: AbortSignal;
}

interface CliOptions {
  maxIterations?: unknown;
  model?: unknown;
  provider?: unknown;
  docsDir?: unknown;
  quiet?: boolean;
  parallelTools?: boolean;
}

function positiveInteger(value: unknown, flag: string): number {
  const text = String(value).trim();
  const parsed = /^\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
  if (!(parsed >= 1)) {
    throw new Error(`${flag} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === true || value === false) return undefined;
  const text = String(value).trim();
  return text === "" ? undefined : text;
}

/**
 * Parse `argv` (as in `process.argv`) and run one question. Resolves to the
 * process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const createClient = deps.createClient ?? ((source) => Client.fromEnv(source));

  let exitCode = 0;
  const cli = cac("toolgate");

  cli
    .command("<...question>", "Answer a question using the built-in tools")
    .option("--max-iterations <n>", "Model requests allowed for this question")
    .option("--model <model>", "Model identifier (default: TOOLGATE_MODEL or llama3.2)")
    .option("--provider <name>", "Provider to route to (ollama, openai-compatible)")
    .option("--docs-dir <dir>", "Directory searched by search_docs")
    .option("--parallel-tools", "Accept several tool calls in one reply")
    .option("--quiet", "Print only the final answer")
    .action(async (words: string[], options: CliOptions) => {
      const question = words.join(" ").trim();
      if (question === "") {
        throw new Error("a question is required");
      }

      const config = loadConfig(env);
      const maxIterations =
        options.maxIterations === undefined
          ? config.maxIterations
          : positiveInteger(options.maxIterations, "--max-iterations");

      const client = createClient(env);
      const orchestrator = new Orchestrator({
        registry: new ToolRegistry(
          builtinTools({ docsDir: optionalString(options.docsDir) ?? config.docsDir }),
        ),
        client,
        model: optionalString(options.model) ?? config.model,
        provider: optionalString(options.provider) ?? config.provider,
        maxIterations,
        modelTimeoutMs: config.modelTimeoutMs,
        toolTimeoutMs: config.toolTimeoutMs,
        retryPolicy: { maxRetries: config.modelRetries },
        allowMultipleToolCalls: options.parallelTools === true || config.allowMultipleToolCalls,
      });

      if (!options.quiet) {
        orchestrator.events.onAny((event) => {
          const line = formatEvent(event);
          if (line !== undefined) stdout(line);
        });
      }

      try {
        const outcome = await orchestrator.run(question, { signal: deps.signal });
        stdout("");
        stdout(formatOutcome(outcome));
        exitCode = outcome.status === TerminalStatus.FATAL_ERROR ? 1 : 0;
      } finally {
        await client.close?.();
      }
    });

  cli.help();
  cli.version(VERSION);

  try {
    const parsed = cli.parse(argv, { run: false });
    if (parsed.options.help || parsed.options.version) {
      return 0;
    }
    await cli.runMatchedCommand();
  } catch (error) {
    stderr(`error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  return exitCode;
}
