/**
 * Orchestrator — the bounded tool-invocation loop.
 *
 *   question -> model reply -> interpret -> validate -> execute -> append
 *            -> model reply -> ... -> terminal status
 *
 * Every non-terminal branch (malformed reply, tool round) consumes exactly
 * one iteration. The bound is checked before each model request, and the
 * caller's signal is checked at the same point.
 */

import { randomUUID } from "node:crypto";

import {
  DEFAULT_RETRY_POLICY,
  ResponseFormatType,
  retry,
} from "@toolgate/llm-client";
import type { CompletionClient, Response, RetryPolicy } from "@toolgate/llm-client";

import { ConversationState } from "./conversation-state.js";
import { formatViolation, validate } from "./contract-validator.js";
import { EventEmitter } from "./events.js";
import { DEFAULT_LOOP_DETECTION_WINDOW, detectLoop } from "./loop-detection.js";
import { interpret } from "./response-interpreter.js";
import { buildCorrection, buildMessages, buildSystemPrompt } from "./system-prompt.js";
import { DEFAULT_TOOL_TIMEOUT_MS, ToolExecutor } from "./tool-executor.js";
import type { ToolRegistry } from "./tool-registry.js";
import type { Turn } from "./turns.js";
import { ErrorKind, TerminalStatus } from "./types.js";
import type { ExecutionResult, Invocation, ValidatedInvocation } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MODEL_TIMEOUT_MS = 120_000;

export interface OrchestratorConfig {
  registry: ToolRegistry;
  client: CompletionClient;
  /** Provider model ID. */
  model: string;
  /** Routes to a named provider; the client's default when omitted. */
  provider?: string;
  /** Model requests per run. Default 5. */
  maxIterations?: number;
  /** Bound on each model request. Default 120000. */
  modelTimeoutMs?: number;
  /** Bound on each tool invocation. Default 30000. */
  toolTimeoutMs?: number;
  /** Retries of a failed model request before the run is fatal. */
  retryPolicy?: Partial<Omit<RetryPolicy, "onRetry" | "signal">>;
  /** Default 0. */
  temperature?: number;
  /** Accept `tool_calls` batches, run concurrently. Default false. */
  allowMultipleToolCalls?: boolean;
  /** Invocations compared for loop detection; 0 disables. Default 4. */
  loopDetectionWindow?: number;
  /** Extra instructions appended to the system prompt. */
  systemPrompt?: string;
}

export interface RunOptions {
  /** Stamped on every event and on the outcome. Default: a random UUID. */
  runId?: string;
  /** Checked between iterations; also aborts an in-flight model request. */
  signal?: AbortSignal;
}

interface OutcomeBase {
  readonly runId: string;
  readonly iterationCount: number;
  /** Invocations that reached a capability. */
  readonly toolExecutions: number;
  readonly transcript: readonly Turn[];
}

type Ending =
  | { readonly status: typeof TerminalStatus.ANSWERED; readonly answer: string }
  | { readonly status: typeof TerminalStatus.REFUSED; readonly reason: string }
  | {
      readonly status: typeof TerminalStatus.FATAL_ERROR;
      readonly error: { readonly errorName: string; readonly message: string };
    }
  | { readonly status: typeof TerminalStatus.ITERATION_LIMIT_EXCEEDED }
  | { readonly status: typeof TerminalStatus.CANCELLED };

export type RunOutcome = OutcomeBase & Ending;

/** Identifies the cycle a helper works on, for its events. */
interface RunStep {
  runId: string;
  iteration: number;
}

interface InvocationOutcome {
  result: ExecutionResult;
  executed: boolean;
}

const LOOP_WARNING =
  "You are repeating the same tool calls. Their results will not change. " +
  "Answer with the results you already have, or refuse.";

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs questions against a fixed tool registry. Holds no per-run state, so
 * one instance can serve concurrent runs; their events share `events` and
 * are told apart by `runId`.
 */
export class Orchestrator {
  readonly events: EventEmitter;

  private readonly _config: OrchestratorConfig;
  private readonly _executor: ToolExecutor;
  private readonly _maxIterations: number;
  private readonly _systemPrompt: string;

  constructor(config: OrchestratorConfig) {
    this._config = config;
    this.events = new EventEmitter();
    this._maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this._executor = new ToolExecutor(config.registry, {
      timeoutMs: config.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    });
    this._systemPrompt = buildSystemPrompt(config.registry.listAll(), {
      allowMultipleToolCalls: config.allowMultipleToolCalls,
      extraInstructions: config.systemPrompt,
    });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Drive one question to a terminal status. Never rejects for model or tool
   * failures; those end up in the outcome.
   */
  async run(question: string, options: RunOptions = {}): Promise<RunOutcome> {
    const state = new ConversationState(this._maxIterations);
    const { signal } = options;
    const runId = options.runId ?? randomUUID();
    let toolExecutions = 0;

    const finish = (ending: Ending): RunOutcome => {
      state.finish(ending.status);
      this.events.emit({
        kind: "RUN_END",
        runId,
        timestamp: Date.now(),
        data: {
          status: ending.status,
          iterationCount: state.iterationCount,
          toolExecutions,
        },
      });
      return {
        ...ending,
        runId,
        iterationCount: state.iterationCount,
        toolExecutions,
        transcript: state.transcript,
      };
    };

    this.events.emit({
      kind: "RUN_START",
      runId,
      timestamp: Date.now(),
      data: {
        question,
        maxIterations: this._maxIterations,
        tools: this._config.registry.names(),
      },
    });
    state.append({ type: "user", content: question, timestamp: Date.now() });
    this.events.emit({
      kind: "USER_INPUT",
      runId,
      timestamp: Date.now(),
      data: { content: question },
    });

    for (;;) {
      // 1. Bound and cancellation, before any new request
      if (!state.canIssueRequest()) {
        return finish({ status: TerminalStatus.ITERATION_LIMIT_EXCEEDED });
      }
      if (signal?.aborted) {
        return finish({ status: TerminalStatus.CANCELLED });
      }

      const iteration = state.iterationCount + 1;

      // 2. Model request (retried; whatever survives the retries is fatal)
      let response: Response;
      try {
        response = await this._requestReply(state, { runId, iteration }, signal);
      } catch (error) {
        if (signal?.aborted) {
          return finish({ status: TerminalStatus.CANCELLED });
        }
        const details = {
          errorName: error instanceof Error ? error.name : "Error",
          message: error instanceof Error ? error.message : String(error),
        };
        this.events.emit({ kind: "ERROR", runId, timestamp: Date.now(), data: details });
        return finish({ status: TerminalStatus.FATAL_ERROR, error: details });
      }

      // 3. Interpret
      const intent = interpret(response.text, {
        allowMultipleToolCalls: this._config.allowMultipleToolCalls,
      });
      state.append({
        type: "assistant",
        content: response.text,
        intent: intent.kind,
        timestamp: Date.now(),
      });
      this.events.emit({
        kind: "MODEL_REPLY",
        runId,
        timestamp: Date.now(),
        data: { iteration, text: response.text },
      });
      if (intent.kind !== "malformed" && intent.ambiguous) {
        this.events.emit({
          kind: "AMBIGUOUS_REPLY",
          runId,
          timestamp: Date.now(),
          data: { iteration, chosen: intent.kind },
        });
      }

      // 4. Dispatch
      switch (intent.kind) {
        case "refusal":
          return finish({ status: TerminalStatus.REFUSED, reason: intent.reason });

        case "completion":
          return finish({ status: TerminalStatus.ANSWERED, answer: intent.answer });

        case "malformed":
          state.append({
            type: "corrective",
            content: buildCorrection(intent.problem, this._config.allowMultipleToolCalls),
            problem: intent.problem,
            timestamp: Date.now(),
          });
          this.events.emit({
            kind: "MALFORMED_REPLY",
            runId,
            timestamp: Date.now(),
            data: { iteration, problem: intent.problem },
          });
          break;

        case "tool_call": {
          // Concurrent when batched; results are appended in call order.
          const outcomes = await Promise.all(
            intent.invocations.map((invocation) =>
              this._handleInvocation(invocation, { runId, iteration }),
            ),
          );
          outcomes.forEach((outcome, index) => {
            const invocation = intent.invocations[index];
            if (invocation === undefined) return;
            if (outcome.executed) toolExecutions += 1;
            state.append({
              type: "tool_result",
              toolName: invocation.toolName,
              arguments: invocation.rawArguments,
              result: outcome.result,
              timestamp: Date.now(),
            });
          });

          const window = this._config.loopDetectionWindow ?? DEFAULT_LOOP_DETECTION_WINDOW;
          if (detectLoop(state.transcript, window)) {
            state.append({ type: "steering", content: LOOP_WARNING, timestamp: Date.now() });
            this.events.emit({
              kind: "LOOP_DETECTION",
              runId,
              timestamp: Date.now(),
              data: { iteration, message: LOOP_WARNING },
            });
          }
          break;
        }
      }

      // 5. One iteration per cycle, whichever branch ran
      const iterationCount = state.completeIteration();
      this.events.emit({
        kind: "ITERATION_END",
        runId,
        timestamp: Date.now(),
        data: { iterationCount },
      });
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async _requestReply(
    state: ConversationState,
    step: RunStep,
    signal: AbortSignal | undefined,
  ): Promise<Response> {
    const messages = buildMessages(this._systemPrompt, state.transcript);
    this.events.emit({
      kind: "MODEL_REQUEST",
      runId: step.runId,
      timestamp: Date.now(),
      data: {
        iteration: step.iteration,
        model: this._config.model,
        messageCount: messages.length,
      },
    });

    return retry(
      () =>
        this._config.client.complete({
          model: this._config.model,
          provider: this._config.provider,
          messages,
          response_format: { type: ResponseFormatType.JSON },
          temperature: this._config.temperature ?? 0,
          timeout_ms: this._config.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS,
          signal,
        }),
      {
        ...DEFAULT_RETRY_POLICY,
        ...this._config.retryPolicy,
        signal,
        onRetry: (error, attempt, delay) => {
          this.events.emit({
            kind: "MODEL_RETRY",
            runId: step.runId,
            timestamp: Date.now(),
            data: {
              iteration: step.iteration,
              attempt: attempt + 1,
              delayMs: delay,
              error: error.message,
            },
          });
        },
      },
    );
  }

  /**
   * Lookup, validation and execution of one invocation. Failures at any step
   * become a result; only a validated invocation reaches its capability.
   */
  private async _handleInvocation(
    invocation: Invocation,
    step: RunStep,
  ): Promise<InvocationOutcome> {
    const { toolName, rawArguments } = invocation;
    this.events.emit({
      kind: "TOOL_CALL_START",
      runId: step.runId,
      timestamp: Date.now(),
      data: { iteration: step.iteration, toolName, arguments: rawArguments },
    });

    const outcome = this._resolve(invocation, step);
    const settled: InvocationOutcome =
      outcome.ok
        ? { result: await this._executor.execute(outcome.invocation), executed: true }
        : { result: outcome.failure, executed: false };

    this.events.emit({
      kind: "TOOL_CALL_END",
      runId: step.runId,
      timestamp: Date.now(),
      data: { iteration: step.iteration, toolName, result: settled.result },
    });
    return settled;
  }

  private _resolve(
    invocation: Invocation,
    step: RunStep,
  ):
    | { ok: true; invocation: ValidatedInvocation }
    | { ok: false; failure: ExecutionResult } {
    const registry = this._config.registry;
    const descriptor = registry.lookup(invocation.toolName);
    if (!descriptor) {
      const available = registry.names();
      return {
        ok: false,
        failure: {
          ok: false,
          errorKind: ErrorKind.UNKNOWN_TOOL,
          message:
            `Unknown tool "${invocation.toolName}". Available tools: ` +
            (available.length > 0 ? available.join(", ") : "none"),
        },
      };
    }

    const validation = validate(descriptor, invocation.rawArguments);
    if (!validation.ok) {
      const message = formatViolation(validation.violation);
      this.events.emit({
        kind: "SCHEMA_VIOLATION",
        runId: step.runId,
        timestamp: Date.now(),
        data: { iteration: step.iteration, toolName: invocation.toolName, message },
      });
      return {
        ok: false,
        failure: {
          ok: false,
          errorKind: ErrorKind.SCHEMA_VIOLATION,
          message,
          violation: validation.violation,
        },
      };
    }

    return { ok: true, invocation: validation.invocation };
  }
}
