/**
 * Tool executor: the only caller of tool capabilities.
 *
 * Whatever a capability does (returns, throws, rejects or hangs), `execute`
 * resolves to an ExecutionResult.
 */

import type { ToolRegistry } from "./tool-registry.js";
import { ErrorKind } from "./types.js";
import type { ExecutionResult, ValidatedInvocation } from "./types.js";

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ToolExecutorOptions {
  /** Per-invocation bound. Zero or a non-finite value disables it. */
  timeoutMs?: number;
}

const TIMED_OUT = Symbol("timed out");

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;

  constructor(registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  async execute(invocation: ValidatedInvocation): Promise<ExecutionResult> {
    const descriptor = this.registry.lookup(invocation.toolName);
    if (!descriptor) {
      return {
        ok: false,
        errorKind: ErrorKind.UNKNOWN_TOOL,
        message: `Unknown tool "${invocation.toolName}"`,
      };
    }

    // Wrapped so a synchronous throw becomes a rejection.
    const running = Promise.resolve().then(() =>
      descriptor.capability(invocation.typedArguments),
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const bounded = Number.isFinite(this.timeoutMs) && this.timeoutMs > 0;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      if (bounded) timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      const value = await (bounded ? Promise.race([running, timeout]) : running);
      if (value === TIMED_OUT) {
        return {
          ok: false,
          errorKind: ErrorKind.TIMEOUT,
          message: `Tool "${invocation.toolName}" did not finish within ${this.timeoutMs}ms`,
        };
      }
      return { ok: true, value };
    } catch (error) {
      return {
        ok: false,
        errorKind: ErrorKind.TOOL_EXECUTION_FAILURE,
        message: errorMessage(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
