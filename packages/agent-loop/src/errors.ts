/**
 * Errors raised inside the agent loop.
 *
 * None of these cross the orchestrator's public surface during a run:
 * capability failures become `ExecutionResult` values and model-service
 * failures become a `fatal_error` outcome.
 */

/**
 * Domain failure reported by a tool capability, e.g. division by zero.
 *
 * The message is what the model sees in the failure result.
 */
export class ToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ToolError";
  }
}

/** The static tool catalog could not be loaded. */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/** A conversation was advanced after its terminal status was set. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}
