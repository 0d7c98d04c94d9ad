// Types
export * from "./types.js";
export type {
  Turn,
  UserTurn,
  AssistantTurn,
  ToolResultTurn,
  CorrectiveTurn,
  SteeringTurn,
} from "./turns.js";

// Errors
export { ToolError, RegistryError, InvalidStateError } from "./errors.js";

// Core
export { ToolRegistry } from "./tool-registry.js";
export { validate, formatViolation, matchesType } from "./contract-validator.js";
export { interpret, extractPayload, MAX_ARGUMENT_DEPTH } from "./response-interpreter.js";
export type { InterpreterOptions } from "./response-interpreter.js";
export { ToolExecutor, DEFAULT_TOOL_TIMEOUT_MS } from "./tool-executor.js";
export type { ToolExecutorOptions } from "./tool-executor.js";
export { ConversationState } from "./conversation-state.js";
export {
  Orchestrator,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MODEL_TIMEOUT_MS,
} from "./orchestrator.js";
export type { OrchestratorConfig, RunOptions, RunOutcome } from "./orchestrator.js";

// Prompt assembly
export {
  buildSystemPrompt,
  buildMessages,
  buildCorrection,
  describeReplyContract,
  renderCatalog,
  renderToolResult,
  serializeResult,
} from "./system-prompt.js";
export type { PromptOptions } from "./system-prompt.js";

// Events
export { EventEmitter } from "./events.js";
export type { AgentEvent, EventKind, EventDataMap } from "./events.js";

// Loop detection
export {
  detectLoop,
  invocationSignature,
  DEFAULT_LOOP_DETECTION_WINDOW,
} from "./loop-detection.js";

// Configuration
export { loadConfig, DEFAULT_MODEL } from "./config.js";
export type { ToolgateConfig } from "./config.js";

// Trace rendering and CLI
export { formatEvent, formatOutcome } from "./trace.js";
export { runCli } from "./cli.js";
export type { CliDeps } from "./cli.js";

// Built-in tools
export * from "./tools/index.js";
