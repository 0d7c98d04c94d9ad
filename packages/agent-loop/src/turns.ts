/**
 * Turn types for the conversation transcript.
 *
 * A Turn is a single entry in the transcript. ConversationState keeps them
 * in an append-only list that is rendered into every model request.
 */

import type { ExecutionResult, TurnIntent } from "./types.js";

/**
 * The question the run was started with.
 */
export interface UserTurn {
  readonly type: "user";
  readonly content: string;
  readonly timestamp: number;
}

/**
 * A model reply, kept verbatim.
 */
export interface AssistantTurn {
  readonly type: "assistant";
  readonly content: string;
  /** How the interpreter classified the reply. */
  readonly intent: TurnIntent["kind"];
  readonly timestamp: number;
}

/**
 * The outcome of one invocation, including ones rejected before execution.
 */
export interface ToolResultTurn {
  readonly type: "tool_result";
  readonly toolName: string;
  /** The arguments as the model sent them. */
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result: ExecutionResult;
  readonly timestamp: number;
}

/**
 * Instruction appended after a malformed reply, restating the reply contract.
 */
export interface CorrectiveTurn {
  readonly type: "corrective";
  readonly content: string;
  readonly problem: string;
  readonly timestamp: number;
}

/**
 * A note injected by the orchestrator itself, e.g. on loop detection.
 */
export interface SteeringTurn {
  readonly type: "steering";
  readonly content: string;
  readonly timestamp: number;
}

export type Turn =
  | UserTurn
  | AssistantTurn
  | ToolResultTurn
  | CorrectiveTurn
  | SteeringTurn;
