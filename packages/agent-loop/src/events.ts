/**
 * Event system for the orchestrator.
 *
 * Every step of a run emits a typed event. Events are delivered
 * synchronously to the host application via the EventEmitter.
 */

import type { ExecutionResult, TerminalStatus, TurnIntent } from "./types.js";

/**
 * Payload carried by each event kind.
 */
export interface EventDataMap {
  RUN_START: { question: string; maxIterations: number; tools: string[] };
  USER_INPUT: { content: string };
  MODEL_REQUEST: { iteration: number; model: string; messageCount: number };
  MODEL_RETRY: { iteration: number; attempt: number; delayMs: number; error: string };
  MODEL_REPLY: { iteration: number; text: string };
  MALFORMED_REPLY: { iteration: number; problem: string };
  AMBIGUOUS_REPLY: { iteration: number; chosen: TurnIntent["kind"] };
  TOOL_CALL_START: {
    iteration: number;
    toolName: string;
    arguments: Readonly<Record<string, unknown>>;
  };
  SCHEMA_VIOLATION: { iteration: number; toolName: string; message: string };
  TOOL_CALL_END: { iteration: number; toolName: string; result: ExecutionResult };
  LOOP_DETECTION: { iteration: number; message: string };
  /** `iterationCount` after the increment. */
  ITERATION_END: { iterationCount: number };
  RUN_END: { status: TerminalStatus; iterationCount: number; toolExecutions: number };
  ERROR: { errorName: string; message: string };
}

/**
 * Discriminator tags for orchestrator events.
 */
export type EventKind = keyof EventDataMap;

/**
 * A single event emitted by the orchestrator. Narrow on `kind` to get the
 * matching `data`.
 */
export type AgentEvent<K extends EventKind = EventKind> = {
  [P in K]: {
    kind: P;
    /** Tells apart the events of runs that share one emitter. */
    runId: string;
    timestamp: number;
    data: EventDataMap[P];
  };
}[K];

type EventHandler<K extends EventKind = EventKind> = (event: AgentEvent<K>) => void;

function isKind<K extends EventKind>(event: AgentEvent | AgentEvent<K>, kind: K): event is AgentEvent<K> {
  return event.kind === kind;
}

/**
 * Simple synchronous event emitter for orchestrator events.
 */
export class EventEmitter {
  private _handlers: Map<EventKind, EventHandler[]> = new Map();
  private _anyHandlers: EventHandler[] = [];

  /**
   * Subscribe to a specific event kind.
   */
  on<K extends EventKind>(kind: K, handler: EventHandler<K>): void {
    let handlers = this._handlers.get(kind);
    if (!handlers) {
      handlers = [];
      this._handlers.set(kind, handlers);
    }
    handlers.push((event) => {
      if (isKind(event, kind)) handler(event);
    });
  }

  /**
   * Subscribe to all events.
   */
  onAny(handler: EventHandler): void {
    this._anyHandlers.push(handler);
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: AgentEvent): void {
    const handlers = this._handlers.get(event.kind);
    if (handlers) {
      for (const handler of handlers) {
        handler(event);
      }
    }
    for (const handler of this._anyHandlers) {
      handler(event);
    }
  }

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void {
    this._handlers.clear();
    this._anyHandlers = [];
  }
}
