/**
 * Per-run conversation state: iteration counter, transcript and terminal
 * status. One instance belongs to exactly one run.
 */

import { InvalidStateError } from "./errors.js";
import type { TerminalStatus } from "./types.js";
import type { Turn } from "./turns.js";

export class ConversationState {
  readonly maxIterations: number;

  private _iterationCount = 0;
  private readonly _transcript: Turn[] = [];
  private _terminalStatus: TerminalStatus | undefined;

  constructor(maxIterations: number) {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    this.maxIterations = maxIterations;
  }

  get iterationCount(): number {
    return this._iterationCount;
  }

  /** A snapshot; later appends do not show up in it. */
  get transcript(): readonly Turn[] {
    return [...this._transcript];
  }

  get terminalStatus(): TerminalStatus | undefined {
    return this._terminalStatus;
  }

  get isTerminal(): boolean {
    return this._terminalStatus !== undefined;
  }

  /** Whether another model request fits within the iteration bound. */
  canIssueRequest(): boolean {
    return !this.isTerminal && this._iterationCount < this.maxIterations;
  }

  append(turn: Turn): void {
    this._assertOpen("append to");
    this._transcript.push(Object.freeze(turn));
  }

  /** Close one loop cycle. Every non-terminal branch calls this exactly once. */
  completeIteration(): number {
    this._assertOpen("advance");
    if (this._iterationCount >= this.maxIterations) {
      throw new InvalidStateError(
        `Iteration bound of ${this.maxIterations} already reached`,
      );
    }
    this._iterationCount += 1;
    return this._iterationCount;
  }

  /**
   * Set the terminal status. Repeating the same status is a no-op; any other
   * value raises.
   */
  finish(status: TerminalStatus): void {
    if (this._terminalStatus === status) return;
    if (this._terminalStatus !== undefined) {
      throw new InvalidStateError(
        `Conversation already ended as ${this._terminalStatus}; cannot end it as ${status}`,
      );
    }
    this._terminalStatus = status;
  }

  private _assertOpen(action: string): void {
    if (this._terminalStatus !== undefined) {
      throw new InvalidStateError(
        `Cannot ${action} a conversation that ended as ${this._terminalStatus}`,
      );
    }
  }
}
