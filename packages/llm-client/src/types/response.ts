/**
 * Response types for the model-service client.
 */

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/** Token accounting reported by the provider. Missing counts are zero. */
export class Usage {
  readonly input_tokens: number;
  readonly output_tokens: number;

  constructor(init?: { input_tokens?: number; output_tokens?: number }) {
    this.input_tokens = init?.input_tokens ?? 0;
    this.output_tokens = init?.output_tokens ?? 0;
  }

  get total_tokens(): number {
    return this.input_tokens + this.output_tokens;
  }
}

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

export interface FinishReason {
  /** "stop" | "length" | "other". */
  readonly reason: "stop" | "length" | "other";
  /** The provider's own value, when it reported one. */
  readonly raw?: string;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export interface Response {
  readonly id: string;
  readonly model: string;
  readonly provider: string;
  /** The generated text, untouched. */
  readonly text: string;
  readonly finish_reason: FinishReason;
  readonly usage: Usage;
}
