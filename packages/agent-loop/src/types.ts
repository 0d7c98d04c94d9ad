/**
 * Type definitions for the tool-invocation orchestrator.
 */

// ---------------------------------------------------------------------------
// Parameter contracts
// ---------------------------------------------------------------------------

/** Primitive types a tool parameter may declare. */
export const ParameterType = {
  STRING: "string",
  /** A JSON number with no fractional part. */
  INTEGER: "integer",
  /** Any finite JSON number. */
  NUMBER: "number",
  BOOLEAN: "boolean",
} as const satisfies Record<string, string>;

export type ParameterType = (typeof ParameterType)[keyof typeof ParameterType];

/** A value a parameter can hold once validated. */
export type ArgumentValue = string | number | boolean;

/** One named parameter in a tool's contract. */
export interface ParameterSpec {
  readonly name: string;
  readonly type: ParameterType;
  readonly required: boolean;
  readonly description?: string;
  /** Legal values. When present, anything else is a violation. */
  readonly enum?: readonly ArgumentValue[];
  /** Filled in for an absent optional parameter. */
  readonly default?: ArgumentValue;
}

/** Ordered list of parameters; order drives coercion and prompt rendering. */
export type ParameterContract = readonly ParameterSpec[];

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** Arguments that have passed validation, keyed in contract order. */
export type TypedArguments = Readonly<Record<string, ArgumentValue>>;

/**
 * The external behaviour behind a tool. Throws (typically a `ToolError`) to
 * report a domain failure.
 */
export type Capability = (args: TypedArguments) => Promise<unknown> | unknown;

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameterContract: ParameterContract;
  readonly capability: Capability;
}

// ---------------------------------------------------------------------------
// Invocations
// ---------------------------------------------------------------------------

/** A proposed call exactly as the model wrote it. */
export interface Invocation {
  readonly toolName: string;
  readonly rawArguments: Readonly<Record<string, unknown>>;
}

/** An invocation whose arguments conform to the tool's contract. */
export interface ValidatedInvocation {
  readonly toolName: string;
  readonly typedArguments: TypedArguments;
}

/** One argument that failed its declared type or enumeration. */
export interface TypeMismatch {
  readonly param: string;
  /** The declared type, or the list of legal values for enum violations. */
  readonly expected: string;
  /** JSON rendering of what the model sent. */
  readonly received: string;
}

export interface SchemaViolation {
  readonly toolName: string;
  readonly missingParams: readonly string[];
  readonly typeErrors: readonly TypeMismatch[];
  readonly unknownParams: readonly string[];
}

export type ValidationOutcome =
  | { readonly ok: true; readonly invocation: ValidatedInvocation }
  | { readonly ok: false; readonly violation: SchemaViolation };

// ---------------------------------------------------------------------------
// Execution results
// ---------------------------------------------------------------------------

/** Failure categories a tool round can report back to the model. */
export const ErrorKind = {
  UNKNOWN_TOOL: "UnknownTool",
  SCHEMA_VIOLATION: "SchemaViolation",
  TOOL_EXECUTION_FAILURE: "ToolExecutionFailure",
  TIMEOUT: "Timeout",
} as const satisfies Record<string, string>;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface ExecutionSuccess {
  readonly ok: true;
  readonly value: unknown;
}

export interface ExecutionFailure {
  readonly ok: false;
  readonly errorKind: ErrorKind;
  readonly message: string;
  /** Present for schema violations. */
  readonly violation?: SchemaViolation;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

// ---------------------------------------------------------------------------
// Turn intents
// ---------------------------------------------------------------------------

export interface ToolCallIntent {
  readonly kind: "tool_call";
  /** One entry for the single-call shape; several for a `tool_calls` batch. */
  readonly invocations: readonly Invocation[];
  /** The reply also satisfied a lower-precedence shape. */
  readonly ambiguous: boolean;
}

export interface CompletionIntent {
  readonly kind: "completion";
  readonly answer: string;
  readonly ambiguous: boolean;
}

export interface RefusalIntent {
  readonly kind: "refusal";
  readonly reason: string;
  readonly ambiguous: boolean;
}

export interface MalformedIntent {
  readonly kind: "malformed";
  readonly rawText: string;
  /** Why the reply was rejected; fed back in the corrective instruction. */
  readonly problem: string;
}

export type TurnIntent =
  | ToolCallIntent
  | CompletionIntent
  | RefusalIntent
  | MalformedIntent;

// ---------------------------------------------------------------------------
// Terminal status
// ---------------------------------------------------------------------------

export const TerminalStatus = {
  ANSWERED: "answered",
  REFUSED: "refused",
  ITERATION_LIMIT_EXCEEDED: "iteration_limit_exceeded",
  FATAL_ERROR: "fatal_error",
  /** The caller's signal fired between iterations. */
  CANCELLED: "cancelled",
} as const satisfies Record<string, string>;

export type TerminalStatus = (typeof TerminalStatus)[keyof typeof TerminalStatus];
