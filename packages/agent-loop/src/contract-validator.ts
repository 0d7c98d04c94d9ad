/**
 * Contract validator: the single point where untyped model arguments become
 * typed tool arguments.
 *
 * Validation is strict and never guesses. Numbers sent as strings, floats for
 * integer parameters, values outside an enumeration and unrecognised names
 * are all violations. Every problem is reported, not just the first.
 */

import type {
  ArgumentValue,
  ParameterType,
  SchemaViolation,
  ToolDescriptor,
  TypeMismatch,
  ValidationOutcome,
} from "./types.js";

/**
 * Whether `value` is a legal JSON value for the declared primitive type.
 */
export function matchesType(value: unknown, type: ParameterType): value is ArgumentValue {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

function render(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function isPresent(args: Readonly<Record<string, unknown>>, name: string): boolean {
  return Object.hasOwn(args, name) && args[name] !== undefined;
}

/**
 * Check `rawArguments` against the descriptor's parameter contract.
 *
 * On success the typed arguments follow the contract's declaration order, with
 * defaults filled in for absent optional parameters. Pure and deterministic.
 */
export function validate(
  descriptor: ToolDescriptor,
  rawArguments: Readonly<Record<string, unknown>>,
): ValidationOutcome {
  const contract = descriptor.parameterContract;
  const missingParams: string[] = [];
  const typeErrors: TypeMismatch[] = [];
  const typed: Record<string, ArgumentValue> = {};

  for (const parameter of contract) {
    if (!isPresent(rawArguments, parameter.name)) {
      if (parameter.required) {
        missingParams.push(parameter.name);
      } else if (parameter.default !== undefined) {
        typed[parameter.name] = parameter.default;
      }
      continue;
    }

    const value = rawArguments[parameter.name];
    if (!matchesType(value, parameter.type)) {
      typeErrors.push({ param: parameter.name, expected: parameter.type, received: render(value) });
      continue;
    }
    if (parameter.enum !== undefined && !parameter.enum.includes(value)) {
      typeErrors.push({
        param: parameter.name,
        expected: `one of ${parameter.enum.map(render).join(", ")}`,
        received: render(value),
      });
      continue;
    }
    typed[parameter.name] = value;
  }

  const declared = new Set(contract.map((parameter) => parameter.name));
  const unknownParams = Object.keys(rawArguments).filter((name) => !declared.has(name));

  if (missingParams.length > 0 || typeErrors.length > 0 || unknownParams.length > 0) {
    return {
      ok: false,
      violation: {
        toolName: descriptor.name,
        missingParams,
        typeErrors,
        unknownParams,
      },
    };
  }

  return {
    ok: true,
    invocation: { toolName: descriptor.name, typedArguments: typed },
  };
}

/**
 * Render a violation as the message the model receives.
 */
export function formatViolation(violation: SchemaViolation): string {
  const parts: string[] = [];

  if (violation.missingParams.length > 0) {
    parts.push(`missing required parameter(s): ${violation.missingParams.join(", ")}`);
  }
  for (const mismatch of violation.typeErrors) {
    parts.push(
      `parameter "${mismatch.param}" expected ${mismatch.expected}, got ${mismatch.received}`,
    );
  }
  if (violation.unknownParams.length > 0) {
    parts.push(`unknown parameter(s): ${violation.unknownParams.join(", ")}`);
  }

  return `Arguments for tool "${violation.toolName}" violate its contract: ${parts.join("; ")}`;
}
