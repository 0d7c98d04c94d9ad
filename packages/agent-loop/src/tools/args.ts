/**
 * Readers for validated arguments. The validator has already checked types,
 * so a mismatch here means the capability and its contract disagree.
 */

import { ToolError } from "../errors.js";
import type { TypedArguments } from "../types.js";

export function stringArg(args: TypedArguments, name: string): string {
  const value = args[name];
  if (typeof value !== "string") {
    throw new ToolError(`argument "${name}" must be a string`);
  }
  return value;
}

export function numberArg(args: TypedArguments, name: string): number {
  const value = args[name];
  if (typeof value !== "number") {
    throw new ToolError(`argument "${name}" must be a number`);
  }
  return value;
}
