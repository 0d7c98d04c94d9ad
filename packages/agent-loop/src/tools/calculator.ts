/**
 * calculator tool: one arithmetic operation on two numbers.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { numberArg, stringArg } from "./args.js";

export const CALCULATOR_OPERATIONS = ["add", "subtract", "multiply", "divide"] as const;

function compute(operation: string, a: number, b: number): number {
  switch (operation) {
    case "add":
      return a + b;
    case "subtract":
      return a - b;
    case "multiply":
      return a * b;
    case "divide":
      if (b === 0) throw new ToolError("division by zero");
      return a / b;
    default:
      throw new ToolError(`unsupported operation: ${operation}`);
  }
}

export const calculatorTool: ToolDescriptor = {
  name: "calculator",
  description: "Performs basic arithmetic (add, subtract, multiply, divide) on two numbers.",
  parameterContract: [
    {
      name: "operation",
      type: "string",
      required: true,
      enum: CALCULATOR_OPERATIONS,
      description: "The arithmetic operation to perform",
    },
    { name: "a", type: "number", required: true, description: "First operand" },
    { name: "b", type: "number", required: true, description: "Second operand" },
  ],
  capability: (args) => {
    const a = numberArg(args, "a");
    const b = numberArg(args, "b");
    const operation = stringArg(args, "operation");

    const result = compute(operation, a, b);
    if (!Number.isFinite(result)) {
      throw new ToolError("result is not a finite number");
    }
    return result;
  },
};
