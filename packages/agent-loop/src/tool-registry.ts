/**
 * Tool registry: the static, read-only catalog of tools.
 *
 * Built once from a list of descriptors and never changed afterwards, so
 * concurrent runs can share one instance.
 */

import { RegistryError } from "./errors.js";
import { matchesType } from "./contract-validator.js";
import type { ParameterSpec, ToolDescriptor } from "./types.js";

const TOOL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]{0,63}$/;

function checkParameter(toolName: string, parameter: ParameterSpec): void {
  const where = `${toolName}.${parameter.name}`;

  if (parameter.enum !== undefined) {
    if (parameter.enum.length === 0) {
      throw new RegistryError(`Parameter ${where} declares an empty enum`);
    }
    const bad = parameter.enum.find((value) => !matchesType(value, parameter.type));
    if (bad !== undefined) {
      throw new RegistryError(
        `Parameter ${where} enum value ${JSON.stringify(bad)} is not of type ${parameter.type}`,
      );
    }
  }

  if (parameter.default !== undefined) {
    if (parameter.required) {
      throw new RegistryError(`Required parameter ${where} cannot declare a default`);
    }
    if (!matchesType(parameter.default, parameter.type)) {
      throw new RegistryError(`Parameter ${where} default is not of type ${parameter.type}`);
    }
    if (parameter.enum !== undefined && !parameter.enum.includes(parameter.default)) {
      throw new RegistryError(`Parameter ${where} default is not one of its enum values`);
    }
  }
}

function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  return Object.freeze({
    ...descriptor,
    parameterContract: Object.freeze(
      descriptor.parameterContract.map((parameter) =>
        Object.freeze({
          ...parameter,
          ...(parameter.enum !== undefined ? { enum: Object.freeze([...parameter.enum]) } : {}),
        }),
      ),
    ),
  });
}

export class ToolRegistry {
  private readonly _tools: ReadonlyMap<string, ToolDescriptor>;
  private readonly _ordered: readonly ToolDescriptor[];

  /**
   * @throws {RegistryError} On duplicate tool or parameter names, an invalid
   *   tool name, or enum/default values that contradict the declared type.
   */
  constructor(descriptors: readonly ToolDescriptor[]) {
    const tools = new Map<string, ToolDescriptor>();

    for (const descriptor of descriptors) {
      if (!TOOL_NAME_PATTERN.test(descriptor.name)) {
        throw new RegistryError(`Invalid tool name: ${JSON.stringify(descriptor.name)}`);
      }
      if (tools.has(descriptor.name)) {
        throw new RegistryError(`Duplicate tool name: ${descriptor.name}`);
      }

      const seen = new Set<string>();
      for (const parameter of descriptor.parameterContract) {
        if (seen.has(parameter.name)) {
          throw new RegistryError(
            `Duplicate parameter ${parameter.name} in tool ${descriptor.name}`,
          );
        }
        seen.add(parameter.name);
        checkParameter(descriptor.name, parameter);
      }

      tools.set(descriptor.name, freezeDescriptor(descriptor));
    }

    this._tools = tools;
    this._ordered = Object.freeze(Array.from(tools.values()));
  }

  /**
   * Look up a tool by name. `undefined` means the tool does not exist.
   */
  lookup(name: string): ToolDescriptor | undefined {
    return this._tools.get(name);
  }

  /**
   * All tools in registration order (for the model-facing catalog).
   */
  listAll(): readonly ToolDescriptor[] {
    return this._ordered;
  }

  names(): string[] {
    return this._ordered.map((t) => t.name);
  }
}
