import type { Logger } from "pino";
import {
  InvalidArgumentsError,
  MissingParameterError,
  ToolExecutionError,
  ToolNotFoundError,
} from "../errors.js";
import type {
  FunctionTool,
  Tool,
  ToolArguments,
  ToolDescriptor,
  ToolExecutor,
  ToolParameterSchema,
  ToolParameterSpec,
} from "../types.js";

/**
 * Central tool registry.
 *
 * Responsibilities:
 * 1. Register tools by name (re-registration replaces the old tool)
 * 2. Export descriptors in the model's function-calling format
 * 3. Validate required parameters before anything reaches an executor
 * 4. Execute, tagging executor failures with the tool name
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: "tool-registry" });
  }

  register(tool: Tool): void {
    const { name } = tool.descriptor;
    if (this.tools.has(name)) {
      this.logger?.debug({ tool: name }, "replacing registered tool");
    }
    this.tools.set(name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Descriptors for every registered tool, translated for function calling */
  describeAll(): FunctionTool[] {
    return [...this.tools.values()].map((t) => toFunctionTool(t.descriptor));
  }

  /**
   * Run a tool with already-decoded arguments.
   * Throws ToolNotFoundError, MissingParameterError or ToolExecutionError.
   */
  async execute(name: string, args: ToolArguments): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    const missing = findMissingParameter(tool.descriptor, args);
    if (missing !== undefined) {
      throw new MissingParameterError(name, missing);
    }

    try {
      return await tool.execute(args);
    } catch (err) {
      throw new ToolExecutionError(name, err);
    }
  }

  /** All registered tool names, in registration order */
  list(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a Tool from parts; rejects duplicate parameter names */
export function defineTool(descriptor: ToolDescriptor, execute: ToolExecutor): Tool {
  const seen = new Set<string>();
  for (const param of descriptor.parameters) {
    if (seen.has(param.name)) {
      throw new Error(
        `Tool "${descriptor.name}" declares parameter "${param.name}" more than once`,
      );
    }
    seen.add(param.name);
  }
  return { descriptor, execute };
}

export function toFunctionTool(descriptor: ToolDescriptor): FunctionTool {
  const properties: Record<string, ToolParameterSchema> = {};
  const required: string[] = [];

  for (const param of descriptor.parameters) {
    properties[param.name] = toParameterSchema(param);
    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    type: "function",
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: { type: "object", properties, required },
    },
  };
}

function toParameterSchema(param: ToolParameterSpec): ToolParameterSchema {
  const schema: ToolParameterSchema = {
    type: param.type,
    description: param.description,
  };
  if (param.enum && param.enum.length > 0) schema.enum = param.enum;
  if (param.items) schema.items = param.items;
  if (param.properties) schema.properties = param.properties;
  return schema;
}

/** First required parameter absent from args, in descriptor order */
export function findMissingParameter(
  descriptor: ToolDescriptor,
  args: ToolArguments,
): string | undefined {
  return descriptor.parameters.find(
    (p) => p.required === true && args[p.name] === undefined,
  )?.name;
}

/** Decode the model's JSON argument string into an argument mapping */
export function parseToolArguments(argsJson: string): ToolArguments {
  if (argsJson.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(argsJson);
  } catch (err) {
    throw new InvalidArgumentsError("Tool arguments are not valid JSON", { cause: err });
  }

  if (!isPlainObject(parsed)) {
    throw new InvalidArgumentsError("Tool arguments must be a JSON object");
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
