// Tool Registry — maps tool names to implementations and to the descriptors
// advertised to the model, and turns raw tool requests into result strings.

import * as z from "zod";
import { formatToolFailure, type ToolErrorCode } from "./errors.js";
import type { ParameterDef, ToolDescriptor, ToolRequest } from "./types.js";

export type ToolSchema = z.AnyZodObject;

export interface ToolDefinition<S extends ToolSchema> {
  name: string;
  description: string;
  inputSchema: S;
  execute(args: z.infer<S>): Promise<string>;
}

export interface ToolInvocation {
  resultText: string;
  /** Set when the request never reached the tool, or the tool threw */
  protocolError?: ToolErrorCode | "ExecutionFailed";
}

/** A registered tool with its argument type erased behind schema validation. */
export interface Tool {
  readonly descriptor: ToolDescriptor;
  invoke(args: unknown): Promise<ToolInvocation>;
}

function unwrapField(field: z.ZodTypeAny): z.ZodTypeAny {
  if (field instanceof z.ZodOptional) return unwrapField(field.unwrap());
  if (field instanceof z.ZodDefault) return unwrapField(field.removeDefault());
  return field;
}

function jsonTypeOf(field: z.ZodTypeAny): string {
  const inner = unwrapField(field);
  if (inner instanceof z.ZodNumber) return "number";
  if (inner instanceof z.ZodBoolean) return "boolean";
  if (inner instanceof z.ZodArray) return "array";
  if (inner instanceof z.ZodObject) return "object";
  return "string";
}

/** Derive the parameter contract sent to the model from a zod object schema. */
export function describeParameters(schema: ToolSchema): Record<string, ParameterDef> {
  const parameters: Record<string, ParameterDef> = {};
  for (const [name, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const field: z.ZodTypeAny = value;
    parameters[name] = {
      type: jsonTypeOf(field),
      description: field.description ?? "",
      required: !field.isOptional(),
    };
  }
  return parameters;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "arguments";
      return `${at}: ${issue.message}`;
    })
    .join("; ");
}

export function createTool<S extends ToolSchema>(definition: ToolDefinition<S>): Tool {
  const descriptor: ToolDescriptor = Object.freeze({
    name: definition.name,
    description: definition.description,
    parameters: Object.freeze(describeParameters(definition.inputSchema)),
  });

  return {
    descriptor,
    async invoke(args: unknown): Promise<ToolInvocation> {
      const parsed = definition.inputSchema.safeParse(args);
      if (!parsed.success) {
        return {
          resultText: formatToolFailure({
            code: "ToolArgumentMismatch",
            message: `Invalid arguments for tool ${definition.name}: ${formatIssues(parsed.error)}. Args received: ${JSON.stringify(args)}`,
          }),
          protocolError: "ToolArgumentMismatch",
        };
      }

      try {
        return { resultText: await definition.execute(parsed.data) };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return {
          resultText: `Error executing tool ${definition.name}: ${message}`,
          protocolError: "ExecutionFailed",
        };
      }
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    const { name } = tool.descriptor;
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.tools.set(name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Descriptors in registration order, frozen. */
  descriptors(): readonly ToolDescriptor[] {
    return Object.freeze([...this.tools.values()].map((t) => t.descriptor));
  }

  /**
   * Run one tool request. Never throws: unknown tools, unparseable or
   * mismatched arguments and tool exceptions all come back as result text.
   */
  async dispatch(request: ToolRequest): Promise<ToolInvocation> {
    const tool = this.tools.get(request.toolName);
    if (!tool) {
      return {
        resultText: formatToolFailure({
          code: "UnknownTool",
          message: `Tool '${request.toolName}' not found.`,
        }),
        protocolError: "UnknownTool",
      };
    }

    let args: unknown;
    try {
      // Some endpoints send an empty string for a call without arguments
      args = request.argumentsJson.trim() === "" ? {} : JSON.parse(request.argumentsJson);
    } catch {
      return this.malformed(request);
    }
    if (typeof args !== "object" || args === null || Array.isArray(args)) {
      return this.malformed(request);
    }

    return tool.invoke(args);
  }

  private malformed(request: ToolRequest): ToolInvocation {
    return {
      resultText: formatToolFailure({
        code: "MalformedArguments",
        message: `Invalid JSON arguments received for ${request.toolName}: ${request.argumentsJson}`,
      }),
      protocolError: "MalformedArguments",
    };
  }
}
