import Anthropic from "@anthropic-ai/sdk";
import { TransportError } from "../errors.js";
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  ConversationEntry,
  ToolDescriptor,
  ToolRequest,
} from "../types.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

/** The fields of an Anthropic message response this client reads. */
export type AnthropicResponse = {
  content: readonly {
    type: string;
    text?: string;
    id?: string;
    name?: string;
    input?: unknown;
  }[];
};

/** The slice of the SDK this client calls. Injected in tests. */
export interface AnthropicMessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<AnthropicResponse>;
}

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  messages?: AnthropicMessagesApi;
}

/**
 * Tool inputs travel as parsed objects in this API. Arguments that failed to
 * parse were already answered with a MalformedArguments result, so an empty
 * input keeps the transcript valid.
 */
function parseInput(argumentsJson: string): unknown {
  try {
    return JSON.parse(argumentsJson);
  } catch {
    return {};
  }
}

/** Translate transcript entries to Anthropic's message format. */
export function translateEntries(entries: readonly ConversationEntry[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];

  for (const entry of entries) {
    switch (entry.kind) {
      case "user":
        result.push({ role: "user", content: entry.text });
        break;

      case "assistant": {
        // Assistant messages always use content blocks so tool_use can coexist with text
        const content: Anthropic.ContentBlockParam[] = [];
        if (entry.text) {
          content.push({ type: "text", text: entry.text });
        }
        for (const request of entry.toolRequests) {
          content.push({
            type: "tool_use",
            id: request.id,
            name: request.toolName,
            input: parseInput(request.argumentsJson),
          });
        }
        // The API rejects empty assistant content
        if (content.length > 0) {
          result.push({ role: "assistant", content });
        }
        break;
      }

      case "tool_result": {
        // Results of one round share a single user message
        const block: Anthropic.ToolResultBlockParam = {
          type: "tool_result",
          tool_use_id: entry.requestId,
          content: entry.resultText,
        };
        const last = result[result.length - 1];
        if (last?.role === "user" && Array.isArray(last.content)) {
          last.content.push(block);
        } else {
          result.push({ role: "user", content: [block] });
        }
        break;
      }
    }
  }

  return result;
}

/** Translate tool descriptors to Anthropic's tool format. */
export function translateTools(tools: readonly ToolDescriptor[]): Anthropic.Tool[] {
  return tools.map((t) => {
    const properties: Record<string, { type: string; description: string }> = {};
    const required: string[] = [];

    for (const [name, def] of Object.entries(t.parameters)) {
      properties[name] = { type: def.type, description: def.description };
      if (def.required) {
        required.push(name);
      }
    }

    return {
      name: t.name,
      description: t.description,
      input_schema: {
        type: "object" as const,
        properties,
        required,
      },
    };
  });
}

/** Map an Anthropic API response to a completion response. */
export function mapResponse(response: AnthropicResponse): CompletionResponse {
  const texts: string[] = [];
  const toolRequests: ToolRequest[] = [];

  for (const block of response.content) {
    if (block.type === "text" && block.text) {
      texts.push(block.text);
    } else if (block.type === "tool_use" && block.id !== undefined && block.name !== undefined) {
      toolRequests.push({
        id: block.id,
        toolName: block.name,
        argumentsJson: JSON.stringify(block.input ?? {}),
      });
    }
    // Skip thinking blocks and other unknown types
  }

  const text = texts.join("\n");
  return text ? { text, toolRequests } : { toolRequests };
}

export class AnthropicClient implements CompletionClient {
  private readonly messages: AnthropicMessagesApi;
  private readonly model: string;
  private readonly temperature: number | undefined;

  constructor(config: AnthropicConfig) {
    if (config.messages) {
      this.messages = config.messages;
    } else {
      const sdk = new Anthropic({ apiKey: config.apiKey });
      this.messages = { create: (params) => sdk.messages.create(params) };
    }
    this.model = config.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.temperature = config.temperature;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxOutputTokens,
      messages: translateEntries(request.entries),
    };

    if (request.system) {
      params.system = request.system;
    }
    if (this.temperature !== undefined) {
      params.temperature = this.temperature;
    }
    if (request.tools.length > 0) {
      params.tools = translateTools(request.tools);
      params.tool_choice = { type: request.toolChoice };
    }

    try {
      return mapResponse(await this.messages.create(params));
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        throw new TransportError(err.message, err.status, { cause: err });
      }
      throw err;
    }
  }
}
