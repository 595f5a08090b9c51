import OpenAI from "openai";
import { TransportError } from "../errors.js";
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  ConversationEntry,
  ToolDescriptor,
  ToolRequest,
} from "../types.js";

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
type ChatCreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

export const OPENAI_DEFAULT_MODEL = "gpt-4.1-2025-04-14";

/** The fields of a chat completion this client reads. */
export type OpenAIResponse = {
  choices: readonly {
    message: {
      content?: string | null;
      tool_calls?: readonly {
        id: string;
        type: string;
        function?: { name: string; arguments: string };
      }[];
    };
  }[];
};

/** The slice of the SDK this client calls. Injected in tests. */
export interface OpenAIChatApi {
  create(params: ChatCreateParams): Promise<OpenAIResponse>;
}

export interface OpenAIConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  chat?: OpenAIChatApi;
}

/** Translate transcript entries to chat messages, system prompt first. */
export function translateEntries(
  entries: readonly ConversationEntry[],
  system?: string,
): ChatMessageParam[] {
  const result: ChatMessageParam[] = [];
  if (system) {
    result.push({ role: "system", content: system });
  }

  for (const entry of entries) {
    switch (entry.kind) {
      case "user":
        result.push({ role: "user", content: entry.text });
        break;
      case "assistant":
        result.push({
          role: "assistant",
          // null is only accepted alongside tool calls
          content: entry.text ?? (entry.toolRequests.length > 0 ? null : ""),
          ...(entry.toolRequests.length > 0
            ? {
                tool_calls: entry.toolRequests.map((r) => ({
                  id: r.id,
                  type: "function" as const,
                  function: { name: r.toolName, arguments: r.argumentsJson },
                })),
              }
            : {}),
        });
        break;
      case "tool_result":
        result.push({
          role: "tool",
          tool_call_id: entry.requestId,
          content: entry.resultText,
        });
        break;
    }
  }

  return result;
}

/** Translate tool descriptors to function tools. */
export function translateTools(tools: readonly ToolDescriptor[]): ChatTool[] {
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
      type: "function" as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: { type: "object", properties, required },
      },
    };
  });
}

/** Map the first choice of a chat completion to a completion response. */
export function mapResponse(response: OpenAIResponse): CompletionResponse {
  const message = response.choices[0]?.message;
  if (!message) {
    return { toolRequests: [] };
  }

  const toolRequests: ToolRequest[] = [];
  for (const call of message.tool_calls ?? []) {
    // Only function calls map onto registered tools
    if (call.type !== "function" || !call.function) continue;
    toolRequests.push({
      id: call.id,
      toolName: call.function.name,
      argumentsJson: call.function.arguments,
    });
  }

  return message.content ? { text: message.content, toolRequests } : { toolRequests };
}

export class OpenAIClient implements CompletionClient {
  private readonly chat: OpenAIChatApi;
  private readonly model: string;
  private readonly temperature: number | undefined;

  constructor(config: OpenAIConfig) {
    if (config.chat) {
      this.chat = config.chat;
    } else {
      const sdk = new OpenAI({ apiKey: config.apiKey });
      this.chat = { create: (params) => sdk.chat.completions.create(params) };
    }
    this.model = config.model ?? OPENAI_DEFAULT_MODEL;
    this.temperature = config.temperature;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: ChatCreateParams = {
      model: this.model,
      messages: translateEntries(request.entries, request.system),
      max_completion_tokens: request.maxOutputTokens,
    };

    if (this.temperature !== undefined) {
      params.temperature = this.temperature;
    }
    if (request.tools.length > 0) {
      params.tools = translateTools(request.tools);
      params.tool_choice = request.toolChoice;
    }

    try {
      return mapResponse(await this.chat.create(params));
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        throw new TransportError(err.message, err.status, { cause: err });
      }
      throw err;
    }
  }
}
