// Agent loop — drives one user turn to completion. Calls the completion
// endpoint, runs any requested tools, appends their results and calls again
// until the model answers with text alone.

import { ConversationStore } from "./conversation.js";
import { ToolLoopExceededError, TransportError, TurnInProgressError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PresentationBridge } from "./presentation-bridge.js";
import { truncateForDisplay } from "./terminal-formatting.js";
import type { ToolRegistry } from "./tool-registry.js";
import type {
  AssistantEntry,
  CompletionClient,
  CompletionResponse,
  ConversationEntry,
  ToolResultEntry,
} from "./types.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 25;
export const DEFAULT_MAX_OUTPUT_TOKENS = 8192;

export const NO_CONTENT_NOTICE = "[Model returned no text content]";
export const TOOL_USE_NOTICE = "Okay, I need to use some tools...";
export const SKIPPED_TOOL_RESULT = "Error: Tool round limit reached. This request was not executed.";

export type LoopState = "idle" | "awaiting_completion";

export type TurnOutcome =
  | { status: "completed"; text?: string; toolRounds: number }
  | { status: "failed"; error: Error; toolRounds: number };

export interface AgentLoopOptions {
  client: CompletionClient;
  registry: ToolRegistry;
  bridge: PresentationBridge;
  systemPrompt?: string;
  maxOutputTokens?: number;
  maxToolRounds?: number;
  logger?: Logger;
}

function describeFailure(err: Error): string {
  if (err instanceof TransportError) return `API Error: ${err.message}`;
  if (err instanceof ToolLoopExceededError) return err.message;
  return `An unexpected error occurred: ${err.message}`;
}

export class AgentLoop {
  private readonly store = new ConversationStore();
  private readonly client: CompletionClient;
  private readonly registry: ToolRegistry;
  private readonly bridge: PresentationBridge;
  private readonly systemPrompt: string | undefined;
  private readonly maxOutputTokens: number;
  private readonly maxToolRounds: number;
  private readonly logger: Logger;
  private loopState: LoopState = "idle";

  constructor(options: AgentLoopOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.bridge = options.bridge;
    this.systemPrompt = options.systemPrompt;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): LoopState {
    return this.loopState;
  }

  /** Read-only view of the transcript. */
  snapshot(): readonly ConversationEntry[] {
    return this.store.entries();
  }

  /**
   * Run one user turn. Resolves with the outcome; endpoint failures and the
   * tool-round cap end the turn as `failed` and are surfaced on the bridge.
   * Rejects only when another turn is still in flight.
   */
  async runTurn(userText: string): Promise<TurnOutcome> {
    if (this.loopState !== "idle") {
      throw new TurnInProgressError();
    }
    this.loopState = "awaiting_completion";
    this.store.append({ kind: "user", text: userText });

    let toolRounds = 0;
    try {
      for (;;) {
        const response = await this.requestCompletion();
        const assistant: AssistantEntry = {
          kind: "assistant",
          toolRequests: response.toolRequests,
          ...(response.text ? { text: response.text } : {}),
        };
        this.store.append(assistant);

        if (assistant.toolRequests.length === 0) {
          if (assistant.text) {
            this.bridge.enqueue("Agent", assistant.text);
          } else {
            this.bridge.enqueue("System", NO_CONTENT_NOTICE, "System");
          }
          return { status: "completed", text: assistant.text, toolRounds };
        }

        if (assistant.text) {
          this.bridge.enqueue("Agent", assistant.text);
        }

        if (toolRounds >= this.maxToolRounds) {
          // Answer the requests so the transcript stays valid for the next turn
          for (const request of assistant.toolRequests) {
            this.store.append({
              kind: "tool_result",
              requestId: request.id,
              toolName: request.toolName,
              resultText: SKIPPED_TOOL_RESULT,
            });
          }
          throw new ToolLoopExceededError(this.maxToolRounds);
        }

        this.bridge.enqueue("Agent", TOOL_USE_NOTICE);

        const results = await this.runTools(assistant);
        for (const result of results) {
          this.store.append(result);
        }
        toolRounds++;
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.debug(`turn failed after ${toolRounds} tool round(s): ${error.stack ?? error.message}`);
      this.bridge.enqueue("Error", describeFailure(error), "Error");
      return { status: "failed", error, toolRounds };
    } finally {
      this.loopState = "idle";
    }
  }

  private async requestCompletion(): Promise<CompletionResponse> {
    const entries = this.store.entries();
    this.logger.debug(`requesting completion with ${entries.length} transcript entries`);

    const response = await this.client.complete({
      ...(this.systemPrompt ? { system: this.systemPrompt } : {}),
      entries,
      tools: this.registry.descriptors(),
      toolChoice: "auto",
      maxOutputTokens: this.maxOutputTokens,
    });

    this.logger.debug(`completion returned ${response.toolRequests.length} tool request(s)`);
    return response;
  }

  /** Execute every request of one assistant entry, in endpoint order. */
  private async runTools(assistant: AssistantEntry): Promise<ToolResultEntry[]> {
    const results: ToolResultEntry[] = [];

    for (const request of assistant.toolRequests) {
      this.bridge.enqueue("Tool", `Calling: ${request.toolName}(${request.argumentsJson})`, "Tool");

      const invocation = await this.registry.dispatch(request);
      if (invocation.protocolError) {
        this.logger.debug(`${request.toolName} (${request.id}): ${invocation.protocolError}`);
        this.bridge.enqueue("Error", invocation.resultText, "Error");
      }
      this.bridge.enqueue("ToolResult", `Result: ${truncateForDisplay(invocation.resultText)}`, "ToolResult");

      results.push({
        kind: "tool_result",
        requestId: request.id,
        toolName: request.toolName,
        resultText: invocation.resultText,
      });
    }

    return results;
  }
}
