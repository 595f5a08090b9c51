// Shared types for the agent loop, tool registry and completion clients.

// --- Conversation entries ---

/** A tool invocation requested by the model. Arguments are raw and unvalidated. */
export interface ToolRequest {
  /** Endpoint-assigned id, unique within one assistant response */
  id: string;
  toolName: string;
  argumentsJson: string;
}

export interface UserEntry {
  kind: "user";
  text: string;
}

export interface AssistantEntry {
  kind: "assistant";
  text?: string;
  /** Kept verbatim: the endpoint expects them in history before their results */
  toolRequests: ToolRequest[];
}

export interface ToolResultEntry {
  kind: "tool_result";
  requestId: string;
  toolName: string;
  resultText: string;
}

export type ConversationEntry = UserEntry | AssistantEntry | ToolResultEntry;

// --- Tool descriptors (advertised to the model) ---

export interface ParameterDef {
  type: string;
  description: string;
  required?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, ParameterDef>;
}

// --- Completion endpoint ---

/** The model decides whether to call zero, one or several tools. */
export type ToolChoice = "auto";

export interface CompletionRequest {
  system?: string;
  entries: readonly ConversationEntry[];
  tools: readonly ToolDescriptor[];
  toolChoice: ToolChoice;
  maxOutputTokens: number;
}

export interface CompletionResponse {
  text?: string;
  toolRequests: ToolRequest[];
}

/** The only contract the agent loop has with a model endpoint. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
