import { ConfigError } from "../errors.js";
import type { CompletionClient } from "../types.js";
import { ANTHROPIC_DEFAULT_MODEL, AnthropicClient } from "./anthropic.js";
import { OPENAI_DEFAULT_MODEL, OpenAIClient } from "./openai.js";

export type ProviderName = "openai" | "anthropic";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic"];

export type Provider = {
  name: ProviderName;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
  defaultModel: string;
  defaultMaxOutputTokens: number;
  createClient(config: { apiKey: string; model: string; temperature?: number }): CompletionClient;
};

export const OpenAIProvider: Provider = {
  name: "openai",
  apiKeyEnv: "OPENAI_API_KEY",
  defaultModel: OPENAI_DEFAULT_MODEL,
  defaultMaxOutputTokens: 32_768,
  createClient: (config) => new OpenAIClient(config),
};

export const AnthropicProvider: Provider = {
  name: "anthropic",
  apiKeyEnv: "ANTHROPIC_API_KEY",
  defaultModel: ANTHROPIC_DEFAULT_MODEL,
  defaultMaxOutputTokens: 8192,
  createClient: (config) => new AnthropicClient(config),
};

const PROVIDERS: Record<ProviderName, Provider> = {
  openai: OpenAIProvider,
  anthropic: AnthropicProvider,
};

export function isProviderName(value: string): value is ProviderName {
  return value === "openai" || value === "anthropic";
}

/**
 * Selects the Provider from an explicit `--provider` flag, or by inferring it
 * from the model name, or falls back to the configured default.
 */
export function resolveProvider(
  providerFlag?: string,
  modelFlag?: string,
  fallback: ProviderName = "openai",
): Provider {
  if (providerFlag !== undefined) {
    if (isProviderName(providerFlag)) return PROVIDERS[providerFlag];
    throw new ConfigError(
      `Unknown provider "${providerFlag}". Valid providers: ${PROVIDER_NAMES.join(", ")}`,
    );
  }

  if (modelFlag) {
    if (modelFlag.startsWith("claude-")) return AnthropicProvider;
    if (modelFlag.startsWith("gpt-") || /^o\d/.test(modelFlag)) return OpenAIProvider;
  }

  return PROVIDERS[fallback];
}
