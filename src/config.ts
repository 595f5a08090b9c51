import { parse } from "smol-toml";
import * as z from "zod";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_MAX_TOOL_ROUNDS } from "./engine.js";
import { ConfigError } from "./errors.js";
import { resolveProvider, type ProviderName } from "./providers/registry.js";

export const CONFIG_DIR = ".tern";
export const CONFIG_FILE = "config.toml";

const positiveInt = z.number().int().positive();

const FileConfigSchema = z
  .object({
    provider: z.enum(["openai", "anthropic"]).optional(),
    model: z.string().min(1).optional(),
    maxOutputTokens: positiveInt.optional(),
    maxToolRounds: positiveInt.optional(),
    systemPrompt: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/** Values given on the command line. They win over the config file. */
export type CliOverrides = {
  provider?: string;
  model?: string;
  maxToolRounds?: number;
};

export type ResolvedConfig = {
  provider: ProviderName;
  model: string;
  maxOutputTokens: number;
  maxToolRounds: number;
  systemPrompt?: string;
  temperature?: number;
  /** Environment variable the API key is read from */
  apiKeyEnv: string;
};

/**
 * Load and validate .tern/config.toml.
 * Returns an empty object if the file does not exist.
 * Throws ConfigError on malformed TOML or schema violations.
 */
export function loadConfigFile(root?: string): FileConfig {
  const filePath = join(root ?? process.cwd(), CONFIG_DIR, CONFIG_FILE);

  if (!existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${CONFIG_DIR}/${CONFIG_FILE}: ${message}`);
  }

  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `"${issue.path.join(".")}" ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigError(`${CONFIG_DIR}/${CONFIG_FILE}: ${issues}`);
  }
  return result.data;
}

/** Merge defaults, the config file and command-line flags, in that order. */
export function resolveConfig(file: FileConfig, flags: CliOverrides = {}): ResolvedConfig {
  if (flags.maxToolRounds !== undefined && !positiveInt.safeParse(flags.maxToolRounds).success) {
    throw new ConfigError("--max-tool-rounds must be a positive integer");
  }

  const provider = resolveProvider(flags.provider ?? file.provider, flags.model ?? file.model);

  const config: ResolvedConfig = {
    provider: provider.name,
    model: flags.model ?? file.model ?? provider.defaultModel,
    maxOutputTokens: file.maxOutputTokens ?? provider.defaultMaxOutputTokens,
    maxToolRounds: flags.maxToolRounds ?? file.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS,
    apiKeyEnv: provider.apiKeyEnv,
  };
  if (file.systemPrompt !== undefined) config.systemPrompt = file.systemPrompt;
  if (file.temperature !== undefined) config.temperature = file.temperature;
  return config;
}

/** The API key for the resolved provider, or undefined when unset or blank. */
export function readApiKey(
  config: Pick<ResolvedConfig, "apiKeyEnv">,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  const value = env[config.apiKeyEnv]?.trim();
  return value ? value : undefined;
}
