#!/usr/bin/env node
import { config as loadEnv } from "dotenv";
import { cli } from "cleye";
import { createInterface } from "node:readline/promises";
import { loadConfigFile, readApiKey, resolveConfig, type ResolvedConfig } from "./src/config.js";
import { createLogger } from "./src/logger.js";
import { resolveProvider } from "./src/providers/registry.js";
import { runInteractive } from "./src/interactive.js";
import { createAgentSession, runOnce } from "./src/session.js";
import { createActivitySpinner } from "./src/terminal-formatting.js";
import pkg from "./package.json" with { type: "json" };

loadEnv();

const argv = cli({
  name: "tern",
  version: pkg.version,
  parameters: ["[prompt]"],
  help: {
    description: "A terminal agent that reads, lists and edits files in the working directory",
  },
  flags: {
    model: {
      type: String,
      alias: "m",
      description: "Model to use (e.g. gpt-4.1-2025-04-14, claude-sonnet-4-5-20250929)",
    },
    provider: {
      type: String,
      alias: "p",
      description: "Provider to use (openai, anthropic)",
    },
    maxToolRounds: {
      type: Number,
      description: "Maximum tool rounds per turn before the turn fails",
    },
    verbose: {
      type: Boolean,
      alias: "v",
      description: "Print debug diagnostics to stderr",
    },
  },
});

const logger = createLogger({ verbose: argv.flags.verbose ?? false });

function loadConfig(): ResolvedConfig {
  try {
    return resolveConfig(loadConfigFile(), {
      provider: argv.flags.provider,
      model: argv.flags.model,
      maxToolRounds: argv.flags.maxToolRounds,
    });
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const config = loadConfig();

// In dry-run mode, print the resolved config as JSON and exit
if (process.env.TERN_DRY_RUN === "1") {
  console.log(JSON.stringify({ prompt: argv._.prompt, ...config }));
  process.exit(0);
}

let apiKey = readApiKey(config);
if (!apiKey && process.stdin.isTTY) {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  const answer = await rl.question(`${config.apiKeyEnv} is not set. Enter your API key: `);
  rl.close();
  apiKey = answer.trim() || undefined;
}
if (!apiKey) {
  logger.error(`${config.apiKeyEnv} is required. Set it in the environment or in .env`);
  process.exit(1);
}

const provider = resolveProvider(config.provider);
logger.debug(`provider ${provider.name}, model ${config.model}, max tool rounds ${config.maxToolRounds}`);

const session = createAgentSession({
  client: provider.createClient({
    apiKey,
    model: config.model,
    ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
  }),
  systemPrompt: config.systemPrompt,
  maxOutputTokens: config.maxOutputTokens,
  maxToolRounds: config.maxToolRounds,
  logger,
});

const write = (s: string) => process.stdout.write(s);
const prompt = argv._.prompt;

if (prompt) {
  const ok = await runOnce(session, prompt, write);
  process.exit(ok ? 0 : 1);
}

await runInteractive({ session }, write, {
  spinner: createActivitySpinner(process.stderr),
});
process.exit(0);
