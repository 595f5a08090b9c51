/**
 * Session wiring and the non-interactive single-turn path.
 *
 * A session is one workspace guard, one tool registry, one presentation
 * bridge and one agent loop. Nothing about it outlives the process.
 */
import { AgentLoop } from "./engine.js";
import type { Logger } from "./logger.js";
import { PresentationBridge } from "./presentation-bridge.js";
import { formatBridgeMessage } from "./terminal-formatting.js";
import { createDefaultRegistry } from "./tool-factory.js";
import type { CompletionClient } from "./types.js";
import { WorkspaceGuard } from "./workspace-guard.js";

export type SessionConfig = {
  client: CompletionClient;
  /** Workspace root; defaults to the process working directory */
  root?: string;
  systemPrompt?: string;
  maxOutputTokens?: number;
  maxToolRounds?: number;
  logger?: Logger;
};

export type AgentSession = {
  guard: WorkspaceGuard;
  bridge: PresentationBridge;
  loop: AgentLoop;
};

export function createAgentSession(config: SessionConfig): AgentSession {
  const guard = new WorkspaceGuard(config.root);
  const bridge = new PresentationBridge();
  const loop = new AgentLoop({
    client: config.client,
    registry: createDefaultRegistry(guard),
    bridge,
    systemPrompt: config.systemPrompt,
    maxOutputTokens: config.maxOutputTokens,
    maxToolRounds: config.maxToolRounds,
    logger: config.logger,
  });
  return { guard, bridge, loop };
}

type WriteFn = (s: string) => void;

/**
 * Runs one turn for a prompt given on the command line, relaying bridge
 * messages to `write` as they arrive. Returns true when the turn completed.
 */
export async function runOnce(
  session: AgentSession,
  prompt: string,
  write: WriteFn,
  drainIntervalMs = 100,
): Promise<boolean> {
  const stopDrain = session.bridge.startDrainLoop(
    (message) => write(formatBridgeMessage(message) + "\n"),
    drainIntervalMs,
  );
  try {
    const outcome = await session.loop.runTurn(prompt);
    return outcome.status === "completed";
  } finally {
    stopDrain();
  }
}
