/**
 * Interactive multi-turn REPL.
 *
 * Reads one line at a time and hands it to the agent loop. Lines typed while
 * a turn is in flight are discarded, so at most one turn runs at a time.
 * Loop output reaches the terminal only through the presentation bridge,
 * drained on a fixed tick. The readline prompt is written to stderr so it
 * does not mix with agent output on stdout.
 */
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { AgentSession } from "./session.js";
import { formatBridgeMessage, type ActivitySpinner } from "./terminal-formatting.js";

const BOLD_GREEN = "\x1b[1;32m";
const RESET = "\x1b[0m";

export const BANNER = "Chat with the agent. Use tools like read_file, list_files, edit_file.";
export const EXIT_COMMANDS = new Set(["exit", "quit"]);

/** Writes a bold green "> " prompt to the output stream. */
export function writePrompt(output: Writable): void {
  output.write(`${BOLD_GREEN}> ${RESET}`);
}

export type InteractiveConfig = {
  session: AgentSession;
  drainIntervalMs?: number;
};

/** Stream and spinner overrides, used by tests. */
export type InteractiveOverrides = {
  input?: Readable;
  promptOutput?: Writable;
  spinner?: ActivitySpinner;
};

/**
 * Runs the interactive REPL loop.
 *
 * - Blank input is ignored; `exit`, `quit` or Ctrl+D ends the session
 * - A failed turn is reported and the prompt comes back
 */
export async function runInteractive(
  config: InteractiveConfig,
  write: (s: string) => void,
  overrides?: InteractiveOverrides,
): Promise<void> {
  const { session } = config;
  const promptOutput = overrides?.promptOutput ?? process.stderr;
  const spinner = overrides?.spinner;

  const rl = createInterface({
    input: overrides?.input ?? process.stdin,
    output: promptOutput,
    terminal: false,
  });
  const lines = rl[Symbol.asyncIterator]();

  // Input is closed while a turn runs: lines typed meanwhile are counted here
  // and skipped once the turn settles.
  let turnInFlight = false;
  let linesToDiscard = 0;
  rl.on("line", () => {
    if (turnInFlight) linesToDiscard++;
  });

  const render = () => {
    const messages = session.bridge.drain();
    if (messages.length === 0) return;
    const emit = () => {
      for (const message of messages) {
        write(formatBridgeMessage(message) + "\n");
      }
    };
    if (spinner) {
      spinner.withPause(emit);
    } else {
      emit();
    }
  };

  session.bridge.enqueue("System", BANNER, "System");
  session.bridge.enqueue("System", `Working directory: ${session.guard.root}`, "System");
  render();

  const timer = setInterval(render, config.drainIntervalMs ?? 100);
  timer.unref();

  try {
    for (;;) {
      writePrompt(promptOutput);
      const next = await lines.next();
      if (next.done) break;
      if (linesToDiscard > 0) {
        linesToDiscard--;
        continue;
      }

      const input = next.value.trim();
      if (input === "") continue;
      if (EXIT_COMMANDS.has(input)) break;

      session.bridge.enqueue("You", input);
      render();

      spinner?.start("Agent thinking...");
      turnInFlight = true;
      try {
        await session.loop.runTurn(input);
      } finally {
        turnInFlight = false;
        spinner?.stop();
        render();
      }
    }
  } finally {
    clearInterval(timer);
    render();
    rl.close();
  }
}
