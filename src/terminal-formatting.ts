// Terminal formatting primitives — colors, symbols, truncation and formatters.
// Composes ansis (colors), figures (symbols), and nanospinner (spinners).
// The REPL and the logger use these to build formatted output lines.

import ansis from "ansis";
import figures from "figures";
import { createSpinner, type Spinner } from "nanospinner";
import type { BridgeMessage, BridgeRole } from "./presentation-bridge.js";

// ── Colors ──────────────────────────────────────────────────────────────────

export const colors = {
  cyan: (text: string) => ansis.cyan(text),
  yellow: (text: string) => ansis.yellow(text),
  /** Metadata and verbose details */
  dim: (text: string) => ansis.dim(text),
  error: (text: string) => ansis.bold.red(text),
};

// ── Symbols ─────────────────────────────────────────────────────────────────

export const symbols = {
  cross: figures.cross,
  info: figures.info,
  warning: figures.warning,
  bullet: figures.bullet,
};

// ── Display truncation ──────────────────────────────────────────────────────

export const MAX_DISPLAY_LENGTH = 500;
export const DISPLAY_TRUNCATION_MARKER = " [... result truncated ...]";

/** Cap text for display. The model always receives the untruncated text. */
export function truncateForDisplay(text: string, max = MAX_DISPLAY_LENGTH): string {
  if (text.length <= max) return text;
  return text.slice(0, max) + DISPLAY_TRUNCATION_MARKER;
}

// ── Bridge messages ─────────────────────────────────────────────────────────

const ROLE_STYLES: Record<BridgeRole, { label: (s: string) => string; body: (s: string) => string }> = {
  You: { label: (s) => ansis.bold.blue(s), body: (s) => s },
  Agent: { label: (s) => ansis.bold.yellow(s), body: (s) => s },
  Tool: { label: (s) => ansis.green(s), body: (s) => ansis.green.italic(s) },
  ToolResult: { label: (s) => ansis.gray(s), body: (s) => ansis.gray(s) },
  System: { label: (s) => ansis.dim.italic(s), body: (s) => ansis.dim.italic(s) },
  Error: { label: (s) => ansis.bold.red(s), body: (s) => ansis.bold.red(s) },
};

/**
 * Render one bridge message as a "Role: content" line. The style tag, when
 * present, overrides the body style picked by the role.
 */
export function formatBridgeMessage(message: BridgeMessage): string {
  const roleStyle = ROLE_STYLES[message.role];
  const body = message.styleTag ? ROLE_STYLES[message.styleTag].body : roleStyle.body;
  return `${roleStyle.label(`${message.role}:`)} ${body(message.content)}`;
}

// ── ANSI stripping ──────────────────────────────────────────────────────────

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

/** Remove ANSI escape codes from a string. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, "");
}

// ── Spinner ─────────────────────────────────────────────────────────────────

export interface ActivitySpinner {
  /** Start the spinner with the given text (e.g. "Agent thinking..."). */
  start(text: string): void;
  /** Stop the spinner and erase its line. */
  stop(): void;
  isSpinning(): boolean;
  /**
   * Pause the spinner, run `fn`, then restart.
   * If the spinner is not running, just runs `fn` directly.
   * This prevents corrupted terminal lines when writing output
   * while the spinner is active.
   */
  withPause(fn: () => void): void;
}

/**
 * Create an activity spinner backed by nanospinner.
 * The spinner writes to the provided stream (defaults to process.stderr).
 */
export function createActivitySpinner(
  stream?: NodeJS.WriteStream,
): ActivitySpinner {
  const spinner: Spinner = createSpinner("", stream ? { stream } : {});
  let lastText = "";

  return {
    start(text: string) {
      lastText = text;
      spinner.start({ text });
    },

    stop() {
      if (spinner.isSpinning()) {
        spinner.reset();
        spinner.clear();
      }
    },

    isSpinning() {
      return spinner.isSpinning();
    },

    withPause(fn: () => void) {
      if (!spinner.isSpinning()) {
        fn();
        return;
      }
      spinner.reset();
      spinner.clear();
      fn();
      spinner.start({ text: lastText });
    },
  };
}
