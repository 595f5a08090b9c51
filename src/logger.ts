// Leveled diagnostic logger for the CLI. Writes one colored line per call to
// an injected stream (stderr by default) so it never mixes with agent output.

import type { Writable } from "node:stream";
import { colors, symbols } from "./terminal-formatting.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerConfig {
  output?: Writable;
  /** When false, debug lines are dropped */
  verbose?: boolean;
}

const FORMATTERS: Record<LogLevel, (message: string) => string> = {
  debug: (m) => colors.dim(`${symbols.bullet} ${m}`),
  info: (m) => `${colors.cyan(symbols.info)} ${m}`,
  warn: (m) => `${colors.yellow(symbols.warning)} ${colors.yellow(m)}`,
  error: (m) => colors.error(`${symbols.cross} error: ${m}`),
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const output = config.output ?? process.stderr;
  const verbose = config.verbose ?? false;

  function write(level: LogLevel, message: string): void {
    if (level === "debug" && !verbose) return;
    try {
      output.write(FORMATTERS[level](message) + "\n");
    } catch {
      // stderr closed; drop the line
    }
  }

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

/** A logger that drops everything. Default for library use and tests. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
