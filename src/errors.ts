/**
 * Error taxonomy.
 *
 * Tool-level failures are values: they are rendered into the result string the
 * model sees and never thrown. Only failures that end a turn (transport, the
 * tool-round cap, overlapping turns) and bad configuration are exceptions.
 */

export type ToolErrorCode =
  // containment
  | "AccessDenied"
  // not found / type mismatch
  | "NotAFile"
  | "NotADirectory"
  | "FileNotFound"
  // edit semantics
  | "NoOpEdit"
  | "FileExists"
  | "PatternNotFound"
  | "NoChangeWarning"
  // protocol
  | "MalformedArguments"
  | "ToolArgumentMismatch"
  | "UnknownTool";

/** A tool failure carried as a value. */
export type ToolFailure = {
  code: ToolErrorCode;
  message: string;
};

/** Renders a failure into the string fed back to the model. */
export function formatToolFailure(failure: ToolFailure): string {
  const prefix = failure.code === "NoChangeWarning" ? "Warning" : "Error";
  return `${prefix}: ${failure.message}`;
}

export class ToolLoopExceededError extends Error {
  readonly code = "ToolLoopExceeded";

  constructor(readonly maxToolRounds: number) {
    super(`Tool loop exceeded ${maxToolRounds} rounds without a final answer`);
    this.name = "ToolLoopExceededError";
  }
}

/** Network, authentication or rate-limit failure reaching the completion endpoint. */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class TurnInProgressError extends Error {
  constructor() {
    super("A turn is already in progress");
    this.name = "TurnInProgressError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
