// Conversation Store — the append-only transcript sent to the endpoint on
// every completion call. Entries are never edited or removed.

import type { ConversationEntry, ToolRequest } from "./types.js";

function freezeEntry(entry: ConversationEntry): ConversationEntry {
  if (entry.kind === "assistant") {
    entry.toolRequests.forEach((request) => Object.freeze(request));
    Object.freeze(entry.toolRequests);
  }
  return Object.freeze(entry);
}

export class ConversationStore {
  private readonly log: ConversationEntry[] = [];

  get length(): number {
    return this.log.length;
  }

  /**
   * Append an entry. A tool result must answer a still-unanswered request of
   * the most recent assistant entry; anything else throws.
   */
  append(entry: ConversationEntry): void {
    if (entry.kind === "tool_result") {
      const pending = this.pendingRequests();
      if (!pending.some((r) => r.id === entry.requestId)) {
        throw new Error(
          `Tool result "${entry.requestId}" does not answer a pending request of the last assistant message`,
        );
      }
    } else if (this.pendingRequests().length > 0) {
      throw new Error(
        `Cannot append a ${entry.kind} message while tool requests are unanswered`,
      );
    }
    this.log.push(freezeEntry(structuredClone(entry)));
  }

  /** Requests from the most recent assistant entry that have no result yet. */
  pendingRequests(): ToolRequest[] {
    const answered = new Set<string>();
    for (let i = this.log.length - 1; i >= 0; i--) {
      const entry = this.log[i];
      if (entry === undefined) break;
      switch (entry.kind) {
        case "tool_result":
          answered.add(entry.requestId);
          break;
        case "assistant":
          return entry.toolRequests.filter((r) => !answered.has(r.id));
        case "user":
          return [];
      }
    }
    return [];
  }

  /** A read-only snapshot for display or for building the next request. */
  entries(): readonly ConversationEntry[] {
    return Object.freeze([...this.log]);
  }
}
