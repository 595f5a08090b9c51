import { test, expect, describe } from "vitest";
import { ConversationStore } from "./conversation.js";
import type { AssistantEntry } from "./types.js";

const twoRequests: AssistantEntry = {
  kind: "assistant",
  toolRequests: [
    { id: "a", toolName: "read_file", argumentsJson: '{"path":"x"}' },
    { id: "b", toolName: "list_files", argumentsJson: "{}" },
  ],
};

describe("ConversationStore", () => {
  test("starts empty", () => {
    const store = new ConversationStore();
    expect(store.length).toBe(0);
    expect(store.entries()).toEqual([]);
  });

  test("keeps entries in append order", () => {
    const store = new ConversationStore();
    store.append({ kind: "user", text: "hi" });
    store.append({ kind: "assistant", text: "hello", toolRequests: [] });
    expect(store.entries().map((e) => e.kind)).toEqual(["user", "assistant"]);
  });

  test("tracks requests still waiting for a result", () => {
    const store = new ConversationStore();
    store.append({ kind: "user", text: "go" });
    store.append(twoRequests);
    expect(store.pendingRequests().map((r) => r.id)).toEqual(["a", "b"]);

    store.append({ kind: "tool_result", requestId: "a", toolName: "read_file", resultText: "x" });
    expect(store.pendingRequests().map((r) => r.id)).toEqual(["b"]);

    store.append({ kind: "tool_result", requestId: "b", toolName: "list_files", resultText: "[]" });
    expect(store.pendingRequests()).toEqual([]);
  });

  test("rejects a result for an unknown request", () => {
    const store = new ConversationStore();
    store.append(twoRequests);
    expect(() =>
      store.append({ kind: "tool_result", requestId: "zzz", toolName: "read_file", resultText: "" }),
    ).toThrow(/does not answer a pending request/);
  });

  test("rejects answering the same request twice", () => {
    const store = new ConversationStore();
    store.append(twoRequests);
    store.append({ kind: "tool_result", requestId: "a", toolName: "read_file", resultText: "" });
    expect(() =>
      store.append({ kind: "tool_result", requestId: "a", toolName: "read_file", resultText: "" }),
    ).toThrow(/does not answer a pending request/);
  });

  test("rejects a result with no assistant request before it", () => {
    const store = new ConversationStore();
    store.append({ kind: "user", text: "hi" });
    expect(() =>
      store.append({ kind: "tool_result", requestId: "a", toolName: "read_file", resultText: "" }),
    ).toThrow();
  });

  test("rejects a new message while requests are unanswered", () => {
    const store = new ConversationStore();
    store.append(twoRequests);
    expect(() => store.append({ kind: "user", text: "next" })).toThrow(
      "Cannot append a user message while tool requests are unanswered",
    );
  });

  test("stores copies that callers cannot mutate", () => {
    const store = new ConversationStore();
    const entry = { kind: "user" as const, text: "original" };
    store.append(entry);
    entry.text = "changed";

    const [stored] = store.entries();
    expect(stored).toEqual({ kind: "user", text: "original" });
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(store.entries())).toBe(true);
  });

  test("freezes the tool requests of stored assistant entries", () => {
    const store = new ConversationStore();
    store.append(twoRequests);

    const [stored] = store.entries();
    if (stored?.kind !== "assistant") throw new Error("expected an assistant entry");
    expect(Object.isFrozen(stored.toolRequests)).toBe(true);
    expect(Object.isFrozen(stored.toolRequests[0])).toBe(true);
    expect(() => stored.toolRequests.push({ id: "x", toolName: "read_file", argumentsJson: "{}" })).toThrow(TypeError);
    expect(store.pendingRequests().map((r) => r.id)).toEqual(["a", "b"]);
  });
});
