import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { PresentationBridge, type BridgeMessage } from "./presentation-bridge.js";

describe("PresentationBridge", () => {
  test("drains messages in enqueue order", () => {
    const bridge = new PresentationBridge();
    bridge.enqueue("You", "hi");
    bridge.enqueue("Tool", "Calling: list_files({})", "Tool");
    bridge.enqueue("Agent", "hello");

    expect(bridge.size).toBe(3);
    expect(bridge.drain()).toEqual([
      { role: "You", content: "hi" },
      { role: "Tool", content: "Calling: list_files({})", styleTag: "Tool" },
      { role: "Agent", content: "hello" },
    ]);
    expect(bridge.size).toBe(0);
    expect(bridge.drain()).toEqual([]);
  });

  test("omits the style tag when none is given", () => {
    const bridge = new PresentationBridge();
    bridge.enqueue("Agent", "plain");
    const [message] = bridge.drain();
    expect(message).not.toHaveProperty("styleTag");
  });

  describe("startDrainLoop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    test("renders queued messages on each tick", () => {
      const bridge = new PresentationBridge();
      const rendered: BridgeMessage[] = [];
      const stop = bridge.startDrainLoop((m) => rendered.push(m), 50);

      bridge.enqueue("Agent", "one");
      expect(rendered).toEqual([]);

      vi.advanceTimersByTime(50);
      expect(rendered).toEqual([{ role: "Agent", content: "one" }]);

      bridge.enqueue("Agent", "two");
      vi.advanceTimersByTime(50);
      expect(rendered.map((m) => m.content)).toEqual(["one", "two"]);

      stop();
    });

    test("flushes what is left when stopped", () => {
      const bridge = new PresentationBridge();
      const rendered: string[] = [];
      const stop = bridge.startDrainLoop((m) => rendered.push(m.content), 1000);

      bridge.enqueue("Error", "API Error: boom", "Error");
      stop();

      expect(rendered).toEqual(["API Error: boom"]);
      bridge.enqueue("Agent", "late");
      vi.advanceTimersByTime(5000);
      expect(rendered).toEqual(["API Error: boom"]);
    });
  });
});
