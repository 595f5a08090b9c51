/**
 * Presentation Bridge — one-way, ordered relay from the agent loop to the
 * interactive surface.
 *
 * The loop only enqueues; the surface only drains, on its own schedule.
 * Nothing else crosses between the two, so the conversation store never has
 * to be shared.
 */

export type BridgeRole = "You" | "Agent" | "Tool" | "ToolResult" | "System" | "Error";

export type StyleTag = "Tool" | "ToolResult" | "System" | "Error";

export type BridgeMessage = {
  role: BridgeRole;
  content: string;
  styleTag?: StyleTag;
};

export type DrainRenderer = (message: BridgeMessage) => void;

export class PresentationBridge {
  private queue: BridgeMessage[] = [];

  enqueue(role: BridgeRole, content: string, styleTag?: StyleTag): void {
    this.queue.push(styleTag ? { role, content, styleTag } : { role, content });
  }

  /** Remove and return everything queued so far, oldest first. */
  drain(): BridgeMessage[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Drain on a fixed tick. The returned function stops the timer and
   * renders whatever is still queued.
   */
  startDrainLoop(render: DrainRenderer, intervalMs = 100): () => void {
    const flush = () => {
      for (const message of this.drain()) {
        render(message);
      }
    };
    const timer = setInterval(flush, intervalMs);
    timer.unref();

    return () => {
      clearInterval(timer);
      flush();
    };
  }
}
