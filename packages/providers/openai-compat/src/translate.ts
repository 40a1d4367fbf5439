// ChunkTranslator: SSE events (tool calls keyed by index) → provider
// StreamEvents (tool calls keyed by call id, with explicit start/complete).
//
// Open calls complete when the choice finishes, in index order. The turn
// completes only at the end of the body, after the trailing usage chunk, and
// only if the server marked the response finished; a body cut short yields
// no turn_completed so the decoder reports the truncation.

import { type StreamEvent, generateId } from "@toolstream/core";
import type { SSEEvent } from "./sse";

export class ChunkTranslator {
  private readonly open = new Map<number, string>();
  private finished = false;
  private finishReason?: string;

  push(event: SSEEvent): StreamEvent[] {
    switch (event.type) {
      case "text":
        return [{ type: "text_delta", text: event.text }];

      case "tool_delta": {
        const events: StreamEvent[] = [];
        let callId = this.open.get(event.index);
        if (callId === undefined) {
          callId = event.id ?? `call_${generateId()}`;
          this.open.set(event.index, callId);
          events.push({ type: "tool_call_started", callId, name: event.name ?? "" });
        }
        if (event.arguments) {
          events.push({ type: "tool_call_delta", callId, delta: event.arguments });
        }
        return events;
      }

      case "finish":
        this.finished = true;
        this.finishReason = event.reason ?? undefined;
        return this.completeOpen();

      case "usage":
        return [{ type: "usage", usage: event.usage }];

      case "error":
        return [{ type: "error", message: event.message, code: event.code }];

      case "done":
        this.finished = true;
        return this.completeOpen();
    }
  }

  /** The response body ended. */
  end(): StreamEvent[] {
    if (!this.finished) return [];
    return [...this.completeOpen(), { type: "turn_completed", finishReason: this.finishReason }];
  }

  private completeOpen(): StreamEvent[] {
    const indices = Array.from(this.open.keys()).sort((a, b) => a - b);
    const events: StreamEvent[] = [];
    for (const index of indices) {
      const callId = this.open.get(index);
      if (callId !== undefined) events.push({ type: "tool_call_completed", callId });
    }
    this.open.clear();
    return events;
  }
}
