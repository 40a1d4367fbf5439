// StreamDecoder: per-turn state machine over raw provider events.
//
// idle → streaming → finalizing → done, with errored as a terminal state.
// Argument buffers are repaired once, when a call completes, never per delta.

import {
  type JsonValue,
  type Result,
  type StreamEvent,
  type ToolCall,
  type Usage,
  ok,
  err,
  DecodeError,
  ProtocolError,
  ProviderError,
} from "./types";
import { type JsonRepair, parseIncompleteJson } from "./repair";

export type DecoderState = "idle" | "streaming" | "finalizing" | "done" | "errored";

export interface CompletedCall {
  readonly call: ToolCall;
  readonly args: Result<JsonValue, DecodeError>;
}

export type DecoderOutput =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "tool_call"; readonly completed: CompletedCall }
  | { readonly type: "usage"; readonly usage: Usage }
  | {
      readonly type: "turn";
      readonly text: string;
      readonly calls: readonly CompletedCall[];
      readonly finishReason?: string;
    };

export type TurnOutput = Extract<DecoderOutput, { readonly type: "turn" }>;

interface OpenCall {
  readonly name: string;
  buffer: string;
}

function isTokenCount(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value >= 0);
}

export class StreamDecoder {
  private _state: DecoderState = "idle";
  private text = "";
  private readonly open = new Map<string, OpenCall>();
  private readonly seen = new Set<string>();
  private readonly completed: CompletedCall[] = [];
  private turn?: TurnOutput;
  private readonly repair: JsonRepair;

  constructor(options?: { repair?: JsonRepair }) {
    this.repair = options?.repair ?? parseIncompleteJson;
  }

  get state(): DecoderState {
    return this._state;
  }

  /**
   * Feed one provider event. Returns the outputs it produced.
   * Throws ProtocolError (or ProviderError for in-band provider errors) and
   * moves to `errored`; every later call throws as well.
   */
  push(event: StreamEvent): DecoderOutput[] {
    if (this._state === "errored") {
      throw new ProtocolError(`Received "${event.type}" after the stream failed`);
    }
    if (this._state === "done") {
      this.fail(`Received "${event.type}" after the turn completed`);
    }

    if (this._state === "idle") this._state = "streaming";

    switch (event.type) {
      case "text_delta":
        this.text += event.text;
        return event.text ? [{ type: "text", text: event.text }] : [];

      case "tool_call_started":
        if (this.seen.has(event.callId)) {
          this.fail(`Duplicate tool call id "${event.callId}"`);
        }
        this.seen.add(event.callId);
        this.open.set(event.callId, { name: event.name, buffer: "" });
        return [];

      case "tool_call_delta": {
        const call = this.open.get(event.callId);
        if (!call) {
          this.fail(this.describeMissing(event.callId, "Argument delta"));
        }
        call.buffer += event.delta;
        return [];
      }

      case "tool_call_completed": {
        if (!this.open.has(event.callId)) {
          this.fail(this.describeMissing(event.callId, "Completion"));
        }
        return [{ type: "tool_call", completed: this.finalize(event.callId) }];
      }

      case "usage": {
        const { inputTokens, outputTokens, cachedInputTokens } = event.usage;
        if (!isTokenCount(inputTokens) || !isTokenCount(outputTokens) || !isTokenCount(cachedInputTokens)) {
          this.fail("Usage counts must be non-negative integers");
        }
        return [{ type: "usage", usage: event.usage }];
      }

      case "turn_completed": {
        this._state = "finalizing";
        const outputs: DecoderOutput[] = [];
        // Calls still open at turn end are finalized in start order.
        for (const callId of Array.from(this.open.keys())) {
          outputs.push({ type: "tool_call", completed: this.finalize(callId) });
        }
        this.turn = {
          type: "turn",
          text: this.text,
          calls: [...this.completed],
          finishReason: event.finishReason,
        };
        outputs.push(this.turn);
        this._state = "done";
        return outputs;
      }

      case "error":
        this._state = "errored";
        throw new ProviderError(`Provider reported an error: ${event.message}`, event.code);
    }
  }

  /**
   * Signal that the provider stream ended and return the completed turn.
   * Throws ProtocolError unless `turn_completed` was seen.
   */
  end(): TurnOutput {
    if (this._state !== "done" || !this.turn) {
      this.fail("Provider stream ended before the turn completed");
    }
    return this.turn;
  }

  private finalize(callId: string): CompletedCall {
    const open = this.open.get(callId);
    if (!open) throw new ProtocolError(`Unknown tool call id "${callId}"`);
    this.open.delete(callId);

    let args: Result<JsonValue, DecodeError>;
    try {
      args = ok(this.repair(open.buffer));
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      args = err(new DecodeError(`arguments are not valid JSON: ${reason}`, cause));
    }

    const call: ToolCall = {
      id: callId,
      name: open.name,
      arguments: open.buffer,
      // The record is frozen with the transcript; executors get their own copy.
      ...(args.ok && { args: structuredClone(args.value) }),
    };
    const completed: CompletedCall = { call, args };
    this.completed.push(completed);
    return completed;
  }

  private describeMissing(callId: string, what: string): string {
    return this.seen.has(callId)
      ? `${what} for already finalized tool call "${callId}"`
      : `${what} for unknown tool call "${callId}"`;
  }

  private fail(message: string): never {
    this._state = "errored";
    throw new ProtocolError(message);
  }
}
