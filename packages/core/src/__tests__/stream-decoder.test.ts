import { describe, it, expect, vi } from "vitest";
import { StreamDecoder, type DecoderOutput, type CompletedCall } from "../stream-decoder";
import { parseIncompleteJson } from "../repair";
import { ProtocolError, ProviderError, type StreamEvent } from "../types";

function feed(decoder: StreamDecoder, events: StreamEvent[]): DecoderOutput[] {
  return events.flatMap((event) => decoder.push(event));
}

function completedCalls(outputs: DecoderOutput[]): CompletedCall[] {
  return outputs.flatMap((output) => (output.type === "tool_call" ? [output.completed] : []));
}

// Calls fn exactly once: a failed decoder rejects everything afterwards.
function expectProtocolError(fn: () => unknown, message: string): void {
  let thrown: unknown;
  try {
    fn();
  } catch (error) {
    thrown = error;
  }
  expect(thrown).toBeInstanceOf(ProtocolError);
  expect(thrown instanceof Error && thrown.message).toBe(message);
}

describe("StreamDecoder", () => {
  it("starts idle and streams text deltas", () => {
    const decoder = new StreamDecoder();
    expect(decoder.state).toBe("idle");

    const outputs = feed(decoder, [
      { type: "text_delta", text: "Hel" },
      { type: "text_delta", text: "" },
      { type: "text_delta", text: "lo" },
    ]);

    expect(decoder.state).toBe("streaming");
    expect(outputs).toEqual([
      { type: "text", text: "Hel" },
      { type: "text", text: "lo" },
    ]);
  });

  it("flushes the full text and calls when the turn completes", () => {
    const decoder = new StreamDecoder();
    const outputs = feed(decoder, [
      { type: "text_delta", text: "Let me add." },
      { type: "tool_call_started", callId: "c1", name: "add" },
      { type: "tool_call_delta", callId: "c1", delta: '{"a":2,"b":3}' },
      { type: "tool_call_completed", callId: "c1" },
      { type: "turn_completed", finishReason: "tool_calls" },
    ]);

    expect(decoder.state).toBe("done");
    const turn = outputs.at(-1);
    expect(turn).toEqual({
      type: "turn",
      text: "Let me add.",
      finishReason: "tool_calls",
      calls: [
        {
          call: { id: "c1", name: "add", arguments: '{"a":2,"b":3}', args: { a: 2, b: 3 } },
          args: { ok: true, value: { a: 2, b: 3 } },
        },
      ],
    });
    expect(decoder.end()).toBe(turn);
  });

  it("gives the call record its own copy of the arguments", () => {
    const decoder = new StreamDecoder();
    const [completed] = completedCalls(
      feed(decoder, [
        { type: "tool_call_started", callId: "c1", name: "note" },
        { type: "tool_call_delta", callId: "c1", delta: '{"meta":{"x":1}}' },
        { type: "tool_call_completed", callId: "c1" },
      ]),
    );

    expect(completed?.call.args).toEqual({ meta: { x: 1 } });
    expect(completed?.args).toEqual({ ok: true, value: { meta: { x: 1 } } });
    expect(completed?.args.ok && completed.args.value).not.toBe(completed?.call.args);
  });

  it("reconstructs interleaved argument streams per call", () => {
    const decoder = new StreamDecoder();
    const outputs = feed(decoder, [
      { type: "tool_call_started", callId: "a", name: "first" },
      { type: "tool_call_started", callId: "b", name: "second" },
      { type: "tool_call_delta", callId: "a", delta: '{"x":' },
      { type: "tool_call_delta", callId: "b", delta: '{"y":' },
      { type: "tool_call_delta", callId: "b", delta: '"two"}' },
      { type: "tool_call_delta", callId: "a", delta: "1}" },
      { type: "tool_call_completed", callId: "b" },
      { type: "tool_call_completed", callId: "a" },
      { type: "turn_completed" },
    ]);

    const calls = completedCalls(outputs).map((completed) => completed.call);
    expect(calls).toEqual([
      { id: "b", name: "second", arguments: '{"y":"two"}', args: { y: "two" } },
      { id: "a", name: "first", arguments: '{"x":1}', args: { x: 1 } },
    ]);
  });

  it("repairs once per completed call regardless of delta count", () => {
    const repair = vi.fn(parseIncompleteJson);
    const decoder = new StreamDecoder({ repair });

    const events: StreamEvent[] = [
      { type: "tool_call_started", callId: "a", name: "first" },
      { type: "tool_call_started", callId: "b", name: "second" },
    ];
    for (const char of '{"text":"a long argument"}') {
      events.push({ type: "tool_call_delta", callId: "a", delta: char });
      events.push({ type: "tool_call_delta", callId: "b", delta: char });
    }
    events.push({ type: "tool_call_completed", callId: "a" });
    events.push({ type: "tool_call_started", callId: "c", name: "third" });
    events.push({ type: "tool_call_completed", callId: "c" });
    feed(decoder, events);

    expect(repair).toHaveBeenCalledTimes(2);

    // "b" is still open and gets finalized with the turn
    const outputs = decoder.push({ type: "turn_completed" });
    expect(repair).toHaveBeenCalledTimes(3);
    expect(repair.mock.calls.map(([raw]) => raw)).toEqual([
      '{"text":"a long argument"}',
      "",
      '{"text":"a long argument"}',
    ]);
    expect(completedCalls(outputs).map((c) => c.call.id)).toEqual(["b"]);
  });

  it("decodes an empty argument buffer as an empty object", () => {
    const decoder = new StreamDecoder();
    const outputs = feed(decoder, [
      { type: "tool_call_started", callId: "c1", name: "now" },
      { type: "tool_call_completed", callId: "c1" },
    ]);
    expect(completedCalls(outputs)[0]?.args).toEqual({ ok: true, value: {} });
  });

  it("returns a decode failure when repair throws", () => {
    const decoder = new StreamDecoder({
      repair: () => {
        throw new Error("Unexpected character");
      },
    });
    const [completed] = completedCalls(
      feed(decoder, [
        { type: "tool_call_started", callId: "c1", name: "add" },
        { type: "tool_call_delta", callId: "c1", delta: "}{" },
        { type: "tool_call_completed", callId: "c1" },
      ]),
    );

    expect(completed?.call).toEqual({ id: "c1", name: "add", arguments: "}{" });
    expect(completed?.args.ok).toBe(false);
    if (completed && !completed.args.ok) {
      expect(completed.args.error.message).toBe("arguments are not valid JSON: Unexpected character");
      expect(completed.args.error.code).toBe("DECODE_ERROR");
    }
  });

  it("emits validated usage", () => {
    const decoder = new StreamDecoder();
    const usage = { inputTokens: 12, outputTokens: 3, cachedInputTokens: 4 };
    expect(decoder.push({ type: "usage", usage })).toEqual([{ type: "usage", usage }]);
  });

  describe("protocol violations", () => {
    it("rejects duplicate call ids", () => {
      const decoder = new StreamDecoder();
      decoder.push({ type: "tool_call_started", callId: "a", name: "first" });
      expectProtocolError(
        () => decoder.push({ type: "tool_call_started", callId: "a", name: "again" }),
        'Duplicate tool call id "a"',
      );
      expect(decoder.state).toBe("errored");
    });

    it("rejects reuse of a finalized call id", () => {
      const decoder = new StreamDecoder();
      feed(decoder, [
        { type: "tool_call_started", callId: "a", name: "first" },
        { type: "tool_call_completed", callId: "a" },
      ]);
      expectProtocolError(
        () => decoder.push({ type: "tool_call_started", callId: "a", name: "first" }),
        'Duplicate tool call id "a"',
      );
    });

    it("rejects deltas for unknown calls", () => {
      const decoder = new StreamDecoder();
      expectProtocolError(
        () => decoder.push({ type: "tool_call_delta", callId: "zz", delta: "{" }),
        'Argument delta for unknown tool call "zz"',
      );
    });

    it("rejects deltas for finalized calls", () => {
      const decoder = new StreamDecoder();
      feed(decoder, [
        { type: "tool_call_started", callId: "a", name: "first" },
        { type: "tool_call_completed", callId: "a" },
      ]);
      expectProtocolError(
        () => decoder.push({ type: "tool_call_delta", callId: "a", delta: "{" }),
        'Argument delta for already finalized tool call "a"',
      );
    });

    it("rejects a second completion", () => {
      const decoder = new StreamDecoder();
      feed(decoder, [
        { type: "tool_call_started", callId: "a", name: "first" },
        { type: "tool_call_completed", callId: "a" },
      ]);
      expectProtocolError(
        () => decoder.push({ type: "tool_call_completed", callId: "a" }),
        'Completion for already finalized tool call "a"',
      );
    });

    it("rejects negative or fractional usage", () => {
      expectProtocolError(
        () => new StreamDecoder().push({ type: "usage", usage: { inputTokens: -1, outputTokens: 0 } }),
        "Usage counts must be non-negative integers",
      );
      expectProtocolError(
        () => new StreamDecoder().push({ type: "usage", usage: { inputTokens: 1, outputTokens: 0.5 } }),
        "Usage counts must be non-negative integers",
      );
    });

    it("rejects events after the turn completed", () => {
      const decoder = new StreamDecoder();
      decoder.push({ type: "turn_completed" });
      expectProtocolError(
        () => decoder.push({ type: "text_delta", text: "late" }),
        'Received "text_delta" after the turn completed',
      );
      expectProtocolError(
        () => decoder.push({ type: "text_delta", text: "later" }),
        'Received "text_delta" after the stream failed',
      );
    });

    it("surfaces in-band provider errors", () => {
      const decoder = new StreamDecoder();
      let thrown: unknown;
      try {
        decoder.push({ type: "error", message: "overloaded", code: "server_error" });
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(ProviderError);
      if (thrown instanceof ProviderError) {
        expect(thrown.message).toBe("Provider reported an error: overloaded");
        expect(thrown.providerCode).toBe("server_error");
      }
      expect(decoder.state).toBe("errored");
    });

    it("fails end() when the turn never completed", () => {
      const decoder = new StreamDecoder();
      decoder.push({ type: "text_delta", text: "cut off" });
      expectProtocolError(() => decoder.end(), "Provider stream ended before the turn completed");
    });
  });
});
