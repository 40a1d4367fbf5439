import { describe, it, expect } from "vitest";
import { processSSEBuffer } from "../sse";

function data(chunk: unknown): string {
  return `data: ${JSON.stringify(chunk)}\n`;
}

describe("processSSEBuffer", () => {
  it("emits text from delta.content", () => {
    const { events, remaining } = processSSEBuffer("", data({ choices: [{ delta: { content: "Hello" } }] }));
    expect(events).toEqual([{ type: "text", text: "Hello" }]);
    expect(remaining).toBe("");
  });

  it("falls back to message.content", () => {
    const { events } = processSSEBuffer("", data({ choices: [{ message: { content: "Full" } }] }));
    expect(events).toEqual([{ type: "text", text: "Full" }]);
  });

  it("accepts data lines without a space after the colon", () => {
    const { events } = processSSEBuffer("", 'data:{"choices":[{"delta":{"content":"tight"}}]}\n');
    expect(events).toEqual([{ type: "text", text: "tight" }]);
  });

  it("emits done on [DONE]", () => {
    const { events } = processSSEBuffer("", "data: [DONE]\n\n");
    expect(events).toEqual([{ type: "done" }]);
  });

  it("skips malformed JSON, comments and blank lines", () => {
    const incoming = ": keep-alive\n\ndata: {not json\nevent: ping\n" + data({ choices: [{ delta: { content: "ok" } }] });
    const { events } = processSSEBuffer("", incoming);
    expect(events).toEqual([{ type: "text", text: "ok" }]);
  });

  it("keeps an incomplete line for the next call", () => {
    const line = data({ choices: [{ delta: { content: "Split" } }] });
    const first = processSSEBuffer("", line.slice(0, 20));
    expect(first.events).toEqual([]);
    expect(first.remaining).toBe(line.slice(0, 20));

    const second = processSSEBuffer(first.remaining, line.slice(20));
    expect(second.events).toEqual([{ type: "text", text: "Split" }]);
  });

  it("emits tool_delta events per index", () => {
    const { events } = processSSEBuffer(
      "",
      data({
        choices: [
          {
            delta: {
              tool_calls: [
                { index: 0, id: "call_1", function: { name: "add", arguments: '{"a"' } },
                { index: 1, function: { arguments: ":1" } },
              ],
            },
          },
        ],
      }),
    );
    expect(events).toEqual([
      { type: "tool_delta", index: 0, id: "call_1", name: "add", arguments: '{"a"' },
      { type: "tool_delta", index: 1, id: undefined, name: undefined, arguments: ":1" },
    ]);
  });

  it("emits finish with its reason", () => {
    const { events } = processSSEBuffer("", data({ choices: [{ delta: {}, finish_reason: "tool_calls" }] }));
    expect(events).toEqual([{ type: "finish", reason: "tool_calls" }]);
  });

  it("maps the trailing usage chunk, including cached tokens", () => {
    const { events } = processSSEBuffer(
      "",
      data({
        choices: [],
        usage: { prompt_tokens: 120, completion_tokens: 8, prompt_tokens_details: { cached_tokens: 64 } },
      }),
    );
    expect(events).toEqual([{ type: "usage", usage: { inputTokens: 120, outputTokens: 8, cachedInputTokens: 64 } }]);
  });

  it("ignores null usage and usage without counts", () => {
    const incoming =
      data({ choices: [{ delta: { content: "a" } }], usage: null }) + data({ choices: [], usage: { total_tokens: 3 } });
    const { events } = processSSEBuffer("", incoming);
    expect(events).toEqual([{ type: "text", text: "a" }]);
  });

  it("emits in-band errors with their code", () => {
    const { events } = processSSEBuffer(
      "",
      data({ error: { message: "The server is overloaded", type: "server_error" } }) +
        data({ error: { message: "Too many requests", code: 429 } }),
    );
    expect(events).toEqual([
      { type: "error", message: "The server is overloaded", code: "server_error" },
      { type: "error", message: "Too many requests", code: "429" },
    ]);
  });

  it("ignores unknown top-level fields", () => {
    const { events } = processSSEBuffer(
      "",
      data({ choices: [{ delta: { content: "Hi" } }], timings: { prompt_ms: 100 }, system_fingerprint: "fp" }),
    );
    expect(events).toEqual([{ type: "text", text: "Hi" }]);
  });
});
