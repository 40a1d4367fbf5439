// Tolerant SSE line parser for OpenAI-compatible streaming responses.
//
// Design goals:
//   • Skip malformed lines instead of throwing
//   • Accept text from delta.content OR message.content (both are observed in
//     "compatible" servers)
//   • Ignore unknown top-level fields (timings, system_fingerprint, etc.)
//   • Stop cleanly on [DONE]

import type { Usage } from "@toolstream/core";
import type { WireChunk, WireUsage } from "./wire";

export type SSEEvent =
  | { type: "text"; text: string }
  | { type: "tool_delta"; index: number; id?: string; name?: string; arguments?: string }
  | { type: "finish"; reason: string | null }
  | { type: "usage"; usage: Usage }
  | { type: "error"; message: string; code?: string }
  | { type: "done" };

/**
 * Parse the payload of one data line, or return null to skip it.
 */
function parseChunk(data: string): WireChunk | null {
  try {
    const chunk: WireChunk | null = JSON.parse(data);
    return typeof chunk === "object" && chunk !== null && !Array.isArray(chunk) ? chunk : null;
  } catch {
    return null;
  }
}

function toUsage(usage: WireUsage): Usage | null {
  if (typeof usage.prompt_tokens !== "number" || typeof usage.completion_tokens !== "number") {
    return null;
  }
  const cached = usage.prompt_tokens_details?.cached_tokens;
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    ...(typeof cached === "number" && { cachedInputTokens: cached }),
  };
}

/**
 * Process a buffer of raw SSE bytes into discrete events.
 * Returns an array of events and the leftover (incomplete) buffer tail.
 */
export function processSSEBuffer(
  buffer: string,
  incoming: string,
): { events: SSEEvent[]; remaining: string } {
  const combined = buffer + incoming;
  const lines = combined.split("\n");
  const remaining = lines.pop() ?? "";
  const events: SSEEvent[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("data:")) continue;

    const data = trimmed.slice(5).trimStart();
    if (data === "[DONE]") {
      events.push({ type: "done" });
      continue;
    }

    const chunk = parseChunk(data);
    if (!chunk) continue;

    if (chunk.error) {
      const code = chunk.error.code ?? chunk.error.type;
      events.push({
        type: "error",
        message: chunk.error.message ?? "unknown error",
        ...(code != null && { code: String(code) }),
      });
      continue;
    }

    const choice = chunk.choices?.[0];
    if (choice) {
      // Text content: prefer delta.content, fall back to message.content
      const text = choice.delta?.content ?? choice.message?.content ?? null;
      if (text) {
        events.push({ type: "text", text });
      }

      // Streaming tool call deltas
      if (choice.delta?.tool_calls) {
        for (const tc of choice.delta.tool_calls) {
          events.push({
            type: "tool_delta",
            index: tc.index,
            id: tc.id,
            name: tc.function?.name,
            arguments: tc.function?.arguments,
          });
        }
      }

      // finish_reason
      if (choice.finish_reason != null) {
        events.push({ type: "finish", reason: choice.finish_reason });
      }
    }

    // With stream_options.include_usage the last chunk carries usage and no choices
    if (chunk.usage) {
      const usage = toUsage(chunk.usage);
      if (usage) events.push({ type: "usage", usage });
    }
  }

  return { events, remaining };
}
