// Wire types for the OpenAI-compatible Chat Completions API (snake_case).

import type { JsonObject } from "@toolstream/core";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: JsonObject };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface WireDelta {
  content?: string | null;
  tool_calls?: Array<{
    index: number;
    id?: string;
    function?: { name?: string; arguments?: string };
  }>;
}

// Some "compatible" servers emit message instead of delta inside SSE chunks
export interface WireChoice {
  delta?: WireDelta;
  message?: { content?: string | null };
  finish_reason?: string | null;
}

export interface WireUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens?: number;
  prompt_tokens_details?: {
    cached_tokens?: number;
  };
}

/** In-band failure some servers send as a data line mid-stream. */
export interface WireError {
  message?: string;
  type?: string;
  code?: string | number | null;
}

export interface WireChunk {
  choices?: WireChoice[];
  usage?: WireUsage | null;
  error?: WireError;
}
