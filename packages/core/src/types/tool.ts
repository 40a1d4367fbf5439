// Tool system types -- definitions, calls, results

import type { JsonObject, JsonValue } from "./json";

/**
 * JSON Schema describing a tool the LLM can call.
 * Sent to the provider as part of the request.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonObject;
}

/**
 * A tool invocation requested by the LLM.
 * `arguments` is the raw buffer exactly as streamed; `args` is its repaired
 * JSON value and is absent when the buffer could not be repaired.
 */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
  readonly args?: JsonValue;
}

export type ToolOutcome = { readonly value: JsonValue } | { readonly error: string };

/**
 * The result of executing (or failing to execute) one tool call.
 * Fed back to the provider so it can continue reasoning.
 */
export interface ToolResult {
  readonly callId: string;
  readonly name: string;
  readonly outcome: ToolOutcome;
}
