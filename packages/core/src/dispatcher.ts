// ToolDispatcher: turns completed tool calls into tool results.
//
// Failures of any kind (unknown tool, bad arguments, executor errors) become
// `{ error }` results fed back to the model; dispatch itself never throws.

import {
  type Logger,
  type ToolOutcome,
  type ToolResult,
  ExtractionError,
} from "./types";
import type { CompletedCall } from "./stream-decoder";
import type { ToolSet } from "./tool-registry";

export type Dispatch =
  | { readonly kind: "client" }
  | { readonly kind: "executing"; readonly result: Promise<ToolResult> };

export class ToolDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly tools: ToolSet,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "ToolDispatcher" });
  }

  /**
   * Start handling a completed call. Executors start immediately and run
   * concurrently with the caller; the returned promise never rejects.
   */
  dispatch(completed: CompletedCall, signal: AbortSignal): Dispatch {
    const { call, args } = completed;
    const tool = this.tools.get(call.name);

    if (!tool) {
      this.logger.warn("Model called an unknown tool", { tool: call.name, toolCallId: call.id });
      return {
        kind: "executing",
        result: Promise.resolve(this.failure(call.id, call.name, `No such tool: ${call.name}`)),
      };
    }

    const execution = tool.execute({ id: call.id, args, signal });
    if (!execution) return { kind: "client" };

    this.logger.info("Executing tool", { tool: call.name, toolCallId: call.id });
    const started = Date.now();

    const result = execution.then(
      (value): ToolResult => {
        this.logger.debug("Tool result", {
          tool: call.name,
          toolCallId: call.id,
          durationMs: Date.now() - started,
        });
        return { callId: call.id, name: call.name, outcome: { value } };
      },
      (cause: unknown): ToolResult => {
        const message = cause instanceof Error ? cause.message : String(cause);
        this.logger.warn(cause instanceof ExtractionError ? "Tool argument extraction failed" : "Tool execution failed", {
          tool: call.name,
          toolCallId: call.id,
          durationMs: Date.now() - started,
          error: message,
        });
        return this.failure(call.id, call.name, message);
      },
    );

    return { kind: "executing", result };
  }

  private failure(callId: string, name: string, error: string): ToolResult {
    return { callId, name, outcome: { error } };
  }
}

export function isFailure(outcome: ToolOutcome): outcome is { readonly error: string } {
  return "error" in outcome;
}
