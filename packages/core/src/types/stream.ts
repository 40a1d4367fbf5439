// Raw provider events consumed by the stream decoder

export interface Usage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  /** Portion of inputTokens served from the prompt cache. */
  readonly cachedInputTokens?: number;
}

export type StreamEvent =
  | { readonly type: "text_delta"; readonly text: string }
  | { readonly type: "tool_call_started"; readonly callId: string; readonly name: string }
  | { readonly type: "tool_call_delta"; readonly callId: string; readonly delta: string }
  | { readonly type: "tool_call_completed"; readonly callId: string }
  | { readonly type: "turn_completed"; readonly finishReason?: string }
  | { readonly type: "usage"; readonly usage: Usage }
  | { readonly type: "error"; readonly message: string; readonly code?: string };
