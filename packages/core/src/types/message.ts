// Message types: the conversation transcript

import type { ToolCall, ToolOutcome } from "./tool";

export type Role = "system" | "user" | "assistant" | "tool";

interface BaseMessage {
  readonly id: string;
  readonly timestamp: number;
}

export interface SystemMessage extends BaseMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage extends BaseMessage {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage extends BaseMessage {
  readonly role: "assistant";
  /** Free-form text of the turn; empty when the model only called tools. */
  readonly content: string;
  /** Tool calls requested during the turn, in completion order. */
  readonly toolCalls?: readonly ToolCall[];
}

export interface ToolMessage extends BaseMessage {
  readonly role: "tool";
  /** Links the result back to its call */
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: ToolOutcome;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** Plain snapshot of a session, suitable for JSON persistence by the caller. */
export interface SessionSnapshot {
  readonly id: string;
  readonly messages: readonly Message[];
  readonly usage: {
    readonly inputTokens: number;
    readonly cachedInputTokens: number;
    readonly outputTokens: number;
    readonly cost: number;
  };
}
