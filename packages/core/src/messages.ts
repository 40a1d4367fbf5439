// Message factories for building a transcript

import type { AssistantMessage, SystemMessage, ToolCall, ToolMessage, ToolResult, UserMessage } from "./types";

export function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

export function systemMessage(content: string): SystemMessage {
  return { id: generateId(), role: "system", content, timestamp: Date.now() };
}

export function userMessage(content: string): UserMessage {
  return { id: generateId(), role: "user", content, timestamp: Date.now() };
}

export function assistantMessage(content: string, toolCalls: readonly ToolCall[] = []): AssistantMessage {
  return {
    id: generateId(),
    role: "assistant",
    content,
    timestamp: Date.now(),
    ...(toolCalls.length > 0 && { toolCalls }),
  };
}

/** Wrap a tool result as the tool-role message appended to the transcript. */
export function toolMessage(result: ToolResult): ToolMessage {
  return {
    id: generateId(),
    role: "tool",
    timestamp: Date.now(),
    toolCallId: result.callId,
    toolName: result.name,
    content: result.outcome,
  };
}
