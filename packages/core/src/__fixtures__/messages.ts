// Test fixture: message factories and capturing logger

import type { LogLevel, Logger, Message } from "../types";

let counter = 0;

function nextId(): string {
  counter++;
  return `test-${counter.toString().padStart(4, "0")}`;
}

export function createUserMessage(content = "test message"): Message {
  return { id: nextId(), role: "user", content, timestamp: Date.now() };
}

/** Reset the counter (call in beforeEach for deterministic IDs). */
export function resetFixtures(): void {
  counter = 0;
}

export interface LogEntry {
  readonly level: Exclude<LogLevel, "silent">;
  readonly message: string;
  readonly data: Record<string, unknown>;
}

/** Logger that records every entry (children share the same list). */
export function createCapturingLogger(
  entries: LogEntry[] = [],
  context: Record<string, unknown> = {},
): Logger & { entries: LogEntry[] } {
  const record = (level: LogEntry["level"]) => (message: string, data?: Record<string, unknown>) => {
    entries.push({ level, message, data: { ...context, ...data } });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (extra) => createCapturingLogger(entries, { ...context, ...extra }),
  };
}
