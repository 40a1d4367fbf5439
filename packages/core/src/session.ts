// Session: conversation transcript + usage accounting, written only through
// an exclusive lease that can be held across await points.

import {
  type Message,
  type SessionSnapshot,
  type ToolCall,
  type ToolMessage,
  type ToolOutcome,
  type Usage,
  SessionError,
} from "./types";
import { generateId, toolMessage } from "./messages";

export interface UsageTotals {
  readonly inputTokens: number;
  readonly cachedInputTokens: number;
  readonly outputTokens: number;
  /** Accumulated estimated cost in USD. */
  readonly cost: number;
}

const ZERO_USAGE: UsageTotals = { inputTokens: 0, cachedInputTokens: 0, outputTokens: 0, cost: 0 };

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const nested of Object.values(value)) deepFreeze(nested);
}

/** Calls requested by the assistant that no tool message answers yet. */
export function findPendingCalls(messages: readonly Message[]): ToolCall[] {
  const answered = new Set<string>();
  for (const message of messages) {
    if (message.role === "tool") answered.add(message.toolCallId);
  }
  const pending: ToolCall[] = [];
  for (const message of messages) {
    if (message.role !== "assistant" || !message.toolCalls) continue;
    for (const call of message.toolCalls) {
      if (!answered.has(call.id)) pending.push(call);
    }
  }
  return pending;
}

interface SessionWriter {
  readonly messages: () => readonly Message[];
  readonly append: (message: Message) => void;
  readonly addUsage: (usage: Usage, cost: number) => UsageTotals;
}

/**
 * Exclusive write access to a Session. Obtained from Session.lease() and
 * valid until release(); it can be handed to another owner (for example
 * responsesStream) which then becomes responsible for releasing it.
 */
export class SessionLease {
  private _released = false;

  constructor(
    readonly sessionId: string,
    private readonly writer: SessionWriter,
    private readonly onRelease: () => void,
  ) {}

  get released(): boolean {
    return this._released;
  }

  get transcript(): readonly Message[] {
    this.assertActive();
    return this.writer.messages();
  }

  /** Append a message. It is frozen and becomes part of the causal order. */
  append(message: Message): void {
    this.assertActive();
    this.writer.append(message);
  }

  /** Add one usage report and its cost to the running totals. */
  recordUsage(usage: Usage, cost: number): UsageTotals {
    this.assertActive();
    if (!Number.isFinite(cost) || cost < 0) {
      throw new SessionError(`Invalid usage cost: ${cost}`);
    }
    return this.writer.addUsage(usage, cost);
  }

  /** Give the session back. Idempotent. */
  release(): void {
    if (this._released) return;
    this._released = true;
    this.onRelease();
  }

  private assertActive(): void {
    if (this._released) {
      throw new SessionError(`Lease on session ${this.sessionId} has been released`);
    }
  }
}

/**
 * In-memory conversation state. Reads are always safe and return frozen
 * snapshots; writes go through a SessionLease, one holder at a time.
 * Durability is the caller's concern (see snapshot()).
 */
export class Session {
  readonly id: string;
  private readonly messages: Message[] = [];
  private totals: UsageTotals;
  private leased = false;
  private waiters: Array<() => void> = [];

  constructor(init?: Partial<SessionSnapshot>) {
    this.id = init?.id ?? generateId();
    this.totals = { ...ZERO_USAGE, ...init?.usage };
    for (const message of init?.messages ?? []) {
      deepFreeze(message);
      this.messages.push(message);
    }
  }

  get transcript(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }

  get usage(): UsageTotals {
    return { ...this.totals };
  }

  get isLeased(): boolean {
    return this.leased;
  }

  /**
   * Acquire the exclusive lease. Resolves immediately when the session is
   * free, otherwise after every earlier lease has been released (FIFO).
   */
  lease(): Promise<SessionLease> {
    if (!this.leased) {
      this.leased = true;
      return Promise.resolve(this.createLease());
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.createLease()));
    });
  }

  /** Append a single message under a short-lived lease. */
  async addMessage(message: Message): Promise<void> {
    const lease = await this.lease();
    try {
      lease.append(message);
    } finally {
      lease.release();
    }
  }

  /** Tool calls (client tools, typically) still waiting for a result. */
  pendingToolCalls(): ToolCall[] {
    return findPendingCalls(this.messages);
  }

  /**
   * Supply the result of a client tool call out of band, before the next
   * stream is started. Rejects with SessionError for unknown or already
   * answered call ids.
   */
  async submitToolResult(callId: string, outcome: ToolOutcome): Promise<ToolMessage> {
    const lease = await this.lease();
    try {
      const call = findPendingCalls(lease.transcript).find((c) => c.id === callId);
      if (!call) {
        throw new SessionError(`No pending tool call with id "${callId}"`);
      }
      const message = toolMessage({ callId, name: call.name, outcome });
      lease.append(message);
      return message;
    } finally {
      lease.release();
    }
  }

  snapshot(): SessionSnapshot {
    return { id: this.id, messages: this.transcript, usage: this.usage };
  }

  private createLease(): SessionLease {
    return new SessionLease(
      this.id,
      {
        messages: () => this.transcript,
        append: (message) => {
          deepFreeze(message);
          this.messages.push(message);
        },
        addUsage: (usage, cost) => {
          this.totals = {
            inputTokens: this.totals.inputTokens + usage.inputTokens,
            cachedInputTokens: this.totals.cachedInputTokens + (usage.cachedInputTokens ?? 0),
            outputTokens: this.totals.outputTokens + usage.outputTokens,
            cost: this.totals.cost + cost,
          };
          return this.usage;
        },
      },
      () => this.handOff(),
    );
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.leased = false;
    }
  }
}
