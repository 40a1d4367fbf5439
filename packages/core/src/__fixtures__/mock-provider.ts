// Test fixture: scripted provider that replays one list of events per round

import type { Provider, ProviderOptions, ProviderRequest, StreamEvent, Usage } from "../types";

export type Step = StreamEvent | { readonly type: "wait"; readonly ms: number };

export class MockProvider implements Provider {
  readonly name = "mock";
  public requests: ProviderRequest[] = [];
  public signals: AbortSignal[] = [];
  private round = 0;

  constructor(private readonly rounds: Step[][] = [textTurn("Hello from mock provider.")]) {}

  async *stream(request: ProviderRequest, options?: ProviderOptions): AsyncIterable<StreamEvent> {
    this.requests.push({ ...request, messages: [...request.messages] });
    if (options?.signal) this.signals.push(options.signal);

    const steps = this.rounds[this.round] ?? [];
    this.round++;

    for (const step of steps) {
      options?.signal?.throwIfAborted();
      if (step.type === "wait") {
        await new Promise((resolve) => setTimeout(resolve, step.ms));
        continue;
      }
      yield step;
    }
  }

  /** Get the request from the last call. */
  lastRequest(): ProviderRequest | undefined {
    return this.requests.at(-1);
  }
}

export function textTurn(text: string, usage?: Usage): Step[] {
  return [
    { type: "text_delta", text },
    ...(usage ? [{ type: "usage", usage } as const] : []),
    { type: "turn_completed", finishReason: "stop" },
  ];
}

/** One complete tool call, arguments split into the given deltas. */
export function toolCall(callId: string, name: string, ...deltas: string[]): Step[] {
  return [
    { type: "tool_call_started", callId, name },
    ...deltas.map((delta) => ({ type: "tool_call_delta", callId, delta }) as const),
    { type: "tool_call_completed", callId },
  ];
}

/** Resolves after the current macrotask queue drains. */
export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
