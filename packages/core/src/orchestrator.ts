// responsesStream: provider rounds → decoder → dispatcher → session, as a
// lazy stream of SessionUpdates.
//
// Flow per round: snapshot transcript → stream provider events → decode
//   (tools start executing as their calls complete) → on turn end append the
//   assistant message, then each tool result in completion order → repeat
//   while tools ran and no client tool is waiting.

import {
  type AssistantMessage,
  type Logger,
  type Provider,
  type ProviderRequest,
  type ToolCall,
  type ToolMessage,
  type ToolResult,
  type Usage,
  ConsoleLogger,
  ProtocolError,
  ProviderError,
  SessionError,
} from "./types";
import { type GenerateConfig, type GenerateConfigInput, parseGenerateConfig } from "./config";
import { type Dispatch, ToolDispatcher, isFailure } from "./dispatcher";
import { assistantMessage, toolMessage } from "./messages";
import { PricingLookup } from "./pricing";
import type { JsonRepair } from "./repair";
import { type UsageTotals, Session, SessionLease, findPendingCalls } from "./session";
import { StreamDecoder } from "./stream-decoder";
import type { ToolSet } from "./tool-registry";

export type DoneReason = "completed" | "client_tools_pending" | "max_rounds";

export type SessionUpdate =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "assistant_message"; readonly message: AssistantMessage }
  | { readonly type: "tool_call"; readonly toolCall: ToolCall; readonly client: boolean }
  | { readonly type: "tool_result"; readonly result: ToolResult; readonly message: ToolMessage }
  | { readonly type: "usage"; readonly usage: Usage; readonly totals: UsageTotals }
  | { readonly type: "done"; readonly reason: DoneReason };

export interface ResponsesStreamOptions {
  /** A Session (leased on first pull) or a lease whose ownership moves to the stream. */
  readonly session: Session | SessionLease;
  readonly provider: Provider;
  readonly tools: ToolSet;
  readonly config?: GenerateConfigInput;
  readonly logger?: Logger;
  /** Aborting cancels the transport and signals running executors. */
  readonly signal?: AbortSignal;
  readonly pricing?: PricingLookup;
  readonly repair?: JsonRepair;
}

interface DispatchedCall {
  readonly call: ToolCall;
  readonly dispatch: Dispatch;
}

/** Resolve with `promise`, or reject with the abort reason once `signal` fires. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/** Lease `session`; if the wait is aborted, the lease is handed back as soon as it is granted. */
async function acquireLease(session: Session, signal: AbortSignal): Promise<SessionLease> {
  const pending = session.lease();
  try {
    return await untilAborted(pending, signal);
  } catch (error) {
    void pending.then((lease) => lease.release());
    throw error;
  }
}

/**
 * Stream one request/response exchange, including any tool rounds it triggers.
 * Single pass: create a new stream for every request. Closing the iterator,
 * or aborting `signal`, cancels outstanding work and releases the session.
 *
 * Throws ProtocolError or ProviderError when the transport breaks its
 * contract; the session keeps everything committed before the failure.
 * Throws SessionError if a tool call in the transcript still has no result.
 */
export async function* responsesStream(options: ResponsesStreamOptions): AsyncGenerator<SessionUpdate> {
  const logger = (options.logger ?? new ConsoleLogger()).child({ component: "responsesStream" });

  const parsed = parseGenerateConfig(options.config);
  if (!parsed.ok) throw parsed.error;
  const config: GenerateConfig = parsed.value;

  const controller = new AbortController();
  const onExternalAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  let lease: SessionLease | undefined;

  try {
    lease = options.session instanceof Session
      ? await acquireLease(options.session, controller.signal)
      : options.session;

    const pending = findPendingCalls(lease.transcript);
    if (pending.length > 0) {
      throw new SessionError(
        `Session ${lease.sessionId} has tool calls awaiting results: ${pending.map((c) => c.id).join(", ")}`,
      );
    }

    const pricing = options.pricing ?? new PricingLookup(logger);
    const dispatcher = new ToolDispatcher(options.tools, logger);
    const definitions = options.tools.definitions();

    for (let round = 0; ; round++) {
      controller.signal.throwIfAborted();

      const request: ProviderRequest = { messages: lease.transcript, tools: definitions, config };
      const decoder = new StreamDecoder({ repair: options.repair });
      const dispatched: DispatchedCall[] = [];

      logger.debug("Starting round", { sessionId: lease.sessionId, round, messages: request.messages.length });

      for await (const event of options.provider.stream(request, { signal: controller.signal })) {
        for (const output of decoder.push(event)) {
          if (output.type === "text") {
            yield { type: "text", text: output.text };
          } else if (output.type === "usage") {
            const cost = pricing.estimate(config.model, output.usage);
            const totals = lease.recordUsage(output.usage, cost);
            yield { type: "usage", usage: output.usage, totals };
          } else if (output.type === "tool_call") {
            dispatched.push({
              call: output.completed.call,
              dispatch: dispatcher.dispatch(output.completed, controller.signal),
            });
          }
        }
      }
      const turn = decoder.end();

      const message = assistantMessage(turn.text, turn.calls.map((completed) => completed.call));
      lease.append(message);
      yield { type: "assistant_message", message };

      for (const { call, dispatch } of dispatched) {
        yield { type: "tool_call", toolCall: call, client: dispatch.kind === "client" };
      }

      let executed = 0;
      let clientPending = 0;
      for (const { dispatch } of dispatched) {
        if (dispatch.kind === "client") {
          clientPending++;
          continue;
        }
        const result = await untilAborted(dispatch.result, controller.signal);
        const resultMessage = toolMessage(result);
        lease.append(resultMessage);
        executed++;
        logger.debug("Appended tool result", {
          tool: result.name,
          toolCallId: result.callId,
          isError: isFailure(result.outcome),
        });
        yield { type: "tool_result", result, message: resultMessage };
      }

      if (clientPending > 0) {
        yield { type: "done", reason: "client_tools_pending" };
        return;
      }
      if (executed === 0) {
        yield { type: "done", reason: "completed" };
        return;
      }
      if (round + 1 >= config.maxRounds) {
        logger.warn("Tool round limit reached", { sessionId: lease.sessionId, maxRounds: config.maxRounds });
        yield { type: "done", reason: "max_rounds" };
        return;
      }
    }
  } catch (error) {
    if (error instanceof ProtocolError || error instanceof ProviderError) {
      logger.error("Stream failed", { code: error.code, error: error.message });
    }
    throw error;
  } finally {
    controller.abort();
    options.signal?.removeEventListener("abort", onExternalAbort);
    lease?.release();
  }
}
