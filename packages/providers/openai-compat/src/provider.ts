// OpenAICompatibleProvider: Chat Completions transport for OpenAI and
// OpenAI-style servers (LM Studio, llama.cpp, vLLM, gateways).
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Transcript conversion (tool-call records, JSON tool results)
//   • SSE streaming with tolerant chunk parsing and usage reporting
//   • Tool call deltas keyed by index → call-id keyed StreamEvents
//   • Unified error classification

import type {
  Logger,
  Message,
  ProviderOptions,
  ProviderRequest,
  StreamEvent,
  ToolDefinition,
  ToolstreamConfig,
} from "@toolstream/core";
import { AbstractProvider, ConsoleLogger, ProviderError } from "@toolstream/core";
import type { WireMessage, WireToolCall, WireToolDef } from "./wire";
import { processSSEBuffer } from "./sse";
import { ChunkTranslator } from "./translate";
import { classifyError, buildErrorHint } from "./errors";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  /** Provider name used in logs and error messages. Default: "openai". */
  readonly name?: string;
  /**
   * Base URL for the API. Accepts any of:
   *   https://api.openai.com
   *   https://api.openai.com/v1
   *   https://api.openai.com/v1/chat/completions   (trailing endpoint stripped)
   * All are normalized to https://api.openai.com/v1 internally.
   */
  readonly baseUrl: string;
  /** API key. If empty/undefined, the Authorization header is omitted. */
  readonly apiKey?: string;
  /** Extra headers merged into every request. */
  readonly extraHeaders?: Record<string, string>;
  /** Extra body fields merged into every request; per-request extraBody wins. */
  readonly extraBody?: Record<string, unknown>;
  readonly logger?: Logger;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  // Strip full endpoint path if user pasted the complete URL
  url = url.replace(/\/chat\/completions$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

function toWireMessages(messages: readonly Message[]): WireMessage[] {
  const result: WireMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        result.push({ role: "system", content: msg.content });
        break;
      case "user":
        result.push({ role: "user", content: msg.content });
        break;
      case "assistant":
        if (msg.toolCalls?.length) {
          result.push({
            role: "assistant",
            content: msg.content || null,
            tool_calls: msg.toolCalls.map(
              (tc): WireToolCall => ({
                id: tc.id,
                type: "function",
                // Unrepairable buffers are replayed as an empty object; the failure result explains it
                function: { name: tc.name, arguments: tc.args !== undefined ? JSON.stringify(tc.args) : "{}" },
              }),
            ),
          });
        } else {
          result.push({ role: "assistant", content: msg.content });
        }
        break;
      case "tool":
        result.push({ role: "tool", tool_call_id: msg.toolCallId, content: JSON.stringify(msg.content) });
        break;
    }
  }

  return result;
}

function toWireTools(tools: readonly ToolDefinition[]): WireToolDef[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

// ── Provider ─────────────────────────────────────────────────────────────────

export class OpenAICompatibleProvider extends AbstractProvider {
  readonly name: string;
  protected readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly extraHeaders: Record<string, string>;
  private readonly extraBody: Record<string, unknown>;

  constructor(config: OpenAICompatibleConfig) {
    super(config.logger ?? new ConsoleLogger("warn"));
    this.name = config.name ?? "openai";
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey ?? "";
    this.extraHeaders = config.extraHeaders ?? {};
    this.extraBody = config.extraBody ?? {};
  }

  /** Build a provider from environment-derived settings (see loadConfig). */
  static fromConfig(config: ToolstreamConfig, logger?: Logger): OpenAICompatibleProvider {
    return new OpenAICompatibleProvider({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      logger: logger ?? new ConsoleLogger(config.logLevel),
    });
  }

  /** The JSON body sent to /chat/completions for `request`. */
  buildBody(request: ProviderRequest): Record<string, unknown> {
    const { config } = request;
    const body: Record<string, unknown> = {
      model: config.model,
      messages: toWireMessages(request.messages),
      stream: true,
      stream_options: { include_usage: true },
    };

    if (config.temperature !== undefined) {
      body.temperature = config.temperature;
    }

    if (request.tools.length > 0) {
      body.tools = toWireTools(request.tools);
      body.tool_choice = config.toolChoice;
      if (config.parallelToolCalls !== undefined) {
        body.parallel_tool_calls = config.parallelToolCalls;
      }
    }

    return { ...body, ...this.extraBody, ...config.extraBody };
  }

  protected async *_stream(request: ProviderRequest, options?: ProviderOptions): AsyncIterable<StreamEvent> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.extraHeaders,
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    this.logger.debug("Sending chat completion request", {
      provider: this.name,
      model: request.config.model,
      messages: request.messages.length,
      tools: request.tools.length,
    });

    const translator = new ChunkTranslator();

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(this.buildBody(request)),
        signal: options?.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`${this.name} API error: Status ${response.status}\nBody: ${errorBody}`);
      }

      if (!response.body) {
        throw new Error(`No response body received from ${this.name}`);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      let sawDone = false;

      while (!sawDone) {
        options?.signal?.throwIfAborted();

        const { done, value } = await reader.read();
        const incoming = done ? decoder.decode() + "\n" : decoder.decode(value, { stream: true });
        const { events, remaining } = processSSEBuffer(buffer, incoming);
        buffer = remaining;

        for (const event of events) {
          if (event.type === "done") sawDone = true;
          yield* translator.push(event);
        }

        if (done) break;
      }
      if (sawDone) await reader.cancel();

      yield* translator.end();
    } catch (err) {
      if (options?.signal?.aborted) throw options.signal.reason;

      const code = classifyError(err);
      const hint = buildErrorHint(code, this.name, this.baseUrl);
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderError(`${this.name} error: ${message}${hint}`, code, err);
    }
  }
}
