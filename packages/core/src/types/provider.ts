// LLM provider interface: the transport the orchestrator streams from

import type { Message } from "./message";
import type { StreamEvent } from "./stream";
import type { ToolDefinition } from "./tool";
import type { GenerateConfig } from "../config";

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "cancelled"
  | "unknown";

export interface ProviderRequest {
  readonly messages: readonly Message[];
  readonly tools: readonly ToolDefinition[];
  readonly config: GenerateConfig;
}

export interface ProviderOptions {
  readonly signal?: AbortSignal;
}

export interface Provider {
  readonly name: string;
  /**
   * Stream one model turn. Implementations end the iterable after emitting
   * `turn_completed`; timeouts and retries are theirs to handle.
   */
  stream(request: ProviderRequest, options?: ProviderOptions): AsyncIterable<StreamEvent>;
}
