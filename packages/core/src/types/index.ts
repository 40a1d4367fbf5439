// Barrel export: the public type surface of @toolstream/core types

export type { JsonPrimitive, JsonValue, JsonObject } from "./json";
export { isJsonObject, toJsonValue } from "./json";

export type {
  Role,
  Message,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  SessionSnapshot,
} from "./message";

export type {
  ToolDefinition,
  ToolCall,
  ToolOutcome,
  ToolResult,
} from "./tool";

export type { Usage, StreamEvent } from "./stream";

export type {
  Provider,
  ProviderRequest,
  ProviderOptions,
  ProviderErrorCode,
} from "./provider";

export type { Logger, LogLevel, LogSink } from "./logger";
export { ConsoleLogger, LOG_LEVELS } from "./logger";

export {
  ToolstreamError,
  ProviderError,
  ProtocolError,
  RegistrationError,
  BuildError,
  DecodeError,
  ExtractionError,
  SessionError,
  ConfigError,
  ok,
  err,
} from "./errors";
export type { Result, ExtractorKind } from "./errors";
