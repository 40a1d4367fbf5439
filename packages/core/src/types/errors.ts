// Error types and Result monad for explicit error handling

export type Result<T, E = ToolstreamError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class ToolstreamError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ToolstreamError";
  }
}

export class ProviderError extends ToolstreamError {
  constructor(
    message: string,
    public readonly providerCode?: string,
    cause?: unknown,
  ) {
    super(message, "PROVIDER_ERROR", cause);
    this.name = "ProviderError";
  }
}

/** The provider's event stream broke the decoding contract. Fatal to the stream. */
export class ProtocolError extends ToolstreamError {
  constructor(message: string, cause?: unknown) {
    super(message, "PROTOCOL_ERROR", cause);
    this.name = "ProtocolError";
  }
}

export class RegistrationError extends ToolstreamError {
  constructor(message: string, cause?: unknown) {
    super(message, "REGISTRATION_ERROR", cause);
    this.name = "RegistrationError";
  }
}

export class BuildError extends ToolstreamError {
  constructor(
    message: string,
    public readonly toolName: string,
    cause?: unknown,
  ) {
    super(message, "BUILD_ERROR", cause);
    this.name = "BuildError";
  }
}

export class DecodeError extends ToolstreamError {
  constructor(message: string, cause?: unknown) {
    super(message, "DECODE_ERROR", cause);
    this.name = "DecodeError";
  }
}

export type ExtractorKind = "id" | "args" | "context" | "signal";

/** One executor parameter could not be resolved from the tool call. */
export class ExtractionError extends ToolstreamError {
  constructor(
    public readonly parameter: number,
    public readonly extractor: ExtractorKind,
    public readonly reason: string,
  ) {
    super(`Parameter ${parameter} (${extractor}): ${reason}`, "EXTRACTION_ERROR");
    this.name = "ExtractionError";
  }
}

export class SessionError extends ToolstreamError {
  constructor(message: string, cause?: unknown) {
    super(message, "SESSION_ERROR", cause);
    this.name = "SessionError";
  }
}

export class ConfigError extends ToolstreamError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}
