export { OpenAICompatibleProvider, type OpenAICompatibleConfig } from "./provider";
export { ChunkTranslator } from "./translate";
export { processSSEBuffer, type SSEEvent } from "./sse";
export { classifyError, buildErrorHint } from "./errors";
export type { WireMessage, WireToolDef, WireChunk, WireChoice, WireDelta, WireToolCall, WireUsage, WireError } from "./wire";
