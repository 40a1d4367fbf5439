// @toolstream/core: streaming tool-call orchestration
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Config
export {
  type GenerateConfig,
  type GenerateConfigInput,
  type ToolChoice,
  type ToolstreamConfig,
  GenerateConfigSchema,
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_ROUNDS,
  parseGenerateConfig,
  loadConfig,
} from "./config";

// Messages
export { generateId, systemMessage, userMessage, assistantMessage, toolMessage } from "./messages";

// Tool registry
export {
  type ToolInvocation,
  EMPTY_PARAMETERS,
  deriveParameters,
  Tool,
  ToolBuilder,
  ToolSet,
} from "./tool-registry";

// Extractors
export {
  type Invocation,
  type Extractor,
  type Extracted,
  type ContextGuard,
  Id,
  Args,
  Context,
  Signal,
  instanceOf,
  extractAll,
} from "./extract";

// JSON repair
export { type JsonRepair, parseIncompleteJson } from "./repair";

// Stream decoder
export {
  type DecoderState,
  type DecoderOutput,
  type TurnOutput,
  type CompletedCall,
  StreamDecoder,
} from "./stream-decoder";

// Dispatcher
export { type Dispatch, ToolDispatcher, isFailure } from "./dispatcher";

// Session
export { type UsageTotals, Session, SessionLease } from "./session";

// Pricing
export { type ModelPricing, PricingLookup } from "./pricing";

// Providers
export { AbstractProvider } from "./base-provider";

// Orchestrator
export {
  type DoneReason,
  type SessionUpdate,
  type ResponsesStreamOptions,
  responsesStream,
} from "./orchestrator";
