// Configuration schema + validation

import { z } from "zod";
import { type Result, ok, err, ConfigError } from "./types";
import { LOG_LEVELS, type LogLevel } from "./types";

export const DEFAULT_MODEL = "gpt-4.1";
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MAX_ROUNDS = 30;

const ToolChoiceEnum = z.enum(["auto", "required", "none"]);

export const GenerateConfigSchema = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  temperature: z.number().min(0).max(2).optional(),
  toolChoice: ToolChoiceEnum.default("auto"),
  parallelToolCalls: z.boolean().optional(),
  /** Upper bound on provider round trips inside one stream. */
  maxRounds: z.number().int().positive().default(DEFAULT_MAX_ROUNDS),
  /** Passed through verbatim into the provider request body. */
  extraBody: z.record(z.unknown()).optional(),
});

export type GenerateConfig = z.output<typeof GenerateConfigSchema>;
export type GenerateConfigInput = z.input<typeof GenerateConfigSchema>;
export type ToolChoice = z.output<typeof ToolChoiceEnum>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate a generation config, filling defaults.
 * Returns Result, never throws.
 */
export function parseGenerateConfig(input: GenerateConfigInput = {}): Result<GenerateConfig, ConfigError> {
  const parsed = GenerateConfigSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid generate config: ${describeIssues(parsed.error)}`, parsed.error));
  }
  return ok(parsed.data);
}

export interface ToolstreamConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly logLevel: LogLevel;
}

const HttpUrlSchema = z.string().refine((value) => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}, "Invalid URL (expected http:// or https://)");

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: "Missing required env var: OPENAI_API_KEY" })
    .min(1, "Missing required env var: OPENAI_API_KEY"),
  OPENAI_BASE_URL: HttpUrlSchema.default(DEFAULT_BASE_URL),
  TOOLSTREAM_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"], {
    errorMap: () => ({ message: `Invalid LOG_LEVEL (must be one of: ${LOG_LEVELS.join(", ")})` }),
  }).default("info"),
});

/**
 * Load and validate connection settings from environment variables.
 * Empty strings count as unset. Returns Result, never throws.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<ToolstreamConfig, ConfigError> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    return err(new ConfigError(message, parsed.error));
  }

  return ok({
    apiKey: parsed.data.OPENAI_API_KEY,
    baseUrl: parsed.data.OPENAI_BASE_URL,
    model: parsed.data.TOOLSTREAM_MODEL,
    logLevel: parsed.data.LOG_LEVEL,
  });
}
