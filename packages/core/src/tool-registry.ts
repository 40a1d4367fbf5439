// Tool registry: built tool definitions + executors, indexed by name

import type { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  type DecodeError,
  type JsonObject,
  type JsonValue,
  type Result,
  type ToolDefinition,
  ok,
  err,
  isJsonObject,
  toJsonValue,
  BuildError,
  RegistrationError,
} from "./types";
import { type Extracted, type Extractor, type Invocation, extractAll } from "./extract";

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/** Advertised for tools that declare no parameter type. */
export const EMPTY_PARAMETERS: JsonObject = {
  type: "object",
  properties: {},
  additionalProperties: false,
  required: [],
};

// Keys whose value maps names to subschemas; the map itself is not a schema.
const SCHEMA_MAP_KEYS = new Set(["properties", "patternProperties", "definitions", "$defs"]);
// Keys holding literal instance data rather than schemas.
const LITERAL_KEYS = new Set(["default", "const", "enum", "examples"]);

function cleanSchema(node: JsonValue): JsonValue {
  if (Array.isArray(node)) return node.map(cleanSchema);
  if (!isJsonObject(node)) return node;

  const cleaned: JsonObject = {};
  for (const [key, value] of Object.entries(node)) {
    if (key === "$schema" || key === "title") continue;
    if (key === "format" && "type" in node) continue;

    if (LITERAL_KEYS.has(key)) {
      cleaned[key] = value;
    } else if (SCHEMA_MAP_KEYS.has(key) && isJsonObject(value)) {
      cleaned[key] = Object.fromEntries(
        Object.entries(value).map(([name, sub]) => [name, cleanSchema(sub)]),
      );
    } else {
      cleaned[key] = cleanSchema(value);
    }
  }
  return cleaned;
}

/**
 * Derive the JSON Schema sent to the provider from a zod parameter type.
 * Throws if the schema cannot be generated or its root is not an object.
 */
export function deriveParameters(schema: ZodTypeAny): JsonObject {
  const derived = cleanSchema(toJsonValue(zodToJsonSchema(schema, { $refStrategy: "none" })));
  if (!isJsonObject(derived) || derived.type !== "object") {
    throw new Error("parameters must describe a JSON object");
  }
  return derived;
}

type BoundExecutor = (invocation: Invocation) => Promise<JsonValue>;

/** What a caller hands to Tool.execute for one completed call. */
export interface ToolInvocation {
  readonly id: string;
  readonly args: Result<JsonValue, DecodeError>;
  readonly signal: AbortSignal;
}

interface ToolInit {
  readonly name: string;
  readonly description: string;
  readonly parameters?: JsonObject;
  readonly executor?: BoundExecutor;
  readonly hasContext: boolean;
  readonly context: unknown;
}

/** An immutable, validated tool. Create through ToolBuilder. */
export class Tool {
  readonly name: string;
  readonly description: string;
  /** Derived JSON Schema, absent for schema-less tools. */
  readonly parameters?: JsonObject;
  private readonly executor?: BoundExecutor;
  private readonly hasContext: boolean;
  private readonly context: unknown;

  constructor(init: ToolInit) {
    this.name = init.name;
    this.description = init.description;
    this.parameters = init.parameters;
    this.executor = init.executor;
    this.hasContext = init.hasContext;
    this.context = init.context;
  }

  /** Client tools have no executor; the application resolves them. */
  get isClient(): boolean {
    return this.executor === undefined;
  }

  definition(): ToolDefinition {
    return {
      name: this.name,
      description: this.description,
      parameters: this.parameters ?? EMPTY_PARAMETERS,
    };
  }

  /**
   * Run the executor for one call. Returns undefined for client tools.
   * The promise rejects with ExtractionError when a parameter cannot be
   * resolved, or with whatever the executor itself throws.
   */
  execute(call: ToolInvocation): Promise<JsonValue> | undefined {
    if (!this.executor) return undefined;
    return this.executor({
      id: call.id,
      args: call.args,
      signal: call.signal,
      hasContext: this.hasContext,
      context: this.context,
    });
  }
}

/**
 * Fluent builder for Tool. Nothing is validated until build().
 *
 * @example
 * const add = new ToolBuilder("add")
 *   .parameters(AddArgs)
 *   .executor([Args(AddArgs)], ({ a, b }) => a + b)
 *   .build();
 */
export class ToolBuilder {
  private _description = "";
  private _schema?: ZodTypeAny;
  private _hasContext = false;
  private _context: unknown = undefined;
  private _client = false;
  private _extractors: readonly Extractor<unknown>[] = [];
  private _executor?: BoundExecutor;

  constructor(private readonly _name: string) {}

  description(text: string): this {
    this._description = text;
    return this;
  }

  parameters(schema: ZodTypeAny): this {
    this._schema = schema;
    return this;
  }

  /** Value handed unchanged to every invocation through the Context extractor. */
  context(value: unknown): this {
    this._hasContext = true;
    this._context = value;
    return this;
  }

  /** Mark as a client tool: calls are surfaced to the caller instead of executed. */
  client(): this {
    this._client = true;
    return this;
  }

  executor<const E extends readonly Extractor<unknown>[]>(
    extractors: E,
    fn: (...args: Extracted<E>) => unknown,
  ): this {
    this._extractors = extractors;
    this._executor = async (invocation) => {
      const values = extractAll(extractors, invocation);
      return toJsonValue(await fn(...values));
    };
    return this;
  }

  build(): Result<Tool, BuildError> {
    const name = this._name;

    if (!TOOL_NAME_PATTERN.test(name)) {
      return err(new BuildError(`Invalid tool name "${name}" (expected 1-64 of [a-zA-Z0-9_-])`, name));
    }
    if (this._client && this._executor) {
      return err(new BuildError(`Tool "${name}" is marked as a client tool but has an executor`, name));
    }
    if (!this._client && !this._executor) {
      return err(new BuildError(`Tool "${name}" has no executor and is not a client tool`, name));
    }

    for (const extractor of this._extractors) {
      if (extractor.kind !== "args") continue;
      if (!this._schema) {
        return err(new BuildError(`Tool "${name}" extracts Args but declares no parameters`, name));
      }
      if (extractor.schema !== this._schema) {
        return err(new BuildError(`Tool "${name}" extracts Args with a schema other than its parameters`, name));
      }
    }

    let parameters: JsonObject | undefined;
    if (this._schema) {
      try {
        parameters = deriveParameters(this._schema);
      } catch (cause) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return err(new BuildError(`Tool "${name}" has an unusable parameter schema: ${reason}`, name, cause));
      }
    }

    return ok(
      new Tool({
        name,
        description: this._description,
        parameters,
        executor: this._executor,
        hasContext: this._hasContext,
        context: this._context,
      }),
    );
  }
}

/** A set of tools with unique names. */
export class ToolSet {
  private tools = new Map<string, Tool>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) this.add(tool);
  }

  /**
   * Register a tool. Throws RegistrationError if the name is taken.
   */
  add(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new RegistrationError(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  /** Look up a tool; undefined means the model asked for an unknown tool. */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Definitions sent to the provider, in registration order. */
  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition());
  }

  get size(): number {
    return this.tools.size;
  }
}
