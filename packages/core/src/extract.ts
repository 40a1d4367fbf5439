// Extractors: typed values pulled out of a tool invocation and handed to an
// executor's parameters, in the order the executor declares them.

import type { ZodTypeAny, output as ZodOutput } from "zod";
import {
  type DecodeError,
  type ExtractorKind,
  type JsonValue,
  type Result,
  ok,
  err,
  ExtractionError,
} from "./types";

/** Everything a single tool call makes available to extractors. */
export interface Invocation {
  readonly id: string;
  readonly args: Result<JsonValue, DecodeError>;
  readonly hasContext: boolean;
  readonly context: unknown;
  readonly signal: AbortSignal;
}

export interface Extractor<T> {
  readonly kind: ExtractorKind;
  /** Set only for `args` extractors; checked against the tool's declared parameters at build time. */
  readonly schema?: ZodTypeAny;
  extract(invocation: Invocation): Result<T, string>;
}

/** Tuple of values produced by a tuple of extractors. */
export type Extracted<E extends readonly Extractor<unknown>[]> = {
  -readonly [K in keyof E]: E[K] extends Extractor<infer T> ? T : never;
};

/** The call identifier assigned by the provider. */
export const Id: Extractor<string> = {
  kind: "id",
  extract: (invocation) => ok(invocation.id),
};

/** Aborted when the stream that started the call is closed or cancelled. */
export const Signal: Extractor<AbortSignal> = {
  kind: "signal",
  extract: (invocation) => ok(invocation.signal),
};

function describePath(path: readonly (string | number)[]): string {
  return path.length > 0 ? ` at "${path.join(".")}"` : "";
}

/**
 * Arguments decoded with `schema`. The schema must be the one passed to
 * `ToolBuilder.parameters()`.
 */
export function Args<S extends ZodTypeAny>(schema: S): Extractor<ZodOutput<S>> {
  return {
    kind: "args",
    schema,
    extract: (invocation) => {
      if (!invocation.args.ok) return err(invocation.args.error.message);

      const parsed = schema.safeParse(invocation.args.value);
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((issue) => `${issue.message}${describePath(issue.path)}`)
          .join("; ");
        return err(`arguments do not match the declared parameters: ${reason}`);
      }
      return ok(parsed.data);
    },
  };
}

export type ContextGuard<T> = (value: unknown) => value is T;

/** Guard accepting instances of `ctor` (for class-typed contexts). */
export function instanceOf<T>(ctor: new (...args: never[]) => T): ContextGuard<T> {
  return (value: unknown): value is T => value instanceof ctor;
}

/** The context value captured when the tool was built, checked with `guard`. */
export function Context<T>(guard: ContextGuard<T>): Extractor<T> {
  return {
    kind: "context",
    extract: (invocation) => {
      if (!invocation.hasContext) return err("tool was registered without a context");
      if (!guard(invocation.context)) return err("context is not of the requested type");
      return ok(invocation.context);
    },
  };
}

/**
 * Resolve every extractor in order, stopping at the first failure.
 * Throws ExtractionError naming the failed parameter.
 */
export function extractAll<E extends readonly Extractor<unknown>[]>(
  extractors: E,
  invocation: Invocation,
): Extracted<E> {
  const values: unknown[] = [];
  for (const [index, extractor] of extractors.entries()) {
    const extracted = extractor.extract(invocation);
    if (!extracted.ok) {
      throw new ExtractionError(index, extractor.kind, extracted.error);
    }
    values.push(extracted.value);
  }
  // Element i came from extractors[i], so the tuple lines up with Extracted<E>.
  return values as Extracted<E>;
}
