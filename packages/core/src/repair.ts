// Best-effort decoding of possibly truncated JSON tool-call arguments

import { jsonrepair } from "jsonrepair";
import type { JsonValue } from "./types";

/** Turns a raw (possibly incomplete) JSON buffer into a value, or throws. */
export type JsonRepair = (raw: string) => JsonValue;

/**
 * Parse a possibly incomplete JSON string, repairing it first.
 * An empty or whitespace-only buffer decodes to `{}` (a call with no arguments).
 */
export const parseIncompleteJson: JsonRepair = (raw) => {
  if (raw.trim() === "") return {};
  const repaired = jsonrepair(raw);
  const value: JsonValue = JSON.parse(repaired);
  return value;
};
