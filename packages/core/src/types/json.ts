// Structural JSON types shared by tool arguments, results and schemas

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Round-trip an arbitrary value through JSON so it can be stored in the
 * transcript. `undefined` (and anything else JSON drops) becomes `null`.
 * Throws for values JSON cannot represent (cycles, BigInt).
 */
export function toJsonValue(value: unknown): JsonValue {
  const text = JSON.stringify(value);
  if (text === undefined) return null;
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}
