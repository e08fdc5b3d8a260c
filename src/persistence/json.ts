import type { JsonObject, JsonValue } from "./types.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonColumn(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

export function parseNullableJsonColumn(text: string | null): JsonValue | null {
  return text === null ? null : parseJsonColumn(text);
}

export function parseJsonObjectColumn(text: string): JsonObject {
  const parsed = parseJsonColumn(text);
  return isJsonObject(parsed) ? parsed : {};
}

/**
 * Normalises an arbitrary value (tool output, planner payload) into a JSON
 * value by round-tripping it through the serializer. `undefined` becomes
 * `null`.
 */
export function toJsonValue(value: unknown): JsonValue {
  const text = JSON.stringify(value);
  return text === undefined ? null : parseJsonColumn(text);
}
