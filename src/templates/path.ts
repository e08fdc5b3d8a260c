import { isJsonObject } from "../persistence/json.js";
import type { JsonValue } from "../persistence/types.js";

export type PathSegment = string | number;

const SEGMENT_PATTERN = /([A-Za-z0-9_-]+)|\[(\d+)\]/g;

/** Splits `results[0].url` into `["results", 0, "url"]`. */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  for (const match of path.matchAll(SEGMENT_PATTERN)) {
    if (match[2] !== undefined) {
      segments.push(Number.parseInt(match[2], 10));
    } else if (match[1] !== undefined) {
      segments.push(match[1]);
    }
  }
  return segments;
}

/** Returns `undefined` when a segment is missing; `null` is a found value. */
export function readPath(root: JsonValue, segments: readonly PathSegment[]): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const segment of segments) {
    if (current === undefined) {
      return undefined;
    }
    if (Array.isArray(current)) {
      const index = typeof segment === "number" ? segment : /^\d+$/.test(segment) ? Number(segment) : Number.NaN;
      current = Number.isInteger(index) && index < current.length ? current[index] : undefined;
      continue;
    }
    if (isJsonObject(current)) {
      const key = String(segment);
      current = Object.prototype.hasOwnProperty.call(current, key) ? current[key] : undefined;
      continue;
    }
    return undefined;
  }
  return current;
}

const ENVELOPE_KEYS = ["data", "result"] as const;
const LIST_KEYS = ["results", "items"] as const;

/**
 * Looks {@link segments} up in a tool result. A miss retries on the
 * `data`/`result` envelope and, for list-shaped results, on the first item.
 */
export function readResultPath(root: JsonValue, segments: readonly PathSegment[]): JsonValue | undefined {
  if (segments.length === 0) {
    return root;
  }
  const candidates: JsonValue[] = [root];
  if (isJsonObject(root)) {
    for (const key of ENVELOPE_KEYS) {
      const inner = root[key];
      if (inner !== undefined && inner !== null) {
        candidates.push(inner);
      }
    }
  }

  for (const candidate of candidates) {
    const direct = readPath(candidate, segments);
    if (direct !== undefined) {
      return direct;
    }
  }
  for (const candidate of candidates) {
    const first = firstListItem(candidate);
    if (first !== undefined) {
      const nested = readPath(first, segments);
      if (nested !== undefined) {
        return nested;
      }
    }
  }
  return undefined;
}

function firstListItem(value: JsonValue): JsonValue | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  if (isJsonObject(value)) {
    for (const key of LIST_KEYS) {
      const list = value[key];
      if (Array.isArray(list)) {
        return list[0];
      }
    }
  }
  return undefined;
}
