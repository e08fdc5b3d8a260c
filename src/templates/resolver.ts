import { TemplateResolutionError } from "../errors.js";
import type { ChatMemory } from "../memory/store.js";
import { isJsonObject } from "../persistence/json.js";
import type { ActionRecord, JsonObject, JsonValue, MemoryEntry } from "../persistence/types.js";
import { parsePath, readResultPath, type PathSegment } from "./path.js";

/** Maximum nesting of objects and arrays walked inside action arguments. */
export const MAX_TEMPLATE_DEPTH = 32;

const PLACEHOLDER_SOURCE = String.raw`\{\{\s*([A-Za-z0-9_-]+)((?:\.[A-Za-z0-9_-]+|\[\d+\])*)\s*\}\}`;
const EMBEDDED_PLACEHOLDER = new RegExp(PLACEHOLDER_SOURCE, "g");
const WHOLE_PLACEHOLDER = new RegExp(`^${PLACEHOLDER_SOURCE}$`);

const POSITIONAL_LATEST = new Set(["previous", "last", "prev"]);
const POSITIONAL_INDEXED = /^(?:action|step)_(\d+)$/;
const ALIAS_SUFFIX = /_(?:action|step|result|id|output)$/;
const MEMORY_SEARCH_LIMIT = 20;

/** Tokens of an identifier or path mapped to the memory tags they imply. */
const TAG_HINTS: ReadonlyArray<{ tokens: readonly string[]; tags: readonly string[] }> = [
  { tokens: ["file", "attachment", "pdf", "document", "url", "report"], tags: ["file", "pdf"] },
  { tokens: ["email", "mail"], tags: ["email"] },
  { tokens: ["data", "machine", "production"], tags: ["data"] },
];

/** Completed action fields the resolver reads. */
export type ResolvableAction = Pick<
  ActionRecord,
  "id" | "plannedId" | "orderIndex" | "toolName" | "result" | "resultVariableName"
>;

export interface TemplateContext {
  /** Completed actions of the current plan. */
  completedActions: readonly ResolvableAction[];
  /** Memory of the chat the plan belongs to. */
  memory?: ChatMemory;
  chatId: string;
}

interface Reference {
  identifier: string;
  rawPath: string | null;
  segments: PathSegment[];
}

/**
 * Expands `{{identifier.path}}` placeholders inside {@link value}. A string
 * made of a single placeholder becomes the referenced value itself; embedded
 * placeholders are stringified. Substituted values are never expanded again.
 */
export async function resolveTemplates(value: JsonValue, context: TemplateContext): Promise<JsonValue> {
  return resolveValue(value, context, 0);
}

/** Resolves every argument of an action. */
export async function resolveArguments(args: JsonObject, context: TemplateContext): Promise<JsonObject> {
  const resolved = await resolveTemplates(args, context);
  return isJsonObject(resolved) ? resolved : {};
}

async function resolveValue(value: JsonValue, context: TemplateContext, depth: number): Promise<JsonValue> {
  if (depth > MAX_TEMPLATE_DEPTH) {
    throw new TemplateResolutionError("<arguments>", null, [], `arguments nest deeper than ${MAX_TEMPLATE_DEPTH} levels`);
  }
  if (typeof value === "string") {
    return resolveString(value, context);
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      items.push(await resolveValue(item, context, depth + 1));
    }
    return items;
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = await resolveValue(entry, context, depth + 1);
    }
    return result;
  }
  return value;
}

async function resolveString(text: string, context: TemplateContext): Promise<JsonValue> {
  const whole = WHOLE_PLACEHOLDER.exec(text.trim());
  if (whole) {
    return lookup(toReference(whole[1], whole[2]), context);
  }

  const matches = Array.from(text.matchAll(EMBEDDED_PLACEHOLDER));
  if (matches.length === 0) {
    return text;
  }
  let output = "";
  let cursor = 0;
  for (const match of matches) {
    const start = match.index ?? 0;
    output += text.slice(cursor, start);
    output += stringify(await lookup(toReference(match[1], match[2]), context));
    cursor = start + match[0].length;
  }
  return output + text.slice(cursor);
}

function toReference(identifier: string, path: string | undefined): Reference {
  const rawPath = path ? path.replace(/^\./, "") : null;
  return { identifier, rawPath: rawPath || null, segments: rawPath ? parsePath(rawPath) : [] };
}

function stringify(value: JsonValue): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}

/** Walks the lookup strategies in order and returns the first hit. */
async function lookup(reference: Reference, context: TemplateContext): Promise<JsonValue> {
  const attempted: string[] = [];
  const local = findLocalAction(reference.identifier, context.completedActions, attempted);
  if (local) {
    const value = readResultPath(local.result ?? null, reference.segments);
    if (value !== undefined) {
      return value;
    }
    attempted.push(`path_miss:${local.id}`);
  }

  const memory = context.memory;
  if (memory) {
    const hit = await findInMemory(reference, memory, attempted);
    if (hit !== undefined) {
      return hit;
    }
  }

  throw new TemplateResolutionError(reference.identifier, reference.rawPath, attempted);
}

function findLocalAction(
  identifier: string,
  actions: readonly ResolvableAction[],
  attempted: string[],
): ResolvableAction | undefined {
  const byRecency = [...actions].sort((left, right) => right.orderIndex - left.orderIndex);

  attempted.push("action_id");
  const exact = byRecency.find((action) => action.plannedId === identifier || action.id === identifier);
  if (exact) {
    return exact;
  }

  attempted.push("result_variable");
  const named = byRecency.find((action) => action.resultVariableName === identifier);
  if (named) {
    return named;
  }

  const lower = identifier.toLowerCase();
  attempted.push("positional");
  if (POSITIONAL_LATEST.has(lower)) {
    return byRecency[0];
  }
  const indexed = POSITIONAL_INDEXED.exec(lower);
  if (indexed) {
    const orderIndex = Number.parseInt(indexed[1], 10) - 1;
    const positioned = byRecency.find((action) => action.orderIndex === orderIndex);
    if (positioned) {
      return positioned;
    }
  }

  attempted.push("tool_alias");
  const alias = toolAlias(identifier);
  return byRecency.find((action) => {
    const tool = action.toolName.toLowerCase();
    return tool.length > 0 && (alias === tool || alias.includes(tool));
  });
}

async function findInMemory(
  reference: Reference,
  memory: ChatMemory,
  attempted: string[],
): Promise<JsonValue | undefined> {
  attempted.push("memory_key");
  const exact = await memory.get(reference.identifier);
  if (exact) {
    const value = readResultPath(exact.value, reference.segments);
    if (value !== undefined) {
      return value;
    }
  }

  const alias = toolAlias(reference.identifier);
  attempted.push("memory_tool");
  const byTool = await memory.search({ tool: alias, limit: MEMORY_SEARCH_LIMIT });
  const toolHit = firstContaining(byTool, reference.segments);
  if (toolHit !== undefined) {
    return toolHit;
  }

  for (const tag of inferTags(reference)) {
    attempted.push(`memory_tag:${tag}`);
    const tagged = await memory.search({ tag, limit: MEMORY_SEARCH_LIMIT });
    const tagHit = firstContaining(tagged, reference.segments);
    if (tagHit !== undefined) {
      return tagHit;
    }
  }
  return undefined;
}

function firstContaining(entries: readonly MemoryEntry[], segments: readonly PathSegment[]): JsonValue | undefined {
  for (const entry of entries) {
    const value = readResultPath(entry.value, segments);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/** `pdf_result` → `pdf`, `create_pdf_action` → `create_pdf`. */
export function toolAlias(identifier: string): string {
  return identifier.toLowerCase().replace(ALIAS_SUFFIX, "");
}

/** Memory tags implied by the identifier and path tokens, in hint order. */
export function inferTags(reference: { identifier: string; rawPath: string | null }): string[] {
  const tokens = new Set(
    `${reference.identifier}.${reference.rawPath ?? ""}`
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((token) => token.length > 0),
  );
  const tags: string[] = [];
  for (const hint of TAG_HINTS) {
    if (hint.tokens.some((token) => tokens.has(token))) {
      for (const tag of hint.tags) {
        if (!tags.includes(tag)) {
          tags.push(tag);
        }
      }
    }
  }
  return tags;
}
