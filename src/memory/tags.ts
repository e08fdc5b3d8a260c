import { isJsonObject } from "../persistence/json.js";
import type { JsonObject, JsonValue } from "../persistence/types.js";

const FILE_TOOL_PATTERN = /(pdf|file|document|report|export|upload|attachment)/;
const MAIL_TOOL_PATTERN = /(mail|email)/;
const DATA_TOOL_PATTERN = /(data|machine|production|metric|sensor|query)/;

const KEYWORD_FIELDS = ["title", "filename", "file_name", "subject"] as const;
const URL_FIELDS = ["file_url", "url"] as const;
const KEYWORD_MIN_LENGTH = 3;
const STOPWORDS = new Set(["the", "and", "for", "with", "from", "this", "that", "into", "your", "our"]);

/**
 * Derives the tags stored next to a tool result. The output only depends on
 * the inputs and is sorted and de-duplicated, so the same call always yields
 * the same tag list.
 */
export function generateTags(toolName: string, args: JsonObject, result: JsonValue): string[] {
  const tags = new Set<string>(["tool_result"]);
  const tool = toolName.trim().toLowerCase();
  if (tool) {
    tags.add(tool);
  }

  const sources = collectSources(args, result);

  const urls = URL_FIELDS.flatMap((field) => readStrings(sources, field));
  const fileLike = FILE_TOOL_PATTERN.test(tool) || urls.length > 0;
  if (fileLike) {
    tags.add("file");
  }

  const names = KEYWORD_FIELDS.flatMap((field) => readStrings(sources, field));
  const mentionsPdf =
    tool.includes("pdf") || [...urls, ...names].some((value) => value.toLowerCase().split(/[?#]/)[0].endsWith(".pdf"));
  if (fileLike && mentionsPdf) {
    tags.add("pdf");
  }

  for (const name of names) {
    for (const keyword of extractKeywords(name)) {
      tags.add(keyword);
    }
  }

  if (MAIL_TOOL_PATTERN.test(tool)) {
    tags.add("email");
  }

  if (DATA_TOOL_PATTERN.test(tool)) {
    tags.add("data");
    for (const [key, value] of Object.entries(args)) {
      if (!key.endsWith("_id") || key.length <= 3) {
        continue;
      }
      if (typeof value !== "string" && typeof value !== "number") {
        continue;
      }
      const stem = key.slice(0, -3).toLowerCase();
      const literal = String(value).trim().toLowerCase();
      tags.add(stem);
      if (literal) {
        tags.add(`${stem}:${literal}`);
      }
    }
  }

  return Array.from(tags).sort();
}

/** Lower-cased alphanumeric tokens of a title or file name. */
export function extractKeywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= KEYWORD_MIN_LENGTH && !/^\d+$/.test(token) && !STOPWORDS.has(token));
}

/** Arguments, the result object and its `data` envelope, when present. */
function collectSources(args: JsonObject, result: JsonValue): JsonObject[] {
  const sources: JsonObject[] = [args];
  if (isJsonObject(result)) {
    sources.push(result);
    const data = result.data;
    if (isJsonObject(data)) {
      sources.push(data);
    }
  }
  return sources;
}

function readStrings(sources: JsonObject[], field: string): string[] {
  const values: string[] = [];
  for (const source of sources) {
    const value = source[field];
    if (typeof value === "string" && value.trim().length > 0) {
      values.push(value.trim());
    }
  }
  return values;
}
