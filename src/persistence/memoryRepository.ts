import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";

import type { SqliteDatabase } from "./database.js";
import { PersistenceError } from "../errors.js";
import { parseJsonColumn } from "./json.js";
import type { MemoryEntry, MemorySearchQuery, MemoryStats, NewMemoryEntry } from "./types.js";

/** Durable storage of chat memory entries. */
export interface MemoryRepository {
  /** Replaces any entry stored under the same `(chat, key)`. */
  put(entry: NewMemoryEntry): Promise<MemoryEntry>;
  get(chatId: string, key: string): Promise<MemoryEntry | undefined>;
  search(chatId: string, query: MemorySearchQuery): Promise<MemoryEntry[]>;
  /** Records an access on each entry and returns the refreshed rows. */
  touch(entries: MemoryEntry[]): Promise<MemoryEntry[]>;
  stats(chatId: string): Promise<MemoryStats>;
  delete(chatId: string, key: string): Promise<boolean>;
}

interface MemoryRow {
  id: string;
  chat_id: string;
  memory_key: string;
  value_json: string;
  tags_json: string;
  source_tool: string | null;
  source_action_id: string | null;
  size_bytes: number;
  created_at: string;
  last_accessed_at: string;
  access_count: number;
}

interface StatsRow {
  entry_count: number;
  total_bytes: number | null;
  unique_tools: number;
  total_accesses: number | null;
}

export interface SqliteMemoryRepositoryOptions {
  database: SqliteDatabase;
  now?: () => Date;
}

export class SqliteMemoryRepository implements MemoryRepository {
  private readonly db: SqliteDatabase;
  private readonly now: () => Date;

  constructor(options: SqliteMemoryRepositoryOptions) {
    this.db = options.database;
    this.now = options.now ?? (() => new Date());
  }

  async put(entry: NewMemoryEntry): Promise<MemoryEntry> {
    return this.guard("memory_put", () => {
      const timestamp = this.now().toISOString();
      const valueJson = JSON.stringify(entry.value);
      const id = randomUUID();
      const replace = this.db.transaction(() => {
        this.db
          .prepare<[string, string]>("INSERT INTO chats (id, created_at) VALUES (?, ?) ON CONFLICT(id) DO NOTHING")
          .run(entry.chatId, timestamp);
        this.db
          .prepare<[string, string]>("DELETE FROM memory_entries WHERE chat_id = ? AND memory_key = ?")
          .run(entry.chatId, entry.key);
        this.db
          .prepare<[string, string, string, string, string, string | null, string | null, number, string, string]>(`
            INSERT INTO memory_entries (
              id, chat_id, memory_key, value_json, tags_json, source_tool, source_action_id,
              size_bytes, created_at, last_accessed_at, access_count
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0)
          `)
          .run(
            id,
            entry.chatId,
            entry.key,
            valueJson,
            JSON.stringify(entry.tags),
            entry.sourceTool,
            entry.sourceActionId,
            Buffer.byteLength(valueJson, "utf8"),
            timestamp,
            timestamp,
          );
      });
      replace();
      const row = this.db.prepare<[string], MemoryRow>("SELECT * FROM memory_entries WHERE id = ?").get(id);
      if (!row) {
        throw new PersistenceError(`memory entry ${entry.key} missing after insert`);
      }
      return mapEntry(row);
    });
  }

  async get(chatId: string, key: string): Promise<MemoryEntry | undefined> {
    return this.guard("memory_get", () => {
      const row = this.db
        .prepare<[string, string], MemoryRow>("SELECT * FROM memory_entries WHERE chat_id = ? AND memory_key = ?")
        .get(chatId, key);
      return row ? mapEntry(row) : undefined;
    });
  }

  async search(chatId: string, query: MemorySearchQuery): Promise<MemoryEntry[]> {
    return this.guard("memory_search", () => {
      const clauses = ["chat_id = ?"];
      const params: Array<string | number> = [chatId];
      if (query.tool) {
        clauses.push("source_tool = ?");
        params.push(query.tool);
      }
      if (query.tag) {
        clauses.push("EXISTS (SELECT 1 FROM json_each(memory_entries.tags_json) WHERE json_each.value = ?)");
        params.push(query.tag);
      }
      if (query.keyPattern) {
        clauses.push("memory_key LIKE ? ESCAPE '\\'");
        params.push(toLikePattern(query.keyPattern));
      }
      let sql = `SELECT * FROM memory_entries WHERE ${clauses.join(" AND ")} ORDER BY created_at DESC, rowid DESC`;
      if (query.limit !== undefined && query.limit > 0) {
        sql += " LIMIT ?";
        params.push(Math.floor(query.limit));
      }
      return this.db.prepare<Array<string | number>, MemoryRow>(sql).all(...params).map(mapEntry);
    });
  }

  async touch(entries: MemoryEntry[]): Promise<MemoryEntry[]> {
    if (entries.length === 0) {
      return [];
    }
    return this.guard("memory_touch", () => {
      const timestamp = this.now().toISOString();
      const statement = this.db.prepare<[string, string]>(
        "UPDATE memory_entries SET last_accessed_at = ?, access_count = access_count + 1 WHERE id = ?",
      );
      const touchAll = this.db.transaction((ids: string[]) => {
        for (const id of ids) {
          statement.run(timestamp, id);
        }
      });
      touchAll(entries.map((entry) => entry.id));
      return entries.map((entry) => ({ ...entry, lastAccessedAt: timestamp, accessCount: entry.accessCount + 1 }));
    });
  }

  async stats(chatId: string): Promise<MemoryStats> {
    return this.guard("memory_stats", () => {
      const row = this.db
        .prepare<[string], StatsRow>(`
          SELECT
            COUNT(*) AS entry_count,
            SUM(size_bytes) AS total_bytes,
            COUNT(DISTINCT source_tool) AS unique_tools,
            SUM(access_count) AS total_accesses
          FROM memory_entries WHERE chat_id = ?
        `)
        .get(chatId);
      return {
        entryCount: row?.entry_count ?? 0,
        totalBytes: row?.total_bytes ?? 0,
        uniqueTools: row?.unique_tools ?? 0,
        totalAccesses: row?.total_accesses ?? 0,
      };
    });
  }

  async delete(chatId: string, key: string): Promise<boolean> {
    return this.guard("memory_delete", () => {
      const info = this.db
        .prepare<[string, string]>("DELETE FROM memory_entries WHERE chat_id = ? AND memory_key = ?")
        .run(chatId, key);
      return info.changes > 0;
    });
  }

  private guard<T>(operation: string, step: () => T): T {
    try {
      return step();
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        details: { operation },
      });
    }
  }
}

/**
 * Converts a key pattern to a LIKE expression: `*` matches any run of
 * characters, a pattern without `*` matches as a substring.
 */
export function toLikePattern(pattern: string): string {
  const escaped = pattern.replace(/[\\%_]/g, (char) => `\\${char}`);
  return pattern.includes("*") ? escaped.replace(/\*/g, "%") : `%${escaped}%`;
}

function mapEntry(row: MemoryRow): MemoryEntry {
  const tags = parseJsonColumn(row.tags_json);
  return {
    id: row.id,
    chatId: row.chat_id,
    key: row.memory_key,
    value: parseJsonColumn(row.value_json),
    tags: Array.isArray(tags) ? tags.filter((tag): tag is string => typeof tag === "string") : [],
    sourceTool: row.source_tool,
    sourceActionId: row.source_action_id,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
    accessCount: row.access_count,
  };
}
