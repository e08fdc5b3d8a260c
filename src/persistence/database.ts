import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";

export type { SqliteDatabase };

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chats (
    id TEXT PRIMARY KEY,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS plans (
    id TEXT PRIMARY KEY,
    chat_id TEXT NOT NULL REFERENCES chats(id) ON DELETE CASCADE,
    user_query TEXT NOT NULL,
    status TEXT NOT NULL,
    failure_reason TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_plans_chat_created ON plans(chat_id, created_at);

  CREATE TABLE IF NOT EXISTS actions (
    id TEXT PRIMARY KEY,
    plan_id TEXT NOT NULL REFERENCES plans(id) ON DELETE CASCADE,
    planned_id TEXT,
    order_index INTEGER NOT NULL,
    tool_name TEXT NOT NULL,
    arguments_json TEXT NOT NULL,
    resolved_arguments_json TEXT,
    status TEXT NOT NULL,
    result_json TEXT,
    error TEXT,
    error_kind TEXT,
    result_variable_name TEXT,
    attempts INTEGER NOT NULL DEFAULT 0,
    started_at TEXT,
    completed_at TEXT,
    UNIQUE(plan_id, order_index),
    UNIQUE(plan_id, planned_id)
  );

  CREATE TABLE IF NOT EXISTS memory_entries (
    id TEXT NOT NULL UNIQUE,
    chat_id TEXT NOT NULL REFERENCES chats(id) ON DELETE CASCADE,
    memory_key TEXT NOT NULL,
    value_json TEXT NOT NULL,
    tags_json TEXT NOT NULL,
    source_tool TEXT,
    source_action_id TEXT,
    size_bytes INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    last_accessed_at TEXT NOT NULL,
    access_count INTEGER NOT NULL DEFAULT 0,
    UNIQUE(chat_id, memory_key)
  );

  CREATE INDEX IF NOT EXISTS idx_memory_chat_tool ON memory_entries(chat_id, source_tool);
`;

export interface OpenDatabaseOptions {
  /** File path; omitted or `:memory:` opens a private in-memory database. */
  path?: string;
}

/** Opens the SQLite database and applies the schema. */
export function openDatabase(options: OpenDatabaseOptions = {}): SqliteDatabase {
  const path = options.path ?? ":memory:";
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}
