import type { StructuredLogger } from "../logger.js";
import type { MemoryRepository } from "../persistence/memoryRepository.js";
import type { JsonValue, MemoryEntry, MemorySearchQuery, MemoryStats } from "../persistence/types.js";

/** Payload accepted by {@link ChatMemoryStore.put}. */
export interface MemoryPut {
  key: string;
  value: JsonValue;
  tags: string[];
  sourceTool?: string | null;
  sourceActionId?: string | null;
}

/**
 * Chat-scoped view over the store. Sessions hand it to the template resolver
 * so lookups never leak across chats.
 */
export interface ChatMemory {
  readonly chatId: string;
  put(entry: MemoryPut): Promise<MemoryEntry>;
  get(key: string): Promise<MemoryEntry | undefined>;
  search(query?: MemorySearchQuery): Promise<MemoryEntry[]>;
}

export interface ChatMemoryStoreOptions {
  repository: MemoryRepository;
  logger?: StructuredLogger;
}

/**
 * Durable memory of tool results, one namespace per chat. Entries are
 * replaced as a whole when a key is written again; reads bump the access
 * counters of the returned entries.
 */
export class ChatMemoryStore {
  private readonly repository: MemoryRepository;
  private readonly logger?: StructuredLogger;

  constructor(options: ChatMemoryStoreOptions) {
    this.repository = options.repository;
    this.logger = options.logger;
  }

  async put(chatId: string, entry: MemoryPut): Promise<MemoryEntry> {
    const key = entry.key.trim();
    if (!key) {
      throw new TypeError("memory key must be a non-empty string");
    }
    const stored = await this.repository.put({
      chatId,
      key,
      value: entry.value,
      tags: normaliseTags(entry.tags),
      sourceTool: entry.sourceTool ?? null,
      sourceActionId: entry.sourceActionId ?? null,
    });
    this.logger?.debug("memory_put", { chat_id: chatId, key, tags: stored.tags, source_tool: stored.sourceTool });
    return stored;
  }

  async get(chatId: string, key: string): Promise<MemoryEntry | undefined> {
    const entry = await this.repository.get(chatId, key);
    if (!entry) {
      return undefined;
    }
    const [touched] = await this.repository.touch([entry]);
    return touched;
  }

  /** Matching entries, most recent first. */
  async search(chatId: string, query: MemorySearchQuery = {}): Promise<MemoryEntry[]> {
    const entries = await this.repository.search(chatId, {
      ...query,
      tag: query.tag?.trim().toLowerCase() || undefined,
    });
    return this.repository.touch(entries);
  }

  async stats(chatId: string): Promise<MemoryStats> {
    return this.repository.stats(chatId);
  }

  async delete(chatId: string, key: string): Promise<boolean> {
    const removed = await this.repository.delete(chatId, key);
    if (removed) {
      this.logger?.debug("memory_deleted", { chat_id: chatId, key });
    }
    return removed;
  }

  forChat(chatId: string): ChatMemory {
    return {
      chatId,
      put: (entry) => this.put(chatId, entry),
      get: (key) => this.get(chatId, key),
      search: (query) => this.search(chatId, query),
    };
  }
}

function normaliseTags(tags: string[]): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const normalised = tag.trim().toLowerCase();
    if (normalised) {
      unique.add(normalised);
    }
  }
  return Array.from(unique).sort();
}
