import { randomUUID } from "node:crypto";

import { ValidationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { Planner } from "../planner/planner.js";
import type { PlanManager } from "../plans/planManager.js";
import { Session, type SessionState, type SessionToolRouter } from "./session.js";

export interface SessionInfo {
  id: string;
  chatId: string;
  state: SessionState;
}

export interface OpenSessionOptions {
  /** Chat to resume; a fresh chat id is generated otherwise. */
  chatId?: string;
}

export interface SessionManagerOptions {
  planner: Planner;
  plans: PlanManager;
  /** Builds the router owned by a new session. */
  createRouter: (sessionId: string) => SessionToolRouter;
  logger?: StructuredLogger;
  toolTimeoutMs?: number;
  generateId?: () => string;
}

/** Tracks one {@link Session} per client connection. */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly options: SessionManagerOptions;
  private readonly generateId: () => string;

  constructor(options: SessionManagerOptions) {
    this.options = options;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  open(connectionId: string, options: OpenSessionOptions = {}): Session {
    if (this.sessions.has(connectionId)) {
      throw new ValidationError(`connection ${connectionId} already has a session`);
    }
    const chatId = options.chatId?.trim() || this.generateId();
    const session = new Session({
      id: connectionId,
      chatId,
      planner: this.options.planner,
      plans: this.options.plans,
      router: this.options.createRouter(connectionId),
      logger: this.options.logger?.child("session"),
      toolTimeoutMs: this.options.toolTimeoutMs,
    });
    this.sessions.set(connectionId, session);
    this.options.logger?.info("session_opened", { session_id: connectionId, chat_id: chatId });
    return session;
  }

  get(connectionId: string): Session | undefined {
    return this.sessions.get(connectionId);
  }

  /** Closes and forgets the session; resolves `false` when none was open. */
  async close(connectionId: string): Promise<boolean> {
    const session = this.sessions.get(connectionId);
    if (!session) {
      return false;
    }
    this.sessions.delete(connectionId);
    await session.close();
    return true;
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values(), (session) => ({
      id: session.id,
      chatId: session.chatId,
      state: session.state,
    }));
  }

  async closeAll(): Promise<void> {
    const ids = Array.from(this.sessions.keys());
    await Promise.all(ids.map((id) => this.close(id)));
  }
}
