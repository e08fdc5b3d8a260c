import type { SqliteDatabase } from "./database.js";
import { ERROR_KINDS, NotFoundError, PersistenceError, ValidationError, type ErrorKind } from "../errors.js";
import { parseJsonObjectColumn, parseNullableJsonColumn } from "./json.js";
import {
  ACTION_STATUSES,
  PLAN_STATUSES,
  type ActionPatch,
  type ActionRecord,
  type ActionStatus,
  type ChatRecord,
  type JsonObject,
  type NewPlanRecord,
  type PlanRecord,
  type PlanStatus,
} from "./types.js";

/**
 * Durable storage of chats, plans and actions. Every method resolves once the
 * write is committed, so callers may treat a resolved promise as "persisted".
 */
export interface PlanRepository {
  ensureChat(chatId: string): Promise<ChatRecord>;
  /** Inserts the plan (`new`) and all of its actions (`pending`) atomically. */
  createPlan(plan: NewPlanRecord): Promise<PlanRecord>;
  getPlan(planId: string): Promise<PlanRecord | undefined>;
  listPlans(chatId: string): Promise<PlanRecord[]>;
  /** Actions of a plan ordered by `order_index`. */
  listActions(planId: string): Promise<ActionRecord[]>;
  updateAction(actionId: string, patch: ActionPatch): Promise<ActionRecord>;
  updatePlanStatus(planId: string, status: PlanStatus, failureReason?: string | null): Promise<PlanRecord>;
  /**
   * Moves a `new` plan to `in_progress` in one conditional write. Resolves
   * `undefined` when the plan was not `new`, so exactly one caller wins.
   */
  claimPlan(planId: string): Promise<PlanRecord | undefined>;
}

const PLAN_RANK: Record<PlanStatus, number> = { new: 0, in_progress: 1, completed: 2, failed: 2 };
const ACTION_RANK: Record<ActionStatus, number> = {
  pending: 0,
  starting: 1,
  in_progress: 2,
  completed: 3,
  failed: 3,
};

const TERMINAL_ACTION_STATUSES = new Set<ActionStatus>(["completed", "failed"]);

/** Plan statuses only move forward: `new → in_progress → completed|failed`. */
export function isPlanTransitionAllowed(from: PlanStatus, to: PlanStatus): boolean {
  return PLAN_RANK[to] > PLAN_RANK[from];
}

/**
 * Action statuses never move backwards and terminal rows are frozen. Staying
 * on the same non-terminal status is allowed so a step can patch fields such
 * as `resolved_arguments` without a transition.
 */
export function isActionTransitionAllowed(from: ActionStatus, to: ActionStatus): boolean {
  if (TERMINAL_ACTION_STATUSES.has(from)) {
    return false;
  }
  return ACTION_RANK[to] >= ACTION_RANK[from];
}

interface ChatRow {
  id: string;
  created_at: string;
}

interface PlanRow {
  id: string;
  chat_id: string;
  user_query: string;
  status: string;
  failure_reason: string | null;
  created_at: string;
  updated_at: string;
}

interface ActionRow {
  id: string;
  plan_id: string;
  planned_id: string | null;
  order_index: number;
  tool_name: string;
  arguments_json: string;
  resolved_arguments_json: string | null;
  status: string;
  result_json: string | null;
  error: string | null;
  error_kind: string | null;
  result_variable_name: string | null;
  attempts: number;
  started_at: string | null;
  completed_at: string | null;
}

export interface SqlitePlanRepositoryOptions {
  database: SqliteDatabase;
  /** Clock used for `created_at`/`updated_at`; injectable for tests. */
  now?: () => Date;
}

export class SqlitePlanRepository implements PlanRepository {
  private readonly db: SqliteDatabase;
  private readonly now: () => Date;

  constructor(options: SqlitePlanRepositoryOptions) {
    this.db = options.database;
    this.now = options.now ?? (() => new Date());
  }

  async ensureChat(chatId: string): Promise<ChatRecord> {
    return this.guard("ensure_chat", () => {
      this.db
        .prepare<[string, string]>("INSERT INTO chats (id, created_at) VALUES (?, ?) ON CONFLICT(id) DO NOTHING")
        .run(chatId, this.timestamp());
      const row = this.db.prepare<[string], ChatRow>("SELECT * FROM chats WHERE id = ?").get(chatId);
      if (!row) {
        throw new PersistenceError(`chat ${chatId} missing after insert`);
      }
      return { id: row.id, createdAt: row.created_at };
    });
  }

  async createPlan(plan: NewPlanRecord): Promise<PlanRecord> {
    return this.guard("create_plan", () => {
      const insertPlan = this.db.prepare<[string, string, string, string, string, string]>(`
        INSERT INTO plans (id, chat_id, user_query, status, failure_reason, created_at, updated_at)
        VALUES (?, ?, ?, ?, NULL, ?, ?)
      `);
      const insertAction = this.db.prepare<[string, string, string | null, number, string, string, string | null]>(`
        INSERT INTO actions (
          id, plan_id, planned_id, order_index, tool_name, arguments_json, status, result_variable_name, attempts
        ) VALUES (?, ?, ?, ?, ?, ?, 'pending', ?, 0)
      `);
      const insertAll = this.db.transaction((record: NewPlanRecord, createdAt: string) => {
        insertPlan.run(record.id, record.chatId, record.userQuery, "new", createdAt, createdAt);
        record.actions.forEach((action, index) => {
          insertAction.run(
            action.id,
            record.id,
            action.plannedId,
            index,
            action.toolName,
            JSON.stringify(action.arguments),
            action.resultVariableName,
          );
        });
      });
      insertAll(plan, this.timestamp());
      return this.requirePlan(plan.id);
    });
  }

  async getPlan(planId: string): Promise<PlanRecord | undefined> {
    return this.guard("get_plan", () => this.readPlan(planId));
  }

  async listPlans(chatId: string): Promise<PlanRecord[]> {
    return this.guard("list_plans", () => {
      const rows = this.db
        .prepare<[string], PlanRow>("SELECT * FROM plans WHERE chat_id = ? ORDER BY created_at ASC, rowid ASC")
        .all(chatId);
      return rows.map((row) => this.mapPlan(row));
    });
  }

  async listActions(planId: string): Promise<ActionRecord[]> {
    return this.guard("list_actions", () => this.readActions(planId));
  }

  async updateAction(actionId: string, patch: ActionPatch): Promise<ActionRecord> {
    return this.guard("update_action", () => {
      const current = this.readAction(actionId);
      if (!current) {
        throw new NotFoundError(`action ${actionId} not found`);
      }
      if (patch.status !== undefined && !isActionTransitionAllowed(current.status, patch.status)) {
        throw new ValidationError(`action ${actionId} cannot move from ${current.status} to ${patch.status}`, {
          details: { from: current.status, to: patch.status },
        });
      }

      const assignments: string[] = [];
      const params: Array<string | number | null> = [];
      const assign = (column: string, value: string | number | null): void => {
        assignments.push(`${column} = ?`);
        params.push(value);
      };
      if (patch.status !== undefined) assign("status", patch.status);
      if (patch.resolvedArguments !== undefined) assign("resolved_arguments_json", JSON.stringify(patch.resolvedArguments));
      if (patch.result !== undefined) assign("result_json", JSON.stringify(patch.result));
      if (patch.error !== undefined) assign("error", patch.error);
      if (patch.errorKind !== undefined) assign("error_kind", patch.errorKind);
      if (patch.attempts !== undefined) assign("attempts", patch.attempts);
      if (patch.startedAt !== undefined) assign("started_at", patch.startedAt);
      if (patch.completedAt !== undefined) assign("completed_at", patch.completedAt);

      if (assignments.length > 0) {
        this.db.prepare(`UPDATE actions SET ${assignments.join(", ")} WHERE id = ?`).run(...params, actionId);
        this.db
          .prepare<[string, string]>("UPDATE plans SET updated_at = ? WHERE id = ?")
          .run(this.timestamp(), current.planId);
      }
      const updated = this.readAction(actionId);
      if (!updated) {
        throw new NotFoundError(`action ${actionId} not found`);
      }
      return updated;
    });
  }

  async updatePlanStatus(planId: string, status: PlanStatus, failureReason: string | null = null): Promise<PlanRecord> {
    return this.guard("update_plan_status", () => {
      const current = this.readPlan(planId);
      if (!current) {
        throw new NotFoundError(`plan ${planId} not found`);
      }
      if (!isPlanTransitionAllowed(current.status, status)) {
        throw new ValidationError(`plan ${planId} cannot move from ${current.status} to ${status}`, {
          details: { from: current.status, to: status },
        });
      }
      this.db
        .prepare<[string, string | null, string, string]>(
          "UPDATE plans SET status = ?, failure_reason = ?, updated_at = ? WHERE id = ?",
        )
        .run(status, failureReason, this.timestamp(), planId);
      return this.requirePlan(planId);
    });
  }

  async claimPlan(planId: string): Promise<PlanRecord | undefined> {
    return this.guard("claim_plan", () => {
      const claimed = this.db
        .prepare<[string, string]>("UPDATE plans SET status = 'in_progress', updated_at = ? WHERE id = ? AND status = 'new'")
        .run(this.timestamp(), planId);
      return claimed.changes === 1 ? this.requirePlan(planId) : undefined;
    });
  }

  private readPlan(planId: string): PlanRecord | undefined {
    const row = this.db.prepare<[string], PlanRow>("SELECT * FROM plans WHERE id = ?").get(planId);
    return row ? this.mapPlan(row) : undefined;
  }

  private requirePlan(planId: string): PlanRecord {
    const plan = this.readPlan(planId);
    if (!plan) {
      throw new NotFoundError(`plan ${planId} not found`);
    }
    return plan;
  }

  private readActions(planId: string): ActionRecord[] {
    return this.db
      .prepare<[string], ActionRow>("SELECT * FROM actions WHERE plan_id = ? ORDER BY order_index ASC")
      .all(planId)
      .map(mapAction);
  }

  private readAction(actionId: string): ActionRecord | undefined {
    const row = this.db.prepare<[string], ActionRow>("SELECT * FROM actions WHERE id = ?").get(actionId);
    return row ? mapAction(row) : undefined;
  }

  private mapPlan(row: PlanRow): PlanRecord {
    const actionIds = this.db
      .prepare<[string], { id: string }>("SELECT id FROM actions WHERE plan_id = ? ORDER BY order_index ASC")
      .all(row.id)
      .map((action) => action.id);
    return {
      id: row.id,
      chatId: row.chat_id,
      userQuery: row.user_query,
      status: narrowStatus(PLAN_STATUSES, row.status, "plan"),
      failureReason: row.failure_reason,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      actionIds,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Runs a synchronous database step. Engine errors pass through untouched;
   * driver errors (constraint violations, I/O) become {@link PersistenceError}.
   */
  private guard<T>(operation: string, step: () => T): T {
    try {
      return step();
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof ValidationError || error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        details: { operation },
      });
    }
  }
}

function mapAction(row: ActionRow): ActionRecord {
  const resolved: JsonObject | null =
    row.resolved_arguments_json === null ? null : parseJsonObjectColumn(row.resolved_arguments_json);
  return {
    id: row.id,
    planId: row.plan_id,
    plannedId: row.planned_id,
    orderIndex: row.order_index,
    toolName: row.tool_name,
    arguments: parseJsonObjectColumn(row.arguments_json),
    resolvedArguments: resolved,
    status: narrowStatus(ACTION_STATUSES, row.status, "action"),
    result: parseNullableJsonColumn(row.result_json),
    error: row.error,
    errorKind: narrowErrorKind(row.error_kind),
    resultVariableName: row.result_variable_name,
    attempts: row.attempts,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

function narrowStatus<T extends string>(allowed: readonly T[], raw: string, entity: string): T {
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new PersistenceError(`unknown ${entity} status "${raw}" in database`);
  }
  return match;
}

function narrowErrorKind(raw: string | null): ErrorKind | null {
  if (raw === null) {
    return null;
  }
  return ERROR_KINDS.find((kind) => kind === raw) ?? null;
}
