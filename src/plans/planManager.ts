import { randomUUID } from "node:crypto";

import {
  EngineError,
  NotFoundError,
  PersistenceError,
  TemplateResolutionError,
  ValidationError,
  describeError,
} from "../errors.js";
import type { EventSink } from "../events/channel.js";
import { runWithCorrelation } from "../infra/correlation.js";
import type { StructuredLogger } from "../logger.js";
import type { ChatMemory, ChatMemoryStore } from "../memory/store.js";
import { generateTags } from "../memory/tags.js";
import type { PlanRepository } from "../persistence/planRepository.js";
import type { ActionRecord, ChatRecord, JsonObject, PlanFailureReason, PlanRecord, PlanStatus } from "../persistence/types.js";
import { resolveArguments } from "../templates/resolver.js";
import type { InvokeOptions, ToolResultEnvelope } from "../tools/router.js";
import type { PlanEvent } from "./events.js";
import { parsePlannedActions } from "./validation.js";

/** Anything able to run a tool call; the session's router in production. */
export interface ToolInvoker {
  invoke(tool: string, args: JsonObject, options?: InvokeOptions): Promise<ToolResultEnvelope>;
}

export interface ExecutePlanOptions {
  router: ToolInvoker;
  events?: EventSink<PlanEvent>;
  /** Aborted when the client goes away: no further action starts. */
  signal?: AbortSignal;
  toolTimeoutMs?: number;
}

export interface PlanSnapshot {
  plan: PlanRecord;
  actions: ActionRecord[];
}

export interface PlanExecutionResult extends PlanSnapshot {
  status: PlanStatus;
  /** Human readable reason naming the failed action, `null` on success. */
  error: string | null;
}

export interface PlanManagerOptions {
  plans: PlanRepository;
  memory: ChatMemoryStore;
  logger?: StructuredLogger;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Owns the plan and action lifecycle. A plan is written with all of its
 * actions before anything runs, and every transition is persisted before the
 * matching event is emitted or the next step starts.
 */
export class PlanManager {
  private readonly plans: PlanRepository;
  private readonly memory: ChatMemoryStore;
  private readonly logger?: StructuredLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: PlanManagerOptions) {
    this.plans = options.plans;
    this.memory = options.memory;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async ensureChat(chatId: string): Promise<ChatRecord> {
    return this.persist("ensure_chat", () => this.plans.ensureChat(chatId));
  }

  /**
   * Validates {@link actions} and stores the plan with every action `pending`
   * in a single transaction. Rows always get fresh ids; an id drafted by the
   * planner is kept as `plannedId`, scoped to this plan, so its placeholders
   * still resolve while other plans reuse the same names.
   */
  async createPlan(chatId: string, userQuery: string, actions: unknown): Promise<string> {
    const planned = parsePlannedActions(actions);
    if (!chatId.trim()) {
      throw new ValidationError("chat id must be a non-empty string");
    }
    const planId = this.generateId();
    await this.ensureChat(chatId);
    await this.persist("create_plan", () =>
      this.plans.createPlan({
        id: planId,
        chatId,
        userQuery,
        actions: planned.map((action) => ({
          id: this.generateId(),
          plannedId: action.id ?? null,
          toolName: action.tool_name,
          arguments: action.arguments,
          resultVariableName: action.result_variable_name ?? null,
        })),
      }),
    );
    this.logger?.info("plan_created", { plan_id: planId, chat_id: chatId, actions: planned.length });
    return planId;
  }

  async getPlanSnapshot(planId: string): Promise<PlanSnapshot> {
    const plan = await this.persist("get_plan", () => this.plans.getPlan(planId));
    if (!plan) {
      throw new NotFoundError(`plan ${planId} not found`);
    }
    const actions = await this.persist("list_actions", () => this.plans.listActions(planId));
    return { plan, actions };
  }

  async listPlans(chatId: string): Promise<PlanRecord[]> {
    return this.persist("list_plans", () => this.plans.listPlans(chatId));
  }

  /**
   * Runs the actions of a `new` plan in order. Action failures end the plan
   * as `failed` and are reported in the result. Any other error is thrown
   * once the plan and its unfinished actions are marked `failed`; a plan
   * another caller already started is rejected untouched.
   */
  async executePlan(planId: string, options: ExecutePlanOptions): Promise<PlanExecutionResult> {
    const claimed = await this.persist("plan_start", () => this.plans.claimPlan(planId));
    if (!claimed) {
      const { plan } = await this.getPlanSnapshot(planId);
      throw new ValidationError(`plan ${planId} is ${plan.status} and cannot be executed again`);
    }
    return runWithCorrelation({ chat_id: claimed.chatId, plan_id: claimed.id }, async () => {
      try {
        return await this.run(claimed, options);
      } catch (error) {
        const persistence = error instanceof PersistenceError;
        this.logger?.error(persistence ? "plan_persistence_failed" : "plan_execution_failed", describeError(error));
        await this.markFailedAfterError(claimed.id, persistence ? "persistence_failed" : "execution_error", error);
        throw error;
      }
    });
  }

  private async run(plan: PlanRecord, options: ExecutePlanOptions): Promise<PlanExecutionResult> {
    const emit = (event: PlanEvent): void => options.events?.push(event);

    emit({ type: "plan", plan_id: plan.id, status: "in_progress" });
    this.logger?.info("plan_started", { plan_id: plan.id });

    const actions = await this.persist("list_actions", () => this.plans.listActions(plan.id));
    const memory = this.memory.forChat(plan.chatId);
    const completed: ActionRecord[] = [];

    for (const action of actions) {
      if (options.signal?.aborted) {
        const remaining = actions.length - completed.length;
        this.logger?.warn("plan_aborted", { plan_id: plan.id, remaining_actions: remaining });
        return this.finish(plan.id, "failed", "connection_closed", `connection closed before action ${label(action)} started`, emit);
      }

      const outcome = await runWithCorrelation({ action_id: action.id }, () =>
        this.runAction(plan, action, completed, memory, options, emit),
      );
      if (!outcome.ok) {
        return this.finish(plan.id, "failed", outcome.reason, outcome.message, emit);
      }
      completed.push(outcome.action);
    }

    return this.finish(plan.id, "completed", null, null, emit);
  }

  private async runAction(
    plan: PlanRecord,
    action: ActionRecord,
    completed: readonly ActionRecord[],
    memory: ChatMemory,
    options: ExecutePlanOptions,
    emit: (event: PlanEvent) => void,
  ): Promise<{ ok: true; action: ActionRecord } | { ok: false; reason: PlanFailureReason; message: string }> {
    await this.persist("action_starting", () =>
      this.plans.updateAction(action.id, { status: "starting", startedAt: this.timestamp() }),
    );
    emit({ type: "status", plan_id: plan.id, action_id: action.id, status: "starting", tool_name: action.toolName });

    let resolved: JsonObject;
    try {
      resolved = await resolveArguments(action.arguments, {
        completedActions: completed,
        memory,
        chatId: plan.chatId,
      });
    } catch (error) {
      if (!(error instanceof TemplateResolutionError)) {
        throw error instanceof EngineError ? error : new PersistenceError("template lookup failed", { cause: error });
      }
      await this.persist("action_failed", () =>
        this.plans.updateAction(action.id, {
          status: "failed",
          error: error.message,
          errorKind: "template_resolution",
          completedAt: this.timestamp(),
        }),
      );
      this.logger?.warn("action_failed", { action_id: action.id, kind: "template_resolution", message: error.message });
      emit({
        type: "status",
        plan_id: plan.id,
        action_id: action.id,
        status: "failed",
        tool_name: action.toolName,
        error: error.message,
        error_kind: "template_resolution",
      });
      return {
        ok: false,
        reason: "template_resolution_failed",
        message: `action ${label(action)} (${action.toolName}) failed: ${error.message}`,
      };
    }

    await this.persist("action_in_progress", () =>
      this.plans.updateAction(action.id, { status: "in_progress", resolvedArguments: resolved }),
    );
    emit({ type: "status", plan_id: plan.id, action_id: action.id, status: "in_progress", tool_name: action.toolName });

    const envelope = await options.router.invoke(action.toolName, resolved, { timeoutMs: options.toolTimeoutMs });

    if (!envelope.ok) {
      const { kind, message } = envelope.error;
      await this.persist("action_failed", () =>
        this.plans.updateAction(action.id, {
          status: "failed",
          error: message,
          errorKind: kind,
          attempts: envelope.attempts,
          completedAt: this.timestamp(),
        }),
      );
      this.logger?.warn("action_failed", { action_id: action.id, tool: action.toolName, kind, message });
      emit({
        type: "status",
        plan_id: plan.id,
        action_id: action.id,
        status: "failed",
        tool_name: action.toolName,
        error: message,
        error_kind: kind,
      });
      return {
        ok: false,
        reason: "action_failed",
        message: `action ${label(action)} (${action.toolName}) failed: ${kind}: ${message}`,
      };
    }

    const updated = await this.persist("action_completed", () =>
      this.plans.updateAction(action.id, {
        status: "completed",
        result: envelope.value,
        attempts: envelope.attempts,
        completedAt: this.timestamp(),
      }),
    );
    await this.persist("memory_put", () =>
      memory.put({
        key: action.resultVariableName ?? `tool_result_${action.id}`,
        value: envelope.value,
        tags: generateTags(action.toolName, resolved, envelope.value),
        sourceTool: action.toolName,
        sourceActionId: action.id,
      }),
    );
    this.logger?.info("action_completed", { action_id: action.id, tool: action.toolName, attempts: envelope.attempts });
    emit({ type: "status", plan_id: plan.id, action_id: action.id, status: "completed", tool_name: action.toolName });
    return { ok: true, action: updated };
  }

  private async finish(
    planId: string,
    status: "completed" | "failed",
    reason: PlanFailureReason | null,
    error: string | null,
    emit: (event: PlanEvent) => void,
  ): Promise<PlanExecutionResult> {
    const plan = await this.persist("plan_finish", () => this.plans.updatePlanStatus(planId, status, reason));
    emit(reason ? { type: "plan", plan_id: planId, status, failure_reason: reason } : { type: "plan", plan_id: planId, status });
    if (status === "completed") {
      this.logger?.info("plan_completed", { plan_id: planId });
    } else {
      this.logger?.warn("plan_failed", { plan_id: planId, reason, error });
    }
    const actions = await this.persist("list_actions", () => this.plans.listActions(planId));
    return { plan, actions, status, error };
  }

  /**
   * Closes a plan interrupted by a thrown error: unfinished actions and the
   * plan itself end `failed`. Best effort, the store that just failed may
   * refuse these writes too.
   */
  private async markFailedAfterError(planId: string, reason: PlanFailureReason, cause: unknown): Promise<void> {
    const message = cause instanceof Error ? cause.message : String(cause);
    try {
      for (const action of await this.plans.listActions(planId)) {
        if (action.status === "starting" || action.status === "in_progress") {
          await this.plans.updateAction(action.id, { status: "failed", error: message, completedAt: this.timestamp() });
        }
      }
      const current = await this.plans.getPlan(planId);
      if (current && (current.status === "new" || current.status === "in_progress")) {
        await this.plans.updatePlanStatus(planId, "failed", reason);
      }
    } catch (error) {
      this.logger?.error("plan_mark_failed_error", describeError(error));
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Awaits a repository call; unknown failures become {@link PersistenceError}. */
  private async persist<T>(operation: string, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      if (error instanceof PersistenceError || error instanceof NotFoundError) {
        throw error;
      }
      if (error instanceof ValidationError) {
        throw new PersistenceError(`${operation} rejected: ${error.message}`, { cause: error, details: error.details });
      }
      throw new PersistenceError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        details: { operation },
      });
    }
  }
}

/** Name used for an action in messages: the planner's id when it drafted one. */
function label(action: ActionRecord): string {
  return action.plannedId ?? action.id;
}
