import { z } from "zod";

import type { ErrorKind } from "../errors.js";
import type { ActionStatusEvent, PlanStatusEvent } from "../plans/events.js";
import type { PlanExecutionResult } from "../plans/planManager.js";
import type { ActionStatus, JsonValue, PlanStatus } from "../persistence/types.js";

/** Frame sent by a client. */
export const inboundMessageSchema = z.object({
  message: z.string().trim().min(1, "message must be a non-empty string"),
  chat_id: z.string().trim().min(1).optional(),
});

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export interface ActionSummary {
  id: string;
  /** Id drafted by the planner, when it gave one. */
  planned_id: string | null;
  order_index: number;
  tool_name: string;
  status: ActionStatus;
  result: JsonValue | null;
  error: string | null;
  error_kind: ErrorKind | null;
}

/** Final frame of every processed message. */
export interface ResultEvent {
  type: "result";
  plan_id: string;
  plan_status: PlanStatus;
  failure_reason: string | null;
  actions: ActionSummary[];
  error: string | null;
}

/** Sent when a message is rejected before or outside plan execution. */
export interface ErrorEvent {
  type: "error";
  message: string;
  kind: string;
  plan_id?: string;
}

export type OutboundEvent = ActionStatusEvent | PlanStatusEvent | ResultEvent | ErrorEvent;

export function toResultEvent(result: PlanExecutionResult): ResultEvent {
  return {
    type: "result",
    plan_id: result.plan.id,
    plan_status: result.status,
    failure_reason: result.plan.failureReason,
    actions: result.actions.map((action) => ({
      id: action.id,
      planned_id: action.plannedId,
      order_index: action.orderIndex,
      tool_name: action.toolName,
      status: action.status,
      result: action.result,
      error: action.error,
      error_kind: action.errorKind,
    })),
    error: result.error,
  };
}
