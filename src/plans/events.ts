import type { ErrorKind } from "../errors.js";
import type { ActionStatus, PlanStatus } from "../persistence/types.js";

/** Emitted after an action transition has been persisted. */
export interface ActionStatusEvent {
  type: "status";
  plan_id: string;
  action_id: string;
  status: ActionStatus;
  tool_name: string;
  error?: string;
  error_kind?: ErrorKind;
}

/** Emitted after a plan transition has been persisted. */
export interface PlanStatusEvent {
  type: "plan";
  plan_id: string;
  status: PlanStatus;
  failure_reason?: string;
}

export type PlanEvent = ActionStatusEvent | PlanStatusEvent;
