import type { ErrorKind } from "../errors.js";

/** JSON-compatible value stored in the `*_json` columns. */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const PLAN_STATUSES = ["new", "in_progress", "completed", "failed"] as const;
export type PlanStatus = (typeof PLAN_STATUSES)[number];

export const ACTION_STATUSES = ["pending", "starting", "in_progress", "completed", "failed"] as const;
export type ActionStatus = (typeof ACTION_STATUSES)[number];

/** Reasons recorded on a failed plan. */
export type PlanFailureReason =
  | "action_failed"
  | "template_resolution_failed"
  | "connection_closed"
  | "persistence_failed"
  | "execution_error";

export interface ChatRecord {
  id: string;
  createdAt: string;
}

export interface PlanRecord {
  id: string;
  chatId: string;
  userQuery: string;
  status: PlanStatus;
  failureReason: string | null;
  createdAt: string;
  updatedAt: string;
  /** Action ids in execution order. */
  actionIds: string[];
}

export interface ActionRecord {
  id: string;
  planId: string;
  /** Id the planner gave the action; unique within its plan only. */
  plannedId: string | null;
  orderIndex: number;
  toolName: string;
  /** Arguments as drafted by the planner, placeholders included. */
  arguments: JsonObject;
  resolvedArguments: JsonObject | null;
  status: ActionStatus;
  result: JsonValue | null;
  error: string | null;
  errorKind: ErrorKind | null;
  resultVariableName: string | null;
  attempts: number;
  startedAt: string | null;
  completedAt: string | null;
}

export interface NewActionRecord {
  id: string;
  plannedId: string | null;
  toolName: string;
  arguments: JsonObject;
  resultVariableName: string | null;
}

export interface NewPlanRecord {
  id: string;
  chatId: string;
  userQuery: string;
  actions: NewActionRecord[];
}

/** Fields an execution step may change on an action row. */
export interface ActionPatch {
  status?: ActionStatus;
  resolvedArguments?: JsonObject;
  result?: JsonValue;
  error?: string;
  errorKind?: ErrorKind;
  attempts?: number;
  startedAt?: string;
  completedAt?: string;
}

export interface MemoryEntry {
  id: string;
  chatId: string;
  key: string;
  value: JsonValue;
  /** Sorted, unique. */
  tags: string[];
  sourceTool: string | null;
  sourceActionId: string | null;
  createdAt: string;
  lastAccessedAt: string;
  accessCount: number;
}

export interface NewMemoryEntry {
  chatId: string;
  key: string;
  value: JsonValue;
  tags: string[];
  sourceTool: string | null;
  sourceActionId: string | null;
}

export interface MemorySearchQuery {
  tool?: string;
  tag?: string;
  /** Substring, or a glob when it contains `*`. */
  keyPattern?: string;
  limit?: number;
}

export interface MemoryStats {
  entryCount: number;
  totalBytes: number;
  uniqueTools: number;
  totalAccesses: number;
}
