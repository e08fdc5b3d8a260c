import type { PlannedAction } from "../plans/validation.js";

export type { PlannedAction };

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

/** Drafts the actions answering a request. How it decides is out of scope here. */
export interface Planner {
  plan(userQuery: string, history: readonly ChatTurn[]): Promise<PlannedAction[]>;
}
