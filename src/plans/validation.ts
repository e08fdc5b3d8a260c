import { z } from "zod";

import { ValidationError } from "../errors.js";
import type { JsonValue } from "../persistence/types.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** Action as drafted by a planner. */
export const plannedActionSchema = z.object({
  id: z.string().trim().min(1).max(128).optional(),
  tool_name: z.string().trim().min(1),
  arguments: z.record(jsonValueSchema).default({}),
  result_variable_name: z.string().trim().min(1).nullish(),
});

export type PlannedAction = z.infer<typeof plannedActionSchema>;

export const plannedActionsSchema = z
  .array(plannedActionSchema)
  .min(1, "a plan needs at least one action")
  .superRefine((actions, ctx) => {
    const seen = new Set<string>();
    actions.forEach((action, index) => {
      if (!action.id) {
        return;
      }
      if (seen.has(action.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "id"], message: `duplicate action id "${action.id}"` });
      }
      seen.add(action.id);
    });
  });

/** Parses planner output into actions or throws a {@link ValidationError}. */
export function parsePlannedActions(raw: unknown): PlannedAction[] {
  const parsed = plannedActionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("invalid plan", {
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`) },
    });
  }
  return parsed.data;
}
