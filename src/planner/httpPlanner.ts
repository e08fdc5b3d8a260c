import { z } from "zod";

import { PlannerError, ValidationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { parsePlannedActions } from "../plans/validation.js";
import { runtimeClearTimeout, runtimeSetTimeout, sleep } from "../runtime/timers.js";
import type { ChatTurn, PlannedAction, Planner } from "./planner.js";

const plannerResponseSchema = z
  .object({
    actions: z.array(z.unknown()).optional(),
    plan: z.object({ actions: z.array(z.unknown()) }).passthrough().optional(),
  })
  .passthrough()
  .transform((payload) => payload.actions ?? payload.plan?.actions ?? null);

function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

export interface HttpPlannerOptions {
  url: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Sent as a bearer token when set. */
  apiKey?: string | null;
  fetchImpl?: typeof fetch;
  logger?: StructuredLogger;
}

/**
 * Asks a remote planning service for actions. The service receives
 * `{ user_query, chat_history }` and answers `{ actions: [...] }` (or the same
 * list under `plan.actions`).
 */
export class HttpPlanner implements Planner {
  private readonly url: URL;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly apiKey: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: StructuredLogger;

  constructor(options: HttpPlannerOptions) {
    this.url = new URL(options.url);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 1);
    this.apiKey = options.apiKey ?? null;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  async plan(userQuery: string, history: readonly ChatTurn[]): Promise<PlannedAction[]> {
    const headers = new Headers({ "Content-Type": "application/json", Accept: "application/json" });
    if (this.apiKey) {
      headers.set("Authorization", `Bearer ${this.apiKey}`);
    }
    const body = JSON.stringify({ user_query: userQuery, chat_history: history });

    const maxAttempts = this.maxRetries + 1;
    for (let attempt = 1; ; attempt += 1) {
      try {
        const payload = await this.request(headers, body);
        const actions = plannerResponseSchema.parse(payload);
        if (actions === null) {
          throw new PlannerError("planner response carries no actions");
        }
        const planned = parsePlannedActions(actions);
        this.logger?.info("planner_replied", { actions: planned.length, attempt });
        return planned;
      } catch (error) {
        const retriable = error instanceof PlannerError && isRetriableStatus(readStatus(error));
        if (!retriable || attempt >= maxAttempts) {
          throw toPlannerError(error);
        }
        this.logger?.warn("planner_retry", { attempt, message: error instanceof Error ? error.message : String(error) });
        await sleep(150 * attempt);
      }
    }
  }

  private async request(headers: Headers, body: string): Promise<unknown> {
    const controller = new AbortController();
    const timer = runtimeSetTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(this.url, { method: "POST", headers, body, signal: controller.signal });
      if (!response.ok) {
        throw new PlannerError(`planner responded with HTTP ${response.status}`, { details: { status: response.status } });
      }
      return await response.json();
    } catch (error) {
      if (error instanceof PlannerError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new PlannerError(`planner did not answer within ${this.timeoutMs}ms`, { cause: error });
      }
      throw new PlannerError("planner request failed", { cause: error });
    } finally {
      runtimeClearTimeout(timer);
    }
  }
}

function readStatus(error: PlannerError): number {
  const status = error.details?.status;
  return typeof status === "number" ? status : 0;
}

function toPlannerError(error: unknown): PlannerError | ValidationError {
  if (error instanceof PlannerError || error instanceof ValidationError) {
    return error;
  }
  if (error instanceof z.ZodError) {
    return new PlannerError("planner response has an unexpected shape", { cause: error });
  }
  return new PlannerError(error instanceof Error ? error.message : String(error), { cause: error });
}
