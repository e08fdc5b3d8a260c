import { describeError, SessionClosedError, ValidationError } from "../errors.js";
import { EventChannel } from "../events/channel.js";
import { runWithCorrelation } from "../infra/correlation.js";
import type { StructuredLogger } from "../logger.js";
import type { ChatTurn, Planner } from "../planner/planner.js";
import type { PlanManager, ToolInvoker } from "../plans/planManager.js";
import type { PrepareReport } from "../tools/router.js";
import { inboundMessageSchema, toResultEvent, type InboundMessage, type OutboundEvent } from "./protocol.js";

export type SessionState = "idle" | "initializing" | "active" | "closed";

/** Router surface a session needs: calls, warm-up and teardown. */
export interface SessionToolRouter extends ToolInvoker {
  prepare(toolNames: readonly string[]): Promise<PrepareReport>;
  close(): Promise<void>;
}

export interface SessionOptions {
  id: string;
  chatId: string;
  planner: Planner;
  plans: PlanManager;
  router: SessionToolRouter;
  logger?: StructuredLogger;
  toolTimeoutMs?: number;
  /** Turns kept in the history handed to the planner. */
  maxHistory?: number;
}

const DEFAULT_MAX_HISTORY = 20;

/**
 * Context of one client connection. Messages are processed one at a time; a
 * message arriving while another runs waits for it. Closing the session stops
 * the running plan after its in-flight action and releases the router.
 */
export class Session {
  readonly id: string;
  private chat: string;
  private current: SessionState = "idle";
  private readonly planner: Planner;
  private readonly plans: PlanManager;
  private readonly router: SessionToolRouter;
  private readonly logger?: StructuredLogger;
  private readonly toolTimeoutMs?: number;
  private readonly maxHistory: number;
  private readonly history: ChatTurn[] = [];
  private readonly abort = new AbortController();
  private queue: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  constructor(options: SessionOptions) {
    this.id = options.id;
    this.chat = options.chatId;
    this.planner = options.planner;
    this.plans = options.plans;
    this.router = options.router;
    this.logger = options.logger;
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
  }

  get state(): SessionState {
    return this.current;
  }

  get chatId(): string {
    return this.chat;
  }

  /**
   * Queues {@link raw} (a JSON string or an already decoded object) and
   * returns the events it produces. The iterable ends after the `result` or
   * `error` frame.
   */
  handleMessage(raw: unknown): AsyncIterable<OutboundEvent> {
    const channel = new EventChannel<OutboundEvent>();
    const run = (): Promise<void> =>
      runWithCorrelation({ session_id: this.id }, () => this.process(raw, channel)).finally(() => channel.close());
    this.queue = this.queue.then(run, run);
    return channel;
  }

  /** Resolves once the in-flight action has finished and the router is closed. */
  close(): Promise<void> {
    if (!this.closing) {
      this.current = "closed";
      this.abort.abort(new SessionClosedError(`session ${this.id} closed`));
      this.closing = this.queue.then(() => this.router.close());
      this.logger?.info("session_closed", { session_id: this.id });
    }
    return this.closing;
  }

  private async process(raw: unknown, channel: EventChannel<OutboundEvent>): Promise<void> {
    if (this.current === "closed") {
      channel.push({ type: "error", message: "session is closed", kind: "session_closed" });
      return;
    }

    let message: InboundMessage;
    try {
      message = parseInbound(raw);
    } catch (error) {
      channel.push(toErrorEvent(error));
      return;
    }

    if (message.chat_id && message.chat_id !== this.chat) {
      this.logger?.info("session_chat_switched", { from: this.chat, to: message.chat_id });
      this.chat = message.chat_id;
      this.history.length = 0;
    }
    const chatId = this.chat;

    await runWithCorrelation({ chat_id: chatId }, async () => {
      let planId: string | undefined;
      try {
        await this.plans.ensureChat(chatId);
        const history = [...this.history];
        this.remember({ role: "user", content: message.message });
        const actions = await this.planner.plan(message.message, history);
        const createdPlanId = await this.plans.createPlan(chatId, message.message, actions);
        planId = createdPlanId;

        this.transition("initializing");
        const report = await this.router.prepare(actions.map((action) => action.tool_name));
        if (report.failed.length > 0 || report.unrouted.length > 0) {
          this.logger?.warn("session_prepare_incomplete", { ...report });
        }

        this.transition("active");
        const result = await runWithCorrelation({ plan_id: createdPlanId }, () =>
          this.plans.executePlan(createdPlanId, {
            router: this.router,
            events: channel,
            signal: this.abort.signal,
            toolTimeoutMs: this.toolTimeoutMs,
          }),
        );
        channel.push(toResultEvent(result));
        this.remember({
          role: "assistant",
          content: result.error ? `plan ${result.plan.id} ${result.status}: ${result.error}` : `plan ${result.plan.id} ${result.status}`,
        });
      } catch (error) {
        this.logger?.error("session_message_failed", { plan_id: planId ?? null, ...describeError(error) });
        channel.push(toErrorEvent(error, planId));
      } finally {
        this.transition("idle");
      }
    });
  }

  private transition(next: SessionState): void {
    if (this.current === "closed") {
      return;
    }
    this.logger?.debug("session_state", { from: this.current, to: next });
    this.current = next;
  }

  private remember(turn: ChatTurn): void {
    this.history.push(turn);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
  }
}

function parseInbound(raw: unknown): InboundMessage {
  let payload: unknown = raw;
  if (typeof raw === "string") {
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError("message frame is not valid JSON", { cause: error });
    }
  }
  const parsed = inboundMessageSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}

function toErrorEvent(error: unknown, planId?: string): OutboundEvent {
  const description = describeError(error);
  return {
    type: "error",
    message: description.message,
    kind: description.category?.toLowerCase() ?? "internal",
    ...(planId ? { plan_id: planId } : {}),
  };
}
