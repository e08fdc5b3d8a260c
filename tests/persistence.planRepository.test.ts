import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { NotFoundError, PersistenceError, ValidationError } from "../src/errors.js";
import { openDatabase, type SqliteDatabase } from "../src/persistence/database.js";
import {
  isActionTransitionAllowed,
  isPlanTransitionAllowed,
  SqlitePlanRepository,
} from "../src/persistence/planRepository.js";
import type { NewPlanRecord } from "../src/persistence/types.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

function samplePlan(overrides: Partial<NewPlanRecord> = {}): NewPlanRecord {
  return {
    id: "plan-1",
    chatId: "chat-1",
    userQuery: "send the report",
    actions: [
      { id: "a1", plannedId: "A", toolName: "generate_pdf", arguments: { title: "Report" }, resultVariableName: "report" },
      { id: "a2", plannedId: null, toolName: "send_email", arguments: { attachment: "{{report.url}}" }, resultVariableName: null },
    ],
    ...overrides,
  };
}

async function capture(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return null;
}

describe("plan repository", () => {
  let database: SqliteDatabase;
  let repository: SqlitePlanRepository;

  beforeEach(async () => {
    database = openDatabase();
    repository = new SqlitePlanRepository({ database, now: () => NOW });
    await repository.ensureChat("chat-1");
  });

  afterEach(() => {
    database.close();
  });

  it("creates the plan and its pending actions in order", async () => {
    const plan = await repository.createPlan(samplePlan());

    expect(plan).to.deep.equal({
      id: "plan-1",
      chatId: "chat-1",
      userQuery: "send the report",
      status: "new",
      failureReason: null,
      createdAt: NOW.toISOString(),
      updatedAt: NOW.toISOString(),
      actionIds: ["a1", "a2"],
    });

    const actions = await repository.listActions("plan-1");
    expect(
      actions.map((action) => [action.id, action.plannedId, action.orderIndex, action.status, action.attempts]),
    ).to.deep.equal([
      ["a1", "A", 0, "pending", 0],
      ["a2", null, 1, "pending", 0],
    ]);
    expect(actions[1].arguments).to.deep.equal({ attachment: "{{report.url}}" });
    expect(actions[0].resultVariableName).to.equal("report");
    expect(actions[0].resolvedArguments).to.equal(null);
  });

  it("is idempotent when ensuring a chat", async () => {
    const again = await repository.ensureChat("chat-1");
    expect(again).to.deep.equal({ id: "chat-1", createdAt: NOW.toISOString() });
  });

  it("writes nothing when an action insert fails", async () => {
    const failure = await capture(
      repository.createPlan(
        samplePlan({
          actions: [
            { id: "dup", plannedId: null, toolName: "t1", arguments: {}, resultVariableName: null },
            { id: "dup", plannedId: null, toolName: "t2", arguments: {}, resultVariableName: null },
          ],
        }),
      ),
    );

    expect(failure).to.be.instanceOf(PersistenceError);
    expect(await repository.getPlan("plan-1")).to.equal(undefined);
    const count = database.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM actions").get();
    expect(count?.n).to.equal(0);
  });

  it("scopes planner ids to their plan", async () => {
    await repository.ensureChat("chat-2");
    await repository.createPlan(samplePlan());
    const other = await repository.createPlan(
      samplePlan({
        id: "plan-2",
        chatId: "chat-2",
        actions: [{ id: "c1", plannedId: "A", toolName: "t", arguments: {}, resultVariableName: null }],
      }),
    );
    expect(other.actionIds).to.deep.equal(["c1"]);

    const clash = await capture(
      repository.createPlan(
        samplePlan({
          id: "plan-3",
          actions: [
            { id: "d1", plannedId: "A", toolName: "t1", arguments: {}, resultVariableName: null },
            { id: "d2", plannedId: "A", toolName: "t2", arguments: {}, resultVariableName: null },
          ],
        }),
      ),
    );
    expect(clash).to.be.instanceOf(PersistenceError);
    expect(await repository.getPlan("plan-3")).to.equal(undefined);
  });

  it("rejects plans for unknown chats", async () => {
    const failure = await capture(repository.createPlan(samplePlan({ chatId: "ghost" })));
    expect(failure).to.be.instanceOf(PersistenceError);
  });

  it("moves actions forward and freezes terminal rows", async () => {
    await repository.createPlan(samplePlan());

    await repository.updateAction("a1", { status: "starting", startedAt: NOW.toISOString() });
    await repository.updateAction("a1", { status: "in_progress", resolvedArguments: { title: "Report" } });
    const done = await repository.updateAction("a1", {
      status: "completed",
      result: { url: "http://127.0.0.1/r.pdf" },
      attempts: 1,
      completedAt: NOW.toISOString(),
    });

    expect(done.status).to.equal("completed");
    expect(done.result).to.deep.equal({ url: "http://127.0.0.1/r.pdf" });
    expect(done.resolvedArguments).to.deep.equal({ title: "Report" });
    expect(done.attempts).to.equal(1);

    const backwards = await capture(repository.updateAction("a1", { status: "in_progress" }));
    expect(backwards).to.be.instanceOf(ValidationError);
    const frozen = await capture(repository.updateAction("a1", { status: "completed" }));
    expect(frozen).to.be.instanceOf(ValidationError);
  });

  it("records failure details on actions", async () => {
    await repository.createPlan(samplePlan());
    const failed = await repository.updateAction("a2", {
      status: "failed",
      error: "tool server unreachable",
      errorKind: "unreachable",
      attempts: 3,
    });
    expect(failed.errorKind).to.equal("unreachable");
    expect(failed.error).to.equal("tool server unreachable");
    expect(failed.attempts).to.equal(3);
  });

  it("only lets plans move forward", async () => {
    await repository.createPlan(samplePlan());

    const running = await repository.updatePlanStatus("plan-1", "in_progress");
    expect(running.status).to.equal("in_progress");

    const failed = await repository.updatePlanStatus("plan-1", "failed", "action_failed");
    expect(failed.failureReason).to.equal("action_failed");

    expect(await capture(repository.updatePlanStatus("plan-1", "completed"))).to.be.instanceOf(ValidationError);
    expect(await capture(repository.updatePlanStatus("plan-1", "in_progress"))).to.be.instanceOf(ValidationError);
  });

  it("lets a single caller claim a new plan", async () => {
    await repository.createPlan(samplePlan());

    const [first, second] = await Promise.all([repository.claimPlan("plan-1"), repository.claimPlan("plan-1")]);

    expect(first?.status).to.equal("in_progress");
    expect(second).to.equal(undefined);
    expect(await repository.claimPlan("ghost")).to.equal(undefined);
  });

  it("reports missing rows", async () => {
    expect(await capture(repository.updateAction("nope", { status: "starting" }))).to.be.instanceOf(NotFoundError);
    expect(await capture(repository.updatePlanStatus("nope", "in_progress"))).to.be.instanceOf(NotFoundError);
  });

  it("lists the plans of a chat in creation order", async () => {
    await repository.createPlan(samplePlan());
    await repository.createPlan(
      samplePlan({ id: "plan-2", actions: [{ id: "b1", plannedId: null, toolName: "t", arguments: {}, resultVariableName: null }] }),
    );
    const plans = await repository.listPlans("chat-1");
    expect(plans.map((plan) => plan.id)).to.deep.equal(["plan-1", "plan-2"]);
  });

  it("encodes the transition tables", () => {
    expect(isPlanTransitionAllowed("new", "in_progress")).to.equal(true);
    expect(isPlanTransitionAllowed("new", "failed")).to.equal(true);
    expect(isPlanTransitionAllowed("in_progress", "in_progress")).to.equal(false);
    expect(isPlanTransitionAllowed("completed", "failed")).to.equal(false);

    expect(isActionTransitionAllowed("pending", "starting")).to.equal(true);
    expect(isActionTransitionAllowed("pending", "failed")).to.equal(true);
    expect(isActionTransitionAllowed("in_progress", "in_progress")).to.equal(true);
    expect(isActionTransitionAllowed("in_progress", "starting")).to.equal(false);
    expect(isActionTransitionAllowed("failed", "failed")).to.equal(false);
  });
});
