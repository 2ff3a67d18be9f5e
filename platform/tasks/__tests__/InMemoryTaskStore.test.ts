import { describe, it, expect, beforeEach } from "vitest";
import type { NewWorkflowTask } from "@shared/schema";
import { InMemoryTaskStore } from "../InMemoryTaskStore";
import { resolveTask } from "../resolveTask";
import { DuplicateTask, TaskNotFound, TaskStoreConflict } from "../errors";

const T0 = new Date("2026-03-01T10:00:00.000Z");

function makeTask(overrides: Partial<NewWorkflowTask> = {}): NewWorkflowTask {
  return {
    id: "a_000000000001",
    tenantId: "tenant-a",
    principalId: "principal-1",
    stepType: "approval",
    toolName: "update_media_buy",
    status: "pending_approval",
    owner: "publisher",
    action: "pause",
    mediaBuyId: "mb-1",
    requestContext: {
      operation: { kind: "update_media_buy", principalId: "principal-1", mediaBuyId: "mb-1", action: "pause_media_buy" },
      actionDetails: {
        actionType: "approval",
        approvalType: "media_buy_update",
        summary: "pause media buy on mb-1",
        instructions: [],
        mediaBuyId: "mb-1",
        nextActionAfterApproval: "automatic_processing",
      },
    },
    assignedTo: null,
    parentTaskId: null,
    executionResult: null,
    createdAt: T0,
    dueAt: new Date(T0.getTime() + 2 * 3_600_000),
    resolvedAt: null,
    resolvedBy: null,
    resolution: null,
    resolutionDetail: null,
    ...overrides,
  };
}

describe("InMemoryTaskStore", () => {
  let store: InMemoryTaskStore;

  beforeEach(() => {
    store = new InMemoryTaskStore();
  });

  it("creates tasks at version 1 and rejects duplicate ids", async () => {
    const task = await store.create(makeTask());
    expect(task.version).toBe(1);
    await expect(store.create(makeTask())).rejects.toBeInstanceOf(DuplicateTask);
  });

  it("scopes get by tenant", async () => {
    await store.create(makeTask());
    expect(await store.get("tenant-a", "a_000000000001")).not.toBeNull();
    expect(await store.get("tenant-b", "a_000000000001")).toBeNull();
    expect(await store.findById("a_000000000001")).not.toBeNull();
  });

  it("returns copies that do not alias stored state", async () => {
    const task = await store.create(makeTask());
    task.status = "completed";
    expect((await store.findById(task.id))?.status).toBe("pending_approval");
  });

  it("keeps the request context and execution result immune to caller mutation", async () => {
    const input = makeTask();
    await store.create(input);
    input.requestContext.operation.principalId = "changed-before-read";

    const read = await store.findById("a_000000000001");
    if (!read) throw new Error("task missing");
    read.requestContext.operation.principalId = "mutated";
    read.requestContext.actionDetails.instructions.push("injected");

    const result = { outcome: "completed" as const, mediaBuyId: "mb-1", assets: [{ creativeId: "cr-1", status: "approved" as const }] };
    await store.update("a_000000000001", { executionResult: result });
    result.assets[0].creativeId = "cr-mutated";
    const updated = await store.findById("a_000000000001");
    updated?.executionResult?.assets?.push({ creativeId: "cr-2", status: "rejected" });

    const latest = await store.findById("a_000000000001");
    expect(latest?.requestContext.operation.principalId).toBe("principal-1");
    expect(latest?.requestContext.actionDetails.instructions).toEqual([]);
    expect(latest?.executionResult).toEqual({
      outcome: "completed",
      mediaBuyId: "mb-1",
      assets: [{ creativeId: "cr-1", status: "approved" }],
    });
  });

  it("filters by tenant, status, step type and overdue, oldest first", async () => {
    await store.create(makeTask({ id: "a_2", createdAt: new Date(T0.getTime() + 1000) }));
    await store.create(makeTask({ id: "a_1" }));
    await store.create(makeTask({ id: "b_1", stepType: "background_task", status: "working" }));
    await store.create(makeTask({ id: "a_other", tenantId: "tenant-b" }));
    await store.create(makeTask({ id: "a_late", dueAt: new Date(T0.getTime() + 48 * 3_600_000) }));

    const pending = await store.list({ tenantId: "tenant-a", status: "pending_approval" });
    expect(pending.map((t) => t.id)).toEqual(["a_1", "a_late", "a_2"]);

    const background = await store.list({ stepType: ["background_task"], status: ["working"] });
    expect(background.map((t) => t.id)).toEqual(["b_1"]);

    const overdue = await store.list({
      tenantId: "tenant-a",
      status: "pending_approval",
      overdue: true,
      now: new Date(T0.getTime() + 3 * 3_600_000),
    });
    expect(overdue.map((t) => t.id)).toEqual(["a_1", "a_2"]);
  });

  it("update bumps the version and enforces expectedVersion", async () => {
    await store.create(makeTask());
    const updated = await store.update("a_000000000001", { assignedTo: "ops" }, { expectedVersion: 1 });
    expect(updated.version).toBe(2);
    expect(updated.assignedTo).toBe("ops");

    await expect(
      store.update("a_000000000001", { assignedTo: "someone-else" }, { expectedVersion: 1 }),
    ).rejects.toBeInstanceOf(TaskStoreConflict);
    await expect(store.update("missing", {})).rejects.toBeInstanceOf(TaskNotFound);
  });

  it("transition applies only from the listed statuses", async () => {
    await store.create(makeTask());

    const first = await store.transition("a_000000000001", ["pending_approval"], { status: "working" });
    const second = await store.transition("a_000000000001", ["pending_approval"], { status: "working" });

    expect(first.applied).toBe(true);
    expect(first.task.version).toBe(2);
    expect(second.applied).toBe(false);
    expect(second.task.status).toBe("working");
    expect(second.task.version).toBe(2);
  });
});

describe("resolveTask", () => {
  let store: InMemoryTaskStore;
  const at = new Date("2026-03-01T11:00:00.000Z");

  beforeEach(async () => {
    store = new InMemoryTaskStore();
    await store.create(makeTask());
  });

  it("records an approval and leaves the task for the executor to claim", async () => {
    const { task, outcome } = await resolveTask(store, "a_000000000001", {
      resolution: "approved",
      resolvedBy: "reviewer-1",
      at,
    });

    expect(outcome).toBe("resolved");
    expect(task).toMatchObject({
      status: "pending_approval",
      resolution: "approved",
      resolvedBy: "reviewer-1",
      resolvedAt: at,
      resolutionDetail: null,
    });
  });

  it("makes a rejection terminal", async () => {
    const { task } = await resolveTask(store, "a_000000000001", {
      resolution: "rejected",
      detail: "wrong flight",
      resolvedBy: "reviewer-1",
      at,
    });
    expect(task.status).toBe("rejected");
    expect(task.resolutionDetail).toBe("wrong flight");
  });

  it("returns the first resolution unchanged on a repeat", async () => {
    await resolveTask(store, "a_000000000001", { resolution: "approved", resolvedBy: "reviewer-1", at });
    const repeat = await resolveTask(store, "a_000000000001", { resolution: "rejected", resolvedBy: "reviewer-2", at });

    expect(repeat.outcome).toBe("duplicate");
    expect(repeat.task.resolution).toBe("approved");
    expect(repeat.task.resolvedBy).toBe("reviewer-1");
  });

  it("refuses tasks that are no longer pending", async () => {
    await store.transition("a_000000000001", ["pending_approval"], { status: "failed" });
    const result = await resolveTask(store, "a_000000000001", { resolution: "approved", resolvedBy: "reviewer-1", at });
    expect(result.outcome).toBe("not_resolvable");
  });

  it("throws TaskNotFound for unknown ids", async () => {
    await expect(
      resolveTask(store, "missing", { resolution: "approved", resolvedBy: "reviewer-1", at }),
    ).rejects.toBeInstanceOf(TaskNotFound);
  });
});
