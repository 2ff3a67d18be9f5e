import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AdapterError } from "../../platform/adapters";
import { buildBackgroundTask } from "../services/taskFactory";
import { createBuyOperation, createHarness, flushMicrotasks, useFakeClock, type Harness } from "./harness";

const HOUR_MS = 3_600_000;

async function tick(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flushMicrotasks();
}

/** Approves a creation the platform leaves pending, producing a parent and its background task. */
async function pendingCreation(h: Harness): Promise<{ parentId: string; backgroundId: string }> {
  h.adapter.setCreateStatus("pending_approval");
  const deferred = await h.engine.interceptor.intercept(h.ctx, createBuyOperation());
  if (deferred.outcome !== "deferred") throw new Error(`expected deferred, got ${deferred.outcome}`);

  const approved = await h.engine.tasks.completeTask(h.ctx, deferred.taskId, {
    resolution: "approved",
    resolvedBy: "reviewer-1",
  });
  if (!approved.ok || approved.execution?.kind !== "pending") throw new Error("expected a pending execution");
  return { parentId: deferred.taskId, backgroundId: approved.execution.backgroundTaskId };
}

describe("BackgroundPollerSupervisor", () => {
  let h: Harness;

  beforeEach(async () => {
    useFakeClock();
    h = await createHarness();
  });

  afterEach(async () => {
    await h.engine.stop();
    vi.useRealTimers();
  });

  it("completes the background task and its parent once the platform reports active", async () => {
    const { parentId, backgroundId } = await pendingCreation(h);
    h.adapter.scriptStatuses("mock_mb_1", ["pending_approval", "active"]);

    await tick(1000);
    expect((await h.store.findById(backgroundId))?.status).toBe("working");

    await tick(1000);
    const background = await h.store.findById(backgroundId);
    const parent = await h.store.findById(parentId);
    expect(background?.status).toBe("completed");
    expect(background?.resolvedBy).toBe("system");
    expect(parent?.status).toBe("completed");
    expect(parent?.executionResult).toEqual({
      outcome: "completed",
      mediaBuyId: "mock_mb_1",
      platformStatus: "active",
      backgroundTaskId: backgroundId,
    });
    expect(h.audit.ofType("background_task_completed")).toHaveLength(1);
    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(2);
  });

  it("stops polling after a terminal status", async () => {
    const { backgroundId } = await pendingCreation(h);
    h.adapter.scriptStatuses("mock_mb_1", ["approved"]);

    await tick(1000);
    await tick(10_000);

    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(1);
    expect(h.engine.supervisor.workerState(backgroundId)).toBeUndefined();
    expect(h.engine.supervisor.activeWorkers).toBe(0);
  });

  it("fails the background task and the parent on a terminal failure status", async () => {
    const { parentId, backgroundId } = await pendingCreation(h);
    h.adapter.scriptStatuses("mock_mb_1", ["rejected"]);

    await tick(1000);

    const background = await h.store.findById(backgroundId);
    const parent = await h.store.findById(parentId);
    expect(background?.status).toBe("failed");
    expect(background?.resolutionDetail).toBe("platform reported rejected");
    expect(parent?.status).toBe("failed");
    expect(parent?.resolutionDetail).toBe("platform reported rejected");
    expect(h.audit.ofType("background_task_failed")).toHaveLength(1);
    expect(h.audit.ofType("task_execution_failed")).toHaveLength(1);
  });

  it("times out into exactly one manual approval task", async () => {
    const { parentId, backgroundId } = await pendingCreation(h);

    for (let i = 0; i < 5; i++) await tick(1000);

    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(4);
    const background = await h.store.findById(backgroundId);
    expect(background?.status).toBe("failed");
    expect(background?.resolutionDetail).toBe("polling_timeout");

    const escalations = await h.store.list({ stepType: "approval" });
    expect(escalations).toHaveLength(1);
    const [escalation] = escalations;
    expect(escalation).toMatchObject({
      toolName: "order_approval",
      action: "approve",
      status: "pending_approval",
      owner: "publisher",
      parentTaskId: backgroundId,
      mediaBuyId: "mock_mb_1",
    });
    expect(escalation.id).toMatch(/^a_/);
    expect(escalation.dueAt.getTime() - escalation.createdAt.getTime()).toBe(4 * HOUR_MS);
    expect(background?.executionResult).toMatchObject({ outcome: "escalated", escalatedTaskId: escalation.id });

    const parent = await h.store.findById(parentId);
    expect(parent?.status).toBe("failed");
    expect(parent?.resolutionDetail).toBe("polling_timeout");
    expect(h.audit.ofType("polling_timeout")).toHaveLength(1);

    await tick(10_000);
    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(4);
    expect(await h.store.list({ stepType: "approval" })).toHaveLength(1);
  });

  it("approving the escalation activates the order", async () => {
    await pendingCreation(h);
    for (let i = 0; i < 5; i++) await tick(1000);
    const [escalation] = await h.store.list({ stepType: "approval" });

    const result = await h.engine.tasks.completeTask(h.ctx, escalation.id, {
      resolution: "approved",
      resolvedBy: "reviewer-1",
    });

    expect(result).toMatchObject({ ok: true, execution: { kind: "completed", mediaBuyId: "mock_mb_1" } });
    const updates = h.adapter.calls.filter((c) => c.method === "updateMediaBuy");
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({ mediaBuyId: "mock_mb_1", args: { action: "activate_order" } });
    expect(h.adapter.getStatus("mock_mb_1")).toBe("active");
  });

  it("fails the task when a poll throws and keeps the supervisor alive", async () => {
    const { backgroundId } = await pendingCreation(h);
    h.adapter.failNext("checkMediaBuyStatus", AdapterError.transient("platform timeout", "mock"));

    await tick(1000);

    const background = await h.store.findById(backgroundId);
    expect(background?.status).toBe("failed");
    expect(background?.resolutionDetail).toBe("platform timeout");
    expect(background?.executionResult?.error).toEqual({ kind: "transient", message: "platform timeout" });
    expect(h.engine.supervisor.activeWorkers).toBe(0);
    expect(h.engine.supervisor.start({ id: backgroundId })).toBe(true);
  });

  it("stops without writing when the task left working before the poll", async () => {
    const { backgroundId } = await pendingCreation(h);
    await h.store.transition(backgroundId, ["working"], { status: "failed", resolutionDetail: "cancelled by operator" });

    await tick(1000);

    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(0);
    expect((await h.store.findById(backgroundId))?.resolutionDetail).toBe("cancelled by operator");
    expect(h.audit.ofType("background_task_failed")).toHaveLength(0);
  });

  it("starting a running worker is a no-op", async () => {
    const { backgroundId } = await pendingCreation(h);

    expect(h.engine.supervisor.start({ id: backgroundId })).toBe(false);
    expect(h.engine.supervisor.activeWorkers).toBe(1);
  });

  it("shutdown stops timers and leaves the task working", async () => {
    const { backgroundId } = await pendingCreation(h);

    h.engine.supervisor.shutdown();
    await tick(5000);

    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(0);
    expect((await h.store.findById(backgroundId))?.status).toBe("working");
  });

  it("recovers workers for working background tasks", async () => {
    const task = await h.store.create(
      buildBackgroundTask({
        tenantId: "tenant-a",
        principalId: "principal-1",
        mediaBuyId: "mb-recovered",
        parentTaskId: null,
        polling: h.config.polling,
        now: new Date(),
      }),
    );
    h.adapter.seedMediaBuy("mb-recovered", "active");

    expect(await h.engine.supervisor.recover()).toBe(1);
    expect(h.engine.supervisor.workerState(task.id)).toBe("scheduled");
    expect(await h.engine.supervisor.recover()).toBe(0);

    await tick(1000);

    expect((await h.store.findById(task.id))?.status).toBe("completed");
    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(1);
  });

  it("keeps the original deadline for a recovered worker", async () => {
    const task = await h.store.create(
      buildBackgroundTask({
        tenantId: "tenant-a",
        principalId: "principal-1",
        mediaBuyId: "mb-recovered",
        parentTaskId: null,
        polling: h.config.polling,
        now: new Date(Date.now() - 10 * 60_000),
      }),
    );

    await h.engine.supervisor.recover();
    await tick(1000);

    expect(h.adapter.callCount("checkMediaBuyStatus")).toBe(0);
    const recovered = await h.store.findById(task.id);
    expect(recovered?.status).toBe("failed");
    expect(recovered?.resolutionDetail).toBe("polling_timeout");
  });
});
