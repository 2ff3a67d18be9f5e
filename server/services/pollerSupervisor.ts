import type { ExecutionErrorRecord, ExecutionRecord } from "@shared/operations";
import type { WorkflowTask } from "@shared/schema";
import { classifyPlatformStatus, type AdServerAdapter } from "../../platform/adapters";
import type { TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { PollingTimeout, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { type DeliverySimulator, simulationParamsFor } from "./deliverySimulator";
import { type ExecutionLock, executionLockKey } from "./executionLock";
import { buildTaskEvent } from "./notificationService";
import { decodeOperation, describeError } from "./operationExecutor";
import { SYSTEM_ACTOR, type TaskAuditor } from "./taskAudit";
import { buildBackgroundTask, buildPendingApprovalTask } from "./taskFactory";
import type { WebhookDispatcher } from "./webhookDispatcher";

export type WorkerState = "scheduled" | "polling" | "terminal";

type Worker = {
  taskId: string;
  state: WorkerState;
  timer: ReturnType<typeof setTimeout> | null;
};

export type PollingSettings = Readonly<{ intervalMs: number; maxDurationMs: number }>;

export type PollerSupervisorDeps = Readonly<{
  store: TaskStore;
  adapter: AdServerAdapter;
  lock: ExecutionLock;
  auditor: TaskAuditor;
  dispatcher: WebhookDispatcher;
  logger: Logger;
  clock: Clock;
  polling: PollingSettings;
  simulator?: DeliverySimulator | null;
}>;

export type SpawnBackgroundInput = Readonly<{
  tenantId: string;
  principalId: string;
  mediaBuyId: string;
  parentTaskId: string | null;
}>;

type PollVerdict =
  | { status: "completed"; platformStatus: string }
  | { status: "failed"; platformStatus?: string; error?: ExecutionErrorRecord };

/**
 * Owns one timer-driven worker per `working` background task.
 *
 * Workers poll checkMediaBuyStatus under the execution lock until the
 * platform reports a terminal status or the polling deadline (measured
 * from the task's createdAt) passes. All state lives in the TaskStore:
 * `recover()` rebuilds the workers after a restart and `shutdown()` only
 * stops timers.
 */
export class BackgroundPollerSupervisor {
  private readonly workers = new Map<string, Worker>();

  constructor(private readonly deps: PollerSupervisorDeps) {}

  async spawnBackgroundTask(input: SpawnBackgroundInput): Promise<WorkflowTask> {
    const { store, auditor, clock, polling, logger } = this.deps;
    const task = await store.create(
      buildBackgroundTask({ ...input, polling, now: clock.now() }),
    );
    await auditor.record(task, "background_task_created", SYSTEM_ACTOR, {
      mediaBuyId: input.mediaBuyId,
      parentTaskId: input.parentTaskId,
    });
    logger.info({ taskId: task.id, mediaBuyId: input.mediaBuyId, parentTaskId: input.parentTaskId }, "background task created");
    this.start(task);
    return task;
  }

  /** Starts polling for a background task. Returns false when a worker already exists. */
  start(task: Pick<WorkflowTask, "id">): boolean {
    const existing = this.workers.get(task.id);
    if (existing && existing.state !== "terminal") return false;

    const worker: Worker = { taskId: task.id, state: "scheduled", timer: null };
    this.workers.set(task.id, worker);
    this.schedule(worker);
    return true;
  }

  async recover(): Promise<number> {
    const tasks = await this.deps.store.list({ stepType: "background_task", status: "working" });
    let started = 0;
    for (const task of tasks) {
      if (this.start(task)) started++;
    }
    this.deps.logger.info({ recovered: started }, "background workers recovered");
    return started;
  }

  shutdown(): void {
    for (const worker of this.workers.values()) {
      if (worker.timer) clearTimeout(worker.timer);
      worker.timer = null;
      worker.state = "terminal";
    }
    this.workers.clear();
  }

  workerState(taskId: string): WorkerState | undefined {
    return this.workers.get(taskId)?.state;
  }

  get activeWorkers(): number {
    let n = 0;
    for (const worker of this.workers.values()) {
      if (worker.state !== "terminal") n++;
    }
    return n;
  }

  private schedule(worker: Worker): void {
    worker.state = "scheduled";
    worker.timer = setTimeout(() => {
      worker.timer = null;
      this.poll(worker).catch((err: unknown) => {
        this.deps.logger.error({ taskId: worker.taskId, err: errorMessage(err) }, "background worker crashed");
        this.stop(worker);
      });
    }, this.deps.polling.intervalMs);
  }

  private stop(worker: Worker): void {
    if (worker.timer) clearTimeout(worker.timer);
    worker.timer = null;
    worker.state = "terminal";
    if (this.workers.get(worker.taskId) === worker) this.workers.delete(worker.taskId);
  }

  private async poll(worker: Worker): Promise<void> {
    if (worker.state === "terminal") return;
    worker.state = "polling";

    const { store, adapter, lock, clock, polling, logger } = this.deps;
    const task = await store.findById(worker.taskId);
    if (!task || task.status !== "working") {
      logger.info({ taskId: worker.taskId, status: task?.status }, "background task no longer working");
      this.stop(worker);
      return;
    }

    const mediaBuyId = task.mediaBuyId;
    if (!mediaBuyId) {
      await this.finish(worker, task, {
        status: "failed",
        error: { kind: "internal", message: "background task has no media buy id" },
      });
      return;
    }

    const now = clock.now();
    if (now.getTime() - task.createdAt.getTime() >= polling.maxDurationMs) {
      await this.escalate(worker, task, mediaBuyId, now);
      return;
    }

    let verdict: PollVerdict | null;
    try {
      const { status } = await lock.runExclusive(executionLockKey(mediaBuyId, task.id), () =>
        adapter.checkMediaBuyStatus(mediaBuyId, now),
      );
      const classified = classifyPlatformStatus(status);
      logger.debug({ taskId: task.id, mediaBuyId, platformStatus: status, classified }, "background poll");
      verdict =
        classified === "pending"
          ? null
          : classified === "succeeded"
            ? { status: "completed", platformStatus: status }
            : { status: "failed", platformStatus: status };
    } catch (err) {
      logger.warn({ taskId: task.id, mediaBuyId, err: errorMessage(err) }, "background poll failed");
      verdict = { status: "failed", error: describeError(err) };
    }

    if (verdict) {
      await this.finish(worker, task, verdict);
    } else if (worker.state !== "terminal") {
      this.schedule(worker);
    }
  }

  private async finish(worker: Worker, task: WorkflowTask, verdict: PollVerdict): Promise<void> {
    const { store, auditor, dispatcher, clock, logger } = this.deps;
    this.stop(worker);

    const now = clock.now();
    const record: ExecutionRecord =
      verdict.status === "completed"
        ? { outcome: "completed", mediaBuyId: task.mediaBuyId ?? undefined, platformStatus: verdict.platformStatus }
        : {
            outcome: "failed",
            mediaBuyId: task.mediaBuyId ?? undefined,
            platformStatus: verdict.platformStatus,
            error: verdict.error,
          };
    const resolutionDetail =
      verdict.status === "completed"
        ? null
        : verdict.error?.message ?? `platform reported ${verdict.platformStatus ?? "failure"}`;

    const { task: updated, applied } = await store.transition(task.id, ["working"], {
      status: verdict.status,
      resolvedAt: now,
      resolvedBy: "system",
      resolutionDetail,
      executionResult: record,
    });
    if (!applied) {
      logger.info({ taskId: task.id, status: updated.status }, "background task already terminal");
      return;
    }

    await auditor.record(
      updated,
      verdict.status === "completed" ? "background_task_completed" : "background_task_failed",
      SYSTEM_ACTOR,
      { mediaBuyId: updated.mediaBuyId, platformStatus: record.platformStatus, error: record.error?.message },
    );
    dispatcher.notify(buildTaskEvent("task_resolved", updated, now));
    logger.info({ taskId: updated.id, status: updated.status, mediaBuyId: updated.mediaBuyId }, "background task finished");

    await this.settleParent(updated, verdict.status, { ...record, backgroundTaskId: updated.id }, resolutionDetail, now);
  }

  private async escalate(worker: Worker, task: WorkflowTask, mediaBuyId: string, now: Date): Promise<void> {
    const { store, auditor, dispatcher, logger, polling } = this.deps;
    this.stop(worker);

    const timeout = new PollingTimeout(task.id, polling.maxDurationMs);
    const escalation = buildPendingApprovalTask({
      tenantId: task.tenantId,
      operation: {
        kind: "order_approval",
        principalId: task.principalId,
        mediaBuyId,
      },
      parentTaskId: task.id,
      now,
    });
    const record: ExecutionRecord = {
      outcome: "escalated",
      mediaBuyId,
      error: { kind: "transient", message: timeout.message },
      escalatedTaskId: escalation.id,
    };

    const { task: failed, applied } = await store.transition(task.id, ["working"], {
      status: "failed",
      resolutionDetail: "polling_timeout",
      resolvedAt: now,
      resolvedBy: "system",
      executionResult: record,
    });
    if (!applied) {
      logger.info({ taskId: task.id, status: failed.status }, "background task already terminal");
      return;
    }

    logger.warn({ taskId: task.id, mediaBuyId, escalatedTaskId: escalation.id, err: timeout.message }, "polling timed out");
    await auditor.record(failed, "polling_timeout", SYSTEM_ACTOR, {
      maxDurationMs: polling.maxDurationMs,
      escalatedTaskId: escalation.id,
    });
    dispatcher.notify(buildTaskEvent("task_resolved", failed, now));

    const created = await store.create(escalation);
    await auditor.record(created, "task_created", SYSTEM_ACTOR, { escalatedFrom: task.id });
    dispatcher.notify(buildTaskEvent("task_created", created, now));

    await this.settleParent(failed, "failed", { ...record, backgroundTaskId: task.id }, "polling_timeout", now);
  }

  private async settleParent(
    background: WorkflowTask,
    status: "completed" | "failed",
    record: ExecutionRecord,
    resolutionDetail: string | null,
    now: Date,
  ): Promise<void> {
    if (!background.parentTaskId) return;
    const { store, auditor, dispatcher, logger } = this.deps;

    const parent = await store.findById(background.parentTaskId);
    if (!parent) return;

    const { task: settled, applied } = await store.transition(parent.id, ["working"], {
      status,
      mediaBuyId: background.mediaBuyId ?? parent.mediaBuyId,
      resolutionDetail: status === "failed" ? resolutionDetail : parent.resolutionDetail,
      executionResult: record,
    });
    if (!applied) return;

    await auditor.record(
      settled,
      status === "completed" ? "task_executed" : "task_execution_failed",
      SYSTEM_ACTOR,
      { mediaBuyId: settled.mediaBuyId, backgroundTaskId: background.id },
    );
    dispatcher.notify(buildTaskEvent("task_resolved", settled, now));
    logger.info({ taskId: settled.id, status, backgroundTaskId: background.id }, "parent task settled");

    if (status === "completed" && settled.mediaBuyId) {
      this.startSimulation(settled, settled.mediaBuyId);
    }
  }

  private startSimulation(task: WorkflowTask, mediaBuyId: string): void {
    const { simulator, logger } = this.deps;
    if (!simulator) return;
    try {
      const params = simulationParamsFor(task, decodeOperation(task), mediaBuyId);
      if (params) simulator.start(params);
    } catch (err) {
      logger.warn({ taskId: task.id, err: errorMessage(err) }, "delivery simulation not started");
    }
  }
}
