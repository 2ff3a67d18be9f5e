import type { ExecutionErrorRecord, ExecutionRecord } from "@shared/operations";
import type { WorkflowTask } from "@shared/schema";
import type { AdServerAdapter } from "../../platform/adapters";
import type { TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { type DeliverySimulator, simulationParamsFor } from "./deliverySimulator";
import { type ExecutionLock, executionLockKey } from "./executionLock";
import { buildTaskEvent } from "./notificationService";
import {
  decodeOperation,
  describeError,
  executeOperation,
  toExecutionRecord,
  type OperationResult,
} from "./operationExecutor";
import type { BackgroundPollerSupervisor } from "./pollerSupervisor";
import { SYSTEM_ACTOR, userActor, type TaskAuditor } from "./taskAudit";
import type { WebhookDispatcher } from "./webhookDispatcher";

export type ExecutionOutcome =
  | { kind: "rejected" }
  | { kind: "completed"; result: OperationResult; mediaBuyId: string }
  | { kind: "failed"; error: ExecutionErrorRecord }
  | { kind: "pending"; backgroundTaskId: string }
  | { kind: "skipped"; reason: string };

export type ResumerRecovery = Readonly<{
  /** Approved tasks that were never claimed, executed now. */
  redriven: number;
  /** Working tasks whose background task already finished, or whose execution was cut short. */
  settled: number;
  /** Working tasks left pending on the platform with no poller, handed to a new background task. */
  respawned: number;
}>;

const HUMAN_STEP_TYPES = ["approval", "creation"] as const;
const RECOVERY_SCAN_LIMIT = 5000;

export type ResumerDeps = Readonly<{
  store: TaskStore;
  adapter: AdServerAdapter;
  lock: ExecutionLock;
  supervisor: BackgroundPollerSupervisor;
  auditor: TaskAuditor;
  dispatcher: WebhookDispatcher;
  logger: Logger;
  clock: Clock;
  simulator?: DeliverySimulator | null;
}>;

/**
 * Replays a resolved task's stored operation against the adapter.
 *
 * An approved task is claimed with a `pending_approval -> working`
 * compare-and-set before anything else, so however many times a
 * resolution is delivered the adapter sees the operation at most once.
 */
export class DeferredExecutionResumer {
  constructor(private readonly deps: ResumerDeps) {}

  async onTaskResolved(task: WorkflowTask): Promise<ExecutionOutcome> {
    const { logger } = this.deps;

    if (task.resolution === "rejected") {
      return this.recordRejection(task);
    }
    if (task.resolution !== "approved") {
      return { kind: "skipped", reason: "task has no resolution" };
    }

    const { task: claimed, applied } = await this.deps.store.transition(task.id, ["pending_approval"], {
      status: "working",
    });
    if (!applied) {
      logger.info({ taskId: task.id, status: claimed.status }, "task already claimed, skipping execution");
      return { kind: "skipped", reason: `task is ${claimed.status}` };
    }

    return this.execute(claimed);
  }

  private async recordRejection(task: WorkflowTask): Promise<ExecutionOutcome> {
    const { auditor, dispatcher, clock, logger } = this.deps;
    await auditor.record(task, "task_rejected", task.resolvedBy ? userActor(task.resolvedBy) : SYSTEM_ACTOR, {
      detail: task.resolutionDetail,
    });
    dispatcher.notify(buildTaskEvent("task_resolved", task, clock.now()));
    logger.info({ taskId: task.id, resolvedBy: task.resolvedBy }, "task rejected");
    return { kind: "rejected" };
  }

  private async execute(task: WorkflowTask): Promise<ExecutionOutcome> {
    const { adapter, lock, clock, logger } = this.deps;

    let result: OperationResult;
    try {
      const op = decodeOperation(task);
      const key = executionLockKey(task.mediaBuyId, task.id);
      result = await lock.runExclusive(key, () => executeOperation(adapter, op, clock.now()));
    } catch (err) {
      const error = describeError(err);
      logger.warn({ taskId: task.id, toolName: task.toolName, error }, "deferred execution failed");
      await this.settle(task, "failed", { outcome: "failed", mediaBuyId: task.mediaBuyId ?? undefined, error }, error.message);
      return { kind: "failed", error };
    }

    if (result.pending) {
      return this.handOff(task, result);
    }

    const settled = await this.settle(task, "completed", toExecutionRecord(result), task.resolutionDetail, result.mediaBuyId);
    logger.info({ taskId: task.id, toolName: task.toolName, mediaBuyId: result.mediaBuyId }, "deferred execution completed");
    this.startSimulation(settled, result.mediaBuyId);
    return { kind: "completed", result, mediaBuyId: result.mediaBuyId };
  }

  /**
   * Records the media buy on the task before anything else, so a failed
   * hand-off still leaves the platform order traceable. A hand-off that
   * cannot start polling fails the task.
   */
  private async handOff(task: WorkflowTask, result: OperationResult): Promise<ExecutionOutcome> {
    const { logger } = this.deps;
    const pending = toExecutionRecord(result);

    try {
      await this.deps.store.update(task.id, { mediaBuyId: result.mediaBuyId, executionResult: pending });
      return await this.spawnPoller(task, result.mediaBuyId, pending);
    } catch (err) {
      const error: ExecutionErrorRecord = {
        kind: "internal",
        message: `background polling could not start: ${errorMessage(err)}`,
      };
      logger.error({ taskId: task.id, mediaBuyId: result.mediaBuyId, err: errorMessage(err) }, "hand-off to background polling failed");
      await this.settle(task, "failed", { ...pending, outcome: "failed", error }, error.message, result.mediaBuyId);
      return { kind: "failed", error };
    }
  }

  private async spawnPoller(
    task: WorkflowTask,
    mediaBuyId: string,
    pending: ExecutionRecord,
  ): Promise<ExecutionOutcome> {
    const { store, supervisor, logger } = this.deps;

    const background = await supervisor.spawnBackgroundTask({
      tenantId: task.tenantId,
      principalId: task.principalId,
      mediaBuyId,
      parentTaskId: task.id,
    });
    try {
      await store.update(task.id, { executionResult: { ...pending, backgroundTaskId: background.id } });
    } catch (err) {
      // the background task links back through parentTaskId and settles this task either way
      logger.warn({ taskId: task.id, backgroundTaskId: background.id, err: errorMessage(err) }, "background task id not recorded on parent");
    }
    logger.info(
      { taskId: task.id, mediaBuyId, backgroundTaskId: background.id },
      "platform still pending, handed off to background polling",
    );
    return { kind: "pending", backgroundTaskId: background.id };
  }

  /**
   * Finishes work a previous process left behind. Run once at startup,
   * after the poller supervisor has recovered its workers and before
   * requests are served.
   */
  async recover(): Promise<ResumerRecovery> {
    const { store, logger } = this.deps;
    let redriven = 0;
    let settled = 0;
    let respawned = 0;

    const unclaimed = await store.list({
      status: "pending_approval",
      stepType: [...HUMAN_STEP_TYPES],
      limit: RECOVERY_SCAN_LIMIT,
    });
    for (const task of unclaimed) {
      if (task.resolution !== "approved") continue;
      try {
        const outcome = await this.onTaskResolved(task);
        if (outcome.kind !== "skipped") redriven++;
      } catch (err) {
        logger.error({ taskId: task.id, err: errorMessage(err) }, "approved task could not be re-driven");
      }
    }

    const stalled = await store.list({ status: "working", stepType: [...HUMAN_STEP_TYPES], limit: RECOVERY_SCAN_LIMIT });
    if (stalled.length > 0) {
      const latestChild = new Map<string, WorkflowTask>();
      for (const child of await store.list({ stepType: "background_task", limit: RECOVERY_SCAN_LIMIT })) {
        if (child.parentTaskId) latestChild.set(child.parentTaskId, child);
      }

      for (const task of stalled) {
        try {
          const result = await this.recoverWorking(task, latestChild.get(task.id));
          if (result === "settled") settled++;
          if (result === "respawned") respawned++;
        } catch (err) {
          logger.error({ taskId: task.id, err: errorMessage(err) }, "working task could not be recovered");
        }
      }
    }

    logger.info({ redriven, settled, respawned }, "deferred executions recovered");
    return { redriven, settled, respawned };
  }

  private async recoverWorking(
    task: WorkflowTask,
    child: WorkflowTask | undefined,
  ): Promise<"settled" | "respawned" | "untouched"> {
    if (child?.status === "working") return "untouched";

    if (child) {
      const status = child.status === "completed" ? "completed" : "failed";
      const record: ExecutionRecord = { ...(child.executionResult ?? { outcome: status }), backgroundTaskId: child.id };
      const settledTask = await this.settle(
        task,
        status,
        record,
        status === "failed" ? child.resolutionDetail : task.resolutionDetail,
        child.mediaBuyId ?? undefined,
      );
      if (status === "completed" && settledTask.mediaBuyId) this.startSimulation(settledTask, settledTask.mediaBuyId);
      return "settled";
    }

    if (task.mediaBuyId && task.executionResult?.outcome === "pending") {
      await this.spawnPoller(task, task.mediaBuyId, task.executionResult);
      return "respawned";
    }

    const error: ExecutionErrorRecord = {
      kind: "internal",
      message: "execution was interrupted before a result was recorded",
    };
    await this.settle(task, "failed", { outcome: "failed", mediaBuyId: task.mediaBuyId ?? undefined, error }, error.message);
    return "settled";
  }

  private async settle(
    task: WorkflowTask,
    status: "completed" | "failed",
    record: ExecutionRecord,
    resolutionDetail: string | null,
    mediaBuyId?: string,
  ): Promise<WorkflowTask> {
    const { store, auditor, dispatcher, clock, logger } = this.deps;

    const { task: settled, applied } = await store.transition(task.id, ["working"], {
      status,
      mediaBuyId: mediaBuyId ?? task.mediaBuyId,
      resolutionDetail,
      executionResult: record,
    });
    if (!applied) {
      logger.warn({ taskId: task.id, status: settled.status }, "task left working before its result was recorded");
      return settled;
    }

    await auditor.record(
      settled,
      status === "completed" ? "task_executed" : "task_execution_failed",
      SYSTEM_ACTOR,
      { mediaBuyId: settled.mediaBuyId, error: record.error?.message },
    );
    dispatcher.notify(buildTaskEvent("task_resolved", settled, clock.now()));
    return settled;
  }

  private startSimulation(task: WorkflowTask, mediaBuyId: string): void {
    const { simulator, logger } = this.deps;
    if (!simulator) return;
    try {
      const params = simulationParamsFor(task, decodeOperation(task), mediaBuyId);
      if (params) simulator.start(params);
    } catch (err) {
      logger.warn({ taskId: task.id, err }, "delivery simulation not started");
    }
  }
}
