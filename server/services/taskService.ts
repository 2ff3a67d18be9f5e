import type { TaskResolutionInput, TaskStatus, WorkflowTask } from "@shared/schema";
import { TaskNotFound, resolveTask, type TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { TaskNotResolvable } from "../errors";
import type { Logger } from "../logger";
import type { TenantContext } from "../tenant";
import type { DeferredExecutionResumer, ExecutionOutcome } from "./deferredExecutionResumer";

export type TaskSummary = Readonly<{
  id: string;
  toolName: string;
  action: string;
  status: TaskStatus;
  mediaBuyId: string | null;
  dueAt: string;
  overdue: boolean;
  resolutionDetail: string | null;
}>;

export type PendingTaskQuery = Readonly<{
  status?: TaskStatus | readonly TaskStatus[];
  overdueOnly?: boolean;
}>;

export type TaskServiceFailure = Readonly<{
  code: string;
  message: string;
  statusCode: number;
}>;

export type CompleteTaskResult =
  | {
      ok: true;
      task: WorkflowTask;
      duplicate: boolean;
      execution: ExecutionOutcome | null;
    }
  | { ok: false; error: TaskServiceFailure };

export type TaskServiceDeps = Readonly<{
  store: TaskStore;
  resumer: DeferredExecutionResumer;
  logger: Logger;
  clock: Clock;
}>;

export function isOverdue(task: Pick<WorkflowTask, "status" | "dueAt">, now: Date): boolean {
  return task.status === "pending_approval" && task.dueAt.getTime() < now.getTime();
}

export function toTaskSummary(task: WorkflowTask, now: Date): TaskSummary {
  return {
    id: task.id,
    toolName: task.toolName,
    action: task.action,
    status: task.status,
    mediaBuyId: task.mediaBuyId,
    dueAt: task.dueAt.toISOString(),
    overdue: isOverdue(task, now),
    resolutionDetail: task.resolutionDetail,
  };
}

export class TaskService {
  constructor(private readonly deps: TaskServiceDeps) {}

  /** Human-facing tasks for a tenant, oldest first. Background tasks are never listed. */
  async getPendingTasks(ctx: TenantContext, query: PendingTaskQuery = {}): Promise<TaskSummary[]> {
    const now = this.deps.clock.now();
    const tasks = await this.deps.store.list({
      tenantId: ctx.tenantId,
      status: query.status ?? "pending_approval",
      stepType: ["approval", "creation"],
      overdue: query.overdueOnly,
      now,
    });
    return tasks.map((t) => toTaskSummary(t, now));
  }

  async getTask(ctx: TenantContext, taskId: string): Promise<WorkflowTask | null> {
    return this.deps.store.get(ctx.tenantId, taskId);
  }

  /**
   * Records a human resolution and replays the task's operation when it
   * was approved. A repeated resolution returns the task unchanged, unless
   * the earlier approval never got as far as execution.
   */
  async completeTask(ctx: TenantContext, taskId: string, input: TaskResolutionInput): Promise<CompleteTaskResult> {
    const { store, resumer, logger, clock } = this.deps;

    const existing = await store.get(ctx.tenantId, taskId);
    if (!existing) return { ok: false, error: failure(new TaskNotFound(taskId)) };
    if (existing.stepType === "background_task") {
      return { ok: false, error: failure(new TaskNotResolvable(taskId, "background tasks are resolved by the system")) };
    }

    const { task, outcome } = await resolveTask(store, taskId, {
      resolution: input.resolution,
      detail: input.detail,
      resolvedBy: input.resolvedBy,
      at: clock.now(),
    });

    if (outcome === "duplicate") {
      logger.info(
        { taskId, resolution: task.resolution, resolvedBy: task.resolvedBy, attemptedBy: input.resolvedBy },
        "DuplicateResolution",
      );
      // an approval recorded but never claimed is driven again; the claim keeps it to one adapter call
      if (task.resolution === "approved" && task.status === "pending_approval") {
        const execution = await resumer.onTaskResolved(task);
        const latest = (await store.findById(taskId)) ?? task;
        return { ok: true, task: latest, duplicate: true, execution };
      }
      return { ok: true, task, duplicate: true, execution: null };
    }
    if (outcome === "not_resolvable") {
      return { ok: false, error: failure(new TaskNotResolvable(taskId, `task is ${task.status}`)) };
    }

    logger.info({ taskId, resolution: input.resolution, resolvedBy: input.resolvedBy }, "task resolved");
    const execution = await resumer.onTaskResolved(task);
    const latest = (await store.findById(taskId)) ?? task;
    return { ok: true, task: latest, duplicate: false, execution };
  }
}

function failure(err: TaskNotFound | TaskNotResolvable): TaskServiceFailure {
  return { code: err.code, message: err.message, statusCode: err.statusCode };
}
