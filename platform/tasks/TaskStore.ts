import type { NewWorkflowTask, TaskStatus, WorkflowTask } from "@shared/schema";
import type { TaskListFilter, TaskPatch, TaskWriteOptions, TransitionResult } from "./types";

/**
 * TaskStore is the durable record of every workflow task.
 *
 * Rules:
 * - Tasks are never deleted
 * - Every write bumps `version`
 * - `update` honours expectedVersion (optimistic concurrency)
 * - `transition` is an atomic compare-and-set on status; it is the only
 *   write path used for status changes so concurrent writers cannot both win
 */
export interface TaskStore {
  create(task: NewWorkflowTask): Promise<WorkflowTask>;

  /** Tenant-scoped read. Returns null when the task belongs to another tenant. */
  get(tenantId: string, taskId: string): Promise<WorkflowTask | null>;

  /** Unscoped read for system workers. */
  findById(taskId: string): Promise<WorkflowTask | null>;

  list(filter?: TaskListFilter): Promise<WorkflowTask[]>;

  update(taskId: string, patch: TaskPatch, opts?: TaskWriteOptions): Promise<WorkflowTask>;

  transition(
    taskId: string,
    from: readonly TaskStatus[],
    patch: TaskPatch,
  ): Promise<TransitionResult>;
}
