import type { NewWorkflowTask, TaskStatus, WorkflowTask } from "@shared/schema";
import type { TaskStore } from "./TaskStore";
import type { TaskListFilter, TaskPatch, TaskWriteOptions, TransitionResult } from "./types";
import { DuplicateTask, TaskNotFound, TaskStoreConflict } from "./errors";

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function toArray<T>(value: T | readonly T[] | undefined): readonly T[] | undefined {
  if (value === undefined) return undefined;
  return isList(value) ? value : [value];
}

function clampLimit(limit?: number): number {
  if (limit == null) return 500;
  if (limit <= 0) return 1;
  return Math.min(limit, 5000);
}

/** Stored records never share nested objects with callers. */
function copy(task: WorkflowTask): WorkflowTask {
  return structuredClone(task);
}

export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, WorkflowTask>();

  async create(task: NewWorkflowTask): Promise<WorkflowTask> {
    if (this.tasks.has(task.id)) throw new DuplicateTask(task.id);
    const record: WorkflowTask = { ...structuredClone(task), version: 1 };
    this.tasks.set(task.id, record);
    return copy(record);
  }

  async get(tenantId: string, taskId: string): Promise<WorkflowTask | null> {
    const task = this.tasks.get(taskId);
    if (!task || task.tenantId !== tenantId) return null;
    return copy(task);
  }

  async findById(taskId: string): Promise<WorkflowTask | null> {
    const task = this.tasks.get(taskId);
    return task ? copy(task) : null;
  }

  async list(filter: TaskListFilter = {}): Promise<WorkflowTask[]> {
    const statuses = toArray(filter.status);
    const stepTypes = toArray(filter.stepType);
    const now = filter.now ?? new Date();

    return Array.from(this.tasks.values())
      .filter((t) => !filter.tenantId || t.tenantId === filter.tenantId)
      .filter((t) => !statuses || statuses.includes(t.status))
      .filter((t) => !stepTypes || stepTypes.includes(t.stepType))
      .filter((t) => !filter.overdue || t.dueAt.getTime() < now.getTime())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, clampLimit(filter.limit))
      .map(copy);
  }

  async update(taskId: string, patch: TaskPatch, opts?: TaskWriteOptions): Promise<WorkflowTask> {
    const existing = this.tasks.get(taskId);
    if (!existing) throw new TaskNotFound(taskId);

    if (opts?.expectedVersion != null && existing.version !== opts.expectedVersion) {
      throw new TaskStoreConflict(
        `task ${taskId} version ${existing.version} != expected ${opts.expectedVersion}`,
      );
    }

    const next: WorkflowTask = { ...existing, ...structuredClone(patch), version: existing.version + 1 };
    this.tasks.set(taskId, next);
    return copy(next);
  }

  async transition(
    taskId: string,
    from: readonly TaskStatus[],
    patch: TaskPatch,
  ): Promise<TransitionResult> {
    const existing = this.tasks.get(taskId);
    if (!existing) throw new TaskNotFound(taskId);

    if (!from.includes(existing.status)) {
      return { task: copy(existing), applied: false };
    }

    const next: WorkflowTask = { ...existing, ...structuredClone(patch), version: existing.version + 1 };
    this.tasks.set(taskId, next);
    return { task: copy(next), applied: true };
  }
}
