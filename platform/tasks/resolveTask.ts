import type { TaskResolution, WorkflowTask } from "@shared/schema";
import type { TaskStore } from "./TaskStore";
import { TaskNotFound, TaskStoreConflict } from "./errors";

export type ResolveTaskInput = Readonly<{
  resolution: TaskResolution;
  detail?: string | null;
  resolvedBy: string;
  at: Date;
}>;

export type ResolveTaskResult = Readonly<{
  task: WorkflowTask;
  outcome: "resolved" | "duplicate" | "not_resolvable";
}>;

/**
 * Records a single human decision on a pending task.
 *
 * Idempotent: a task that already carries a resolution comes back
 * unchanged as `duplicate`. Rejection is terminal. Approval leaves the
 * task in `pending_approval` for the executor to claim. The write is
 * versioned, so of two racing resolutions only the first applies.
 */
export async function resolveTask(
  store: TaskStore,
  taskId: string,
  input: ResolveTaskInput,
): Promise<ResolveTaskResult> {
  const current = await store.findById(taskId);
  if (!current) throw new TaskNotFound(taskId);
  if (current.resolution) return { task: current, outcome: "duplicate" };
  if (current.status !== "pending_approval" || current.stepType === "background_task") {
    return { task: current, outcome: "not_resolvable" };
  }

  try {
    const task = await store.update(
      taskId,
      {
        status: input.resolution === "rejected" ? "rejected" : current.status,
        resolution: input.resolution,
        resolutionDetail: input.detail ?? null,
        resolvedBy: input.resolvedBy,
        resolvedAt: input.at,
      },
      { expectedVersion: current.version },
    );
    return { task, outcome: "resolved" };
  } catch (err) {
    if (!(err instanceof TaskStoreConflict)) throw err;
    const latest = await store.findById(taskId);
    if (!latest) throw new TaskNotFound(taskId);
    return { task: latest, outcome: latest.resolution ? "duplicate" : "not_resolvable" };
  }
}
