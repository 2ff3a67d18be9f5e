import type { StepType, TaskStatus, WorkflowTask } from "@shared/schema";

export type TaskListFilter = Readonly<{
  tenantId?: string;
  status?: TaskStatus | readonly TaskStatus[];
  stepType?: StepType | readonly StepType[];
  /** Only tasks whose dueAt is before `now`. */
  overdue?: boolean;
  now?: Date;
  limit?: number;
}>;

export type TaskWriteOptions = Readonly<{
  expectedVersion?: number;
}>;

/** Mutable task fields. `requestContext`, identity and ownership are fixed at creation. */
export type TaskPatch = Partial<
  Pick<
    WorkflowTask,
    | "status"
    | "mediaBuyId"
    | "assignedTo"
    | "resolvedAt"
    | "resolvedBy"
    | "resolution"
    | "resolutionDetail"
    | "executionResult"
  >
>;

export type TransitionResult = Readonly<{
  task: WorkflowTask;
  applied: boolean;
}>;
