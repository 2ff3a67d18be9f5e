export type { TaskStore } from "./TaskStore";
export type { TaskListFilter, TaskPatch, TaskWriteOptions, TransitionResult } from "./types";
export { InMemoryTaskStore } from "./InMemoryTaskStore";
export { resolveTask } from "./resolveTask";
export type { ResolveTaskInput, ResolveTaskResult } from "./resolveTask";
export { TaskStoreError, TaskNotFound, TaskStoreConflict, DuplicateTask } from "./errors";
