export class TaskStoreError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = "TaskStoreError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class TaskNotFound extends TaskStoreError {
  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task ${taskId} not found`, 404);
    this.name = "TaskNotFound";
  }
}

export class TaskStoreConflict extends TaskStoreError {
  constructor(message: string) {
    super("TASK_STORE_CONFLICT", message, 409);
    this.name = "TaskStoreConflict";
  }
}

export class DuplicateTask extends TaskStoreError {
  constructor(taskId: string) {
    super("TASK_DUPLICATE", `Task ${taskId} already exists`, 409);
    this.name = "DuplicateTask";
  }
}
