export class WorkflowEngineError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 400) {
    super(message);
    this.name = "WorkflowEngineError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class PolicyLookupFailure extends WorkflowEngineError {
  constructor(tenantId: string) {
    super("POLICY_LOOKUP_FAILURE", `No approval policy configured for tenant ${tenantId}`, 422);
    this.name = "PolicyLookupFailure";
  }
}

export class InvalidOperation extends WorkflowEngineError {
  constructor(message: string) {
    super("INVALID_OPERATION", message, 400);
    this.name = "InvalidOperation";
  }
}

export class TaskNotResolvable extends WorkflowEngineError {
  constructor(taskId: string, reason: string) {
    super("TASK_NOT_RESOLVABLE", `Task ${taskId} cannot be resolved: ${reason}`, 409);
    this.name = "TaskNotResolvable";
  }
}

export class PollingTimeout extends WorkflowEngineError {
  constructor(taskId: string, maxDurationMs: number) {
    super("POLLING_TIMEOUT", `Background task ${taskId} did not finish within ${maxDurationMs}ms`, 504);
    this.name = "PollingTimeout";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
