export type AuditEventType =
  | "task_created"
  | "task_rejected"
  | "task_executed"
  | "task_execution_failed"
  | "task_overdue"
  | "background_task_created"
  | "background_task_completed"
  | "background_task_failed"
  | "polling_timeout";

export type AuditEvent = Readonly<{
  eventId: string;
  tenantId: string;
  taskId: string;
  actorId: string | null;
  actorType: "user" | "system";
  eventType: AuditEventType;
  timestamp: string;
  metadata?: Record<string, unknown>;
}>;
