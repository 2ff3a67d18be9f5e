import { randomUUID } from "crypto";
import type { WorkflowTask } from "@shared/schema";
import type { AuditEvent, AuditEventType, AuditSink } from "../../platform/audit";
import type { Clock } from "../clock";
import type { Logger } from "../logger";

export type AuditActor = Readonly<{
  actorType: "user" | "system";
  actorId: string | null;
}>;

export const SYSTEM_ACTOR: AuditActor = { actorType: "system", actorId: null };

export function userActor(userId: string): AuditActor {
  return { actorType: "user", actorId: userId };
}

/**
 * Writes one audit entry per task transition.
 * A failing sink is logged and never fails the transition that produced it.
 */
export class TaskAuditor {
  constructor(
    private readonly sink: AuditSink,
    private readonly logger: Logger,
    private readonly clock: Clock,
  ) {}

  async record(
    task: Pick<WorkflowTask, "id" | "tenantId">,
    eventType: AuditEventType,
    actor: AuditActor = SYSTEM_ACTOR,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    const event: AuditEvent = {
      eventId: randomUUID(),
      tenantId: task.tenantId,
      taskId: task.id,
      actorId: actor.actorId,
      actorType: actor.actorType,
      eventType,
      timestamp: this.clock.now().toISOString(),
      metadata,
    };

    try {
      await this.sink.emit(event);
    } catch (err) {
      this.logger.error({ err, taskId: task.id, eventType }, "audit sink rejected event");
    }
  }
}
