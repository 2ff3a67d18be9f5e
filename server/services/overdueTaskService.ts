import type { TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { SYSTEM_ACTOR, type TaskAuditor } from "./taskAudit";

export type OverdueSweepDeps = Readonly<{
  store: TaskStore;
  auditor: TaskAuditor;
  logger: Logger;
  clock: Clock;
}>;

/**
 * Flags pending tasks whose dueAt has passed. Each task is audited once
 * per process while it stays overdue; overdue tasks stay actionable.
 */
export class OverdueTaskMonitor {
  private readonly flagged = new Set<string>();
  private handle: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly deps: OverdueSweepDeps) {}

  async processOverdueTasks(now: Date = this.deps.clock.now()): Promise<number> {
    const { store, auditor, logger } = this.deps;
    const overdue = await store.list({ status: "pending_approval", overdue: true, now });
    const stillOverdue = new Set(overdue.map((t) => t.id));
    for (const id of this.flagged) {
      if (!stillOverdue.has(id)) this.flagged.delete(id);
    }
    let processed = 0;

    for (const task of overdue) {
      if (this.flagged.has(task.id)) continue;
      try {
        await auditor.record(task, "task_overdue", SYSTEM_ACTOR, {
          dueAt: task.dueAt.toISOString(),
          overdueByMs: now.getTime() - task.dueAt.getTime(),
        });
        this.flagged.add(task.id);
        processed++;
      } catch (err) {
        logger.warn({ taskId: task.id, err: errorMessage(err) }, "overdue flag failed");
      }
    }

    if (processed > 0) logger.info({ processed }, "overdue tasks flagged");
    return processed;
  }

  start(intervalMs: number): void {
    if (this.handle) return;
    this.handle = setInterval(() => {
      this.processOverdueTasks().catch((err: unknown) => {
        this.deps.logger.error({ err: errorMessage(err) }, "overdue sweep failed");
      });
    }, intervalMs);
  }

  stop(): void {
    if (this.handle) clearInterval(this.handle);
    this.handle = null;
  }

  get flaggedCount(): number {
    return this.flagged.size;
  }

  get running(): boolean {
    return this.handle !== null;
  }
}
