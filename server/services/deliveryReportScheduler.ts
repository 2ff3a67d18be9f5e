import type { WorkflowTask } from "@shared/schema";
import type { AdServerAdapter } from "../../platform/adapters";
import type { TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { HOUR_MS, simulationParamsFor } from "./deliverySimulator";
import { buildDeliveryEvent, round2 } from "./notificationService";
import { decodeOperation } from "./operationExecutor";
import type { WebhookDispatcher } from "./webhookDispatcher";

export type DeliveryReportDeps = Readonly<{
  store: TaskStore;
  adapter: AdServerAdapter;
  dispatcher: WebhookDispatcher;
  logger: Logger;
  clock: Clock;
}>;

const REPORT_SCAN_LIMIT = 5000;

/**
 * Periodic delivery reports for media buys on platforms with live
 * delivery data. Each run asks the adapter for delivery to date on every
 * media buy created through a completed task and emits a `delivering`
 * update; the first run after the flight ends emits `completed` and the
 * buy is not reported again.
 */
export class DeliveryReportScheduler {
  private readonly finished = new Set<string>();
  private handle: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly deps: DeliveryReportDeps) {}

  async sendReports(now: Date = this.deps.clock.now()): Promise<number> {
    const { store, logger } = this.deps;
    const tasks = await store.list({ status: "completed", stepType: "creation", limit: REPORT_SCAN_LIMIT });

    const tracked = new Set<string>();
    let sent = 0;
    for (const task of tasks) {
      if (task.toolName !== "create_media_buy" || !task.mediaBuyId) continue;
      tracked.add(task.mediaBuyId);
      if (this.finished.has(task.mediaBuyId)) continue;
      try {
        if (await this.report(task, task.mediaBuyId, now)) sent++;
      } catch (err) {
        logger.warn({ taskId: task.id, mediaBuyId: task.mediaBuyId, err: errorMessage(err) }, "delivery report failed");
      }
    }
    for (const id of this.finished) {
      if (!tracked.has(id)) this.finished.delete(id);
    }

    if (sent > 0) logger.info({ sent }, "delivery reports sent");
    return sent;
  }

  private async report(task: WorkflowTask, mediaBuyId: string, now: Date): Promise<boolean> {
    const { adapter, dispatcher } = this.deps;
    const params = simulationParamsFor(task, decodeOperation(task), mediaBuyId);
    if (!params || now.getTime() < params.flightStart.getTime()) return false;

    const totalMs = params.flightEnd.getTime() - params.flightStart.getTime();
    const ended = now.getTime() >= params.flightEnd.getTime();
    const delivery = await adapter.getMediaBuyDelivery(
      mediaBuyId,
      { start: params.flightStart, end: ended ? params.flightEnd : now },
      now,
    );

    const elapsedMs = Math.min(now.getTime() - params.flightStart.getTime(), totalMs);
    dispatcher.notify(
      buildDeliveryEvent({
        taskId: task.id,
        tenantId: task.tenantId,
        mediaBuyId,
        totalBudget: params.totalBudget,
        status: ended ? "completed" : "delivering",
        sequenceNumber: dispatcher.nextSequence(mediaBuyId),
        figures: {
          progress: totalMs > 0 ? elapsedMs / totalMs : 1,
          elapsedHours: round2(Math.max(elapsedMs, 0) / HOUR_MS),
          totalHours: round2(totalMs / HOUR_MS),
          impressions: delivery.impressions,
          spend: delivery.spend,
        },
        now,
      }),
    );

    if (ended) {
      this.finished.add(mediaBuyId);
      dispatcher.resetSequence(mediaBuyId);
    }
    return true;
  }

  start(intervalMs: number): void {
    if (this.handle) return;
    this.handle = setInterval(() => {
      this.sendReports().catch((err: unknown) => {
        this.deps.logger.error({ err: errorMessage(err) }, "delivery report run failed");
      });
    }, intervalMs);
  }

  stop(): void {
    if (this.handle) clearInterval(this.handle);
    this.handle = null;
  }

  get running(): boolean {
    return this.handle !== null;
  }
}
