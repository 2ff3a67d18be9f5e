import type { MediaBuyOperation } from "@shared/operations";
import type { WorkflowTask } from "@shared/schema";
import type { Logger } from "../logger";
import { buildDeliveryEvent, round2, type DeliveryFigures, type DeliveryStatus } from "./notificationService";
import type { WebhookDispatcher } from "./webhookDispatcher";

export type SimulationParams = Readonly<{
  taskId: string;
  tenantId: string;
  mediaBuyId: string;
  flightStart: Date;
  flightEnd: Date;
  totalBudget: number;
  budgetedImpressions: number;
  /** Simulated seconds per wall-clock second. */
  acceleration?: number;
  intervalMs?: number;
}>;

type Simulation = {
  params: Required<SimulationParams>;
  startedAtMs: number;
  timer: ReturnType<typeof setInterval>;
};

export type DeliverySnapshot = DeliveryFigures;

export const HOUR_MS = 3_600_000;

/**
 * Even-pacing delivery at a given wall-clock offset into the simulation.
 * Pure: the simulator and its tests share it.
 */
export function computeDeliverySnapshot(
  params: Pick<SimulationParams, "flightStart" | "flightEnd" | "totalBudget" | "budgetedImpressions">,
  acceleration: number,
  wallElapsedMs: number,
): DeliverySnapshot {
  const totalMs = params.flightEnd.getTime() - params.flightStart.getTime();
  const simulatedMs = wallElapsedMs * acceleration;
  const progress = totalMs > 0 ? Math.min(simulatedMs / totalMs, 1) : 1;
  return {
    progress,
    elapsedHours: round2(Math.min(simulatedMs, totalMs) / HOUR_MS),
    totalHours: round2(totalMs / HOUR_MS),
    impressions: Math.floor(params.budgetedImpressions * progress),
    spend: round2(params.totalBudget * progress),
  };
}

/** Simulation inputs for a freshly created media buy; null for any other operation. */
export function simulationParamsFor(
  task: Pick<WorkflowTask, "id" | "tenantId">,
  op: MediaBuyOperation,
  mediaBuyId: string,
): SimulationParams | null {
  if (op.kind !== "create_media_buy") return null;
  return {
    taskId: task.id,
    tenantId: task.tenantId,
    mediaBuyId,
    flightStart: new Date(op.flightStart),
    flightEnd: new Date(op.flightEnd),
    totalBudget: op.request.totalBudget,
    budgetedImpressions: op.packages.reduce((sum, p) => sum + p.impressions, 0),
  };
}

/**
 * Time-accelerated producer of delivery events for adapters with no live
 * delivery data. Emits through the same WebhookDispatcher as real
 * delivery tracking: `started`, one `delivering` per tick, then a single
 * `completed` once the whole flight has been simulated.
 */
export class DeliverySimulator {
  private readonly simulations = new Map<string, Simulation>();
  private readonly now: () => number;

  constructor(
    private readonly deps: {
      dispatcher: WebhookDispatcher;
      logger: Logger;
      defaults: { acceleration: number; intervalMs: number };
      now?: () => number;
    },
  ) {
    this.now = deps.now ?? (() => Date.now());
  }

  /** Returns false when a simulation for the media buy is already running. */
  start(input: SimulationParams): boolean {
    if (this.simulations.has(input.mediaBuyId)) {
      this.deps.logger.warn({ mediaBuyId: input.mediaBuyId }, "delivery simulation already running");
      return false;
    }

    const params: Required<SimulationParams> = {
      ...input,
      acceleration: input.acceleration ?? this.deps.defaults.acceleration,
      intervalMs: input.intervalMs ?? this.deps.defaults.intervalMs,
    };

    const sim: Simulation = {
      params,
      startedAtMs: this.now(),
      timer: setInterval(() => this.tick(params.mediaBuyId), params.intervalMs),
    };
    this.simulations.set(params.mediaBuyId, sim);

    this.deps.logger.info(
      {
        mediaBuyId: params.mediaBuyId,
        acceleration: params.acceleration,
        intervalMs: params.intervalMs,
        flightHours: round2((params.flightEnd.getTime() - params.flightStart.getTime()) / HOUR_MS),
      },
      "delivery simulation started",
    );
    this.emit(sim, "started", computeDeliverySnapshot(params, params.acceleration, 0));
    return true;
  }

  stop(mediaBuyId: string): boolean {
    const sim = this.simulations.get(mediaBuyId);
    if (!sim) return false;
    this.finish(sim);
    this.deps.logger.info({ mediaBuyId }, "delivery simulation stopped");
    return true;
  }

  stopAll(): void {
    for (const sim of [...this.simulations.values()]) this.finish(sim);
  }

  isRunning(mediaBuyId: string): boolean {
    return this.simulations.has(mediaBuyId);
  }

  get activeCount(): number {
    return this.simulations.size;
  }

  private tick(mediaBuyId: string): void {
    const sim = this.simulations.get(mediaBuyId);
    if (!sim) return;

    const { params } = sim;
    const snapshot = computeDeliverySnapshot(params, params.acceleration, this.now() - sim.startedAtMs);

    if (snapshot.progress >= 1) {
      this.emit(sim, "completed", snapshot);
      this.finish(sim);
      this.deps.logger.info({ mediaBuyId }, "delivery simulation completed");
      return;
    }
    this.emit(sim, "delivering", snapshot);
  }

  private finish(sim: Simulation): void {
    clearInterval(sim.timer);
    this.simulations.delete(sim.params.mediaBuyId);
    this.deps.dispatcher.resetSequence(sim.params.mediaBuyId);
  }

  private emit(sim: Simulation, status: DeliveryStatus, snapshot: DeliverySnapshot): void {
    const { params } = sim;
    const { dispatcher } = this.deps;
    dispatcher.notify(
      buildDeliveryEvent({
        taskId: params.taskId,
        tenantId: params.tenantId,
        mediaBuyId: params.mediaBuyId,
        totalBudget: params.totalBudget,
        status,
        sequenceNumber: dispatcher.nextSequence(params.mediaBuyId),
        figures: snapshot,
        now: new Date(this.now()),
      }),
    );
  }
}
