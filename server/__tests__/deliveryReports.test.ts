import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AdapterError, MockAdServerAdapter } from "../../platform/adapters";
import type { DeliveryPayload } from "../services/notificationService";
import { createBuyOperation, createHarness, flushMicrotasks, useFakeClock, type Harness } from "./harness";

const DAY_MS = 86_400_000;

function deliveryPayloads(h: Harness): DeliveryPayload[] {
  const payloads: DeliveryPayload[] = [];
  for (const event of h.webhooks) {
    if (event.type === "delivery_progress" || event.type === "delivery_completed") payloads.push(event.payload);
  }
  return payloads;
}

function requireReports(h: Harness) {
  const reports = h.engine.reports;
  if (!reports) throw new Error("expected a delivery report scheduler");
  return reports;
}

/** Approves a creation for the 2026-01-01 to 2026-01-08 flight; the platform answers active. */
async function approvedCreation(h: Harness): Promise<string> {
  const deferred = await h.engine.interceptor.intercept(h.ctx, createBuyOperation());
  if (deferred.outcome !== "deferred") throw new Error(`expected deferred, got ${deferred.outcome}`);
  await h.engine.tasks.completeTask(h.ctx, deferred.taskId, { resolution: "approved", resolvedBy: "reviewer-1" });
  return deferred.taskId;
}

describe("DeliveryReportScheduler", () => {
  let h: Harness;

  beforeEach(async () => {
    useFakeClock();
    vi.setSystemTime(new Date("2025-12-31T00:00:00.000Z"));
    h = await createHarness({
      adapter: new MockAdServerAdapter({ supportsDeliverySimulation: false }),
      env: { OVERDUE_SWEEP_INTERVAL_MS: String(DAY_MS) },
    });
  });

  afterEach(async () => {
    await h.engine.stop();
    vi.useRealTimers();
  });

  it("exists only for adapters that are not simulated", async () => {
    const simulated = await createHarness();
    expect(simulated.engine.reports).toBeNull();
    expect(h.engine.reports).not.toBeNull();
  });

  it("reports delivery to date while the flight runs", async () => {
    const taskId = await approvedCreation(h);
    const reports = requireReports(h);

    expect(await reports.sendReports(new Date("2025-12-31T12:00:00.000Z"))).toBe(0);
    expect(h.adapter.callCount("getMediaBuyDelivery")).toBe(0);

    expect(await reports.sendReports(new Date("2026-01-04T12:00:00.000Z"))).toBe(1);
    await h.engine.dispatcher.flush();

    const progress = h.webhooks.filter((e) => e.type === "delivery_progress");
    expect(progress).toHaveLength(1);
    expect(progress[0]).toMatchObject({ tenantId: "tenant-a", taskId, mediaBuyId: "mock_mb_1" });
    expect(deliveryPayloads(h)).toEqual([
      {
        task_id: taskId,
        status: "delivering",
        timestamp: "2026-01-04T12:00:00.000Z",
        sequence_number: 1,
        data: {
          event_type: "delivery_update",
          media_buy_id: "mock_mb_1",
          progress: { elapsed_hours: 84, total_hours: 168, progress_percentage: 50 },
          delivery: { impressions: 50000, spend: 2500, total_budget: 5000, pacing_percentage: 50 },
        },
      },
    ]);
    expect(h.adapter.calls.at(-1)).toEqual({
      method: "getMediaBuyDelivery",
      mediaBuyId: "mock_mb_1",
      args: { start: "2026-01-01T00:00:00.000Z", end: "2026-01-04T12:00:00.000Z" },
    });
  });

  it("sends one completed report after the flight ends", async () => {
    await approvedCreation(h);
    const reports = requireReports(h);

    await reports.sendReports(new Date("2026-01-04T12:00:00.000Z"));
    expect(await reports.sendReports(new Date("2026-01-09T00:00:00.000Z"))).toBe(1);
    expect(await reports.sendReports(new Date("2026-01-10T00:00:00.000Z"))).toBe(0);
    await h.engine.dispatcher.flush();

    const payloads = deliveryPayloads(h);
    expect(payloads.map((p) => [p.status, p.sequence_number])).toEqual([
      ["delivering", 1],
      ["completed", 2],
    ]);
    expect(payloads[1].data.progress).toEqual({ elapsed_hours: 168, total_hours: 168, progress_percentage: 100 });
    expect(payloads[1].data.delivery).toEqual({ impressions: 100000, spend: 5000, total_budget: 5000, pacing_percentage: 100 });
    expect(h.webhooks.filter((e) => e.type === "delivery_completed")).toHaveLength(1);
    expect(h.adapter.calls.at(-1)?.args).toEqual({ start: "2026-01-01T00:00:00.000Z", end: "2026-01-08T00:00:00.000Z" });
    expect(h.engine.dispatcher.nextSequence("mock_mb_1")).toBe(1);
  });

  it("retries a media buy on the next run when the platform fails", async () => {
    await approvedCreation(h);
    const reports = requireReports(h);
    h.adapter.failNext("getMediaBuyDelivery", new AdapterError("transient", "delivery api unavailable", "mock"));

    expect(await reports.sendReports(new Date("2026-01-04T12:00:00.000Z"))).toBe(0);
    expect(await reports.sendReports(new Date("2026-01-04T12:00:00.000Z"))).toBe(1);
    await h.engine.dispatcher.flush();

    expect(deliveryPayloads(h).map((p) => p.sequence_number)).toEqual([1]);
  });

  it("ignores creations that never completed", async () => {
    await h.engine.interceptor.intercept(h.ctx, createBuyOperation());

    expect(await requireReports(h).sendReports(new Date("2026-01-04T12:00:00.000Z"))).toBe(0);
    expect(h.adapter.callCount("getMediaBuyDelivery")).toBe(0);
  });

  it("runs on its interval once the engine starts", async () => {
    await approvedCreation(h);
    vi.setSystemTime(new Date("2026-01-04T12:00:00.000Z"));
    await h.engine.start();
    expect(requireReports(h).running).toBe(true);

    await vi.advanceTimersByTimeAsync(DAY_MS);
    await flushMicrotasks();
    await h.engine.dispatcher.flush();

    const payloads = deliveryPayloads(h);
    expect(payloads).toHaveLength(1);
    expect(payloads[0]).toMatchObject({
      status: "delivering",
      timestamp: "2026-01-05T12:00:00.000Z",
      sequence_number: 1,
      data: { progress: { elapsed_hours: 108 }, delivery: { impressions: 64285 } },
    });

    await h.engine.stop();
    expect(requireReports(h).running).toBe(false);
  });
});
