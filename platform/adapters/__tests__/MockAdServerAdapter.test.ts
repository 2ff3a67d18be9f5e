import { describe, it, expect } from "vitest";
import { classifyPlatformStatus } from "../AdServerAdapter";
import { AdapterError } from "../errors";
import { MockAdServerAdapter } from "../MockAdServerAdapter";

const today = new Date("2026-01-04T00:00:00.000Z");

describe("classifyPlatformStatus", () => {
  it.each([
    ["active", "succeeded"],
    ["approved", "succeeded"],
    ["delivering", "succeeded"],
    ["completed", "succeeded"],
    ["rejected", "failed"],
    ["failed", "failed"],
    ["cancelled", "failed"],
    ["pending_approval", "pending"],
    ["draft", "pending"],
  ] as const)("classifies %s as %s", (status, verdict) => {
    expect(classifyPlatformStatus(status)).toBe(verdict);
  });
});

describe("MockAdServerAdapter", () => {
  async function createBuy(adapter: MockAdServerAdapter) {
    return adapter.createMediaBuy(
      { buyerRef: "buyer-ref-1", totalBudget: 7000 },
      [{ packageId: "pkg-1", name: "Run of site", impressions: 70000, cpm: 100 }],
      new Date("2026-01-01T00:00:00.000Z"),
      new Date("2026-01-08T00:00:00.000Z"),
    );
  }

  it("assigns sequential media buy ids with the scripted status", async () => {
    const adapter = new MockAdServerAdapter();
    adapter.setCreateStatus("pending_forecast");

    expect(await createBuy(adapter)).toEqual({ mediaBuyId: "mock_mb_1", status: "pending_forecast" });
    expect(await createBuy(adapter)).toEqual({ mediaBuyId: "mock_mb_2", status: "pending_forecast" });
  });

  it("answers status checks from the script, then from the stored status", async () => {
    const adapter = new MockAdServerAdapter();
    const { mediaBuyId } = await createBuy(adapter);
    adapter.scriptStatuses(mediaBuyId, ["pending_approval", "approved"]);

    expect((await adapter.checkMediaBuyStatus(mediaBuyId, today)).status).toBe("pending_approval");
    expect((await adapter.checkMediaBuyStatus(mediaBuyId, today)).status).toBe("approved");
    expect((await adapter.checkMediaBuyStatus(mediaBuyId, today)).status).toBe("approved");
    expect(adapter.callCount("checkMediaBuyStatus")).toBe(3);
  });

  it("throws a scripted failure once", async () => {
    const adapter = new MockAdServerAdapter();
    adapter.failNext("createMediaBuy", AdapterError.transient("rate limited", "mock"));

    await expect(createBuy(adapter)).rejects.toMatchObject({ kind: "transient", message: "rate limited" });
    await expect(createBuy(adapter)).resolves.toMatchObject({ mediaBuyId: "mock_mb_1" });
  });

  it("rejects updates to unknown media buys as permanent errors", async () => {
    const adapter = new MockAdServerAdapter();
    await expect(
      adapter.updateMediaBuy("mb-missing", "pause_media_buy", undefined, undefined, today),
    ).rejects.toMatchObject({ kind: "permanent", message: "Media buy mb-missing not found" });
  });

  it("reports pending updates when scripted", async () => {
    const adapter = new MockAdServerAdapter();
    adapter.seedMediaBuy("mb-1");
    adapter.setUpdateStatus("pending");

    expect(await adapter.updateMediaBuy("mb-1", "resume_media_buy", undefined, undefined, today)).toEqual({
      status: "pending",
      reason: "platform has not confirmed the change",
    });
  });

  it("paces delivery evenly over the flight", async () => {
    const adapter = new MockAdServerAdapter();
    const { mediaBuyId } = await createBuy(adapter);

    const delivery = await adapter.getMediaBuyDelivery(
      mediaBuyId,
      { start: new Date("2026-01-01T00:00:00.000Z"), end: new Date("2026-01-02T00:00:00.000Z") },
      today,
    );

    expect(delivery).toEqual({ impressions: 10000, spend: 1000 });
  });
});
