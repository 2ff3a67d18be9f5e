import type {
  AssetStatus,
  CreativeAsset,
  MediaBuyRequest,
  MediaPackage,
  UpdateAction,
} from "@shared/operations";
import type {
  AdServerAdapter,
  CreateMediaBuyResult,
  DeliveryDateRange,
  MediaBuyDeliveryResult,
  MediaBuyStatusResult,
  UpdateMediaBuyResult,
} from "./AdServerAdapter";
import { AdapterError } from "./errors";

export type AdapterMethod =
  | "createMediaBuy"
  | "updateMediaBuy"
  | "addCreativeAssets"
  | "checkMediaBuyStatus"
  | "getMediaBuyDelivery";

export type AdapterCall = Readonly<{
  method: AdapterMethod;
  mediaBuyId: string | null;
  args: Record<string, unknown>;
}>;

type MockMediaBuy = {
  mediaBuyId: string;
  status: string;
  totalBudget: number;
  totalImpressions: number;
  start: Date;
  end: Date;
  creativeIds: Set<string>;
};

const UPDATE_STATUS_BY_ACTION: Record<UpdateAction, string> = {
  activate_order: "active",
  pause_media_buy: "paused",
  resume_media_buy: "active",
  pause_package: "active",
  resume_package: "active",
  update_package_budget: "active",
  update_package_impressions: "active",
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * In-memory ad server used for local runs and tests.
 *
 * Every call is recorded in `calls`. Behaviour can be scripted per test:
 * the status returned by createMediaBuy, queued status answers for
 * checkMediaBuyStatus, and one-shot failures per method.
 */
export class MockAdServerAdapter implements AdServerAdapter {
  public readonly name = "mock";
  public readonly supportsDeliverySimulation: boolean;
  public readonly calls: AdapterCall[] = [];

  private readonly mediaBuys = new Map<string, MockMediaBuy>();
  private readonly statusScripts = new Map<string, string[]>();
  private readonly pendingFailures = new Map<AdapterMethod, AdapterError>();
  private createStatus = "active";
  private updateStatusOverride: string | null = null;
  private sequence = 0;

  constructor(opts: { supportsDeliverySimulation?: boolean } = {}) {
    this.supportsDeliverySimulation = opts.supportsDeliverySimulation ?? true;
  }

  // ---- scripting ----

  setCreateStatus(status: string): void {
    this.createStatus = status;
  }

  setUpdateStatus(status: string | null): void {
    this.updateStatusOverride = status;
  }

  scriptStatuses(mediaBuyId: string, statuses: readonly string[]): void {
    this.statusScripts.set(mediaBuyId, [...statuses]);
  }

  failNext(method: AdapterMethod, error: AdapterError): void {
    this.pendingFailures.set(method, error);
  }

  seedMediaBuy(mediaBuyId: string, status = "active"): void {
    const now = new Date();
    this.mediaBuys.set(mediaBuyId, {
      mediaBuyId,
      status,
      totalBudget: 0,
      totalImpressions: 0,
      start: now,
      end: now,
      creativeIds: new Set(),
    });
  }

  callCount(method?: AdapterMethod): number {
    return method ? this.calls.filter((c) => c.method === method).length : this.calls.length;
  }

  getStatus(mediaBuyId: string): string | undefined {
    return this.mediaBuys.get(mediaBuyId)?.status;
  }

  // ---- AdServerAdapter ----

  async createMediaBuy(
    request: MediaBuyRequest,
    packages: readonly MediaPackage[],
    start: Date,
    end: Date,
  ): Promise<CreateMediaBuyResult> {
    this.record("createMediaBuy", null, { buyerRef: request.buyerRef, packages: packages.length });
    this.throwIfScripted("createMediaBuy");

    this.sequence += 1;
    const mediaBuyId = `mock_mb_${this.sequence}`;
    this.mediaBuys.set(mediaBuyId, {
      mediaBuyId,
      status: this.createStatus,
      totalBudget: request.totalBudget,
      totalImpressions: packages.reduce((sum, p) => sum + p.impressions, 0),
      start,
      end,
      creativeIds: new Set(),
    });
    return { mediaBuyId, status: this.createStatus };
  }

  async updateMediaBuy(
    mediaBuyId: string,
    action: UpdateAction,
    packageId: string | undefined,
    budget: number | undefined,
    _today: Date,
  ): Promise<UpdateMediaBuyResult> {
    this.record("updateMediaBuy", mediaBuyId, { action, packageId, budget });
    this.throwIfScripted("updateMediaBuy");

    const buy = this.requireMediaBuy(mediaBuyId);
    if (this.updateStatusOverride) {
      return { status: this.updateStatusOverride, reason: "platform has not confirmed the change" };
    }
    if (action === "update_package_budget" && budget !== undefined) {
      buy.totalBudget = budget;
    }
    buy.status = UPDATE_STATUS_BY_ACTION[action];
    return { status: buy.status };
  }

  async addCreativeAssets(
    mediaBuyId: string,
    assets: readonly CreativeAsset[],
    _today: Date,
  ): Promise<AssetStatus[]> {
    this.record("addCreativeAssets", mediaBuyId, { assets: assets.map((a) => a.creativeId) });
    this.throwIfScripted("addCreativeAssets");

    const buy = this.requireMediaBuy(mediaBuyId);
    return assets.map((asset) => {
      buy.creativeIds.add(asset.creativeId);
      return { creativeId: asset.creativeId, status: "approved" as const };
    });
  }

  async checkMediaBuyStatus(mediaBuyId: string, _today: Date): Promise<MediaBuyStatusResult> {
    this.record("checkMediaBuyStatus", mediaBuyId, {});
    this.throwIfScripted("checkMediaBuyStatus");

    const script = this.statusScripts.get(mediaBuyId);
    const buy = this.mediaBuys.get(mediaBuyId);
    if (script && script.length > 0) {
      const next = script.shift() ?? "unknown";
      if (buy) buy.status = next;
      return { status: next };
    }
    return { status: buy?.status ?? "unknown" };
  }

  async getMediaBuyDelivery(
    mediaBuyId: string,
    dateRange: DeliveryDateRange,
    _today: Date,
  ): Promise<MediaBuyDeliveryResult> {
    this.record("getMediaBuyDelivery", mediaBuyId, {
      start: dateRange.start.toISOString(),
      end: dateRange.end.toISOString(),
    });
    this.throwIfScripted("getMediaBuyDelivery");

    const buy = this.requireMediaBuy(mediaBuyId);
    const flightMs = buy.end.getTime() - buy.start.getTime();
    if (flightMs <= 0) return { impressions: 0, spend: 0 };

    const until = Math.min(dateRange.end.getTime(), buy.end.getTime());
    const fraction = Math.max(0, Math.min((until - buy.start.getTime()) / flightMs, 1));
    return {
      impressions: Math.floor(buy.totalImpressions * fraction),
      spend: round2(buy.totalBudget * fraction),
    };
  }

  private record(method: AdapterMethod, mediaBuyId: string | null, args: Record<string, unknown>): void {
    this.calls.push({ method, mediaBuyId, args });
  }

  private throwIfScripted(method: AdapterMethod): void {
    const failure = this.pendingFailures.get(method);
    if (failure) {
      this.pendingFailures.delete(method);
      throw failure;
    }
  }

  private requireMediaBuy(mediaBuyId: string): MockMediaBuy {
    const buy = this.mediaBuys.get(mediaBuyId);
    if (!buy) {
      throw AdapterError.permanent(`Media buy ${mediaBuyId} not found`, this.name);
    }
    return buy;
  }
}
