import type {
  AssetStatus,
  CreativeAsset,
  MediaBuyRequest,
  MediaPackage,
  UpdateAction,
} from "@shared/operations";

export type CreateMediaBuyResult = Readonly<{
  mediaBuyId: string;
  status: string;
}>;

export type UpdateMediaBuyResult = Readonly<{
  status: string;
  reason?: string;
}>;

export type MediaBuyStatusResult = Readonly<{
  status: string;
}>;

export type DeliveryDateRange = Readonly<{
  start: Date;
  end: Date;
}>;

export type MediaBuyDeliveryResult = Readonly<{
  impressions: number;
  spend: number;
}>;

/**
 * AdServerAdapter is the only surface the engine uses to reach an ad platform.
 *
 * Rules:
 * - Adapters are interchangeable; engine code never branches on `name`
 * - Every method may throw AdapterError
 * - "Still pending" is reported through the returned status, not an error
 */
export interface AdServerAdapter {
  readonly name: string;

  /** True when the platform has no live delivery data and delivery should be simulated. */
  readonly supportsDeliverySimulation: boolean;

  createMediaBuy(
    request: MediaBuyRequest,
    packages: readonly MediaPackage[],
    start: Date,
    end: Date,
  ): Promise<CreateMediaBuyResult>;

  updateMediaBuy(
    mediaBuyId: string,
    action: UpdateAction,
    packageId: string | undefined,
    budget: number | undefined,
    today: Date,
  ): Promise<UpdateMediaBuyResult>;

  addCreativeAssets(
    mediaBuyId: string,
    assets: readonly CreativeAsset[],
    today: Date,
  ): Promise<AssetStatus[]>;

  checkMediaBuyStatus(mediaBuyId: string, today: Date): Promise<MediaBuyStatusResult>;

  getMediaBuyDelivery(
    mediaBuyId: string,
    dateRange: DeliveryDateRange,
    today: Date,
  ): Promise<MediaBuyDeliveryResult>;
}

export const PENDING_CREATE_STATUSES: readonly string[] = ["pending_approval", "pending_forecast"];
export const PENDING_UPDATE_STATUSES: readonly string[] = ["pending"];

const TERMINAL_SUCCESS_STATUSES: readonly string[] = ["active", "approved", "delivering", "completed"];
const TERMINAL_FAILURE_STATUSES: readonly string[] = ["rejected", "failed", "cancelled"];

export type PlatformStatusVerdict = "succeeded" | "failed" | "pending";

/** Maps a platform-reported order status onto the engine's polling outcome. */
export function classifyPlatformStatus(status: string): PlatformStatusVerdict {
  const normalized = status.trim().toLowerCase();
  if (TERMINAL_SUCCESS_STATUSES.includes(normalized)) return "succeeded";
  if (TERMINAL_FAILURE_STATUSES.includes(normalized)) return "failed";
  return "pending";
}
