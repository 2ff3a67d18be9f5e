export type {
  AdServerAdapter,
  CreateMediaBuyResult,
  UpdateMediaBuyResult,
  MediaBuyStatusResult,
  DeliveryDateRange,
  MediaBuyDeliveryResult,
  PlatformStatusVerdict,
} from "./AdServerAdapter";
export { classifyPlatformStatus, PENDING_CREATE_STATUSES, PENDING_UPDATE_STATUSES } from "./AdServerAdapter";
export { AdapterError, isAdapterError } from "./errors";
export type { AdapterErrorKind } from "./errors";
export { MockAdServerAdapter } from "./MockAdServerAdapter";
export type { AdapterCall, AdapterMethod } from "./MockAdServerAdapter";
