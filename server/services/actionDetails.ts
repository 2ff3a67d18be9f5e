import type {
  ActionDetails,
  AddCreativeAssetsOperation,
  CreateMediaBuyOperation,
  MediaBuyOperation,
  OrderApprovalOperation,
  UpdateMediaBuyOperation,
} from "@shared/operations";

function packageBudget(pkg: { impressions: number; cpm: number; budget?: number }): number {
  return pkg.budget ?? Math.round((pkg.impressions / 1000) * pkg.cpm * 100) / 100;
}

function humanize(value: string): string {
  return value.replace(/_/g, " ");
}

export function buildCreationDetails(op: CreateMediaBuyOperation): ActionDetails {
  const budget = op.request.totalBudget;
  return {
    actionType: "manual_creation",
    summary: `Create media buy ${op.request.buyerRef} (${op.packages.length} package${op.packages.length === 1 ? "" : "s"}, budget ${budget.toFixed(2)})`,
    instructions: [
      `Confirm total budget of ${budget.toFixed(2)} ${op.request.currency ?? "USD"}`,
      `Confirm flight dates ${op.flightStart.slice(0, 10)} to ${op.flightEnd.slice(0, 10)}`,
      "Check package impressions and CPM against the rate card",
      "Approve this task to create the order on the ad server",
    ],
    buyerRef: op.request.buyerRef,
    totalBudget: budget,
    flightStart: op.flightStart,
    flightEnd: op.flightEnd,
    packages: op.packages.map((pkg) => ({
      name: pkg.name,
      impressions: pkg.impressions,
      cpm: pkg.cpm,
      budget: packageBudget(pkg),
    })),
    nextActionAfterApproval: "automatic_creation",
  };
}

export function buildActivationDetails(op: UpdateMediaBuyOperation): ActionDetails {
  return {
    actionType: "activation",
    summary: `Activate order ${op.mediaBuyId}`,
    instructions: [
      `Review order ${op.mediaBuyId} on the ad server`,
      "Verify line item settings, targeting and creative placeholders",
      "Confirm budget, flight dates and delivery settings",
      "Approve this task to activate the order and its line items",
    ],
    mediaBuyId: op.mediaBuyId,
    nextActionAfterApproval: "automatic_activation",
  };
}

export function buildUpdateApprovalDetails(op: UpdateMediaBuyOperation): ActionDetails {
  const target = op.packageId ? `package ${op.packageId} of ${op.mediaBuyId}` : op.mediaBuyId;
  const instructions = [`Review request to ${humanize(op.action)} for ${target}`];
  if (op.budget !== undefined) instructions.push(`New budget requested: ${op.budget.toFixed(2)}`);
  instructions.push("Approve this task to apply the change on the ad server");
  return {
    actionType: "approval",
    approvalType: "media_buy_update",
    summary: `${humanize(op.action)} on ${target}`,
    instructions,
    mediaBuyId: op.mediaBuyId,
    nextActionAfterApproval: "automatic_processing",
  };
}

export function buildCreativeApprovalDetails(op: AddCreativeAssetsOperation): ActionDetails {
  return {
    actionType: "approval",
    approvalType: "creative_approval",
    summary: `Assign ${op.assets.length} creative${op.assets.length === 1 ? "" : "s"} to ${op.mediaBuyId}`,
    instructions: [
      ...op.assets.map((a) => `Review creative ${a.creativeId} (${a.format}): ${a.url}`),
      "Check that all creatives meet the publisher's content policy",
      "Approve this task to upload and assign the creatives",
    ],
    mediaBuyId: op.mediaBuyId,
    nextActionAfterApproval: "automatic_processing",
  };
}

export function buildOrderApprovalDetails(op: OrderApprovalOperation): ActionDetails {
  return {
    actionType: "approval",
    approvalType: "order_approval",
    summary: `Approve order ${op.mediaBuyId} manually`,
    instructions: [
      `Automatic approval of order ${op.mediaBuyId} did not complete in time`,
      "Check forecasting and inventory availability on the ad server",
      "Approve this task to activate the order",
    ],
    mediaBuyId: op.mediaBuyId,
    nextActionAfterApproval: "automatic_processing",
  };
}

export function buildBackgroundPollingDetails(
  mediaBuyId: string,
  polling: { intervalMs: number; maxDurationMs: number },
): ActionDetails {
  return {
    actionType: "background_polling",
    summary: `Waiting for the ad server to confirm order ${mediaBuyId}`,
    instructions: [
      "Order approval is pending on the ad server",
      "A background task is polling the ad server for completion",
      "A webhook notification is sent when approval completes",
    ],
    mediaBuyId,
    pollingIntervalSeconds: Math.round(polling.intervalMs / 1000),
    maxPollingDurationMinutes: Math.round(polling.maxDurationMs / 60_000),
    nextAction: "automatic_approval_when_ready",
  };
}

/** Dispatches an operation to its human-readable detail builder. */
export function buildActionDetails(op: MediaBuyOperation): ActionDetails {
  switch (op.kind) {
    case "create_media_buy":
      return buildCreationDetails(op);
    case "update_media_buy":
      return op.action === "activate_order" ? buildActivationDetails(op) : buildUpdateApprovalDetails(op);
    case "add_creative_assets":
      return buildCreativeApprovalDetails(op);
    case "order_approval":
      return buildOrderApprovalDetails(op);
  }
}
