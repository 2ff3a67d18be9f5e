import { z } from "zod";

export const operationKinds = [
  "create_media_buy",
  "update_media_buy",
  "add_creative_assets",
  "order_approval",
] as const;

export type OperationKind = (typeof operationKinds)[number];

export const operationKindSchema = z.enum(operationKinds);

export const updateActions = [
  "activate_order",
  "pause_media_buy",
  "resume_media_buy",
  "pause_package",
  "resume_package",
  "update_package_budget",
  "update_package_impressions",
] as const;

export type UpdateAction = (typeof updateActions)[number];

export const mediaPackageSchema = z.object({
  packageId: z.string().min(1),
  name: z.string().min(1),
  impressions: z.number().int().nonnegative(),
  cpm: z.number().nonnegative(),
  budget: z.number().nonnegative().optional(),
});

export type MediaPackage = z.infer<typeof mediaPackageSchema>;

export const mediaBuyRequestSchema = z.object({
  buyerRef: z.string().min(1),
  poNumber: z.string().optional(),
  totalBudget: z.number().positive(),
  currency: z.string().length(3).optional(),
  brandName: z.string().optional(),
});

export type MediaBuyRequest = z.infer<typeof mediaBuyRequestSchema>;

export const creativeAssetSchema = z.object({
  creativeId: z.string().min(1),
  name: z.string().min(1),
  format: z.string().min(1),
  url: z.string().url(),
  packageIds: z.array(z.string()).default([]),
});

export type CreativeAsset = z.infer<typeof creativeAssetSchema>;

export const createMediaBuyOperationSchema = z.object({
  kind: z.literal("create_media_buy"),
  principalId: z.string().min(1),
  request: mediaBuyRequestSchema,
  packages: z.array(mediaPackageSchema).min(1),
  flightStart: z.string().datetime(),
  flightEnd: z.string().datetime(),
});

export const updateMediaBuyOperationSchema = z.object({
  kind: z.literal("update_media_buy"),
  principalId: z.string().min(1),
  mediaBuyId: z.string().min(1),
  action: z.enum(updateActions),
  packageId: z.string().optional(),
  budget: z.number().nonnegative().optional(),
});

export const addCreativeAssetsOperationSchema = z.object({
  kind: z.literal("add_creative_assets"),
  principalId: z.string().min(1),
  mediaBuyId: z.string().min(1),
  assets: z.array(creativeAssetSchema).min(1),
});

/** Raised by the engine itself when a platform order needs a human go-ahead. */
export const orderApprovalOperationSchema = z.object({
  kind: z.literal("order_approval"),
  principalId: z.string().min(1),
  mediaBuyId: z.string().min(1),
});

export type CreateMediaBuyOperation = z.infer<typeof createMediaBuyOperationSchema>;
export type UpdateMediaBuyOperation = z.infer<typeof updateMediaBuyOperationSchema>;
export type AddCreativeAssetsOperation = z.infer<typeof addCreativeAssetsOperationSchema>;
export type OrderApprovalOperation = z.infer<typeof orderApprovalOperationSchema>;

function checkFlightWindow(
  op: { kind: string; flightStart?: string; flightEnd?: string },
  ctx: z.RefinementCtx,
): void {
  if (op.kind !== "create_media_buy" || !op.flightStart || !op.flightEnd) return;
  if (Date.parse(op.flightEnd) <= Date.parse(op.flightStart)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["flightEnd"],
      message: "flightEnd must be after flightStart",
    });
  }
}

/** Operations a caller may submit for interception. */
export const submittedOperationSchema = z
  .discriminatedUnion("kind", [
    createMediaBuyOperationSchema,
    updateMediaBuyOperationSchema,
    addCreativeAssetsOperationSchema,
  ])
  .superRefine(checkFlightWindow);

/** Everything that may sit in a task's request context. */
export const storedOperationSchema = z
  .discriminatedUnion("kind", [
    createMediaBuyOperationSchema,
    updateMediaBuyOperationSchema,
    addCreativeAssetsOperationSchema,
    orderApprovalOperationSchema,
  ])
  .superRefine(checkFlightWindow);

export type SubmittedOperation = z.infer<typeof submittedOperationSchema>;
export type MediaBuyOperation = z.infer<typeof storedOperationSchema>;

export type AssetStatus = {
  creativeId: string;
  status: "approved" | "pending_review" | "rejected";
  reason?: string;
};

export type PackageSummary = {
  name: string;
  impressions: number;
  cpm: number;
};

export type ActionDetails =
  | {
      actionType: "manual_creation";
      summary: string;
      instructions: string[];
      buyerRef: string;
      totalBudget: number;
      flightStart: string;
      flightEnd: string;
      packages: Array<PackageSummary & { budget: number }>;
      nextActionAfterApproval: "automatic_creation";
    }
  | {
      actionType: "activation";
      summary: string;
      instructions: string[];
      mediaBuyId: string;
      nextActionAfterApproval: "automatic_activation";
    }
  | {
      actionType: "approval";
      approvalType: "media_buy_update" | "creative_approval" | "order_approval";
      summary: string;
      instructions: string[];
      mediaBuyId: string;
      nextActionAfterApproval: "automatic_processing";
    }
  | {
      actionType: "background_polling";
      summary: string;
      instructions: string[];
      mediaBuyId: string;
      pollingIntervalSeconds: number;
      maxPollingDurationMinutes: number;
      nextAction: "automatic_approval_when_ready";
    };

/** Immutable snapshot written once when a task is created. */
export type RequestContext = Readonly<{
  operation: MediaBuyOperation;
  actionDetails: ActionDetails;
}>;

export type ExecutionErrorRecord = {
  kind: "transient" | "permanent" | "internal";
  message: string;
};

export type ExecutionRecord = {
  outcome: "completed" | "failed" | "pending" | "escalated";
  mediaBuyId?: string;
  platformStatus?: string;
  reason?: string;
  assets?: AssetStatus[];
  error?: ExecutionErrorRecord;
  backgroundTaskId?: string;
  escalatedTaskId?: string;
};
