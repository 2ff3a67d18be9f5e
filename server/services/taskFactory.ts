import { randomUUID } from "crypto";
import { addHours, addMilliseconds } from "date-fns";
import type {
  ActionDetails,
  MediaBuyOperation,
  OperationKind,
  UpdateAction,
} from "@shared/operations";
import type { NewWorkflowTask, StepType, TaskAction } from "@shared/schema";
import { buildActionDetails, buildBackgroundPollingDetails } from "./actionDetails";

export const BACKGROUND_ASSIGNEE = "background_approval_service";

const TASK_ID_PREFIX: Record<StepType, string> = {
  creation: "c",
  approval: "a",
  background_task: "b",
};

type OperationProfile = Readonly<{
  stepType: StepType;
  slaHours: number;
}>;

export const OPERATION_PROFILES: Record<OperationKind, OperationProfile> = {
  create_media_buy: { stepType: "creation", slaHours: 4 },
  update_media_buy: { stepType: "approval", slaHours: 2 },
  add_creative_assets: { stepType: "approval", slaHours: 24 },
  order_approval: { stepType: "approval", slaHours: 4 },
};

const UPDATE_TASK_ACTION: Record<UpdateAction, TaskAction> = {
  activate_order: "activate",
  pause_media_buy: "pause",
  pause_package: "pause",
  resume_media_buy: "resume",
  resume_package: "resume",
  update_package_budget: "update",
  update_package_impressions: "update",
};

export function newTaskId(stepType: StepType): string {
  return `${TASK_ID_PREFIX[stepType]}_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function taskActionFor(op: MediaBuyOperation): TaskAction {
  switch (op.kind) {
    case "create_media_buy":
      return "create";
    case "update_media_buy":
      return UPDATE_TASK_ACTION[op.action];
    case "add_creative_assets":
      return "assign_creatives";
    case "order_approval":
      return "approve";
  }
}

/** The media buy an operation targets; null until creation assigns one. */
export function operationMediaBuyId(op: MediaBuyOperation): string | null {
  return op.kind === "create_media_buy" ? null : op.mediaBuyId;
}

export function buildPendingApprovalTask(input: {
  tenantId: string;
  operation: MediaBuyOperation;
  now: Date;
  parentTaskId?: string | null;
  actionDetails?: ActionDetails;
}): NewWorkflowTask {
  const { operation, now } = input;
  const profile = OPERATION_PROFILES[operation.kind];
  return {
    id: newTaskId(profile.stepType),
    tenantId: input.tenantId,
    principalId: operation.principalId,
    stepType: profile.stepType,
    toolName: operation.kind,
    status: "pending_approval",
    owner: "publisher",
    action: taskActionFor(operation),
    mediaBuyId: operationMediaBuyId(operation),
    requestContext: {
      operation,
      actionDetails: input.actionDetails ?? buildActionDetails(operation),
    },
    assignedTo: null,
    parentTaskId: input.parentTaskId ?? null,
    executionResult: null,
    createdAt: now,
    dueAt: addHours(now, profile.slaHours),
    resolvedAt: null,
    resolvedBy: null,
    resolution: null,
    resolutionDetail: null,
  };
}

export function buildBackgroundTask(input: {
  tenantId: string;
  principalId: string;
  mediaBuyId: string;
  parentTaskId: string | null;
  polling: { intervalMs: number; maxDurationMs: number };
  now: Date;
}): NewWorkflowTask {
  const { now, mediaBuyId } = input;
  return {
    id: newTaskId("background_task"),
    tenantId: input.tenantId,
    principalId: input.principalId,
    stepType: "background_task",
    toolName: "order_approval",
    status: "working",
    owner: "system",
    action: "approve",
    mediaBuyId,
    requestContext: {
      operation: { kind: "order_approval", principalId: input.principalId, mediaBuyId },
      actionDetails: buildBackgroundPollingDetails(mediaBuyId, input.polling),
    },
    assignedTo: BACKGROUND_ASSIGNEE,
    parentTaskId: input.parentTaskId,
    executionResult: null,
    createdAt: now,
    dueAt: addMilliseconds(now, input.polling.maxDurationMs),
    resolvedAt: null,
    resolvedBy: null,
    resolution: null,
    resolutionDetail: null,
  };
}
