import {
  storedOperationSchema,
  type AssetStatus,
  type ExecutionErrorRecord,
  type ExecutionRecord,
  type MediaBuyOperation,
} from "@shared/operations";
import type { WorkflowTask } from "@shared/schema";
import {
  PENDING_CREATE_STATUSES,
  PENDING_UPDATE_STATUSES,
  isAdapterError,
  type AdServerAdapter,
} from "../../platform/adapters";
import { InvalidOperation, errorMessage } from "../errors";

export type OperationResult =
  | {
      kind: "create_media_buy";
      mediaBuyId: string;
      status: string;
      pending: boolean;
    }
  | {
      kind: "update_media_buy" | "order_approval";
      mediaBuyId: string;
      status: string;
      reason?: string;
      pending: boolean;
    }
  | {
      kind: "add_creative_assets";
      mediaBuyId: string;
      assets: AssetStatus[];
      pending: false;
    };

/** Issues the single adapter call that carries out an operation. */
export async function executeOperation(
  adapter: AdServerAdapter,
  op: MediaBuyOperation,
  today: Date,
): Promise<OperationResult> {
  switch (op.kind) {
    case "create_media_buy": {
      const res = await adapter.createMediaBuy(
        op.request,
        op.packages,
        new Date(op.flightStart),
        new Date(op.flightEnd),
      );
      return {
        kind: op.kind,
        mediaBuyId: res.mediaBuyId,
        status: res.status,
        pending: PENDING_CREATE_STATUSES.includes(res.status),
      };
    }
    case "update_media_buy": {
      const res = await adapter.updateMediaBuy(op.mediaBuyId, op.action, op.packageId, op.budget, today);
      return {
        kind: op.kind,
        mediaBuyId: op.mediaBuyId,
        status: res.status,
        reason: res.reason,
        pending: PENDING_UPDATE_STATUSES.includes(res.status),
      };
    }
    case "order_approval": {
      const res = await adapter.updateMediaBuy(op.mediaBuyId, "activate_order", undefined, undefined, today);
      return {
        kind: op.kind,
        mediaBuyId: op.mediaBuyId,
        status: res.status,
        reason: res.reason,
        pending: PENDING_UPDATE_STATUSES.includes(res.status),
      };
    }
    case "add_creative_assets": {
      const assets = await adapter.addCreativeAssets(op.mediaBuyId, op.assets, today);
      return { kind: op.kind, mediaBuyId: op.mediaBuyId, assets, pending: false };
    }
  }
}

/**
 * Rebuilds the original operation from a task's request context.
 * Throws InvalidOperation when the stored payload no longer matches its tool.
 */
export function decodeOperation(task: Pick<WorkflowTask, "id" | "toolName" | "requestContext">): MediaBuyOperation {
  const parsed = storedOperationSchema.safeParse(task.requestContext.operation);
  if (!parsed.success) {
    throw new InvalidOperation(`Task ${task.id} has an unreadable request context: ${parsed.error.message}`);
  }
  if (parsed.data.kind !== task.toolName) {
    throw new InvalidOperation(
      `Task ${task.id} stores a ${parsed.data.kind} operation but is registered as ${task.toolName}`,
    );
  }
  return parsed.data;
}

export function toExecutionRecord(result: OperationResult): ExecutionRecord {
  if (result.kind === "add_creative_assets") {
    return { outcome: "completed", mediaBuyId: result.mediaBuyId, assets: result.assets };
  }
  return {
    outcome: result.pending ? "pending" : "completed",
    mediaBuyId: result.mediaBuyId,
    platformStatus: result.status,
    reason: "reason" in result ? result.reason : undefined,
  };
}

export function describeError(err: unknown): ExecutionErrorRecord {
  if (isAdapterError(err)) return { kind: err.kind, message: err.message };
  return { kind: "internal", message: errorMessage(err) };
}
