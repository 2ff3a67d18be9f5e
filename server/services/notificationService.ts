/**
 * Webhook transport and payload builders for task and delivery events.
 *
 * Best-effort: sendWebhook NEVER throws. All errors are returned as
 * structured results. Callers decide how to handle failures.
 *
 * With `hmac_sha256` the token is a shared secret: the body is signed as
 * `<unix seconds>.<body>` and sent in `X-AdCP-Signature: sha256=<hex>`
 * beside `X-AdCP-Timestamp`. Otherwise the token goes out as a Bearer
 * credential.
 */
import { createHmac } from "crypto";
import type { TaskStatus, WebhookAuthType, WorkflowTask } from "@shared/schema";

export interface WebhookResult {
  success: boolean;
  status?: number;
  error?: string;
}

export type TaskEventType = "task_created" | "task_resolved";
export type DeliveryEventType = "delivery_progress" | "delivery_completed";
export type DeliveryStatus = "started" | "delivering" | "completed";

export type TaskEventPayload = {
  task_id: string;
  status: TaskStatus;
  timestamp: string;
  data: {
    event_type: TaskEventType;
    tenant_id: string;
    tool_name: string;
    action: string;
    media_buy_id: string | null;
    due_at: string;
    resolution: string | null;
    resolution_detail: string | null;
  };
};

export type DeliveryPayload = {
  task_id: string;
  status: DeliveryStatus;
  timestamp: string;
  sequence_number: number;
  data: {
    event_type: "delivery_update";
    media_buy_id: string;
    progress: {
      elapsed_hours: number;
      total_hours: number;
      progress_percentage: number;
    };
    delivery: {
      impressions: number;
      spend: number;
      total_budget: number;
      pacing_percentage: number;
    };
  };
};

export type WebhookEvent =
  | {
      type: TaskEventType;
      tenantId: string;
      taskId: string;
      payload: TaskEventPayload;
    }
  | {
      type: DeliveryEventType;
      tenantId: string;
      taskId: string;
      mediaBuyId: string;
      payload: DeliveryPayload;
    };

/**
 * POST a JSON payload to the given URL with a timeout.
 * Returns a structured result; never throws.
 */
export async function sendWebhook(
  url: string,
  payload: unknown,
  opts: { timeoutMs?: number; token?: string | null; authType?: WebhookAuthType; now?: Date } = {},
): Promise<WebhookResult> {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "User-Agent": "media-buy-workflow-engine/1.0 (webhooks)",
  };
  if (opts.token && opts.authType === "hmac_sha256") {
    const timestamp = String(Math.floor((opts.now ?? new Date()).getTime() / 1000));
    headers["X-AdCP-Signature"] = `sha256=${signWebhookBody(opts.token, timestamp, body)}`;
    headers["X-AdCP-Timestamp"] = timestamp;
  } else if (opts.token) {
    headers.Authorization = `Bearer ${opts.token}`;
  }

  try {
    const response = await fetch(url, {
      method: "POST",
      headers,
      body,
      signal: AbortSignal.timeout(opts.timeoutMs ?? 5000),
    });

    if (response.ok) {
      return { success: true, status: response.status };
    }

    return {
      success: false,
      status: response.status,
      error: `HTTP ${response.status}: ${response.statusText}`,
    };
  } catch (err) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/** Hex HMAC-SHA256 of `<timestamp>.<body>`; receivers recompute it to verify a delivery. */
export function signWebhookBody(secret: string, timestamp: string, body: string): string {
  return createHmac("sha256", secret).update(`${timestamp}.${body}`).digest("hex");
}

/**
 * Build the payload for task lifecycle notifications.
 */
export function buildTaskEvent(type: TaskEventType, task: WorkflowTask, now: Date): WebhookEvent {
  return {
    type,
    tenantId: task.tenantId,
    taskId: task.id,
    payload: {
      task_id: task.id,
      status: task.status,
      timestamp: now.toISOString(),
      data: {
        event_type: type,
        tenant_id: task.tenantId,
        tool_name: task.toolName,
        action: task.action,
        media_buy_id: task.mediaBuyId,
        due_at: task.dueAt.toISOString(),
        resolution: task.resolution,
        resolution_detail: task.resolutionDetail,
      },
    },
  };
}

export type DeliveryFigures = Readonly<{
  /** Share of the flight elapsed, 0..1. */
  progress: number;
  elapsedHours: number;
  totalHours: number;
  impressions: number;
  spend: number;
}>;

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Build a delivery update. Simulated and reported delivery share this
 * shape so receivers cannot tell them apart.
 */
export function buildDeliveryEvent(input: {
  taskId: string;
  tenantId: string;
  mediaBuyId: string;
  totalBudget: number;
  status: DeliveryStatus;
  sequenceNumber: number;
  figures: DeliveryFigures;
  now: Date;
}): WebhookEvent {
  const { figures, totalBudget } = input;
  return {
    type: input.status === "completed" ? "delivery_completed" : "delivery_progress",
    tenantId: input.tenantId,
    taskId: input.taskId,
    mediaBuyId: input.mediaBuyId,
    payload: {
      task_id: input.taskId,
      status: input.status,
      timestamp: input.now.toISOString(),
      sequence_number: input.sequenceNumber,
      data: {
        event_type: "delivery_update",
        media_buy_id: input.mediaBuyId,
        progress: {
          elapsed_hours: figures.elapsedHours,
          total_hours: figures.totalHours,
          progress_percentage: round2(figures.progress * 100),
        },
        delivery: {
          impressions: figures.impressions,
          spend: figures.spend,
          total_budget: totalBudget,
          pacing_percentage: totalBudget > 0 ? round2((figures.spend / totalBudget) * 100) : 0,
        },
      },
    },
  };
}
