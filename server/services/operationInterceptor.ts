import { submittedOperationSchema, type SubmittedOperation } from "@shared/operations";
import { isAdapterError, type AdServerAdapter } from "../../platform/adapters";
import type { TaskStore } from "../../platform/tasks";
import type { Clock } from "../clock";
import { InvalidOperation, WorkflowEngineError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { TenantContext } from "../tenant";
import { type ExecutionLock, mediaBuyLockKey } from "./executionLock";
import { buildTaskEvent } from "./notificationService";
import { executeOperation, type OperationResult } from "./operationExecutor";
import type { BackgroundPollerSupervisor } from "./pollerSupervisor";
import { SYSTEM_ACTOR, userActor, type TaskAuditor } from "./taskAudit";
import { buildPendingApprovalTask, operationMediaBuyId } from "./taskFactory";
import { requireTenantPolicy, requiresManualApproval, type TenantPolicyStore } from "./tenantPolicyService";
import type { WebhookDispatcher } from "./webhookDispatcher";

export type OperationFailure = Readonly<{
  code: string;
  message: string;
  statusCode: number;
}>;

export type InterceptResult =
  | {
      ok: true;
      outcome: "executed";
      result: OperationResult;
      backgroundTaskId?: string;
    }
  | {
      ok: true;
      outcome: "deferred";
      taskId: string;
      status: "pending_manual";
      dueAt: string;
    }
  | {
      ok: false;
      outcome: "error";
      error: OperationFailure;
    };

export type InterceptorDeps = Readonly<{
  store: TaskStore;
  policies: TenantPolicyStore;
  adapter: AdServerAdapter;
  lock: ExecutionLock;
  supervisor: BackgroundPollerSupervisor;
  auditor: TaskAuditor;
  dispatcher: WebhookDispatcher;
  logger: Logger;
  clock: Clock;
}>;

function toFailure(err: unknown): OperationFailure {
  if (err instanceof WorkflowEngineError) {
    return { code: err.code, message: err.message, statusCode: err.statusCode };
  }
  if (isAdapterError(err)) {
    return { code: `ADAPTER_${err.kind.toUpperCase()}`, message: err.message, statusCode: 502 };
  }
  return { code: "INTERNAL_ERROR", message: errorMessage(err), statusCode: 500 };
}

/**
 * Decides, per tenant policy, whether an operation runs now or waits for a
 * human. Deferred operations are captured whole in a pending task so they
 * can be replayed later without the caller.
 */
export class OperationInterceptor {
  constructor(private readonly deps: InterceptorDeps) {}

  async intercept(ctx: TenantContext, input: unknown): Promise<InterceptResult> {
    const { logger } = this.deps;
    try {
      const operation = this.parse(input);
      const policy = await requireTenantPolicy(this.deps.policies, ctx.tenantId);

      if (!requiresManualApproval(policy, operation.kind)) {
        return await this.executeNow(ctx, operation);
      }
      return await this.defer(ctx, operation);
    } catch (err) {
      const error = toFailure(err);
      logger.warn({ tenantId: ctx.tenantId, code: error.code, err: error.message }, "operation not accepted");
      return { ok: false, outcome: "error", error };
    }
  }

  private parse(input: unknown): SubmittedOperation {
    const parsed = submittedOperationSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "operation"}: ${i.message}`).join("; ");
      throw new InvalidOperation(issues);
    }
    return parsed.data;
  }

  private async executeNow(ctx: TenantContext, operation: SubmittedOperation): Promise<InterceptResult> {
    const { adapter, lock, supervisor, clock, logger } = this.deps;

    const mediaBuyId = operationMediaBuyId(operation);
    const run = () => executeOperation(adapter, operation, clock.now());
    const result = mediaBuyId ? await lock.runExclusive(mediaBuyLockKey(mediaBuyId), run) : await run();

    logger.info(
      { tenantId: ctx.tenantId, kind: operation.kind, mediaBuyId: result.mediaBuyId, pending: result.pending },
      "operation executed immediately",
    );

    if (!result.pending) {
      return { ok: true, outcome: "executed", result };
    }

    const background = await supervisor.spawnBackgroundTask({
      tenantId: ctx.tenantId,
      principalId: operation.principalId,
      mediaBuyId: result.mediaBuyId,
      parentTaskId: null,
    });
    return { ok: true, outcome: "executed", result, backgroundTaskId: background.id };
  }

  private async defer(ctx: TenantContext, operation: SubmittedOperation): Promise<InterceptResult> {
    const { store, auditor, dispatcher, clock, logger } = this.deps;

    const now = clock.now();
    const task = await store.create(
      buildPendingApprovalTask({ tenantId: ctx.tenantId, operation, now }),
    );

    await auditor.record(task, "task_created", ctx.userId ? userActor(ctx.userId) : SYSTEM_ACTOR, {
      toolName: task.toolName,
      action: task.action,
      dueAt: task.dueAt.toISOString(),
    });
    dispatcher.notify(buildTaskEvent("task_created", task, now));
    logger.info(
      { tenantId: ctx.tenantId, taskId: task.id, toolName: task.toolName, dueAt: task.dueAt.toISOString() },
      "operation deferred for manual approval",
    );

    return {
      ok: true,
      outcome: "deferred",
      taskId: task.id,
      status: "pending_manual",
      dueAt: task.dueAt.toISOString(),
    };
  }
}
