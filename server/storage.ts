import { and, asc, eq, inArray, lt, sql, type SQL } from "drizzle-orm";
import type { Database } from "./db";
import {
  taskAuditEvents,
  tenantPolicies,
  workflowTasks,
  type InsertTenantPolicy,
  type NewWorkflowTask,
  type TaskStatus,
  type TenantPolicy,
  type WorkflowTask,
} from "@shared/schema";
import type { AuditEvent, AuditSink } from "../platform/audit";
import {
  TaskNotFound,
  TaskStoreConflict,
  type TaskListFilter,
  type TaskPatch,
  type TaskStore,
  type TaskWriteOptions,
  type TransitionResult,
} from "../platform/tasks";
import type { TenantPolicyStore } from "./services/tenantPolicyService";

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function asList<T>(value: T | readonly T[] | undefined): T[] | undefined {
  if (value === undefined) return undefined;
  return isList(value) ? [...value] : [value];
}

export class DatabaseTaskStore implements TaskStore {
  constructor(private readonly db: Database) {}

  async create(task: NewWorkflowTask): Promise<WorkflowTask> {
    const [row] = await this.db.insert(workflowTasks).values(task).returning();
    return row;
  }

  async get(tenantId: string, taskId: string): Promise<WorkflowTask | null> {
    const [row] = await this.db
      .select()
      .from(workflowTasks)
      .where(and(eq(workflowTasks.id, taskId), eq(workflowTasks.tenantId, tenantId)));
    return row ?? null;
  }

  async findById(taskId: string): Promise<WorkflowTask | null> {
    const [row] = await this.db.select().from(workflowTasks).where(eq(workflowTasks.id, taskId));
    return row ?? null;
  }

  async list(filter: TaskListFilter = {}): Promise<WorkflowTask[]> {
    const conditions: SQL[] = [];
    const statuses = asList<TaskStatus>(filter.status);
    const stepTypes = asList(filter.stepType);

    if (filter.tenantId) conditions.push(eq(workflowTasks.tenantId, filter.tenantId));
    if (statuses) conditions.push(inArray(workflowTasks.status, statuses));
    if (stepTypes) conditions.push(inArray(workflowTasks.stepType, stepTypes));
    if (filter.overdue) conditions.push(lt(workflowTasks.dueAt, filter.now ?? new Date()));

    return this.db
      .select()
      .from(workflowTasks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(workflowTasks.createdAt))
      .limit(Math.min(Math.max(filter.limit ?? 500, 1), 5000));
  }

  async update(taskId: string, patch: TaskPatch, opts?: TaskWriteOptions): Promise<WorkflowTask> {
    const where =
      opts?.expectedVersion != null
        ? and(eq(workflowTasks.id, taskId), eq(workflowTasks.version, opts.expectedVersion))
        : eq(workflowTasks.id, taskId);

    const [row] = await this.db
      .update(workflowTasks)
      .set({ ...patch, version: sql`${workflowTasks.version} + 1` })
      .where(where)
      .returning();
    if (row) return row;

    const current = await this.findById(taskId);
    if (!current) throw new TaskNotFound(taskId);
    throw new TaskStoreConflict(
      `task ${taskId} version ${current.version} != expected ${opts?.expectedVersion}`,
    );
  }

  async transition(
    taskId: string,
    from: readonly TaskStatus[],
    patch: TaskPatch,
  ): Promise<TransitionResult> {
    const [row] = await this.db
      .update(workflowTasks)
      .set({ ...patch, version: sql`${workflowTasks.version} + 1` })
      .where(and(eq(workflowTasks.id, taskId), inArray(workflowTasks.status, [...from])))
      .returning();
    if (row) return { task: row, applied: true };

    const current = await this.findById(taskId);
    if (!current) throw new TaskNotFound(taskId);
    return { task: current, applied: false };
  }
}

export class DatabaseAuditSink implements AuditSink {
  constructor(private readonly db: Database) {}

  async emit(event: AuditEvent): Promise<void> {
    await this.db.insert(taskAuditEvents).values({
      eventId: event.eventId,
      tenantId: event.tenantId,
      taskId: event.taskId,
      eventType: event.eventType,
      actorType: event.actorType,
      actorId: event.actorId,
      metadata: event.metadata ?? null,
      timestamp: new Date(event.timestamp),
    });
  }
}

export class DatabaseTenantPolicyStore implements TenantPolicyStore {
  constructor(private readonly db: Database) {}

  async getPolicy(tenantId: string): Promise<TenantPolicy | null> {
    const [row] = await this.db.select().from(tenantPolicies).where(eq(tenantPolicies.tenantId, tenantId));
    return row ?? null;
  }

  async upsertPolicy(policy: InsertTenantPolicy): Promise<TenantPolicy> {
    const values = { ...policy, updatedAt: new Date() };
    const [row] = await this.db
      .insert(tenantPolicies)
      .values(values)
      .onConflictDoUpdate({ target: tenantPolicies.tenantId, set: values })
      .returning();
    return row;
  }
}
