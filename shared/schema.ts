import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, pgEnum, boolean, integer, jsonb, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import {
  operationKindSchema,
  type ExecutionRecord,
  type OperationKind,
  type RequestContext,
} from "./operations";

export const stepTypeEnum = pgEnum("step_type", [
  "approval",
  "creation",
  "background_task",
]);

export const taskStatusEnum = pgEnum("task_status", [
  "pending_approval",
  "working",
  "completed",
  "rejected",
  "failed",
]);

export const taskOwnerEnum = pgEnum("task_owner", [
  "publisher",
  "system",
]);

export const taskActionEnum = pgEnum("task_action", [
  "create",
  "activate",
  "approve",
  "pause",
  "resume",
  "update",
  "assign_creatives",
]);

export const taskResolutionEnum = pgEnum("task_resolution", [
  "approved",
  "rejected",
]);

export const webhookAuthTypeEnum = pgEnum("webhook_auth_type", [
  "bearer",
  "hmac_sha256",
]);

export const auditActorTypeEnum = pgEnum("audit_actor_type", [
  "user",
  "system",
]);

export const workflowTasks = pgTable("workflow_tasks", {
  id: varchar("id").primaryKey(),
  tenantId: varchar("tenant_id").notNull(),
  principalId: varchar("principal_id").notNull(),
  stepType: stepTypeEnum("step_type").notNull(),
  toolName: text("tool_name").$type<OperationKind>().notNull(),
  status: taskStatusEnum("status").notNull().default("pending_approval"),
  owner: taskOwnerEnum("owner").notNull(),
  action: taskActionEnum("action").notNull(),
  mediaBuyId: varchar("media_buy_id"),
  requestContext: jsonb("request_context").$type<RequestContext>().notNull(),
  assignedTo: text("assigned_to"),
  parentTaskId: varchar("parent_task_id"),
  executionResult: jsonb("execution_result").$type<ExecutionRecord>(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  dueAt: timestamp("due_at").notNull(),
  resolvedAt: timestamp("resolved_at"),
  resolvedBy: text("resolved_by"),
  resolution: taskResolutionEnum("resolution"),
  resolutionDetail: text("resolution_detail"),
  version: integer("version").notNull().default(1),
}, (table) => [
  index("idx_workflow_tasks_tenant_status").on(table.tenantId, table.status),
  index("idx_workflow_tasks_step_status").on(table.stepType, table.status),
]);

export const tenantPolicies = pgTable("tenant_policies", {
  tenantId: varchar("tenant_id").primaryKey(),
  manualApprovalRequired: boolean("manual_approval_required").notNull().default(false),
  approvalRequiredOperations: jsonb("approval_required_operations")
    .$type<OperationKind[]>()
    .notNull()
    .default(sql`'[]'::jsonb`),
  webhookUrl: text("webhook_url"),
  webhookToken: text("webhook_token"),
  webhookAuthType: webhookAuthTypeEnum("webhook_auth_type").notNull().default("bearer"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const taskAuditEvents = pgTable("task_audit_events", {
  eventId: varchar("event_id").primaryKey().default(sql`gen_random_uuid()`),
  tenantId: varchar("tenant_id").notNull(),
  taskId: varchar("task_id").notNull(),
  eventType: text("event_type").notNull(),
  actorType: auditActorTypeEnum("actor_type").notNull(),
  actorId: text("actor_id"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  timestamp: timestamp("timestamp").defaultNow().notNull(),
}, (table) => [
  index("idx_task_audit_events_task").on(table.taskId),
]);

// Insert schemas
export const insertTenantPolicySchema = createInsertSchema(tenantPolicies, {
  approvalRequiredOperations: z.array(operationKindSchema),
  webhookUrl: z.string().url().nullable().optional(),
}).omit({
  updatedAt: true,
});

export const taskResolutionSchema = z.object({
  resolution: z.enum(taskResolutionEnum.enumValues),
  detail: z.string().max(2000).optional(),
  resolvedBy: z.string().min(1),
});

// Types
export type StepType = (typeof stepTypeEnum.enumValues)[number];
export type TaskStatus = (typeof taskStatusEnum.enumValues)[number];
export type TaskOwner = (typeof taskOwnerEnum.enumValues)[number];
export type TaskAction = (typeof taskActionEnum.enumValues)[number];
export type TaskResolution = (typeof taskResolutionEnum.enumValues)[number];
export type WebhookAuthType = (typeof webhookAuthTypeEnum.enumValues)[number];

export type WorkflowTask = typeof workflowTasks.$inferSelect;
export type NewWorkflowTask = Omit<WorkflowTask, "version">;

export type InsertTenantPolicy = z.infer<typeof insertTenantPolicySchema>;
export type TenantPolicy = typeof tenantPolicies.$inferSelect;

export type TaskResolutionInput = z.infer<typeof taskResolutionSchema>;

export type TaskAuditEventRow = typeof taskAuditEvents.$inferSelect;

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ["completed", "rejected", "failed"];
