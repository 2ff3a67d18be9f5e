import { MockAdServerAdapter, type AdServerAdapter } from "../platform/adapters";
import { InMemoryAuditSink, type AuditSink } from "../platform/audit";
import { InMemoryTaskStore, type TaskStore } from "../platform/tasks";
import { systemClock, type Clock } from "./clock";
import type { EngineConfig } from "./config";
import type { Logger } from "./logger";
import { DeferredExecutionResumer } from "./services/deferredExecutionResumer";
import { DeliveryReportScheduler } from "./services/deliveryReportScheduler";
import { DeliverySimulator } from "./services/deliverySimulator";
import { ExecutionLock } from "./services/executionLock";
import { OperationInterceptor } from "./services/operationInterceptor";
import { OverdueTaskMonitor } from "./services/overdueTaskService";
import { BackgroundPollerSupervisor } from "./services/pollerSupervisor";
import { TaskAuditor } from "./services/taskAudit";
import { TaskService } from "./services/taskService";
import { InMemoryTenantPolicyStore, type TenantPolicyStore } from "./services/tenantPolicyService";
import { TenantPolicyWebhookReceiver, WebhookDispatcher } from "./services/webhookDispatcher";

export type WorkflowEngineDeps = Readonly<{
  config: EngineConfig;
  logger: Logger;
  adapter: AdServerAdapter;
  store: TaskStore;
  policies: TenantPolicyStore;
  auditSink: AuditSink;
  clock?: Clock;
}>;

export type WorkflowEngine = Readonly<{
  store: TaskStore;
  policies: TenantPolicyStore;
  adapter: AdServerAdapter;
  dispatcher: WebhookDispatcher;
  interceptor: OperationInterceptor;
  resumer: DeferredExecutionResumer;
  supervisor: BackgroundPollerSupervisor;
  tasks: TaskService;
  overdue: OverdueTaskMonitor;
  simulator: DeliverySimulator | null;
  /** Live delivery reporting, for adapters that are not simulated. */
  reports: DeliveryReportScheduler | null;
  /** Recovers background workers and unfinished executions, then starts the periodic sweeps. */
  start(): Promise<void>;
  /** Stops every timer and waits for in-flight webhooks. Persisted tasks are untouched. */
  stop(): Promise<void>;
}>;

export function createWorkflowEngine(deps: WorkflowEngineDeps): WorkflowEngine {
  const { config, logger, adapter, store, policies } = deps;
  const clock = deps.clock ?? systemClock;

  const lock = new ExecutionLock();
  const auditor = new TaskAuditor(deps.auditSink, logger.child({ source: "audit" }), clock);

  const dispatcher = new WebhookDispatcher({
    maxAttempts: config.webhooks.maxAttempts,
    baseDelayMs: config.webhooks.baseDelayMs,
    logger: logger.child({ source: "webhooks" }),
  });
  dispatcher.register(new TenantPolicyWebhookReceiver(policies, config.webhooks.timeoutMs));

  const simulator =
    config.simulation.enabled && adapter.supportsDeliverySimulation
      ? new DeliverySimulator({
          dispatcher,
          logger: logger.child({ source: "simulator" }),
          defaults: { acceleration: config.simulation.acceleration, intervalMs: config.simulation.intervalMs },
        })
      : null;

  const supervisor = new BackgroundPollerSupervisor({
    store,
    adapter,
    lock,
    auditor,
    dispatcher,
    logger: logger.child({ source: "poller" }),
    clock,
    polling: config.polling,
    simulator,
  });

  const resumer = new DeferredExecutionResumer({
    store,
    adapter,
    lock,
    supervisor,
    auditor,
    dispatcher,
    logger: logger.child({ source: "resumer" }),
    clock,
    simulator,
  });

  const interceptor = new OperationInterceptor({
    store,
    policies,
    adapter,
    lock,
    supervisor,
    auditor,
    dispatcher,
    logger: logger.child({ source: "interceptor" }),
    clock,
  });

  const tasks = new TaskService({ store, resumer, logger: logger.child({ source: "tasks" }), clock });
  const overdue = new OverdueTaskMonitor({ store, auditor, logger: logger.child({ source: "overdue" }), clock });
  const reports = adapter.supportsDeliverySimulation
    ? null
    : new DeliveryReportScheduler({ store, adapter, dispatcher, logger: logger.child({ source: "delivery" }), clock });

  return {
    store,
    policies,
    adapter,
    dispatcher,
    interceptor,
    resumer,
    supervisor,
    tasks,
    overdue,
    simulator,
    reports,
    async start() {
      await supervisor.recover();
      await resumer.recover();
      overdue.start(config.overdueSweepIntervalMs);
      reports?.start(config.deliveryReportIntervalMs);
      logger.info({ adapter: adapter.name, simulation: simulator !== null, deliveryReports: reports !== null }, "workflow engine started");
    },
    async stop() {
      overdue.stop();
      reports?.stop();
      supervisor.shutdown();
      simulator?.stopAll();
      await dispatcher.flush();
      logger.info("workflow engine stopped");
    },
  };
}

/** Engine over in-memory stores and the mock ad server, for local runs without a database. */
export function createDevWorkflowEngine(config: EngineConfig, logger: Logger, clock?: Clock): WorkflowEngine {
  return createWorkflowEngine({
    config,
    logger,
    clock,
    adapter: new MockAdServerAdapter(),
    store: new InMemoryTaskStore(),
    policies: new InMemoryTenantPolicyStore(),
    auditSink: new InMemoryAuditSink(),
  });
}
