// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import { MockAdServerAdapter } from "../platform/adapters";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { createDevWorkflowEngine, createWorkflowEngine, type WorkflowEngine } from "./engine";
import { createLogger } from "./logger";
import { seedTenantPolicies } from "./seed";
import { DatabaseAuditSink, DatabaseTaskStore, DatabaseTenantPolicyStore } from "./storage";

const config = loadConfig();
const logger = createLogger(config.logLevel);

function buildEngine(): { engine: WorkflowEngine; close: () => Promise<void> } {
  if (!config.databaseUrl) {
    logger.warn("DATABASE_URL not set, using in-memory stores");
    return { engine: createDevWorkflowEngine(config, logger), close: async () => {} };
  }
  const { db, pool } = createDatabase(config.databaseUrl);
  const engine = createWorkflowEngine({
    config,
    logger,
    adapter: new MockAdServerAdapter(),
    store: new DatabaseTaskStore(db),
    policies: new DatabaseTenantPolicyStore(db),
    auditSink: new DatabaseAuditSink(db),
  });
  return { engine, close: () => pool.end() };
}

async function main(): Promise<void> {
  const { engine, close } = buildEngine();

  if (config.nodeEnv !== "production") {
    await seedTenantPolicies(engine.policies, logger.child({ source: "seed" }));
  }
  await engine.start();

  const httpServer = createServer(createApp(engine, logger));
  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info({ port: config.port }, `serving on port ${config.port}`);
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    httpServer.close();
    engine
      .stop()
      .then(close)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
