import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => String(v ?? "false").toLowerCase() === "true");

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().min(1).optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  MAX_POLLING_DURATION_MS: z.coerce.number().int().positive().default(15 * 60_000),
  WEBHOOK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  WEBHOOK_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  DELIVERY_SIMULATION_ENABLED: booleanFlag,
  SIMULATION_ACCELERATION: z.coerce.number().positive().default(3600),
  SIMULATION_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  OVERDUE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  DELIVERY_REPORT_INTERVAL_MS: z.coerce.number().int().positive().default(86_400_000),
});

export type EngineConfig = Readonly<{
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: string;
  databaseUrl?: string;
  polling: Readonly<{ intervalMs: number; maxDurationMs: number }>;
  webhooks: Readonly<{ maxAttempts: number; baseDelayMs: number; timeoutMs: number }>;
  simulation: Readonly<{ enabled: boolean; acceleration: number; intervalMs: number }>;
  overdueSweepIntervalMs: number;
  deliveryReportIntervalMs: number;
}>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL,
    polling: { intervalMs: e.POLL_INTERVAL_MS, maxDurationMs: e.MAX_POLLING_DURATION_MS },
    webhooks: {
      maxAttempts: e.WEBHOOK_MAX_ATTEMPTS,
      baseDelayMs: e.WEBHOOK_BASE_DELAY_MS,
      timeoutMs: e.WEBHOOK_TIMEOUT_MS,
    },
    simulation: {
      enabled: e.DELIVERY_SIMULATION_ENABLED,
      acceleration: e.SIMULATION_ACCELERATION,
      intervalMs: e.SIMULATION_INTERVAL_MS,
    },
    overdueSweepIntervalMs: e.OVERDUE_SWEEP_INTERVAL_MS,
    deliveryReportIntervalMs: e.DELIVERY_REPORT_INTERVAL_MS,
  };
}
