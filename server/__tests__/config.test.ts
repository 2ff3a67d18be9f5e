import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: "development",
      port: 5000,
      logLevel: "info",
      databaseUrl: undefined,
      polling: { intervalMs: 30_000, maxDurationMs: 900_000 },
      webhooks: { maxAttempts: 3, baseDelayMs: 1000, timeoutMs: 5000 },
      simulation: { enabled: false, acceleration: 3600, intervalMs: 1000 },
      overdueSweepIntervalMs: 60_000,
      deliveryReportIntervalMs: 86_400_000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      POLL_INTERVAL_MS: "5000",
      DELIVERY_SIMULATION_ENABLED: "TRUE",
      SIMULATION_ACCELERATION: "60",
      DATABASE_URL: "postgres://localhost:5432/workflow",
    });

    expect(config.port).toBe(8080);
    expect(config.polling.intervalMs).toBe(5000);
    expect(config.simulation.enabled).toBe(true);
    expect(config.simulation.acceleration).toBe(60);
    expect(config.databaseUrl).toBe("postgres://localhost:5432/workflow");
  });

  it("throws ConfigError on invalid values", () => {
    expect(() => loadConfig({ WEBHOOK_MAX_ATTEMPTS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
