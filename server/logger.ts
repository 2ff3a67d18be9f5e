import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: undefined,
    redact: ["req.headers.authorization", "*.webhookToken", "*.token"],
  });
}

/** Silent logger for tests and tools that do not want output. */
export const silentLogger: Logger = pino({ level: "silent" });
