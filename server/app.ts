import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { WorkflowEngine } from "./engine";
import type { Logger } from "./logger";
import { registerRoutes } from "./routes";

function statusCodeOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
    if ("status" in err && typeof err.status === "number") return err.status;
  }
  return 500;
}

export function createApp(engine: WorkflowEngine, logger: Logger): Express {
  const app = express();
  const httpLogger = logger.child({ source: "express" });

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    res.on("finish", () => {
      if (path.startsWith("/api")) {
        httpLogger.info(
          { method: req.method, path, status: res.statusCode, durationMs: Date.now() - start },
          `${req.method} ${path} ${res.statusCode}`,
        );
      }
    });
    next();
  });

  registerRoutes(app, engine);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusCodeOf(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";

    httpLogger.error({ err }, "request failed");

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  return app;
}
