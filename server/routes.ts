import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { taskResolutionSchema, taskStatusEnum } from "@shared/schema";
import type { WorkflowEngine } from "./engine";
import { tenantResolution } from "./middleware/tenant";
import { isOverdue } from "./services/taskService";

const taskListQuerySchema = z.object({
  status: z
    .union([z.enum(taskStatusEnum.enumValues), z.array(z.enum(taskStatusEnum.enumValues))])
    .optional(),
  overdue: z.enum(["true", "false"]).optional(),
});

/** Forwards rejected handler promises to the error middleware. */
function route(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function registerRoutes(app: Express, engine: WorkflowEngine): Express {
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", tenantResolution);

  app.get("/api/tasks", route(async (req, res) => {
    const parsed = taskListQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const tasks = await engine.tasks.getPendingTasks(req.tenantContext, {
      status: parsed.data.status,
      overdueOnly: parsed.data.overdue === "true",
    });
    res.json(tasks);
  }));

  app.get("/api/tasks/:id", route(async (req, res) => {
    const task = await engine.tasks.getTask(req.tenantContext, req.params.id);
    if (!task) return res.status(404).json({ message: "Task not found" });
    res.json({ ...task, overdue: isOverdue(task, new Date()) });
  }));

  app.post("/api/tasks/:id/complete", route(async (req, res) => {
    const parsed = taskResolutionSchema.safeParse({
      ...req.body,
      resolvedBy: req.body?.resolvedBy ?? req.tenantContext.userId,
    });
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const result = await engine.tasks.completeTask(req.tenantContext, req.params.id, parsed.data);
    if (!result.ok) return sendFailure(res, result.error);
    res.json({ task: result.task, duplicate: result.duplicate, execution: result.execution });
  }));

  app.post("/api/operations", route(async (req, res) => {
    const result = await engine.interceptor.intercept(req.tenantContext, req.body);
    if (!result.ok) return sendFailure(res, result.error);
    res.status(result.outcome === "deferred" ? 202 : 200).json(result);
  }));

  return app;
}

function sendFailure(res: Response, error: { code: string; message: string; statusCode: number }) {
  return res.status(error.statusCode).json({ code: error.code, message: error.message });
}
