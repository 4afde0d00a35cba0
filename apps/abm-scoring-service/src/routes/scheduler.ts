import { Router, Request, Response } from "express";
import { z } from "zod";
import { Scheduler } from "../scheduler/scheduler";
import { AbmCrmFlow, sweepTask, sweepTaskId } from "../flows/abmCrmFlow";
import { KNOWN_ENTITY_TYPES } from "../types/entities";
import { NotFoundError, ValidationError } from "../utils/errors";
import { parseRequest, sendError } from "./helpers";

const AddTaskSchema = z.object({
  task_id: z.string().min(1).optional(),
  entity_type: z.enum(KNOWN_ENTITY_TYPES),
  interval: z.number().positive(),
  limit: z.number().int().positive().default(50),
});

const UpdateTaskSchema = z.object({
  interval: z.number().positive().optional(),
  entity_type: z.enum(KNOWN_ENTITY_TYPES).optional(),
  limit: z.number().int().positive().optional(),
});

/**
 * Scheduler administration. Tasks added here are CRM sweeps.
 */
export function createSchedulerRouter(scheduler: Scheduler, flow: AbmCrmFlow): Router {
  const router = Router();

  router.get("/status", (_req: Request, res: Response) => {
    res.json(scheduler.status());
  });

  router.post("/start", (_req: Request, res: Response) => {
    try {
      if (!scheduler.start()) {
        throw new ValidationError("Scheduler is already running");
      }
      return res.json({ status: "started" });
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  router.post("/stop", (_req: Request, res: Response) => {
    try {
      if (!scheduler.stop()) {
        throw new ValidationError("Scheduler is already stopped");
      }
      return res.json({ status: "stopped" });
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  router.post("/tasks", (req: Request, res: Response) => {
    try {
      const body = parseRequest(AddTaskSchema, req.body);
      const taskId = body.task_id ?? sweepTaskId(body.entity_type);

      const added = scheduler.addTask(taskId, sweepTask(flow), body.interval, {
        entity_type: body.entity_type,
        limit: body.limit,
      });
      if (!added) {
        throw new ValidationError(`Task ${taskId} already exists`, { task_id: taskId });
      }

      return res.status(201).json(scheduler.getTaskStatus(taskId));
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  router.get("/tasks/:id", (req: Request, res: Response) => {
    try {
      const task = scheduler.getTaskStatus(req.params.id);
      if (!task) {
        throw new NotFoundError(`Task ${req.params.id} not found`, { task_id: req.params.id });
      }
      return res.json(task);
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  router.patch("/tasks/:id", (req: Request, res: Response) => {
    try {
      const taskId = req.params.id;
      if (!scheduler.getTaskStatus(taskId)) {
        throw new NotFoundError(`Task ${taskId} not found`, { task_id: taskId });
      }

      const body = parseRequest(UpdateTaskSchema, req.body);
      const args: Record<string, unknown> = {};
      if (body.entity_type !== undefined) args.entity_type = body.entity_type;
      if (body.limit !== undefined) args.limit = body.limit;

      scheduler.updateTask(taskId, { intervalSeconds: body.interval, args });
      return res.json(scheduler.getTaskStatus(taskId));
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  router.delete("/tasks/:id", (req: Request, res: Response) => {
    try {
      if (!scheduler.removeTask(req.params.id)) {
        throw new NotFoundError(`Task ${req.params.id} not found`, { task_id: req.params.id });
      }
      return res.json({ status: "removed", task_id: req.params.id });
    } catch (error) {
      return sendError(res, "scheduler", error);
    }
  });

  return router;
}
