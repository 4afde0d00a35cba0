import express, { Express } from "express";
import cors from "cors";
import { AbmCrmFlow } from "./flows/abmCrmFlow";
import { Scheduler } from "./scheduler/scheduler";
import { adminAuth } from "./middleware/adminAuth";
import { createWebhookErrorHandler, createWebhookRouter } from "./routes/webhook";
import { createCacheRouter } from "./routes/cache";
import { createFlowRouter } from "./routes/flow";
import { createSchedulerRouter } from "./routes/scheduler";
import { createScoringRouter } from "./routes/scoring";

export interface AppDeps {
  flow: AbmCrmFlow;
  scheduler: Scheduler;
  adminApiKey: string;
}

const ENDPOINTS = [
  "POST /webhook",
  "POST /hubspot-webhook",
  "GET /cache/stats",
  "POST /cache/clear",
  "GET /flow/status",
  "GET /scheduler/status",
  "POST /scheduler/start",
  "POST /scheduler/stop",
  "POST /scheduler/tasks",
  "GET|PATCH|DELETE /scheduler/tasks/:id",
  "GET /scoring/weights",
  "POST /scoring/weights",
  "POST /scoring/weights/reset",
  "POST /scoring/score",
  "GET /health",
];

export function createApp({ flow, scheduler, adminApiKey }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({ service: "abm-scoring-service", endpoints: ENDPOINTS });
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      scheduler: scheduler.isRunning ? "running" : "stopped",
    });
  });

  // CRM webhooks
  const webhook = createWebhookRouter(flow);
  app.use("/webhook", webhook);
  app.use("/hubspot-webhook", webhook);
  app.use(["/webhook", "/hubspot-webhook"], createWebhookErrorHandler(flow));

  // Admin
  const admin = adminAuth(adminApiKey);
  app.use("/cache", admin, createCacheRouter(flow.cache));
  app.use("/flow", admin, createFlowRouter(flow));
  app.use("/scheduler", admin, createSchedulerRouter(scheduler, flow));
  app.use("/scoring", admin, createScoringRouter(flow));

  return app;
}
