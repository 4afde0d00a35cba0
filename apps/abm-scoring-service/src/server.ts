import { config } from "./config";
import { createApp } from "./app";
import { CacheManager } from "./cache/cacheManager";
import { createDocumentStore } from "./db/client";
import { createCrmClient } from "./services/crmClient";
import { AbmCrmFlow, registerSweeps } from "./flows/abmCrmFlow";
import { Scheduler } from "./scheduler/scheduler";

const cache = new CacheManager(config.cache);
const store = createDocumentStore();
const crm = createCrmClient();
const flow = new AbmCrmFlow({ cache, store, crm });

const scheduler = new Scheduler({
  tickMs: config.scheduler.tickMs,
  maxConcurrency: config.scheduler.maxConcurrency,
});

if (crm) {
  registerSweeps(scheduler, flow, {
    entityTypes: config.scheduler.sweepEntityTypes,
    intervalSeconds: config.scheduler.sweepIntervalSeconds,
    limit: config.scheduler.sweepBatchSize,
  });
}
if (config.scheduler.autoStart) {
  scheduler.start();
}

const app = createApp({ flow, scheduler, adminApiKey: config.adminApiKey });

// Start server
const server = app.listen(config.port, () => {
  console.log(`[server] ABM Scoring Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Store: ${store.backend}`);
  console.log(`[server] CRM: ${crm ? crm.name : "not configured"}`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[server] ${signal} received, shutting down`);
  if (scheduler.isRunning) {
    scheduler.stop();
  }
  const drained = await scheduler.drain(10_000);
  if (!drained) {
    console.warn("[server] Scheduler jobs still running at shutdown");
  }
  server.close(() => process.exit(0));
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch(error => {
      console.error("[server] Shutdown failed:", error);
      process.exit(1);
    });
  });
}

export default app;
