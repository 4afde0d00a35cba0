import "dotenv/config";

/**
 * Environment configuration
 */
export const config = {
  port: parseInt(process.env.PORT || "3000", 10),

  // HubSpot
  hubspotAccessToken: process.env.HUBSPOT_ACCESS_TOKEN || "",
  hubspotBaseUrl: process.env.HUBSPOT_BASE_URL || "https://api.hubapi.com",

  // Supabase
  supabaseUrl: process.env.SUPABASE_URL || "",
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || "",

  // Admin routes are open when unset (dev mode)
  adminApiKey: process.env.ADMIN_API_KEY || "",

  cache: {
    entity: {
      ttlSeconds: parseInt(process.env.CACHE_ENTITY_TTL || "3600", 10),
      maxSize: parseInt(process.env.CACHE_ENTITY_MAXSIZE || "1000", 10),
    },
    score: {
      ttlSeconds: parseInt(process.env.CACHE_SCORE_TTL || "86400", 10),
      maxSize: parseInt(process.env.CACHE_SCORE_MAXSIZE || "5000", 10),
    },
    prompt: {
      ttlSeconds: parseInt(process.env.CACHE_PROMPT_TTL || "3600", 10),
      maxSize: parseInt(process.env.CACHE_PROMPT_MAXSIZE || "1000", 10),
    },
  },

  scheduler: {
    tickMs: parseInt(process.env.SCHEDULER_TICK_MS || "1000", 10),
    maxConcurrency: parseInt(process.env.SCHEDULER_MAX_CONCURRENCY || "4", 10),
    autoStart: (process.env.SCHEDULER_AUTOSTART || "true") === "true",
    sweepIntervalSeconds: parseInt(process.env.SWEEP_INTERVAL_SECONDS || "3600", 10),
    sweepBatchSize: parseInt(process.env.SWEEP_BATCH_SIZE || "50", 10),
    sweepEntityTypes: (process.env.SWEEP_ENTITY_TYPES || "company,contact")
      .split(",")
      .map(s => s.trim())
      .filter(Boolean),
  },

  nodeEnv: process.env.NODE_ENV || "development",
};
