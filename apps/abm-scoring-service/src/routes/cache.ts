import { Router, Request, Response } from "express";
import { z } from "zod";
import { CacheManager } from "../cache/cacheManager";
import { parseRequest, sendError } from "./helpers";

const ClearQuerySchema = z.object({
  cache_type: z.string().optional(),
});

export function createCacheRouter(cache: CacheManager): Router {
  const router = Router();

  router.get("/stats", (_req: Request, res: Response) => {
    res.json(cache.stats());
  });

  /**
   * POST /cache/clear?cache_type=entity|score|prompt
   * Omit cache_type to clear everything.
   */
  router.post("/clear", (req: Request, res: Response) => {
    try {
      const { cache_type: cacheType } = parseRequest(ClearQuerySchema, req.query);
      cache.clear(cacheType);
      console.log(`[cache] Cleared ${cacheType ?? "all"} cache(s)`);
      return res.json({ status: "cleared", cache_type: cacheType ?? "all" });
    } catch (error) {
      return sendError(res, "cache", error);
    }
  });

  return router;
}
