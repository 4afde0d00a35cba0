import { Request, Response, NextFunction, RequestHandler } from "express";
import { timingSafeEqual } from "crypto";

/**
 * Extract API key from request
 */
export function extractApiKey(req: Request): string | null {
  // 1. X-API-Key header
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey) {
    return headerKey;
  }

  // 2. Authorization: Bearer <key>
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  // 3. Query param
  const queryKey = req.query.api_key;
  if (typeof queryKey === "string" && queryKey) {
    return queryKey;
  }

  return null;
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guard for admin routes. With no key configured (dev mode) every request passes.
 */
export function adminAuth(adminApiKey: string): RequestHandler {
  if (!adminApiKey) {
    console.warn("[adminAuth] ADMIN_API_KEY not set, admin routes are open");
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (!adminApiKey) {
      next();
      return;
    }

    const apiKey = extractApiKey(req);
    if (!apiKey) {
      res.status(401).json({
        error: "Missing API key. Provide via X-API-Key header, Authorization Bearer, or api_key query param",
      });
      return;
    }

    if (!keysMatch(apiKey, adminApiKey)) {
      console.warn(`[adminAuth] Rejected ${req.method} ${req.originalUrl}: invalid API key`);
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    next();
  };
}
