import { Router, Request, Response } from "express";
import { z } from "zod";
import { AbmCrmFlow } from "../flows/abmCrmFlow";
import { KNOWN_ENTITY_TYPES } from "../types/entities";
import { parseRequest, sendError } from "./helpers";

const UpdateWeightsSchema = z.object({
  entity_type: z.enum(KNOWN_ENTITY_TYPES).default("company"),
  weights: z.record(z.number()),
});

const ScoreRequestSchema = z.object({
  entity: z.record(z.unknown()),
  weights: z.record(z.number().min(0).max(1)).optional(),
});

/**
 * Scoring weight administration and ad-hoc scoring
 */
export function createScoringRouter(flow: AbmCrmFlow): Router {
  const router = Router();

  router.get("/weights", (_req: Request, res: Response) => {
    res.json({ weights: flow.weights.all() });
  });

  router.post("/weights", (req: Request, res: Response) => {
    try {
      const body = parseRequest(UpdateWeightsSchema, req.body);
      const weights = flow.updateWeights(body.entity_type, body.weights);
      return res.json({ status: "updated", entity_type: body.entity_type, weights });
    } catch (error) {
      return sendError(res, "scoring", error);
    }
  });

  router.post("/weights/reset", (_req: Request, res: Response) => {
    res.json({ status: "reset", weights: flow.resetWeights() });
  });

  /**
   * POST /scoring/score
   * Scores { entity, weights? } with the current weights, overridden per request by `weights`;
   * nothing is cached or stored
   */
  router.post("/score", (req: Request, res: Response) => {
    try {
      const { entity, weights } = parseRequest(ScoreRequestSchema, req.body);
      return res.json(flow.score(entity, weights));
    } catch (error) {
      return sendError(res, "scoring", error);
    }
  });

  return router;
}
