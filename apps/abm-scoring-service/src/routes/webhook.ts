import { ErrorRequestHandler, Router, Request, Response } from "express";
import { AbmCrmFlow } from "../flows/abmCrmFlow";
import { ValidationError, errorMessage } from "../utils/errors";

/**
 * POST /webhook
 * CRM change notifications: { event_type?, data: { id, type?, ... } }
 *
 * Always answers 200 so the CRM does not retry; the body carries the flow status.
 */
export function createWebhookRouter(flow: AbmCrmFlow): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const result = await flow.process(req.body);

    console.log(`[webhook] ${result.entity_type} ${result.entity_id}: ${result.status}`, {
      total_score: result.scores?.total_score ?? null,
      duration_ms: result.duration_ms,
    });

    return res.status(200).json(result);
  });

  return router;
}

/**
 * Body parser failures on the webhook paths (malformed JSON, oversized body).
 * Answered with 200 and an error result, like any other rejected event.
 */
export function createWebhookErrorHandler(flow: AbmCrmFlow): ErrorRequestHandler {
  return (error, _req, res, next) => {
    if (res.headersSent) return next(error);

    const result = flow.rejectPayload(new ValidationError(`Unreadable webhook body: ${errorMessage(error)}`));
    return res.status(200).json(result);
  };
}
