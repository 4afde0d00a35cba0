import { Router, Request, Response } from "express";
import { AbmCrmFlow } from "../flows/abmCrmFlow";

export function createFlowRouter(flow: AbmCrmFlow): Router {
  const router = Router();

  router.get("/status", (_req: Request, res: Response) => {
    res.json(flow.status());
  });

  return router;
}
