import { Router, type RequestHandler } from "express";

export function createAskRouter(ask: RequestHandler): Router {
  const router = Router();

  // POST /api/ask { question } -> { question, guidance, relevant_forms, ... }
  router.post("/", ask);

  return router;
}
