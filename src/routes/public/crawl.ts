import { Router, type RequestHandler } from "express";

export function createCrawlRouter(crawl: RequestHandler): Router {
  const router = Router();

  // Fire-and-forget: responds 202 before the crawler has done any work.
  router.post("/", crawl);

  return router;
}
