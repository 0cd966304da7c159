import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { CrawlUseCase } from "@app/crawl/CrawlUseCase";
import { CrawlRequestSchema } from "@interfaces/http/crawl/schema";

import { parseRequest } from "./validation";

/**
 * POST /api/crawl: acknowledges with 202 once the jobs are handed off.
 */
export function createCrawlController(useCase: CrawlUseCase): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const { type } = parseRequest(CrawlRequestSchema, req.body);
      const accepted = useCase.trigger(type);

      res.status(202).json({
        status: accepted.status,
        crawl_type: accepted.crawlType,
        jobs: accepted.jobs.map((job) => ({
          tool: job.tool,
          url: job.arguments.url,
          ...(job.topic ? { topic: job.topic } : {}),
        })),
      });
    } catch (err: unknown) {
      next(err);
    }
  };
}
