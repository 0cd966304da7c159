/**
 * Read-only catalogue endpoints: sources, stats, topics and health.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";

export interface CatalogController {
  sources: RequestHandler;
  stats: RequestHandler;
  topics: RequestHandler;
  health: RequestHandler;
}

export function createCatalogController(
  useCase: CatalogUseCase,
  embeddingModel: string
): CatalogController {
  return {
    async sources(_req: Request, res: Response, next: NextFunction) {
      try {
        const sources = await useCase.listSources();

        res.json({
          sources: sources.map((s) => ({
            source_id: s.sourceId,
            summary: s.summary,
            total_word_count: s.totalWordCount,
          })),
          total: sources.length,
        });
      } catch (err: unknown) {
        next(err);
      }
    },

    async stats(_req: Request, res: Response, next: NextFunction) {
      try {
        const stats = await useCase.stats();

        res.json({
          total_forms: stats.totalForms,
          total_topics: stats.totalTopics,
          forms_by_topic: stats.formsByTopic,
        });
      } catch (err: unknown) {
        next(err);
      }
    },

    async topics(_req: Request, res: Response, next: NextFunction) {
      try {
        const topics = await useCase.topics();
        res.json({ topics, total_topics: topics.length });
      } catch (err: unknown) {
        next(err);
      }
    },

    async health(_req: Request, res: Response, next: NextFunction) {
      try {
        await useCase.health();
        res.json({
          status: "ok",
          store: "connected",
          embedding_model: embeddingModel,
        });
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}
