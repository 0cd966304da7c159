/**
 * Form search HTTP controller.
 *
 * Express handlers for POST /api/search and POST /api/search_by_topic:
 * - Validates request bodies with the zod schemas
 * - Delegates to SearchUseCase
 * - Checks the outgoing DTO against SearchResponseSchema before sending it
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { SearchUseCase } from "@app/search/SearchUseCase";
import {
  SearchRequestSchema,
  SearchResponseSchema,
  TopicSearchRequestSchema,
} from "@interfaces/http/search/schema";
import { AppError } from "@typesLocal/AppError";

import { toFormListingDto, toSearchResponseDto } from "./search/dto";
import { parseRequest } from "./validation";

export interface SearchController {
  search: RequestHandler;
  searchByTopic: RequestHandler;
}

export function createSearchController(useCase: SearchUseCase): SearchController {
  return {
    async search(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { query, limit, topic, source } = parseRequest(
          SearchRequestSchema,
          req.body
        );

        const result = await useCase.search({ query, limit, topic, source });
        const body = toSearchResponseDto(result);
        const checked = SearchResponseSchema.safeParse(body);

        if (!checked.success) {
          throw new AppError("Invalid response", "InternalError", 500, {
            issues: checked.error.issues,
          });
        }

        res.json(checked.data);
      } catch (err: unknown) {
        next(err);
      }
    },

    async searchByTopic(
      req: Request,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const { topic, limit } = parseRequest(TopicSearchRequestSchema, req.body);
        const result = await useCase.browseTopic(topic, limit);
        const forms = result.forms.map(toFormListingDto);

        res.json({ topic: result.topic, forms, total_found: forms.length });
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}
