import { Router } from "express";

import type { SearchController } from "@interfaces/http/SearchController";

/**
 * Semantic form search.
 *
 *   POST /api/search { query, limit?, topic?, source? } -> { query, forms, total_found }
 */
export function createSearchRouter(controller: SearchController): Router {
  const router = Router();
  router.post("/", controller.search);
  return router;
}

/**
 *   POST /api/search_by_topic { topic, limit? } -> { topic, forms, total_found }
 */
export function createTopicSearchRouter(controller: SearchController): Router {
  const router = Router();
  router.post("/", controller.searchByTopic);
  return router;
}
