import { Router } from "express";

import type { CatalogController } from "@interfaces/http/CatalogController";

export function createCatalogRouter(controller: CatalogController): Router {
  const router = Router();

  router.get("/sources", controller.sources);
  router.get("/stats", controller.stats);
  router.get("/topics", controller.topics);
  router.get("/health", controller.health);

  return router;
}
