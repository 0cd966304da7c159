/**
 * Express route registration for the court forms HTTP API.
 *
 * - POST /api/ask               guidance + related forms for a question
 * - POST /api/search            semantic form search
 * - POST /api/search_by_topic   forms of one topic
 * - POST /api/crawl             trigger re-ingestion
 * - GET  /api/sources|stats|topics|health
 */
import type { Express } from "express";

import type { HttpControllers } from "@interfaces/http/createHttpApp";
import { createAskRouter } from "@routes/public/ask";
import { createCatalogRouter } from "@routes/public/catalog";
import { createCrawlRouter } from "@routes/public/crawl";
import {
  createSearchRouter,
  createTopicSearchRouter,
} from "@routes/public/search";

export function registerRoutes(app: Express, controllers: HttpControllers): void {
  app.use("/api/ask", createAskRouter(controllers.ask));
  app.use("/api/search", createSearchRouter(controllers.search));
  app.use("/api/search_by_topic", createTopicSearchRouter(controllers.search));
  app.use("/api/crawl", createCrawlRouter(controllers.crawl));
  app.use("/api", createCatalogRouter(controllers.catalog));
}
