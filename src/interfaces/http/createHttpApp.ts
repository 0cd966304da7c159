import cors from "cors";
import express, { type Express, type RequestHandler } from "express";

import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import type { CrawlUseCase } from "@app/crawl/CrawlUseCase";
import type { AskUseCase } from "@app/guidance/AskUseCase";
import type { SearchUseCase } from "@app/search/SearchUseCase";
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";

import { createAskController } from "./AskController";
import {
  createCatalogController,
  type CatalogController,
} from "./CatalogController";
import { createCrawlController } from "./CrawlController";
import {
  createSearchController,
  type SearchController,
} from "./SearchController";

export interface HttpControllers {
  ask: RequestHandler;
  search: SearchController;
  crawl: RequestHandler;
  catalog: CatalogController;
}

export interface HttpAppDependencies {
  ask: AskUseCase;
  search: SearchUseCase;
  crawl: CrawlUseCase;
  catalog: CatalogUseCase;
  embeddingModel: string;
  /** Directory of the static web page; omitted in tests. */
  publicDir?: string;
}

export function createHttpApp(deps: HttpAppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  if (deps.publicDir) {
    app.use(express.static(deps.publicDir));
  }

  registerRoutes(app, {
    ask: createAskController(deps.ask),
    search: createSearchController(deps.search),
    crawl: createCrawlController(deps.crawl),
    catalog: createCatalogController(deps.catalog, deps.embeddingModel),
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
