/**
 * Wires the service graph from configuration.
 *
 * The vector store is either PostgreSQL/pgvector (production) or an in-process
 * index built from the forms catalogue file (local runs without a database).
 */
import type OpenAI from "openai";
import type { Pool } from "pg";

import { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { CrawlUseCase } from "@app/crawl/CrawlUseCase";
import { AskUseCase } from "@app/guidance/AskUseCase";
import { SearchUseCase } from "@app/search/SearchUseCase";
import type { AppConfig } from "@config/index";
import type { FormRepository } from "@domain/forms/ports";

import { loadFormsCatalog } from "./catalog/FormsCatalog";
import { HttpCrawlDispatcher } from "./crawl/HttpCrawlDispatcher";
import { createPool } from "./database/db";
import { InMemoryFormRepository } from "./database/InMemoryFormRepository";
import { PgVectorFormRepository } from "./database/PgVectorFormRepository";
import { loadGuidanceTable } from "./guidance/loadGuidanceTable";
import { OpenAIEmbeddingProvider } from "./llm/EmbeddingProvider";
import { createOpenAIClient } from "./llm/OpenAIAdapter";
import { logger } from "./logging/Logger";

export interface Container {
  openai: OpenAI;
  embedder: OpenAIEmbeddingProvider;
  search: SearchUseCase;
  ask: AskUseCase;
  crawl: CrawlUseCase;
  catalog: CatalogUseCase;
  close(): Promise<void>;
}

export async function createContainer(config: AppConfig): Promise<Container> {
  const guidance = loadGuidanceTable(config.guidance.dataPath);

  const openai = createOpenAIClient(config.openai);
  const embedder = new OpenAIEmbeddingProvider(
    openai,
    config.openai.embeddingModel,
    config.embedding.dimensions
  );

  let pool: Pool | null = null;
  let repository: FormRepository;

  if (config.store.driver === "memory") {
    const catalog = loadFormsCatalog(config.store.catalogPath);
    const memory = await InMemoryFormRepository.fromCatalog(catalog, embedder);
    logger.log("info", "In-memory form index built", {
      forms: memory.size,
      catalog: config.store.catalogPath,
    });
    repository = memory;
  } else {
    pool = createPool(config.db, config.search.timeoutMs);
    repository = new PgVectorFormRepository(pool);
  }

  const defaultSourceId = config.search.sourceId || null;

  const search = new SearchUseCase(repository, embedder, {
    defaultLimit: config.search.defaultLimit,
    maxResults: config.search.maxResults,
    similarityThreshold: config.search.similarityThreshold,
    timeoutMs: config.search.timeoutMs,
    defaultSourceId,
  });

  const dispatcher = config.crawler.url
    ? new HttpCrawlDispatcher(config.crawler.url, config.crawler.timeoutMs)
    : null;

  return {
    openai,
    embedder,
    search,
    ask: new AskUseCase(guidance, search),
    crawl: new CrawlUseCase(dispatcher, config.crawler.formsUrl),
    catalog: new CatalogUseCase(
      repository,
      config.search.timeoutMs,
      defaultSourceId
    ),
    async close() {
      if (pool) {
        await pool.end();
      }
    },
  };
}
