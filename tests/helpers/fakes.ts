import path from "path";

import { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { CrawlUseCase } from "@app/crawl/CrawlUseCase";
import { AskUseCase } from "@app/guidance/AskUseCase";
import { SearchUseCase, type SearchSettings } from "@app/search/SearchUseCase";
import type { FormTopic } from "@config/topics";
import type { CrawlJob } from "@domain/crawl/crawlPlan";
import type { CrawlDispatcher } from "@domain/crawl/ports";
import type {
  EmbeddingPort,
  FormRecord,
  FormRepository,
  FormSource,
  NeighborQuery,
  SearchResult,
} from "@domain/forms/ports";
import type { GuidanceTable } from "@domain/guidance/types";
import { parseFormsCatalog } from "@infrastructure/catalog/FormsCatalog";
import { InMemoryFormRepository } from "@infrastructure/database/InMemoryFormRepository";
import type { SqlClient } from "@infrastructure/database/PgVectorFormRepository";
import { loadGuidanceTable } from "@infrastructure/guidance/loadGuidanceTable";

export const GUIDANCE_PATH = path.resolve(__dirname, "../../data/guidance.json");
export const CATALOG_PATH = path.resolve(__dirname, "../../data/forms.json");
export const FORMS_URL = "https://forms.example.test/find-forms";

/**
 * Bag-of-words embedder: every distinct lowercase token gets its own axis the
 * first time it is seen, so cosine similarities are exact and reproducible.
 */
export class VocabularyEmbedder implements EmbeddingPort {
  readonly model = "vocab-test";
  private readonly vocabulary = new Map<string, number>();

  constructor(readonly dimensions = 64) {}

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of text.toLowerCase().split(/[^a-z0-9-]+/)) {
      if (!token) continue;

      let index = this.vocabulary.get(token);
      if (index === undefined) {
        index = this.vocabulary.size;
        if (index >= this.dimensions) {
          throw new Error(`vocabulary exceeds ${this.dimensions} tokens`);
        }
        this.vocabulary.set(token, index);
      }

      vector[index] = (vector[index] ?? 0) + 1;
    }

    return vector;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorFor(t));
  }
}

/** Never settles; used to drive timeouts. */
export class HangingEmbedder implements EmbeddingPort {
  readonly model = "hanging";
  readonly dimensions = 64;

  embed(): Promise<number[]> {
    return new Promise<number[]>(() => undefined);
  }

  async embedBatch(): Promise<number[][]> {
    return [];
  }
}

export class WrongSizeEmbedder implements EmbeddingPort {
  readonly model = "wrong-size";
  readonly dimensions = 64;

  async embed(): Promise<number[]> {
    return [1, 0, 0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map(() => [1, 0, 0]);
  }
}

/** A store whose every call rejects, as when the database is unreachable. */
export class UnreachableRepository implements FormRepository {
  constructor(private readonly reason = "connect ECONNREFUSED 127.0.0.1:5432") {}

  private fail(): Promise<never> {
    return Promise.reject(new Error(this.reason));
  }

  nearestNeighbors(_query: NeighborQuery): Promise<SearchResult[]> {
    return this.fail();
  }

  listByTopic(
    _topic: FormTopic,
    _limit: number,
    _sourceId: string | null
  ): Promise<FormRecord[]> {
    return this.fail();
  }

  countByTopic(_sourceId: string | null): Promise<Record<string, number>> {
    return this.fail();
  }

  listSources(): Promise<FormSource[]> {
    return this.fail();
  }

  ping(): Promise<void> {
    return this.fail();
  }
}

/** Returns a canned result list and records the queries it receives. */
export class FixedResultsRepository extends UnreachableRepository {
  readonly queries: NeighborQuery[] = [];

  constructor(private readonly results: SearchResult[]) {
    super();
  }

  override async nearestNeighbors(query: NeighborQuery): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.results.map((r) => ({ ...r }));
  }
}

/**
 * Stands in for a `pg.Pool`: records each statement with its values and
 * answers with the queued row sets in order (an empty set once they run out).
 */
export class RecordingSqlClient implements SqlClient {
  readonly calls: { text: string; values: unknown[] | undefined }[] = [];

  constructor(private readonly responses: unknown[][] = []) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push({ text, values });
    return { rows: this.responses.shift() ?? [] };
  }
}

export class RecordingDispatcher implements CrawlDispatcher {
  readonly batches: CrawlJob[][] = [];

  async dispatch(jobs: readonly CrawlJob[]): Promise<void> {
    this.batches.push([...jobs]);
  }
}

export function formRecord(overrides: Partial<FormRecord> = {}): FormRecord {
  return {
    id: "1",
    code: "FL-100",
    title: "Petition",
    topic: "divorce",
    url: "https://forms.example.test/fl100.pdf",
    sourceId: "test-source",
    content: "Petition to end a marriage",
    effectiveDate: null,
    languages: ["English"],
    mandatory: true,
    ...overrides,
  };
}

/**
 * Five forms over four topics. Under VocabularyEmbedder the query "divorce"
 * scores FL-100 at 1/sqrt(3), FL-180 at 1/2 and the rest at 0.
 */
export const TEST_CATALOG = {
  source_id: "test-source",
  summary: "Test catalogue",
  forms: [
    {
      code: "FL-100",
      title: "Petition",
      topic: "divorce",
      url: "https://forms.example.test/fl100.pdf",
      content: "Petition to end a marriage",
      languages: ["English", "Spanish"],
      mandatory: true,
    },
    {
      code: "FL-180",
      title: "Settlement Agreement",
      topic: "divorce",
      url: "https://forms.example.test/fl180.pdf",
      content: "Judgment terms agreed by both spouses",
      languages: ["English"],
    },
    {
      code: "SC-100",
      title: "Plaintiff's Claim",
      topic: "small claims",
      url: "https://forms.example.test/sc100.pdf",
      content: "Claim for money",
      languages: ["English"],
    },
    {
      code: "FW-001",
      title: "Request to Waive Court Fees",
      topic: "fee waivers",
      url: "https://forms.example.test/fw001.pdf",
      content: "Ask the court to waive filing fees",
      languages: ["English"],
    },
    {
      code: "DV-100",
      title: "Request for Domestic Violence Restraining Order",
      topic: "domestic violence",
      url: "https://forms.example.test/dv100.pdf",
      content: "Protection from abuse",
      effective_date: "2025-01-01",
      languages: ["English"],
      mandatory: true,
    },
  ],
};

export const TEST_SETTINGS: SearchSettings = {
  defaultLimit: 5,
  maxResults: 20,
  similarityThreshold: 0,
  timeoutMs: 200,
  defaultSourceId: "test-source",
};

export async function buildTestRepository(
  embedder: EmbeddingPort = new VocabularyEmbedder()
): Promise<InMemoryFormRepository> {
  return InMemoryFormRepository.fromCatalog(
    parseFormsCatalog(TEST_CATALOG),
    embedder
  );
}

export function loadTestGuidance(): GuidanceTable {
  return loadGuidanceTable(GUIDANCE_PATH);
}

export interface TestServices {
  search: SearchUseCase;
  ask: AskUseCase;
  crawl: CrawlUseCase;
  catalog: CatalogUseCase;
  dispatcher: RecordingDispatcher;
}

export function buildServices(
  repository: FormRepository,
  embedder: EmbeddingPort,
  settings: SearchSettings = TEST_SETTINGS
): TestServices {
  const search = new SearchUseCase(repository, embedder, settings);
  const dispatcher = new RecordingDispatcher();

  return {
    search,
    ask: new AskUseCase(loadTestGuidance(), search),
    crawl: new CrawlUseCase(dispatcher, FORMS_URL),
    catalog: new CatalogUseCase(
      repository,
      settings.timeoutMs,
      settings.defaultSourceId
    ),
    dispatcher,
  };
}
