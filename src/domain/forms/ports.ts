import type { FormTopic } from "@config/topics";

/**
 * Domain ports for form retrieval.
 *
 * The vector store is treated as an abstract nearest-neighbour capability;
 * PgVectorFormRepository (pgvector `<=>`) and InMemoryFormRepository (brute
 * force cosine) both implement it.
 */
export interface FormRecord {
  id: string;
  code: string;
  title: string;
  topic: string;
  url: string;
  sourceId: string;
  content: string;
  effectiveDate: string | null;
  languages: string[];
  mandatory: boolean;
}

export interface SearchResult {
  form: FormRecord;
  /** `1 - cosine_distance` between the query and the stored embedding. */
  similarity: number;
}

export interface FormSource {
  sourceId: string;
  summary: string | null;
  totalWordCount: number;
}

export interface NeighborQuery {
  embedding: number[];
  limit: number;
  topic: FormTopic | null;
  sourceId: string | null;
}

export interface FormRepository {
  /**
   * Returns at most `limit` records ordered by descending similarity, ties
   * broken by insertion order.
   */
  nearestNeighbors(query: NeighborQuery): Promise<SearchResult[]>;

  /** Records of one topic in insertion order. */
  listByTopic(
    topic: FormTopic,
    limit: number,
    sourceId: string | null
  ): Promise<FormRecord[]>;

  /** Record counts keyed by topic, for the topics present in the store. */
  countByTopic(sourceId: string | null): Promise<Record<string, number>>;

  listSources(): Promise<FormSource[]>;

  /** Resolves when the store answers a trivial query. */
  ping(): Promise<void>;
}

export interface EmbeddingPort {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
