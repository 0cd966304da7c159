/**
 * Semantic search over the court forms store.
 *
 * Validates and normalizes the request, embeds the query, asks the vector
 * store for the nearest forms and enforces the ranking contract: at most
 * `limit` results, ordered by non-increasing similarity, none below the
 * configured threshold. Embedding and store calls are each bounded by the
 * search timeout; any failure of either surfaces as SearchUnavailable.
 */
import { resolveTopic } from "@config/topics";
import type {
  EmbeddingPort,
  FormRecord,
  FormRepository,
  SearchResult,
} from "@domain/forms/ports";
import {
  applyThreshold,
  clampLimit,
  isRankedBySimilarity,
  rankBySimilarity,
} from "@domain/forms/ranking";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import {
  describeError,
  InvalidArgumentError,
  isAppError,
  SearchUnavailableError,
} from "@typesLocal/AppError";
import { withTimeout } from "@utils/timeout";

export interface SearchSettings {
  defaultLimit: number;
  maxResults: number;
  similarityThreshold: number;
  timeoutMs: number;
  /** Source applied when a request names none; null searches every source. */
  defaultSourceId: string | null;
}

export interface SemanticSearchRequest {
  query: string;
  limit?: number | null;
  topic?: string | null;
  source?: string | null;
}

export interface SemanticSearchResponse {
  query: string;
  results: SearchResult[];
}

export interface TopicBrowseResponse {
  topic: string;
  forms: FormRecord[];
}

export const DEFAULT_TOPIC_BROWSE_LIMIT = 10;

export class SearchUseCase {
  constructor(
    private readonly repository: FormRepository,
    private readonly embedder: EmbeddingPort,
    private readonly settings: SearchSettings
  ) {}

  private resolveLimit(limit: number | null | undefined, fallback: number): number {
    if (limit === undefined || limit === null) {
      return clampLimit(fallback, this.settings.maxResults);
    }

    if (typeof limit !== "number" || !Number.isFinite(limit)) {
      throw new InvalidArgumentError("limit must be a number");
    }

    return clampLimit(limit, this.settings.maxResults);
  }

  private resolveSource(source: string | null | undefined): string | null {
    const requested = source?.trim();
    return requested || this.settings.defaultSourceId || null;
  }

  async search(input: SemanticSearchRequest): Promise<SemanticSearchResponse> {
    const query = typeof input.query === "string" ? input.query.trim() : "";

    if (!query) {
      throw new InvalidArgumentError("query is required");
    }

    const limit = this.resolveLimit(input.limit, this.settings.defaultLimit);
    const topic = resolveTopic(input.topic);
    const sourceId = this.resolveSource(input.source);
    const startedAt = Date.now();

    let results: SearchResult[];

    try {
      const embedding = await withTimeout(
        (signal) => this.embedder.embed(query, signal),
        this.settings.timeoutMs,
        "query embedding"
      );

      if (embedding.length !== this.embedder.dimensions) {
        throw new SearchUnavailableError(
          `Embedding has ${embedding.length} dimensions, expected ${this.embedder.dimensions}`
        );
      }

      results = await withTimeout(
        () =>
          this.repository.nearestNeighbors({ embedding, limit, topic, sourceId }),
        this.settings.timeoutMs,
        "vector search"
      );
    } catch (error: unknown) {
      logEvent("FORM_SEARCH_FAILURE", {
        limit,
        topic,
        sourceId,
        durationMs: Date.now() - startedAt,
        ...describeError(error),
      });

      if (isAppError(error)) {
        throw error;
      }

      throw new SearchUnavailableError(
        "Form search is temporarily unavailable",
        error
      );
    }

    if (!isRankedBySimilarity(results)) {
      logger.log("warn", "Vector store returned unordered results", {
        returned: results.length,
      });
      results = rankBySimilarity(results);
    }

    const ranked = applyThreshold(results, this.settings.similarityThreshold)
      .slice(0, limit);

    logEvent("FORM_SEARCH", {
      queryLength: query.length,
      limit,
      topic,
      sourceId,
      returned: ranked.length,
      topSimilarity: ranked[0]?.similarity ?? null,
      durationMs: Date.now() - startedAt,
    });

    return { query, results: ranked };
  }

  async browseTopic(
    topicInput: string,
    limitInput?: number | null
  ): Promise<TopicBrowseResponse> {
    const topic = resolveTopic(topicInput);

    if (!topic) {
      throw new InvalidArgumentError(`Unknown topic: ${topicInput}`);
    }

    const limit = this.resolveLimit(limitInput, DEFAULT_TOPIC_BROWSE_LIMIT);
    const sourceId = this.resolveSource(null);

    try {
      const forms = await withTimeout(
        () => this.repository.listByTopic(topic, limit, sourceId),
        this.settings.timeoutMs,
        "topic listing"
      );

      return { topic, forms };
    } catch (error: unknown) {
      logEvent("FORM_SEARCH_FAILURE", { topic, ...describeError(error) });
      throw new SearchUnavailableError(
        "Form listing is temporarily unavailable",
        error
      );
    }
  }
}
