import { z } from "zod";

import type { FormTopic } from "@config/topics";
import type {
  FormRecord,
  FormRepository,
  FormSource,
  NeighborQuery,
  SearchResult,
} from "@domain/forms/ports";
import { toPgVectorLiteral } from "@utils/vector";

/** The slice of `pg.Pool` the repository needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

// pg returns bigint ids and numeric aggregates as strings
const CrawledPageRowSchema = z.object({
  id: z.coerce.string(),
  url: z.string(),
  content: z
    .string()
    .nullable()
    .transform((value) => value ?? ""),
  metadata: z.unknown(),
  source_id: z.string(),
});

const NeighborRowSchema = CrawledPageRowSchema.extend({
  similarity: z.coerce.number(),
});

const TopicCountRowSchema = z.object({
  topic: z.string(),
  count: z.coerce.number(),
});

const SourceRowSchema = z.object({
  source_id: z.string(),
  summary: z.string().nullable(),
  total_word_count: z.coerce.number().nullable(),
});

export type CrawledPageRow = z.output<typeof CrawledPageRowSchema>;

function readString(meta: Record<string, unknown>, key: string): string | null {
  const value = meta[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function asObject(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }

  return {};
}

export function toFormRecord(row: CrawledPageRow): FormRecord {
  const meta = asObject(row.metadata);
  const languages = Array.isArray(meta.languages)
    ? meta.languages.filter((l): l is string => typeof l === "string")
    : [];

  return {
    id: row.id,
    code: readString(meta, "form_code") ?? "Unknown",
    title: readString(meta, "title") ?? readString(meta, "form_title") ?? "Unknown",
    topic: readString(meta, "topic") ?? "Unknown",
    url: row.url,
    sourceId: row.source_id,
    content: row.content,
    effectiveDate: readString(meta, "effective_date"),
    languages,
    mandatory: meta.mandatory === true,
  };
}

function topicFilter(topic: FormTopic | null): string {
  return JSON.stringify(topic ? { topic } : {});
}

/**
 * Postgres + pgvector implementation of the FormRepository port over the
 * `crawled_pages` table (see sql/schema.sql).
 *
 * Similarity is `1 - (embedding <=> query)`; rows are ordered by cosine
 * distance and then by id so equal distances keep insertion order.
 */
export class PgVectorFormRepository implements FormRepository {
  constructor(private readonly pool: SqlClient) {}

  async nearestNeighbors(query: NeighborQuery): Promise<SearchResult[]> {
    const result = await this.pool.query(
      `
      SELECT
        id::text AS id,
        url,
        content,
        metadata,
        source_id,
        1 - (embedding <=> $1::vector) AS similarity
      FROM crawled_pages
      WHERE embedding IS NOT NULL
        AND metadata @> $2::jsonb
        AND ($3::text IS NULL OR source_id = $3::text)
      ORDER BY embedding <=> $1::vector ASC, id ASC
      LIMIT $4;
      `,
      [
        toPgVectorLiteral(query.embedding),
        topicFilter(query.topic),
        query.sourceId,
        query.limit,
      ]
    );

    return z.array(NeighborRowSchema).parse(result.rows).map((row) => ({
      form: toFormRecord(row),
      similarity: row.similarity,
    }));
  }

  async listByTopic(
    topic: FormTopic,
    limit: number,
    sourceId: string | null
  ): Promise<FormRecord[]> {
    const result = await this.pool.query(
      `
      SELECT id::text AS id, url, content, metadata, source_id
      FROM crawled_pages
      WHERE metadata @> $1::jsonb
        AND ($2::text IS NULL OR source_id = $2::text)
      ORDER BY id ASC
      LIMIT $3;
      `,
      [topicFilter(topic), sourceId, limit]
    );

    return z.array(CrawledPageRowSchema).parse(result.rows).map(toFormRecord);
  }

  async countByTopic(sourceId: string | null): Promise<Record<string, number>> {
    const result = await this.pool.query(
      `
      SELECT metadata->>'topic' AS topic, COUNT(*)::int AS count
      FROM crawled_pages
      WHERE metadata->>'topic' IS NOT NULL
        AND ($1::text IS NULL OR source_id = $1::text)
      GROUP BY metadata->>'topic'
      ORDER BY metadata->>'topic' ASC;
      `,
      [sourceId]
    );

    return Object.fromEntries(
      z
        .array(TopicCountRowSchema)
        .parse(result.rows)
        .map((row) => [row.topic, row.count])
    );
  }

  async listSources(): Promise<FormSource[]> {
    const result = await this.pool.query(
      `
      SELECT source_id, summary, total_word_count
      FROM sources
      ORDER BY source_id ASC;
      `
    );

    return z.array(SourceRowSchema).parse(result.rows).map((row) => ({
      sourceId: row.source_id,
      summary: row.summary,
      totalWordCount: row.total_word_count ?? 0,
    }));
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }
}
