/**
 * OpenAI-backed implementation of the EmbeddingPort.
 *
 * Single-text embedding serves queries and accepts an abort signal so the
 * search timeout cancels the HTTP request; batch embedding seeds the
 * in-memory store at startup.
 */
import type OpenAI from "openai";

import type { EmbeddingPort } from "@domain/forms/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  describeError,
  InvalidArgumentError,
  SearchUnavailableError,
} from "@typesLocal/AppError";

import { supportsDimensions } from "./OpenAIAdapter";

const BATCH_SIZE = 256;

export class OpenAIEmbeddingProvider implements EmbeddingPort {
  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    readonly dimensions: number
  ) {}

  private request(input: string | string[]) {
    return {
      model: this.model,
      input,
      ...(supportsDimensions(this.model) ? { dimensions: this.dimensions } : {}),
    };
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const normalized = text.trim();

    if (!normalized) {
      throw new InvalidArgumentError("Cannot embed empty text");
    }

    const startedAt = Date.now();

    try {
      const response = await this.client.embeddings.create(
        this.request(normalized),
        { signal }
      );

      const first = response.data[0];

      if (!first || first.embedding.length === 0) {
        throw new SearchUnavailableError("Embedding API returned invalid data");
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        inputLength: normalized.length,
        vectorLength: first.embedding.length,
      });

      return first.embedding;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        ...describeError(error),
      });

      if (error instanceof SearchUnavailableError) {
        throw error;
      }

      throw new SearchUnavailableError("Embedding request failed", error);
    }
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const normalized = texts.map((t) => t.trim());

    if (normalized.some((t) => t.length === 0)) {
      throw new InvalidArgumentError("Cannot embed empty text");
    }

    const vectors: number[][] = [];

    for (let start = 0; start < normalized.length; start += BATCH_SIZE) {
      const batch = normalized.slice(start, start + BATCH_SIZE);
      const startedAt = Date.now();

      try {
        const response = await this.client.embeddings.create(
          this.request(batch)
        );

        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        vectors.push(...ordered.map((item) => item.embedding));

        logEvent("EMBEDDING_BATCH_SUCCESS", {
          model: this.model,
          durationMs: Date.now() - startedAt,
          batchSize: batch.length,
        });
      } catch (error: unknown) {
        logEvent("EMBEDDING_BATCH_FAILURE", {
          model: this.model,
          durationMs: Date.now() - startedAt,
          batchSize: batch.length,
          ...describeError(error),
        });

        throw new SearchUnavailableError("Batch embedding request failed", error);
      }
    }

    return vectors;
  }
}
