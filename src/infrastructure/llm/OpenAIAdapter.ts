/**
 * OpenAI client construction and startup connectivity check.
 *
 * Only the embeddings API is used: questions and form records are embedded
 * with the configured model, and no retries are attempted here. Callers decide
 * whether to try again.
 */
import OpenAI from "openai";

import type { AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { describeError } from "@typesLocal/AppError";

export function createOpenAIClient(openai: AppConfig["openai"]): OpenAI {
  return new OpenAI({
    apiKey: openai.key,
    baseURL: openai.baseUrl,
    maxRetries: 0,
  });
}

/**
 * Models of the text-embedding-3 family accept a `dimensions` parameter that
 * shortens their output; older models reject it.
 */
export function supportsDimensions(model: string): boolean {
  return model.startsWith("text-embedding-3");
}

export function assertOpenAIKey(key: string): void {
  if (!key) {
    throw new Error(
      "OPENAI_API_KEY is missing. Please set it in your .env file."
    );
  }
}

/**
 * Embeds a fixed sample string and logs the outcome. Never throws: the service
 * starts either way and reports failures per request.
 */
export async function checkEmbeddingConnectivity(
  client: OpenAI,
  model: string,
  dimensions: number
): Promise<boolean> {
  const startedAt = Date.now();

  try {
    const response = await client.embeddings.create(
      {
        model,
        input: "connectivity-check",
        ...(supportsDimensions(model) ? { dimensions } : {}),
      },
      { timeout: 5000 }
    );

    const vectorLength = response.data[0]?.embedding.length ?? 0;

    if (vectorLength !== dimensions) {
      logger.log("error", "Embedding connectivity check returned wrong size", {
        model,
        expected: dimensions,
        received: vectorLength,
      });
      return false;
    }

    logger.log("info", "Embedding connectivity OK", {
      model,
      durationMs: Date.now() - startedAt,
    });
    return true;
  } catch (error: unknown) {
    logger.log("error", "Embedding connectivity check failed", {
      model,
      ...describeError(error),
    });
    return false;
  }
}
