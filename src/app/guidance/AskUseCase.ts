/**
 * Answers a free-text legal question with canned guidance plus related forms.
 *
 * Guidance matching and the form search run concurrently and are joined
 * before responding. A question with no guidance match gets the general
 * fallback entry; a search outage degrades the answer to guidance only.
 */
import type { SearchResult } from "@domain/forms/ports";
import { matchGuidance } from "@domain/guidance/guidanceMatcher";
import type { GuidanceEntry, GuidanceTable } from "@domain/guidance/types";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  InvalidArgumentError,
  SearchUnavailableError,
} from "@typesLocal/AppError";

import type { SearchUseCase } from "../search/SearchUseCase";

export type RelatedSearchStatus = "success" | "unavailable";

export interface AskResponse {
  question: string;
  guidance: GuidanceEntry;
  matchedTopic: string | null;
  relevantForms: SearchResult[];
  searchStatus: RelatedSearchStatus;
}

export const RELATED_FORMS_LIMIT = 5;

export class AskUseCase {
  constructor(
    private readonly table: GuidanceTable,
    private readonly search: SearchUseCase
  ) {}

  private async relatedForms(
    question: string
  ): Promise<{ forms: SearchResult[]; status: RelatedSearchStatus }> {
    try {
      const { results } = await this.search.search({
        query: question,
        limit: RELATED_FORMS_LIMIT,
      });
      return { forms: results, status: "success" };
    } catch (error: unknown) {
      if (error instanceof SearchUnavailableError) {
        return { forms: [], status: "unavailable" };
      }
      throw error;
    }
  }

  async ask(questionInput: string): Promise<AskResponse> {
    const question =
      typeof questionInput === "string" ? questionInput.trim() : "";

    if (!question) {
      throw new InvalidArgumentError("question is required");
    }

    const [match, related] = await Promise.all([
      Promise.resolve(matchGuidance(question, this.table)),
      this.relatedForms(question),
    ]);

    logEvent("GUIDANCE_MATCH", {
      matchedTopic: match?.entry.topic ?? null,
      score: match?.score ?? 0,
      relatedForms: related.forms.length,
      searchStatus: related.status,
    });

    return {
      question,
      guidance: match?.entry ?? this.table.fallback,
      matchedTopic: match?.entry.topic ?? null,
      relevantForms: related.forms,
      searchStatus: related.status,
    };
  }
}
