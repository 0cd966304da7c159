import { describe, expect, it } from "vitest";

import { AskUseCase, RELATED_FORMS_LIMIT } from "@app/guidance/AskUseCase";
import { SearchUseCase } from "@app/search/SearchUseCase";
import { InvalidArgumentError } from "@typesLocal/AppError";

import {
  buildTestRepository,
  loadTestGuidance,
  TEST_SETTINGS,
  UnreachableRepository,
  VocabularyEmbedder,
} from "./helpers/fakes";

async function askUseCase(): Promise<AskUseCase> {
  const embedder = new VocabularyEmbedder();
  const search = new SearchUseCase(
    await buildTestRepository(embedder),
    embedder,
    TEST_SETTINGS
  );
  return new AskUseCase(loadTestGuidance(), search);
}

describe("AskUseCase", () => {
  it("answers with matched guidance and related forms", async () => {
    const response = await (await askUseCase()).ask("I want to file for divorce");

    expect(response.question).toBe("I want to file for divorce");
    expect(response.matchedTopic).toBe("divorce");
    expect(response.guidance.topic).toBe("divorce");
    expect(response.searchStatus).toBe("success");
    expect(response.relevantForms.map((r) => r.form.code)).toEqual([
      "FL-100",
      "FL-180",
      "FW-001",
      "DV-100",
      "SC-100",
    ]);
    expect(response.relevantForms.length).toBeLessThanOrEqual(RELATED_FORMS_LIMIT);
  });

  it("falls back to general guidance when no topic matches", async () => {
    const response = await (await askUseCase()).ask("xyzzy plugh");

    expect(response.matchedTopic).toBeNull();
    expect(response.guidance.topic).toBe("general");
    expect(response.guidance.description).toBe(
      "For general legal matters in California courts, follow these basic steps."
    );
    expect(response.guidance.steps).toHaveLength(5);
  });

  it("still answers when the form search is down", async () => {
    const search = new SearchUseCase(
      new UnreachableRepository(),
      new VocabularyEmbedder(),
      TEST_SETTINGS
    );
    const useCase = new AskUseCase(loadTestGuidance(), search);

    const response = await useCase.ask("I want to file for divorce");

    expect(response.guidance.topic).toBe("divorce");
    expect(response.relevantForms).toEqual([]);
    expect(response.searchStatus).toBe("unavailable");
  });

  it("rejects a blank question", async () => {
    await expect((await askUseCase()).ask("  ")).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });
});
