import { describe, expect, it } from "vitest";

import {
  formEmbeddingText,
  InMemoryFormRepository,
} from "@infrastructure/database/InMemoryFormRepository";
import {
  PgVectorFormRepository,
  toFormRecord,
} from "@infrastructure/database/PgVectorFormRepository";

import {
  buildTestRepository,
  formRecord,
  RecordingSqlClient,
  VocabularyEmbedder,
} from "./helpers/fakes";

describe("InMemoryFormRepository", () => {
  it("embeds code, title and topic", () => {
    expect(formEmbeddingText(formRecord({ code: "FL-180", title: "Settlement Agreement" }))).toBe(
      "FL-180: Settlement Agreement (divorce)"
    );
  });

  it("assigns ids in catalogue order", async () => {
    const repository = await buildTestRepository();
    const forms = await repository.listByTopic("divorce", 10, null);

    expect(repository.size).toBe(5);
    expect(forms.map((f) => [f.id, f.code])).toEqual([
      ["1", "FL-100"],
      ["2", "FL-180"],
    ]);
    expect(forms[0]?.languages).toEqual(["English", "Spanish"]);
    expect(forms[1]?.mandatory).toBe(false);
  });

  it("keeps optional catalogue fields", async () => {
    const repository = await buildTestRepository();
    const [dv] = await repository.listByTopic("domestic violence", 1, "test-source");
    expect(dv?.effectiveDate).toBe("2025-01-01");
  });

  it("breaks similarity ties by insertion order", async () => {
    const embedder = new VocabularyEmbedder(8);
    const repository = new InMemoryFormRepository([
      { form: formRecord({ id: "1", code: "A" }), embedding: [1, 0, 0, 0, 0, 0, 0, 0] },
      { form: formRecord({ id: "2", code: "B" }), embedding: [0, 1, 0, 0, 0, 0, 0, 0] },
      { form: formRecord({ id: "3", code: "C" }), embedding: [1, 0, 0, 0, 0, 0, 0, 0] },
    ]);

    const results = await repository.nearestNeighbors({
      embedding: await embedder.embed("x"),
      limit: 3,
      topic: null,
      sourceId: null,
    });

    expect(results.map((r) => r.form.code)).toEqual(["A", "C", "B"]);
    expect(results.map((r) => r.similarity)).toEqual([1, 1, 0]);
  });

  it("counts forms per topic and lists the catalogue source", async () => {
    const repository = await buildTestRepository();

    expect(await repository.countByTopic("test-source")).toEqual({
      divorce: 2,
      "domestic violence": 1,
      "fee waivers": 1,
      "small claims": 1,
    });
    expect(await repository.countByTopic("other")).toEqual({});
    expect(await repository.listSources()).toEqual([
      { sourceId: "test-source", summary: "Test catalogue", totalWordCount: 24 },
    ]);
  });

  it("hands out copies", async () => {
    const repository = await buildTestRepository();
    const [first] = await repository.listByTopic("divorce", 1, null);
    if (first) first.title = "changed";

    const [again] = await repository.listByTopic("divorce", 1, null);
    expect(again?.title).toBe("Petition");
  });
});

describe("toFormRecord", () => {
  it("maps crawled page metadata onto a form record", () => {
    expect(
      toFormRecord({
        id: "42",
        url: "https://forms.example.test/fl180.pdf",
        content: "Judgment",
        source_id: "california_courts_comprehensive",
        metadata: {
          form_code: "FL-180",
          form_title: "Judgment",
          topic: "divorce",
          languages: ["English", 7, "Spanish"],
          mandatory: true,
          effective_date: "2024-01-01",
        },
      })
    ).toEqual({
      id: "42",
      code: "FL-180",
      title: "Judgment",
      topic: "divorce",
      url: "https://forms.example.test/fl180.pdf",
      sourceId: "california_courts_comprehensive",
      content: "Judgment",
      effectiveDate: "2024-01-01",
      languages: ["English", "Spanish"],
      mandatory: true,
    });
  });

  it("fills gaps in sparse metadata", () => {
    const record = toFormRecord({
      id: "7",
      url: "https://forms.example.test/page",
      content: "",
      source_id: "s",
      metadata: null,
    });

    expect(record.code).toBe("Unknown");
    expect(record.title).toBe("Unknown");
    expect(record.effectiveDate).toBeNull();
    expect(record.languages).toEqual([]);
    expect(record.mandatory).toBe(false);
  });
});

describe("PgVectorFormRepository", () => {
  const pageRow = {
    id: 5,
    url: "https://forms.example.test/fl100.pdf",
    content: null,
    source_id: "src",
    metadata: { form_code: "FL-100", title: "Petition", topic: "divorce" },
  };

  it("sends the vector, an empty filter, no source and the limit", async () => {
    const client = new RecordingSqlClient([[{ ...pageRow, similarity: "0.75" }]]);
    const repository = new PgVectorFormRepository(client);

    const results = await repository.nearestNeighbors({
      embedding: [0.5, 1],
      limit: 3,
      topic: null,
      sourceId: null,
    });

    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.values).toEqual(["[0.5,1]", "{}", null, 3]);
    expect(client.calls[0]?.text).toContain(
      "ORDER BY embedding <=> $1::vector ASC, id ASC"
    );
    expect(client.calls[0]?.text).toContain("LIMIT $4");
    expect(results).toHaveLength(1);
    expect(results[0]?.similarity).toBe(0.75);
    expect(results[0]?.form.id).toBe("5");
    expect(results[0]?.form.code).toBe("FL-100");
    expect(results[0]?.form.content).toBe("");
  });

  it("filters by topic containment and source", async () => {
    const client = new RecordingSqlClient();
    const repository = new PgVectorFormRepository(client);

    const results = await repository.nearestNeighbors({
      embedding: [1],
      limit: 10,
      topic: "divorce",
      sourceId: "src",
    });

    expect(results).toEqual([]);
    expect(client.calls[0]?.values).toEqual(["[1]", '{"topic":"divorce"}', "src", 10]);
  });

  it("lists one topic in id order", async () => {
    const client = new RecordingSqlClient([[pageRow]]);
    const repository = new PgVectorFormRepository(client);

    const records = await repository.listByTopic("divorce", 20, null);

    expect(client.calls[0]?.values).toEqual(['{"topic":"divorce"}', null, 20]);
    expect(client.calls[0]?.text).toContain("ORDER BY id ASC");
    expect(records.map((r) => r.title)).toEqual(["Petition"]);
  });

  it("counts topics with numeric totals", async () => {
    const client = new RecordingSqlClient([
      [
        { topic: "divorce", count: "2" },
        { topic: "small claims", count: 1 },
      ],
    ]);
    const repository = new PgVectorFormRepository(client);

    await expect(repository.countByTopic("src")).resolves.toEqual({
      divorce: 2,
      "small claims": 1,
    });
    expect(client.calls[0]?.values).toEqual(["src"]);
  });

  it("maps source rows and treats a missing word count as zero", async () => {
    const client = new RecordingSqlClient([
      [
        { source_id: "a", summary: "First", total_word_count: "120" },
        { source_id: "b", summary: null, total_word_count: null },
      ],
    ]);
    const repository = new PgVectorFormRepository(client);

    await expect(repository.listSources()).resolves.toEqual([
      { sourceId: "a", summary: "First", totalWordCount: 120 },
      { sourceId: "b", summary: null, totalWordCount: 0 },
    ]);
    expect(client.calls[0]?.values).toBeUndefined();
  });

  it("pings with a trivial statement", async () => {
    const client = new RecordingSqlClient();
    await new PgVectorFormRepository(client).ping();

    expect(client.calls.map((c) => c.text)).toEqual(["SELECT 1"]);
  });

  it("rejects rows that lack a url", async () => {
    const client = new RecordingSqlClient([[{ id: "1", source_id: "src", similarity: 1 }]]);
    const repository = new PgVectorFormRepository(client);

    await expect(
      repository.nearestNeighbors({ embedding: [1], limit: 1, topic: null, sourceId: null })
    ).rejects.toThrow();
  });
});
