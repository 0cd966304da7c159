import type { FormTopic } from "@config/topics";
import type {
  EmbeddingPort,
  FormRecord,
  FormRepository,
  FormSource,
  NeighborQuery,
  SearchResult,
} from "@domain/forms/ports";
import { rankBySimilarity } from "@domain/forms/ranking";
import type { FormsCatalog } from "@infrastructure/catalog/FormsCatalog";
import { cosineSimilarity } from "@utils/vector";

export interface StoredForm {
  form: FormRecord;
  embedding: number[];
}

/** Text embedded for each record: code, title and topic. */
export function formEmbeddingText(form: Pick<FormRecord, "code" | "title" | "topic">): string {
  return `${form.code}: ${form.title} (${form.topic})`;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Brute-force cosine similarity over records held in memory.
 *
 * Suitable for the few hundred records of the court forms catalogue and for
 * tests; records are immutable once the repository is built.
 */
export class InMemoryFormRepository implements FormRepository {
  private readonly records: readonly StoredForm[];
  private readonly sources: readonly FormSource[];

  constructor(records: StoredForm[], sources: FormSource[] = []) {
    this.records = records.map((r) => ({
      form: { ...r.form },
      embedding: [...r.embedding],
    }));
    this.sources = sources.map((s) => ({ ...s }));
  }

  static async fromCatalog(
    catalog: FormsCatalog,
    embedder: EmbeddingPort
  ): Promise<InMemoryFormRepository> {
    const forms: FormRecord[] = catalog.forms.map((f, index) => ({
      id: String(index + 1),
      code: f.code,
      title: f.title,
      topic: f.topic,
      url: f.url,
      sourceId: catalog.source_id,
      content: f.content,
      effectiveDate: f.effective_date ?? null,
      languages: f.languages,
      mandatory: f.mandatory,
    }));

    const embeddings = await embedder.embedBatch(forms.map(formEmbeddingText));

    if (embeddings.length !== forms.length) {
      throw new Error(
        `Embedding provider returned ${embeddings.length} vectors for ${forms.length} forms`
      );
    }

    const records = forms.map((form, i) => ({
      form,
      embedding: embeddings[i] ?? [],
    }));

    const source: FormSource = {
      sourceId: catalog.source_id,
      summary: catalog.summary ?? null,
      totalWordCount: forms.reduce((sum, f) => sum + countWords(f.content), 0),
    };

    return new InMemoryFormRepository(records, [source]);
  }

  private matches(
    form: FormRecord,
    topic: FormTopic | null,
    sourceId: string | null
  ): boolean {
    return (
      (topic === null || form.topic === topic) &&
      (sourceId === null || form.sourceId === sourceId)
    );
  }

  async nearestNeighbors(query: NeighborQuery): Promise<SearchResult[]> {
    const scored = this.records
      .filter((r) => this.matches(r.form, query.topic, query.sourceId))
      .map((r) => ({
        form: { ...r.form },
        similarity: cosineSimilarity(query.embedding, r.embedding),
      }));

    return rankBySimilarity(scored).slice(0, Math.max(query.limit, 0));
  }

  async listByTopic(
    topic: FormTopic,
    limit: number,
    sourceId: string | null
  ): Promise<FormRecord[]> {
    return this.records
      .filter((r) => this.matches(r.form, topic, sourceId))
      .slice(0, Math.max(limit, 0))
      .map((r) => ({ ...r.form }));
  }

  async countByTopic(sourceId: string | null): Promise<Record<string, number>> {
    const counts = new Map<string, number>();

    for (const { form } of this.records) {
      if (this.matches(form, null, sourceId)) {
        counts.set(form.topic, (counts.get(form.topic) ?? 0) + 1);
      }
    }

    return Object.fromEntries(
      [...counts.entries()].sort(([a], [b]) => a.localeCompare(b))
    );
  }

  async listSources(): Promise<FormSource[]> {
    return this.sources.map((s) => ({ ...s }));
  }

  async ping(): Promise<void> {
    return;
  }

  get size(): number {
    return this.records.length;
  }
}
