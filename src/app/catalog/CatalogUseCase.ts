/**
 * Read-side catalogue queries: sources, per-topic statistics, topics present
 * in the store, and a store health check.
 */
import type { FormRepository, FormSource } from "@domain/forms/ports";
import { SearchUnavailableError } from "@typesLocal/AppError";
import { withTimeout } from "@utils/timeout";

export interface CatalogStats {
  totalForms: number;
  totalTopics: number;
  formsByTopic: Record<string, number>;
}

export class CatalogUseCase {
  constructor(
    private readonly repository: FormRepository,
    private readonly timeoutMs: number,
    private readonly defaultSourceId: string | null
  ) {}

  private async guarded<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(() => run(), this.timeoutMs, label);
    } catch (error: unknown) {
      throw new SearchUnavailableError("Form store is unavailable", error);
    }
  }

  listSources(): Promise<FormSource[]> {
    return this.guarded("source listing", () => this.repository.listSources());
  }

  async stats(): Promise<CatalogStats> {
    const formsByTopic = await this.guarded("topic counts", () =>
      this.repository.countByTopic(this.defaultSourceId)
    );

    return {
      totalForms: Object.values(formsByTopic).reduce((sum, n) => sum + n, 0),
      totalTopics: Object.keys(formsByTopic).length,
      formsByTopic,
    };
  }

  async topics(): Promise<string[]> {
    const counts = await this.guarded("topic counts", () =>
      this.repository.countByTopic(this.defaultSourceId)
    );
    return Object.keys(counts);
  }

  health(): Promise<void> {
    return this.guarded("store ping", () => this.repository.ping());
  }
}
