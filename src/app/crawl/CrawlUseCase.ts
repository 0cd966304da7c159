/**
 * Triggers asynchronous re-ingestion of court form pages.
 *
 * The jobs are handed to the crawler dispatcher without awaiting it; the
 * caller gets an acknowledgement immediately and dispatch failures are only
 * logged.
 */
import {
  buildCrawlPlan,
  CRAWL_TYPES,
  isCrawlType,
  type CrawlJob,
  type CrawlType,
} from "@domain/crawl/crawlPlan";
import type { CrawlDispatcher } from "@domain/crawl/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  describeError,
  InvalidArgumentError,
  SearchUnavailableError,
} from "@typesLocal/AppError";

export interface CrawlAccepted {
  status: "accepted";
  crawlType: CrawlType;
  jobs: CrawlJob[];
}

export class CrawlUseCase {
  constructor(
    private readonly dispatcher: CrawlDispatcher | null,
    private readonly formsUrl: string
  ) {}

  trigger(typeInput?: string | null): CrawlAccepted {
    const type = (typeInput ?? "single").trim().toLowerCase();

    if (!isCrawlType(type)) {
      throw new InvalidArgumentError(
        `Unknown crawl type: ${typeInput}. Expected one of ${CRAWL_TYPES.join(", ")}`
      );
    }

    if (!this.dispatcher) {
      throw new SearchUnavailableError("Crawler is not configured");
    }

    const jobs = buildCrawlPlan(type, this.formsUrl);

    void this.dispatcher.dispatch(jobs).catch((error: unknown) => {
      logEvent("CRAWL_DISPATCH_FAILURE", {
        crawlType: type,
        ...describeError(error),
      });
    });

    logEvent("CRAWL_TRIGGERED", { crawlType: type, jobs: jobs.length });

    return { status: "accepted", crawlType: type, jobs };
  }
}
