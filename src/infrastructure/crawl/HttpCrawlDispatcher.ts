import type { CrawlJob } from "@domain/crawl/crawlPlan";
import type { CrawlDispatcher } from "@domain/crawl/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { describeError } from "@typesLocal/AppError";
import { withTimeout } from "@utils/timeout";

export type FetchLike = (
  input: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<{ ok: boolean; status: number }>;

/**
 * Submits crawl jobs to the crawler service as JSON-RPC `tools/call`
 * requests, one after another. A failed submission is logged and the
 * remaining jobs are still sent.
 */
export class HttpCrawlDispatcher implements CrawlDispatcher {
  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async dispatch(jobs: readonly CrawlJob[]): Promise<void> {
    for (const [index, job] of jobs.entries()) {
      const body = JSON.stringify({
        jsonrpc: "2.0",
        id: index + 1,
        method: "tools/call",
        params: { name: job.tool, arguments: job.arguments },
      });

      try {
        const response = await withTimeout(
          (signal) =>
            this.fetchImpl(this.endpoint, {
              method: "POST",
              headers: { "Content-Type": "application/json" },
              body,
              signal,
            }),
          this.timeoutMs,
          "crawler dispatch"
        );

        if (!response.ok) {
          throw new Error(`Crawler responded with HTTP ${response.status}`);
        }
      } catch (error: unknown) {
        logEvent("CRAWL_DISPATCH_FAILURE", {
          tool: job.tool,
          url: job.arguments.url,
          ...describeError(error),
        });
      }
    }
  }
}
