import type { CrawlJob } from "./crawlPlan";

/**
 * Hands crawl jobs to the external crawler. Resolves once every job has been
 * submitted, not when crawling finishes.
 */
export interface CrawlDispatcher {
  dispatch(jobs: readonly CrawlJob[]): Promise<void>;
}
