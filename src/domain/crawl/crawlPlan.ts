/**
 * Builds the jobs sent to the external crawler for each crawl type.
 *
 * - single: the forms landing page
 * - smart: a bounded recursive crawl starting at the landing page
 * - popular: one search-results page per published topic
 */
import { FORM_TOPICS } from "@config/topics";

export const CRAWL_TYPES = ["single", "smart", "popular"] as const;

export type CrawlType = (typeof CRAWL_TYPES)[number];

export interface CrawlJob {
  tool: "crawl_single_page" | "smart_crawl_url";
  arguments: Record<string, string | number>;
  topic?: string;
}

export const SMART_CRAWL_MAX_DEPTH = 2;
export const SMART_CRAWL_MAX_CONCURRENT = 5;

const CRAWL_TYPE_SET: ReadonlySet<string> = new Set(CRAWL_TYPES);

export function isCrawlType(value: string): value is CrawlType {
  return CRAWL_TYPE_SET.has(value);
}

export function topicSearchUrl(formsUrl: string, topic: string): string {
  const url = new URL(formsUrl);
  url.searchParams.set("query", topic);
  return url.toString();
}

export function buildCrawlPlan(type: CrawlType, formsUrl: string): CrawlJob[] {
  switch (type) {
    case "single":
      return [{ tool: "crawl_single_page", arguments: { url: formsUrl } }];

    case "smart":
      return [
        {
          tool: "smart_crawl_url",
          arguments: {
            url: formsUrl,
            max_depth: SMART_CRAWL_MAX_DEPTH,
            max_concurrent: SMART_CRAWL_MAX_CONCURRENT,
          },
        },
      ];

    case "popular":
      return FORM_TOPICS.map((topic) => ({
        tool: "crawl_single_page",
        arguments: { url: topicSearchUrl(formsUrl, topic) },
        topic,
      }));
  }
}
