import { z } from "zod";

/**
 * Zod schema for the crawl trigger. The type itself is checked against the
 * known crawl types by CrawlUseCase; absent means a single-page crawl.
 */
export const CrawlRequestSchema = z.object({
  type: z.string({ invalid_type_error: "must be a string" }).nullish(),
});

export type CrawlRequest = z.infer<typeof CrawlRequestSchema>;
