import { z } from "zod";

/**
 * Zod schemas for the form search API.
 *
 * `limit` accepts a number or a numeric string; anything else is rejected.
 * Clamping to the configured range happens in SearchUseCase.
 */
export const LimitSchema = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim() !== "" ? Number(value) : value,
  z
    .number({ invalid_type_error: "must be a number" })
    .finite("must be a number")
    .nullish()
);

export const QuerySchema = z
  .string({
    required_error: "is required",
    invalid_type_error: "must be a string",
  })
  .trim()
  .min(1, "is required");

export const SearchRequestSchema = z.object({
  query: QuerySchema,
  limit: LimitSchema,
  topic: z.string().nullish(),
  source: z.string().nullish(),
});

export const TopicSearchRequestSchema = z.object({
  topic: z
    .string({
      required_error: "is required",
      invalid_type_error: "must be a string",
    })
    .trim()
    .min(1, "is required"),
  limit: LimitSchema,
});

export const FormResultSchema = z.object({
  code: z.string(),
  title: z.string(),
  topic: z.string(),
  url: z.string(),
  similarity: z.number(),
  effective_date: z.string().nullable(),
  languages: z.array(z.string()),
  mandatory: z.boolean(),
  content: z.string(),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  forms: z.array(FormResultSchema),
  total_found: z.number().int().nonnegative(),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type FormResultDto = z.infer<typeof FormResultSchema>;
export type SearchResponseDto = z.infer<typeof SearchResponseSchema>;
