import { z } from "zod";

/**
 * Zod schema for the ask API: a single non-empty question.
 */
export const AskRequestSchema = z.object({
  question: z
    .string({
      required_error: "is required",
      invalid_type_error: "must be a string",
    })
    .trim()
    .min(1, "is required"),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;
