import type { z } from "zod";

import { InvalidArgumentError } from "@typesLocal/AppError";

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")} ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * Parses a request payload, raising InvalidArgument with the zod issues as
 * details when it does not match the schema.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown
): z.output<S> {
  const parsed = schema.safeParse(payload ?? {});

  if (!parsed.success) {
    throw new InvalidArgumentError(formatIssues(parsed.error.issues), {
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
