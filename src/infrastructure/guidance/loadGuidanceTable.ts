/**
 * Loads the static guidance table from JSON once at process start.
 *
 * The file is validated against GuidanceFileSchema and the resulting table is
 * deep-frozen; request handlers only ever read it.
 */
import fs from "fs";

import { z } from "zod";

import type { GuidanceTable } from "@domain/guidance/types";
import { logEvent } from "@infrastructure/logging/Logger";

const GuidanceEntrySchema = z.object({
  topic: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  excludeKeywords: z.array(z.string().min(1)).default([]),
  description: z.string(),
  forms: z
    .array(
      z.object({
        code: z.string().min(1),
        name: z.string(),
        purpose: z.string(),
        url: z.string().url(),
      })
    )
    .default([]),
  steps: z.array(z.string()).default([]),
  requirements: z.array(z.string()).default([]),
  links: z
    .array(z.object({ text: z.string(), url: z.string().url() }))
    .default([]),
});

export const GuidanceFileSchema = z.object({
  entries: z.array(
    GuidanceEntrySchema.refine((entry) => entry.keywords.length > 0, {
      message: "guidance entries need at least one keyword",
    })
  ),
  fallback: GuidanceEntrySchema,
});

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }

  return value;
}

export function buildGuidanceTable(raw: unknown): GuidanceTable {
  const parsed = GuidanceFileSchema.parse(raw);
  return deepFreeze({ entries: parsed.entries, fallback: parsed.fallback });
}

export function loadGuidanceTable(filepath: string): GuidanceTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filepath, "utf-8"));
  const table = buildGuidanceTable(raw);

  logEvent("GUIDANCE_LOADED", {
    filepath,
    entries: table.entries.length,
  });

  return table;
}
