/**
 * JSON catalogue of form records used to seed the in-memory vector store.
 *
 * Mirrors the metadata the crawler writes into `crawled_pages.metadata`, so a
 * catalogue exported from the database loads unchanged.
 */
import fs from "fs";

import { z } from "zod";

import { FORM_TOPICS } from "@config/topics";

const CatalogFormSchema = z.object({
  code: z.string().min(1),
  title: z.string().min(1),
  topic: z.enum(FORM_TOPICS),
  url: z.string().url(),
  content: z.string().default(""),
  effective_date: z.string().nullish(),
  languages: z.array(z.string()).default([]),
  mandatory: z.boolean().default(false),
});

export const FormsCatalogSchema = z.object({
  source_id: z.string().min(1),
  summary: z.string().nullish(),
  forms: z.array(CatalogFormSchema),
});

export type FormsCatalog = z.infer<typeof FormsCatalogSchema>;

export function parseFormsCatalog(raw: unknown): FormsCatalog {
  return FormsCatalogSchema.parse(raw);
}

export function loadFormsCatalog(filepath: string): FormsCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filepath, "utf-8"));
  return parseFormsCatalog(raw);
}
