import type { SemanticSearchResponse } from "@app/search/SearchUseCase";
import type { FormRecord, SearchResult } from "@domain/forms/ports";

import type { FormResultDto, SearchResponseDto } from "./schema";

export const CONTENT_PREVIEW_LENGTH = 200;

export function previewContent(content: string): string {
  return content.length > CONTENT_PREVIEW_LENGTH
    ? `${content.slice(0, CONTENT_PREVIEW_LENGTH)}...`
    : content;
}

export function toFormListingDto(form: FormRecord): Omit<FormResultDto, "similarity"> {
  return {
    code: form.code,
    title: form.title,
    topic: form.topic,
    url: form.url,
    effective_date: form.effectiveDate,
    languages: [...form.languages],
    mandatory: form.mandatory,
    content: previewContent(form.content),
  };
}

export function toFormResultDto(result: SearchResult): FormResultDto {
  return { ...toFormListingDto(result.form), similarity: result.similarity };
}

export function toSearchResponseDto(
  response: SemanticSearchResponse
): SearchResponseDto {
  const forms = response.results.map(toFormResultDto);
  return { query: response.query, forms, total_found: forms.length };
}
