import type { SearchResult } from "./ports";

export function clampLimit(limit: number, max: number): number {
  const whole = Math.trunc(limit);
  return Math.min(Math.max(whole, 1), Math.max(max, 1));
}

/**
 * Orders results by descending similarity. The sort is stable, so equal
 * scores keep the order the store produced them in (insertion order).
 */
export function rankBySimilarity(results: SearchResult[]): SearchResult[] {
  return [...results].sort((a, b) => b.similarity - a.similarity);
}

export function applyThreshold(
  results: SearchResult[],
  threshold: number
): SearchResult[] {
  return results.filter((r) => r.similarity >= threshold);
}

export function isRankedBySimilarity(results: SearchResult[]): boolean {
  return results.every(
    (r, i) => i === 0 || (results[i - 1]?.similarity ?? Infinity) >= r.similarity
  );
}
