/**
 * Keyword classifier mapping a free-text question to a canned guidance entry.
 *
 * The question is lowercased and split on whitespace and punctuation; a
 * keyword (one or more words) counts when its tokens occur contiguously in
 * the question. Each entry scores the number of its keywords present, entries
 * with a present exclude keyword are skipped, and the highest score wins with
 * ties going to the earlier entry. A zero score everywhere is no match.
 */
import type { GuidanceEntry, GuidanceTable } from "./types";

const TOKEN_SPLIT = /[^\p{L}\p{N}'-]+/u;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .map((t) => t.replace(/^['-]+|['-]+$/g, ""))
    .filter((t) => t.length > 0);
}

function containsPhrase(tokens: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0 || phrase.length > tokens.length) {
    return false;
  }

  for (let start = 0; start + phrase.length <= tokens.length; start++) {
    if (phrase.every((word, offset) => tokens[start + offset] === word)) {
      return true;
    }
  }

  return false;
}

function countPresent(tokens: readonly string[], keywords: readonly string[]): number {
  return keywords.filter((keyword) => containsPhrase(tokens, tokenize(keyword)))
    .length;
}

export interface GuidanceMatch {
  entry: GuidanceEntry;
  score: number;
}

export function scoreEntry(
  tokens: readonly string[],
  entry: GuidanceEntry
): number {
  if (countPresent(tokens, entry.excludeKeywords) > 0) {
    return 0;
  }

  return countPresent(tokens, entry.keywords);
}

export function matchGuidance(
  question: string,
  table: GuidanceTable
): GuidanceMatch | null {
  const tokens = tokenize(question);
  let best: GuidanceMatch | null = null;

  for (const entry of table.entries) {
    const score = scoreEntry(tokens, entry);

    if (score > 0 && (best === null || score > best.score)) {
      best = { entry, score };
    }
  }

  return best;
}
