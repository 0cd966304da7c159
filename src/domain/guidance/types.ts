export interface GuidanceForm {
  code: string;
  name: string;
  purpose: string;
  url: string;
}

export interface GuidanceLink {
  text: string;
  url: string;
}

export interface GuidanceEntry {
  topic: string;
  keywords: readonly string[];
  excludeKeywords: readonly string[];
  description: string;
  forms: readonly GuidanceForm[];
  steps: readonly string[];
  requirements: readonly string[];
  links: readonly GuidanceLink[];
}

/**
 * Static guidance loaded once at startup. `entries` order is significant:
 * on equal keyword scores the earlier entry wins.
 */
export interface GuidanceTable {
  readonly entries: readonly GuidanceEntry[];
  readonly fallback: GuidanceEntry;
}
