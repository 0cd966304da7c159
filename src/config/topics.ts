/**
 * Closed set of form topics published by the California Courts self-help site.
 *
 * Every stored form record carries exactly one of these in its metadata, and
 * topic filters on search requests are only honoured when they name one.
 */
export const FORM_TOPICS = [
  "adoption",
  "appeals",
  "child custody and visitation",
  "child support",
  "civil",
  "civil harassment",
  "cleaning criminal record",
  "conservatorship",
  "discovery and subpoenas",
  "divorce",
  "domestic violence",
  "elder abuse",
  "enforcement of judgment",
  "eviction",
  "fee waivers",
  "gender change",
  "guardianship",
  "juvenile",
  "language access",
  "name change",
  "parentage",
  "probate",
  "proof of service",
  "remote appearance",
  "small claims",
  "traffic",
] as const;

export type FormTopic = (typeof FORM_TOPICS)[number];

const TOPIC_SET: ReadonlySet<string> = new Set(FORM_TOPICS);

export function isFormTopic(value: string): value is FormTopic {
  return TOPIC_SET.has(value);
}

/**
 * Resolves free-form user input to a known topic, or null when it names none.
 */
export function resolveTopic(value: string | undefined | null): FormTopic | null {
  if (typeof value !== "string") {
    return null;
  }

  const normalized = value.trim().toLowerCase().replace(/\s+/g, " ");
  return isFormTopic(normalized) ? normalized : null;
}
