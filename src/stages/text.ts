/**
 * Sentence-level text helpers shared by the built-in verification and
 * synthesis adapters.
 */

/** Sentence terminators followed by whitespace or the end of the text. */
const SENTENCE_END = /[.!?]+(?:\s+|$)/;

/**
 * Split text into trimmed, non-empty sentences. Decimal points inside
 * numbers ("3.5%") do not end a sentence.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_END)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * True when the lowercased text contains any of the phrases.
 */
export function containsAny(text: string, phrases: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase));
}

/** Collapse whitespace and lowercase, for duplicate checks. */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Keep the first item for each normalized key, in order.
 */
export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    const k = normalizeText(key(item));
    if (seen.has(k)) continue;
    seen.add(k);
    unique.push(item);
  }
  return unique;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function average(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Domain of a source: its own `domain` field when present, else the
 * host of its url without `www.`, else "unknown".
 */
export function sourceDomain(source: { url: string; domain?: string }): string {
  if (source.domain) return source.domain.toLowerCase();
  if (!URL.canParse(source.url)) return "unknown";
  return new URL(source.url).hostname.toLowerCase().replace(/^www\./, "") || "unknown";
}
