/**
 * Content similarity for duplicate detection.
 *
 * Word-shingle Jaccard: content is lowercased and split into alphanumeric
 * tokens, tokens are grouped into overlapping runs of `shingleSize` words,
 * and the score is |A ∩ B| / |A ∪ B| over the two shingle sets.
 *
 * Content shorter than one shingle forms a single shingle of all its
 * tokens. Content without tokens never matches anything, itself included.
 */

import { createHash } from "node:crypto";

const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;

export function tokenize(content: string): string[] {
  return content
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((token) => token.length > 0);
}

export function shingles(content: string, shingleSize: number): Set<string> {
  const tokens = tokenize(content);
  const result = new Set<string>();
  if (tokens.length === 0) return result;

  if (tokens.length < shingleSize) {
    result.add(tokens.join(" "));
    return result;
  }
  for (let i = 0; i + shingleSize <= tokens.length; i++) {
    result.add(tokens.slice(i, i + shingleSize).join(" "));
  }
  return result;
}

/**
 * Jaccard score of two shingle sets, in [0, 1].
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const item of small) {
    if (large.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function contentSimilarity(a: string, b: string, shingleSize: number): number {
  return jaccard(shingles(a, shingleSize), shingles(b, shingleSize));
}

/**
 * Hash of the token stream, so whitespace, punctuation and case
 * differences hash alike. Empty content hashes to "".
 */
export function contentHash(content: string): string {
  const tokens = tokenize(content);
  if (tokens.length === 0) return "";
  return createHash("sha256").update(tokens.join(" ")).digest("hex");
}
