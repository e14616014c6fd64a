/**
 * Text and set similarity helpers shared by merging, conflict detection
 * and consolidation grouping.
 */

/** Whitespace tokens, case preserved. Empty or blank text yields no tokens. */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Jaccard index with the reflexive convention: two empty sets are
 * identical (1.0), one empty set shares nothing (0.0).
 */
export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 1;
  if (setA.size === 0 || setB.size === 0) return 0;

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  return intersection / (setA.size + setB.size - intersection);
}

export function wordJaccard(a: string, b: string): number {
  return jaccard(tokenize(a), tokenize(b));
}

export function intersects(a: readonly string[], b: readonly string[]): boolean {
  return a.some((item) => b.includes(item));
}

function normalizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Punctuation- and case-insensitive similarity in [0,1]:
 * 70% word overlap, 30% length agreement (floored at 0.3).
 * Empty text is never similar to anything.
 */
export function normalizedTextSimilarity(a: string, b: string): number {
  const wordsA = normalizeWords(a);
  const wordsB = normalizeWords(b);
  if (wordsA.length === 0 || wordsB.length === 0) return 0;

  const overlap = jaccard(wordsA, wordsB);
  const lengthRatio = Math.min(a.length, b.length) / Math.max(a.length, b.length);
  return overlap * 0.7 + Math.max(0.3, lengthRatio) * 0.3;
}

/** Same-day relative time expressions. */
export const TIME_REFERENCE_KEYWORDS = [
  "yesterday",
  "today",
  "tomorrow",
  "tonight",
  "this morning",
  "last week",
  "next week",
  "last year",
  "this year",
  "next year",
] as const;

export function containsTimeReference(text: string): boolean {
  const lower = text.toLowerCase();
  return TIME_REFERENCE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function excerpt(text: string, length = 50): string {
  return text.length > length ? text.slice(0, length) : text;
}
