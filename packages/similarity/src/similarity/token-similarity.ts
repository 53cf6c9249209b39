/**
 * Token Set Similarity
 *
 * Word-level comparison for free-text fields.
 */

import type { SimilarityResult, TokenizeOptions } from '../types/similarity.js';

/** Function words ignored by `tokenize` unless a caller supplies its own set */
export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  'is',
  'are',
  'the',
  'a',
  'an',
  'and',
  'or',
  'but',
  'in',
  'on',
  'at',
  'to',
  'for',
  'of',
  'with',
  'by',
]);

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Split text into lower-case words, dropping stop words and short tokens
 */
export function tokenize(text: string, options?: TokenizeOptions): string[] {
  const stopWords = options?.stopWords ?? DEFAULT_STOP_WORDS;
  const minLength = options?.minLength ?? 1;

  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];
  return words.filter((word) => word.length >= minLength && !stopWords.has(word));
}

/**
 * |A ∩ B| / |A ∪ B|. Two empty sets are identical; one empty set shares nothing.
 */
export function jaccardIndex<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 1;
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }

  return intersection / (a.size + b.size - intersection);
}

/**
 * Jaccard similarity over the word sets of two strings
 */
export function tokenJaccard(
  a: string,
  b: string,
  options?: TokenizeOptions
): SimilarityResult {
  const aTokens = new Set(tokenize(a, options));
  const bTokens = new Set(tokenize(b, options));
  const score = jaccardIndex(aTokens, bTokens);

  return {
    score,
    algorithm: 'token_jaccard',
    details: `Tokens: ${aTokens.size} vs ${bTokens.size}`,
  };
}
