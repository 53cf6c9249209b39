/**
 * Text and entity comparison
 */

import { normalizeText, toText } from '@annobench/core';
import type { AnnotationValue, EvaluatorOptions } from '@annobench/core';
import { calculateSimilarity, tokenJaccard } from '@annobench/similarity';

/** Leading tokens stripped from entity names before fuzzy comparison */
export const DEFAULT_ENTITY_PREFIXES: readonly string[] = ['rs', 'CYP', 'COMT'];

/** Semantic set matching ignores tokens of two characters or fewer */
const MIN_CONTENT_TOKEN_LENGTH = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * exact_match: trimmed, case-folded string equality. Absent equals absent.
 */
export function exactMatch(predicted: AnnotationValue, expected: AnnotationValue): number {
  return normalizeText(predicted) === normalizeText(expected) ? 1 : 0;
}

/**
 * category_equal: exact_match for controlled vocabularies, with runs of
 * whitespace collapsed
 */
export function categoryEqual(predicted: AnnotationValue, expected: AnnotationValue): number {
  const p = normalizeText(predicted, { collapseWhitespace: true });
  const e = normalizeText(expected, { collapseWhitespace: true });
  return p === e ? 1 : 0;
}

/**
 * Strip known prefixes and punctuation noise from an entity name
 */
export function normalizeEntity(
  entity: string,
  prefixes: readonly string[] = DEFAULT_ENTITY_PREFIXES
): string {
  let out = entity.trim();
  if (prefixes.length > 0) {
    const prefixPattern = new RegExp(`^(?:${prefixes.map(escapeRegExp).join('|')})`, 'i');
    out = out.replace(prefixPattern, '');
  }
  out = out.replace(/[^\p{L}\p{N}_\s*+-]/gu, ' ');
  return out.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Map a raw similarity onto partial-credit buckets
 */
export function bucketSimilarity(similarity: number): number {
  if (similarity >= 0.9) return 1.0;
  if (similarity >= 0.7) return 0.8;
  if (similarity >= 0.5) return 0.5;
  return 0.0;
}

/**
 * fuzzy_entity_match: character similarity over normalized names, bucketed
 */
export function fuzzyEntityMatch(
  predicted: AnnotationValue,
  expected: AnnotationValue,
  options?: EvaluatorOptions
): number {
  const p = toText(predicted);
  const e = toText(expected);
  if (p === null || e === null) return p === e ? 1 : 0;

  const prefixes = options?.stripPrefixes ?? DEFAULT_ENTITY_PREFIXES;
  const similarity = calculateSimilarity(
    normalizeEntity(p, prefixes),
    normalizeEntity(e, prefixes),
    options?.similarityAlgorithm ?? 'sequence_ratio'
  );

  return bucketSimilarity(similarity.score);
}

/**
 * semantic_set_match: Jaccard over content words
 */
export function semanticSetMatch(predicted: AnnotationValue, expected: AnnotationValue): number {
  const p = toText(predicted);
  const e = toText(expected);
  if (p === null || e === null) return p === e ? 1 : 0;

  return tokenJaccard(p, e, { minLength: MIN_CONTENT_TOKEN_LENGTH }).score;
}
