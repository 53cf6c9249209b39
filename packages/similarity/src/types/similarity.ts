/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'levenshtein'
  | 'jaro'
  | 'jaro_winkler'
  | 'sequence_ratio'
  | 'token_jaccard';

/** Character-level algorithms selectable through `calculateSimilarity` */
export type CharacterAlgorithm = Exclude<SimilarityAlgorithm, 'token_jaccard'>;

/** Options for word tokenization */
export interface TokenizeOptions {
  /** Words dropped after lower-casing */
  stopWords?: ReadonlySet<string>;
  /** Tokens shorter than this are dropped (default: 1) */
  minLength?: number;
}
