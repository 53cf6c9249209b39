/**
 * Pair Scoring Types
 *
 * Types for comparing one predicted record with one ground-truth record.
 */

import type { AnnotationInstance, AnnotationValue } from '@annobench/core';

/** Why a field scored below 1 */
export type ErrorType =
  | 'missing_prediction'     // Predicted absent, expected present
  | 'unexpected_prediction'  // Predicted present, expected absent
  | 'incomplete_extraction'  // Predicted much shorter than expected
  | 'over_extraction'        // Predicted much longer than expected
  | 'content_mismatch';      // Anything else

/** Raw evaluation of a single field */
export interface FieldResult {
  field: string;
  /** Evaluator score before any consistency penalty */
  score: number;
  /** Normalized values are equal, or both absent */
  exactMatch: boolean;
  predicted: AnnotationValue;
  expected: AnnotationValue;
  /** Set whenever `score` < 1 */
  errorType?: ErrorType;
}

/**
 * Score of one (prediction, ground truth) combination
 */
export interface PairScore {
  /** Position of the prediction in its input list */
  predictionIndex: number;
  /** Position of the ground truth in its input list */
  groundTruthIndex: number;
  prediction: AnnotationInstance;
  groundTruth: AnnotationInstance;
  /** Field → score in [0, 1]; exactly the schema's field names */
  fieldScores: Record<string, number>;
  /** Field → raw evaluation details */
  fieldResults: Record<string, FieldResult>;
  /** Weighted mean of `fieldScores` */
  score: number;
}

/**
 * Pairs chosen by a matching strategy.
 * Each prediction appears in at most one pair; a ground truth may appear in several.
 */
export interface MatchSet {
  pairs: PairScore[];
  /** Indices of predictions left without a pair */
  unmatchedPredictions: number[];
  /** Indices of ground truths no prediction was assigned to */
  unmatchedGroundTruths: number[];
  /** Number of pairs that reached the threshold before assignment */
  candidateCount: number;
}
