/**
 * Report Types
 *
 * Aggregated results of one evaluation call.
 */

import type { AnnotationValue } from '@annobench/core';
import type { ErrorType, FieldResult } from './scoring.js';
import type { ConsistencyIssue, PenaltyInfo } from './consistency.js';

export type EvaluationMode = 'single' | 'set';

/**
 * Outcome of the degenerate-input checks:
 * - scored: at least one side had records and scoring ran
 * - empty: both sides empty (score 1.0)
 * - missing_predictions / missing_ground_truth: one side empty (score 0.0)
 */
export type EvaluationStatus = 'scored' | 'empty' | 'missing_predictions' | 'missing_ground_truth';

export type ScoreBucket = 'excellent' | 'good' | 'fair' | 'poor';

/** Per-field statistics across all scored samples */
export interface FieldStatistics {
  meanScore: number;
  /** Post-penalty score of every sample, in sample order */
  scores: number[];
  exactMatchCount: number;
  exactMatchRate: number;
  errorTypes: Partial<Record<ErrorType, number>>;
}

/** One scored (prediction, ground truth) pair after consistency penalties */
export interface SampleResult {
  sampleId: number;
  predictionIndex: number;
  groundTruthIndex: number;
  /** Post-penalty field scores */
  fieldScores: Record<string, number>;
  fieldResults: Record<string, FieldResult>;
  /** Unweighted mean of `fieldScores` */
  overallScore: number;
  /** Weighted mean of `fieldScores` */
  weightedScore: number;
  issues: ConsistencyIssue[];
  penalty: PenaltyInfo;
}

export interface DifficultSample {
  sampleId: number;
  score: number;
  /** Fields scoring below 0.3 */
  mainIssues: string[];
}

export interface RunStatistics {
  matchedCount: number;
  unmatchedPredictionCount: number;
  unmatchedGroundTruthCount: number;
  meanOverallScore: number;
  /** Weighted mean of field-level mean scores */
  meanWeightedScore: number;
  minScore: number | null;
  maxScore: number | null;
  scoreDistribution: Record<ScoreBucket, number>;
  mostDifficult: DifficultSample[];
}

/**
 * Full result of one evaluation call
 */
export interface EvaluationResult {
  schema: string;
  mode: EvaluationMode;
  status: EvaluationStatus;
  totalSamples: number;
  fieldStatistics: Record<string, FieldStatistics>;
  overallScore: number;
  samples: SampleResult[];
  run: RunStatistics;
}

/** Ground truth and prediction for one field of one sample */
export interface FieldValuePair {
  ground_truth: AnnotationValue;
  prediction: AnnotationValue;
}

export interface SerializedPenaltyInfo {
  total_penalty: number;
  penalized_fields: Record<
    string,
    { original_score: number; penalized_score: number; penalty_percentage: number }
  >;
  issues_by_field: Record<string, string[]>;
}

export interface DetailedResult {
  sample_id: number;
  field_scores: Record<string, number>;
  dependency_issues: string[];
  field_values: Record<string, FieldValuePair>;
  penalty_info: SerializedPenaltyInfo;
}

/**
 * JSON-serializable report handed back across the library boundary
 */
export interface ScoreReport {
  total_samples: number;
  field_scores: Record<string, { mean_score: number; scores: number[] }>;
  overall_score: number;
  detailed_results: DetailedResult[];
  status: EvaluationStatus;
  field_statistics?: Record<
    string,
    {
      mean_score: number;
      exact_match_count: number;
      exact_match_rate: number;
      error_types: Partial<Record<ErrorType, number>>;
    }
  >;
  run_statistics?: {
    matched_count: number;
    unmatched_prediction_count: number;
    unmatched_ground_truth_count: number;
    mean_overall_score: number;
    mean_weighted_score: number;
    min_score: number | null;
    max_score: number | null;
    score_distribution: Record<ScoreBucket, number>;
    most_difficult: Array<{ sample_id: number; score: number; main_issues: string[] }>;
  };
}
