/**
 * Annotation Benchmark Interface
 *
 * Scores predicted annotation records against ground truth for one schema.
 */

import type { AnnotationInstance } from '@annobench/core';
import type { EvaluationResult, ScoreReport } from '../types/index.js';

/**
 * Per-call options. Both override the engine's configuration for one call.
 */
export interface EvaluateOptions {
  /** Field name → weight; replaces schema weights for the named fields */
  fieldWeights?: Record<string, number>;
  /** Minimum pair score for greedy matching (default: engine setting) */
  matchingThreshold?: number;
  /** Records the referential check looks up cross-reference ids in */
  relatedInstances?: AnnotationInstance[];
}

export interface IAnnotationBenchmark {
  /**
   * Evaluate an `AnnotationPair` (two records) or `AnnotationSets` (two
   * lists) and return the wire report. Values inside a record that are not
   * scalars, scalar lists or booleans count as absent.
   *
   * @throws BenchmarkError with code INVALID_INPUT when the shape is neither
   */
  evaluate(samples: unknown, options?: EvaluateOptions): ScoreReport;

  /**
   * Same as evaluate, returning the full in-memory result
   */
  run(samples: unknown, options?: EvaluateOptions): EvaluationResult;

  /**
   * Score one prediction against one ground truth, without matching
   */
  evaluatePair(
    groundTruth: AnnotationInstance,
    prediction: AnnotationInstance,
    options?: EvaluateOptions
  ): EvaluationResult;

  /**
   * Match and score two collections of records
   */
  evaluateSets(
    groundTruths: AnnotationInstance[],
    predictions: AnnotationInstance[],
    options?: EvaluateOptions
  ): EvaluationResult;
}
