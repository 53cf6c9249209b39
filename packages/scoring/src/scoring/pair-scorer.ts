/**
 * Pair Scorer
 *
 * Scores one predicted record against one ground-truth record,
 * field by field, and combines the field scores into a weighted mean.
 */

import { createSilentLogger, normalizeText } from '@annobench/core';
import type {
  AnnotationInstance,
  FieldSpec,
  Logger,
  SchemaDescriptor,
} from '@annobench/core';
import type { FieldResult, PairScore } from '../types/index.js';
import { FieldEvaluatorLibrary } from '../evaluators/index.js';
import { classifyError } from '../aggregation/error-taxonomy.js';

/**
 * Weighted mean of field scores. Fields without a weight count 1.0;
 * a zero total weight gives 0.
 */
export function computeWeightedScore(
  scores: Record<string, number>,
  weights?: Record<string, number>
): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const [field, score] of Object.entries(scores)) {
    const weight = weights?.[field] ?? 1.0;
    weighted += score * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weighted / totalWeight : 0;
}

/**
 * Effective weight per schema field: override, then FieldSpec weight, then 1.0
 */
export function resolveFieldWeights(
  schema: SchemaDescriptor,
  overrides?: Record<string, number>
): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const spec of schema.fields) {
    weights[spec.name] = overrides?.[spec.name] ?? spec.weight ?? 1.0;
  }
  return weights;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export interface PairScorerOptions {
  schema: SchemaDescriptor;
  /** Weight overrides by field name */
  fieldWeights?: Record<string, number>;
  library?: FieldEvaluatorLibrary;
  logger?: Logger;
}

export class PairScorer {
  readonly schema: SchemaDescriptor;
  readonly weights: Record<string, number>;
  private readonly library: FieldEvaluatorLibrary;
  private readonly logger: Logger;

  constructor(options: PairScorerOptions) {
    this.schema = options.schema;
    this.weights = resolveFieldWeights(options.schema, options.fieldWeights);
    this.library = options.library ?? new FieldEvaluatorLibrary();
    this.logger = options.logger ?? createSilentLogger();

    // Fail on unknown evaluators before any record is scored
    for (const spec of this.schema.fields) {
      this.library.get(spec.evaluator);
    }
  }

  /**
   * Score every schema field of the pair. Missing values are scored,
   * never skipped.
   */
  score(
    prediction: AnnotationInstance,
    groundTruth: AnnotationInstance,
    predictionIndex = 0,
    groundTruthIndex = 0
  ): PairScore {
    const fieldScores: Record<string, number> = {};
    const fieldResults: Record<string, FieldResult> = {};

    for (const spec of this.schema.fields) {
      const predicted = prediction[spec.name];
      const expected = groundTruth[spec.name];
      const score = this.evaluateField(spec, prediction, groundTruth);

      fieldScores[spec.name] = score;
      fieldResults[spec.name] = {
        field: spec.name,
        score,
        exactMatch: normalizeText(predicted) === normalizeText(expected),
        predicted,
        expected,
        errorType: classifyError(predicted, expected, score),
      };
    }

    return {
      predictionIndex,
      groundTruthIndex,
      prediction,
      groundTruth,
      fieldScores,
      fieldResults,
      score: computeWeightedScore(fieldScores, this.weights),
    };
  }

  /**
   * Run one evaluator. A throwing evaluator degrades the field to 0.
   */
  private evaluateField(
    spec: FieldSpec,
    prediction: AnnotationInstance,
    groundTruth: AnnotationInstance
  ): number {
    const evaluator = this.library.get(spec.evaluator);
    try {
      return clampScore(evaluator(prediction[spec.name], groundTruth[spec.name], spec.options));
    } catch (err) {
      this.logger.warn('Evaluator failed; field scored 0', {
        field: spec.name,
        evaluator: spec.evaluator,
        error: err instanceof Error ? err.message : String(err),
      });
      return 0;
    }
  }
}
