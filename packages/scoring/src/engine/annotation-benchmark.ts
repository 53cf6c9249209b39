/**
 * Annotation Benchmark
 *
 * Scores predicted annotation records against ground truth:
 * match → score fields → penalize contradictions → aggregate.
 */

import { z } from 'zod';
import {
  BenchmarkError,
  Logger,
  annotationInstanceSchema,
  annotationListSchema,
  extractFieldNames,
  fieldWeightsSchema,
  formatZodError,
  matchingThresholdSchema,
} from '@annobench/core';
import type {
  AnnotationInstance,
  AnnotationPair,
  AnnotationSets,
  LoggerOptions,
  SchemaDescriptor,
} from '@annobench/core';
import type { EvaluateOptions, IAnnotationBenchmark } from '../interfaces/index.js';
import type {
  ConsistencyCheck,
  EvaluationMode,
  EvaluationResult,
  EvaluationStatus,
  MatchSet,
  PairScore,
  SampleResult,
  ScoreReport,
} from '../types/index.js';
import { FieldEvaluatorLibrary } from '../evaluators/index.js';
import type { FieldEvaluator } from '../evaluators/index.js';
import { PairScorer, computeWeightedScore } from '../scoring/index.js';
import { DEFAULT_MATCHING_THRESHOLD, InstanceMatcher, alignByKey } from '../matching/index.js';
import { ConsistencyValidator } from '../consistency/index.js';
import { Aggregator } from '../aggregation/index.js';
import { resolveSchema } from '../schemas/index.js';
import { toScoreReport } from '../formatters/report-formatter.js';

export type MatchingStrategy = 'greedy' | 'key';

export interface ConsistencyOptions {
  /** Run consistency checks when the schema maps consistency fields (default: true) */
  enabled?: boolean;
  penaltyPerIssue?: number;
  maxPenalty?: number;
  /** Extra checks run after the built-in ones */
  checks?: ConsistencyCheck[];
}

export interface AnnotationBenchmarkOptions {
  /** Built-in schema name or an inline descriptor */
  schema: string | SchemaDescriptor;
  /** Minimum pair score for greedy matching (default: 0.7) */
  matchingThreshold?: number;
  /** Field name → weight, applied on top of the schema's weights */
  fieldWeights?: Record<string, number>;
  /** How predictions are paired with ground truths in set mode (default: greedy) */
  matchingStrategy?: MatchingStrategy;
  /** Identifier field for key alignment (default: the schema's keyField) */
  keyField?: string;
  consistency?: ConsistencyOptions;
  /** Custom evaluators, referenced by name from FieldSpecs */
  evaluators?: Record<string, FieldEvaluator>;
  logger?: Logger;
  /** Used when no logger is given (default: level "warn") */
  logging?: LoggerOptions;
}

type NormalizedSamples =
  | { mode: 'single'; groundTruth: AnnotationInstance; prediction: AnnotationInstance }
  | { mode: 'set'; groundTruths: AnnotationInstance[]; predictions: AnnotationInstance[] };

const samplesSchema = z.union([
  z
    .tuple([annotationListSchema, annotationListSchema])
    .transform(([groundTruths, predictions]: AnnotationSets): NormalizedSamples => ({
      mode: 'set',
      groundTruths,
      predictions,
    })),
  z
    .tuple([annotationInstanceSchema, annotationInstanceSchema])
    .transform(([groundTruth, prediction]: AnnotationPair): NormalizedSamples => ({
      mode: 'single',
      groundTruth,
      prediction,
    })),
]);

function parseOption<T>(schema: z.ZodType<T>, value: unknown, name: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BenchmarkError({
      code: 'INVALID_OPTIONS',
      message: formatZodError(parsed.error, `Invalid ${name}`),
    });
  }
  return parsed.data;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Annotation Benchmark Implementation
 *
 * Holds only construction-time configuration; every call allocates its
 * own intermediate state, so one instance may serve concurrent callers.
 */
export class AnnotationBenchmark implements IAnnotationBenchmark {
  readonly schema: SchemaDescriptor;
  private readonly library: FieldEvaluatorLibrary;
  private readonly scorer: PairScorer;
  private readonly threshold: number;
  private readonly fieldWeights?: Record<string, number>;
  private readonly strategy: MatchingStrategy;
  private readonly keyField?: string;
  private readonly validator: ConsistencyValidator | null;
  private readonly logger: Logger;

  constructor(options: AnnotationBenchmarkOptions) {
    this.schema = resolveSchema(options.schema);
    this.logger = (options.logger ?? new Logger({ level: 'warn', ...options.logging })).child({
      schema: this.schema.name,
    });

    this.library = new FieldEvaluatorLibrary();
    for (const [name, fn] of Object.entries(options.evaluators ?? {})) {
      this.library.register(name, fn);
    }

    this.threshold = parseOption(
      matchingThresholdSchema,
      options.matchingThreshold ?? DEFAULT_MATCHING_THRESHOLD,
      'matchingThreshold'
    );
    this.fieldWeights =
      options.fieldWeights === undefined
        ? undefined
        : parseOption(fieldWeightsSchema, options.fieldWeights, 'fieldWeights');

    this.strategy = options.matchingStrategy ?? 'greedy';
    this.keyField = options.keyField ?? this.schema.keyField;
    if (this.strategy === 'key' && !this.keyField) {
      throw new BenchmarkError({
        code: 'INVALID_OPTIONS',
        message: `Key alignment needs a key field and schema '${this.schema.name}' declares none`,
        suggestion: 'Pass keyField or use matchingStrategy "greedy"',
      });
    }

    const consistency = options.consistency ?? {};
    this.validator =
      consistency.enabled !== false && this.schema.consistency
        ? new ConsistencyValidator(this.schema.consistency, consistency)
        : null;

    this.scorer = this.createScorer(this.fieldWeights);
  }

  evaluate(samples: unknown, options?: EvaluateOptions): ScoreReport {
    return toScoreReport(this.run(samples, options));
  }

  run(samples: unknown, options?: EvaluateOptions): EvaluationResult {
    const normalized = this.normalizeSamples(samples);
    return normalized.mode === 'single'
      ? this.evaluatePair(normalized.groundTruth, normalized.prediction, options)
      : this.evaluateSets(normalized.groundTruths, normalized.predictions, options);
  }

  evaluatePair(
    groundTruth: AnnotationInstance,
    prediction: AnnotationInstance,
    options?: EvaluateOptions
  ): EvaluationResult {
    const scorer = this.scorerFor(options);
    const pair = scorer.score(prediction, groundTruth, 0, 0);
    this.logger.debug('Scored single pair', { score: pair.score });

    const matchSet: MatchSet = {
      pairs: [pair],
      unmatchedPredictions: [],
      unmatchedGroundTruths: [],
      candidateCount: 1,
    };
    return this.finish('single', scorer, matchSet, options);
  }

  evaluateSets(
    groundTruths: AnnotationInstance[],
    predictions: AnnotationInstance[],
    options?: EvaluateOptions
  ): EvaluationResult {
    if (groundTruths.length === 0 && predictions.length === 0) {
      return this.degenerate('empty', 1.0);
    }
    if (predictions.length === 0) {
      return this.degenerate('missing_predictions', 0.0, groundTruths.length, 0);
    }
    if (groundTruths.length === 0) {
      return this.degenerate('missing_ground_truth', 0.0, 0, predictions.length);
    }

    this.logUnknownFields(predictions);

    const scorer = this.scorerFor(options);
    const matchSet = this.match(scorer, predictions, groundTruths, options);

    this.logger.debug('Matched annotation sets', {
      strategy: this.strategy,
      predictions: predictions.length,
      groundTruths: groundTruths.length,
      candidates: matchSet.candidateCount,
      matched: matchSet.pairs.length,
    });

    return this.finish('set', scorer, matchSet, options);
  }

  private match(
    scorer: PairScorer,
    predictions: AnnotationInstance[],
    groundTruths: AnnotationInstance[],
    options?: EvaluateOptions
  ): MatchSet {
    if (this.strategy === 'key' && this.keyField) {
      return alignByKey(predictions, groundTruths, scorer, this.keyField);
    }

    const threshold =
      options?.matchingThreshold === undefined
        ? this.threshold
        : parseOption(matchingThresholdSchema, options.matchingThreshold, 'matchingThreshold');
    return new InstanceMatcher(scorer, threshold).match(predictions, groundTruths);
  }

  /**
   * Penalize matched pairs and aggregate
   */
  private finish(
    mode: EvaluationMode,
    scorer: PairScorer,
    matchSet: MatchSet,
    options?: EvaluateOptions
  ): EvaluationResult {
    const samples = matchSet.pairs.map((pair, sampleId) =>
      this.toSample(pair, sampleId, scorer, options?.relatedInstances)
    );

    const aggregation = new Aggregator(this.schema, scorer.weights).aggregate({
      samples,
      unmatchedPredictionCount: matchSet.unmatchedPredictions.length,
      unmatchedGroundTruthCount: matchSet.unmatchedGroundTruths.length,
    });

    return {
      schema: this.schema.name,
      mode,
      status: 'scored',
      totalSamples: samples.length,
      fieldStatistics: aggregation.fieldStatistics,
      overallScore: aggregation.overallScore,
      samples,
      run: aggregation.run,
    };
  }

  private toSample(
    pair: PairScore,
    sampleId: number,
    scorer: PairScorer,
    related?: AnnotationInstance[]
  ): SampleResult {
    const issues = this.validator ? this.validator.validate(pair.prediction, related) : [];
    const { fieldScores, penalty } = this.validator
      ? this.validator.applyPenalties(pair.fieldScores, issues)
      : {
          fieldScores: { ...pair.fieldScores },
          penalty: { totalPenalty: 0, penalizedFields: {}, issuesByField: {} },
        };

    if (issues.length > 0) {
      this.logger.debug('Consistency issues found', {
        sampleId,
        issues: issues.map((i) => i.code),
        penalty: penalty.totalPenalty,
      });
    }

    return {
      sampleId,
      predictionIndex: pair.predictionIndex,
      groundTruthIndex: pair.groundTruthIndex,
      fieldScores,
      fieldResults: pair.fieldResults,
      overallScore: mean(Object.values(fieldScores)),
      weightedScore: computeWeightedScore(fieldScores, scorer.weights),
      issues,
      penalty,
    };
  }

  private degenerate(
    status: Exclude<EvaluationStatus, 'scored'>,
    overallScore: number,
    groundTruthCount = 0,
    predictionCount = 0
  ): EvaluationResult {
    this.logger.debug('Degenerate input', { status, groundTruthCount, predictionCount });
    return {
      schema: this.schema.name,
      mode: 'set',
      status,
      totalSamples: 0,
      fieldStatistics: {},
      overallScore,
      samples: [],
      run: {
        matchedCount: 0,
        unmatchedPredictionCount: predictionCount,
        unmatchedGroundTruthCount: groundTruthCount,
        meanOverallScore: overallScore,
        meanWeightedScore: overallScore,
        minScore: null,
        maxScore: null,
        scoreDistribution: { excellent: 0, good: 0, fair: 0, poor: 0 },
        mostDifficult: [],
      },
    };
  }

  private normalizeSamples(samples: unknown): NormalizedSamples {
    const parsed = samplesSchema.safeParse(samples);
    if (!parsed.success) {
      throw new BenchmarkError({
        code: 'INVALID_INPUT',
        message:
          'Expected [groundTruth, prediction] as two records or two lists of records',
        suggestion: 'Pass [groundTruthRecord, predictionRecord] or [groundTruthList, predictionList]',
        context: { issues: parsed.error.issues.length },
      });
    }
    return parsed.data;
  }

  private scorerFor(options?: EvaluateOptions): PairScorer {
    if (options?.fieldWeights === undefined) {
      return this.scorer;
    }
    const overrides = parseOption(fieldWeightsSchema, options.fieldWeights, 'fieldWeights');
    return this.createScorer({ ...this.fieldWeights, ...overrides });
  }

  private createScorer(fieldWeights?: Record<string, number>): PairScorer {
    return new PairScorer({
      schema: this.schema,
      fieldWeights,
      library: this.library,
      logger: this.logger,
    });
  }

  private logUnknownFields(records: AnnotationInstance[]): void {
    if (!this.logger.isLevelEnabled('debug')) return;
    const known = new Set(this.schema.fields.map((f) => f.name));
    const unknown = extractFieldNames(records).filter((f) => !known.has(f));
    if (unknown.length > 0) {
      this.logger.debug('Fields outside the schema are not scored', { fields: unknown });
    }
  }
}
