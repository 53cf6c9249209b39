/**
 * Article Benchmark
 *
 * Runs every annotation family of an article through its own engine and
 * combines the family scores. A failing family or article scores 0 and is
 * recorded; a batch never stops early.
 */

import { BenchmarkError, Logger, annotationListSchema, wrapError } from '@annobench/core';
import type { AnnotationInstance, LoggerOptions } from '@annobench/core';
import type { ScoreReport } from '../types/index.js';
import { AnnotationBenchmark } from './annotation-benchmark.js';
import type { ConsistencyOptions } from './annotation-benchmark.js';

export type AnnotationFamily = 'varDrugAnn' | 'varPhenoAnn' | 'varFaAnn' | 'studyParameters';

/** Schema used for each family */
export const FAMILY_SCHEMAS: Readonly<Record<AnnotationFamily, string>> = {
  varDrugAnn: 'drug',
  varPhenoAnn: 'phenotype',
  varFaAnn: 'functional',
  studyParameters: 'study_parameters',
};

const FAMILIES: readonly AnnotationFamily[] = [
  'varDrugAnn',
  'varPhenoAnn',
  'varFaAnn',
  'studyParameters',
];

/** Families whose rows study parameters refer to */
const REFERENCED_FAMILIES: readonly AnnotationFamily[] = ['varDrugAnn', 'varPhenoAnn', 'varFaAnn'];

/**
 * Family lists as loaded. Each list is validated when its family is
 * evaluated; a family missing on both sides is skipped.
 */
export type ArticleAnnotations = Partial<Record<AnnotationFamily, unknown>>;

export interface FamilyResult {
  family: AnnotationFamily;
  schema: string;
  status: 'scored' | 'skipped' | 'failed';
  score: number;
  report?: ScoreReport;
  error?: string;
}

export interface ArticleResult {
  articleId: string;
  status: 'scored' | 'failed';
  /** Mean of scored and failed family scores; 1.0 when every family was skipped */
  totalScore: number;
  families: Partial<Record<AnnotationFamily, FamilyResult>>;
  error?: string;
}

export interface ArticleInput {
  id: string;
  groundTruth: unknown;
  prediction: unknown;
}

export interface BatchResult {
  articles: ArticleResult[];
  meanScore: number;
  failedCount: number;
}

export interface ArticleBenchmarkOptions {
  matchingThreshold?: number;
  /** Weight overrides per family */
  fieldWeights?: Partial<Record<AnnotationFamily, Record<string, number>>>;
  consistency?: ConsistencyOptions;
  logger?: Logger;
  logging?: LoggerOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export class ArticleBenchmark {
  private readonly engines: Record<AnnotationFamily, AnnotationBenchmark>;
  private readonly logger: Logger;

  constructor(options: ArticleBenchmarkOptions = {}) {
    this.logger = options.logger ?? new Logger({ level: 'warn', ...options.logging });

    const build = (family: AnnotationFamily) =>
      new AnnotationBenchmark({
        schema: FAMILY_SCHEMAS[family],
        matchingThreshold: options.matchingThreshold,
        fieldWeights: options.fieldWeights?.[family],
        matchingStrategy: family === 'studyParameters' ? 'key' : 'greedy',
        consistency: options.consistency,
        logger: this.logger,
      });

    this.engines = {
      varDrugAnn: build('varDrugAnn'),
      varPhenoAnn: build('varPhenoAnn'),
      varFaAnn: build('varFaAnn'),
      studyParameters: build('studyParameters'),
    };
  }

  /**
   * Evaluate every family of one article.
   *
   * @throws BenchmarkError INVALID_INPUT when either side is not an object
   */
  evaluateArticle(groundTruth: unknown, prediction: unknown, articleId = 'article'): ArticleResult {
    if (!isRecord(groundTruth) || !isRecord(prediction)) {
      throw new BenchmarkError({
        code: 'INVALID_INPUT',
        message: `Article '${articleId}': ground truth and prediction must be objects keyed by family`,
        context: { families: FAMILIES },
      });
    }

    const families: Partial<Record<AnnotationFamily, FamilyResult>> = {};
    const counted: number[] = [];

    for (const family of FAMILIES) {
      const result = this.evaluateFamily(family, groundTruth, prediction, articleId);
      families[family] = result;
      if (result.status !== 'skipped') {
        counted.push(result.score);
      }
    }

    return {
      articleId,
      status: 'scored',
      totalScore: counted.length > 0 ? mean(counted) : 1.0,
      families,
    };
  }

  /**
   * Evaluate many articles. Articles that throw are recorded with score 0.
   */
  evaluateBatch(articles: ArticleInput[]): BatchResult {
    const results = articles.map((article) => {
      try {
        return this.evaluateArticle(article.groundTruth, article.prediction, article.id);
      } catch (err) {
        const error = wrapError(err);
        this.logger.error('Article evaluation failed', {
          article: article.id,
          code: error.code,
          error: error.message,
        });
        const failed: ArticleResult = {
          articleId: article.id,
          status: 'failed',
          totalScore: 0,
          families: {},
          error: error.message,
        };
        return failed;
      }
    });

    const failedCount = results.filter((r) => r.status === 'failed').length;
    const meanScore = mean(results.map((r) => r.totalScore));

    this.logger.info('Batch evaluation complete', {
      articles: results.length,
      failed: failedCount,
      meanScore,
    });

    return { articles: results, meanScore, failedCount };
  }

  private evaluateFamily(
    family: AnnotationFamily,
    groundTruth: Record<string, unknown>,
    prediction: Record<string, unknown>,
    articleId: string
  ): FamilyResult {
    const schema = FAMILY_SCHEMAS[family];
    const expected = groundTruth[family];
    const predicted = prediction[family];

    if (expected == null && predicted == null) {
      return { family, schema, status: 'skipped', score: 0 };
    }

    try {
      const report = this.engines[family].evaluate([expected ?? [], predicted ?? []], {
        relatedInstances:
          family === 'studyParameters' ? this.relatedRows(prediction) : undefined,
      });
      return { family, schema, status: 'scored', score: report.overall_score, report };
    } catch (err) {
      const error = wrapError(err);
      this.logger.error('Annotation family failed', {
        article: articleId,
        family,
        code: error.code,
        error: error.message,
      });
      return { family, schema, status: 'failed', score: 0, error: error.message };
    }
  }

  /**
   * Predicted rows of the families study parameters point into. Undefined,
   * which skips the referential check, when the prediction carries none of
   * those families or any of them is malformed.
   */
  private relatedRows(prediction: Record<string, unknown>): AnnotationInstance[] | undefined {
    if (REFERENCED_FAMILIES.every((family) => prediction[family] == null)) {
      return undefined;
    }

    const rows: AnnotationInstance[] = [];
    for (const family of REFERENCED_FAMILIES) {
      const parsed = annotationListSchema.safeParse(prediction[family] ?? []);
      if (!parsed.success) return undefined;
      rows.push(...parsed.data);
    }
    return rows;
  }
}
