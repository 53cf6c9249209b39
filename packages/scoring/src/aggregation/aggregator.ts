/**
 * Aggregator
 *
 * Reduces scored samples into field-level and run-level statistics.
 */

import type { SchemaDescriptor } from '@annobench/core';
import type {
  DifficultSample,
  ErrorType,
  FieldStatistics,
  RunStatistics,
  SampleResult,
  ScoreBucket,
} from '../types/index.js';
import { computeWeightedScore } from '../scoring/index.js';

/** Length of the most-difficult list */
export const MAX_DIFFICULT_SAMPLES = 10;
/** Fields below this score are listed as a difficult sample's main issues */
export const LOW_FIELD_SCORE = 0.3;

export interface AggregationInput {
  samples: SampleResult[];
  unmatchedPredictionCount: number;
  unmatchedGroundTruthCount: number;
}

export interface Aggregation {
  fieldStatistics: Record<string, FieldStatistics>;
  /** Weighted mean of field-level means */
  overallScore: number;
  run: RunStatistics;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function scoreBucket(score: number): ScoreBucket {
  if (score >= 0.9) return 'excellent';
  if (score >= 0.7) return 'good';
  if (score >= 0.5) return 'fair';
  return 'poor';
}

export class Aggregator {
  constructor(
    private readonly schema: SchemaDescriptor,
    private readonly weights: Record<string, number>
  ) {}

  aggregate(input: AggregationInput): Aggregation {
    const { samples } = input;
    const fieldStatistics = this.fieldLevel(samples);

    const fieldMeans: Record<string, number> = {};
    for (const [field, stats] of Object.entries(fieldStatistics)) {
      fieldMeans[field] = stats.meanScore;
    }
    const overallScore = computeWeightedScore(fieldMeans, this.weights);

    const pairScores = samples.map((s) => s.weightedScore);
    const scoreDistribution: Record<ScoreBucket, number> = {
      excellent: 0,
      good: 0,
      fair: 0,
      poor: 0,
    };
    for (const score of pairScores) {
      scoreDistribution[scoreBucket(score)] += 1;
    }

    return {
      fieldStatistics,
      overallScore,
      run: {
        matchedCount: samples.length,
        unmatchedPredictionCount: input.unmatchedPredictionCount,
        unmatchedGroundTruthCount: input.unmatchedGroundTruthCount,
        meanOverallScore: mean(samples.map((s) => s.overallScore)),
        meanWeightedScore: overallScore,
        minScore: pairScores.length > 0 ? Math.min(...pairScores) : null,
        maxScore: pairScores.length > 0 ? Math.max(...pairScores) : null,
        scoreDistribution,
        mostDifficult: this.mostDifficult(samples),
      },
    };
  }

  /**
   * Statistics for every schema field, in schema order
   */
  private fieldLevel(samples: SampleResult[]): Record<string, FieldStatistics> {
    const stats: Record<string, FieldStatistics> = {};

    for (const spec of this.schema.fields) {
      const scores = samples.map((s) => s.fieldScores[spec.name] ?? 0);
      const results = samples.flatMap((s) => {
        const result = s.fieldResults[spec.name];
        return result ? [result] : [];
      });

      const errorTypes: Partial<Record<ErrorType, number>> = {};
      for (const result of results) {
        if (result.errorType) {
          errorTypes[result.errorType] = (errorTypes[result.errorType] ?? 0) + 1;
        }
      }

      const exactMatchCount = results.filter((r) => r.exactMatch).length;
      stats[spec.name] = {
        meanScore: mean(scores),
        scores,
        exactMatchCount,
        exactMatchRate: samples.length > 0 ? exactMatchCount / samples.length : 0,
        errorTypes,
      };
    }

    return stats;
  }

  private mostDifficult(samples: SampleResult[]): DifficultSample[] {
    return [...samples]
      .sort((a, b) => a.weightedScore - b.weightedScore || a.sampleId - b.sampleId)
      .slice(0, MAX_DIFFICULT_SAMPLES)
      .map((s) => ({
        sampleId: s.sampleId,
        score: s.weightedScore,
        mainIssues: this.schema.fields
          .map((f) => f.name)
          .filter((name) => (s.fieldScores[name] ?? 0) < LOW_FIELD_SCORE),
      }));
  }
}
