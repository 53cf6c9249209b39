import { describe, expect, it } from 'vitest';
import type { SchemaDescriptor } from '@annobench/core';
import { Aggregator, scoreBucket } from '../src/aggregation/index.js';
import type { ErrorType, FieldResult, SampleResult } from '../src/types/index.js';

const schema: SchemaDescriptor = {
  name: 'test',
  fields: [
    { name: 'a', evaluator: 'exact_match', weight: 1 },
    { name: 'b', evaluator: 'exact_match', weight: 3 },
  ],
};
const weights = { a: 1, b: 3 };

function result(field: string, score: number, errorType?: ErrorType): FieldResult {
  return {
    field,
    score,
    exactMatch: score === 1,
    predicted: 'p',
    expected: 'e',
    errorType,
  };
}

function sample(sampleId: number, a: number, b: number, weightedScore: number): SampleResult {
  return {
    sampleId,
    predictionIndex: sampleId,
    groundTruthIndex: 0,
    fieldScores: { a, b },
    fieldResults: {
      a: result('a', a, a < 1 ? 'incomplete_extraction' : undefined),
      b: result('b', b, b < 1 ? 'content_mismatch' : undefined),
    },
    overallScore: (a + b) / 2,
    weightedScore,
    issues: [],
    penalty: { totalPenalty: 0, penalizedFields: {}, issuesByField: {} },
  };
}

describe('scoreBucket', () => {
  it('uses fixed boundaries', () => {
    expect(scoreBucket(0.9)).toBe('excellent');
    expect(scoreBucket(0.7)).toBe('good');
    expect(scoreBucket(0.5)).toBe('fair');
    expect(scoreBucket(0.49)).toBe('poor');
  });
});

describe('Aggregator', () => {
  const aggregator = new Aggregator(schema, weights);

  it('computes field-level statistics', () => {
    const { fieldStatistics } = aggregator.aggregate({
      samples: [sample(0, 1, 0.2, 0.4), sample(1, 0.5, 1, 0.875)],
      unmatchedPredictionCount: 0,
      unmatchedGroundTruthCount: 0,
    });

    expect(fieldStatistics.a).toEqual({
      meanScore: 0.75,
      scores: [1, 0.5],
      exactMatchCount: 1,
      exactMatchRate: 0.5,
      errorTypes: { incomplete_extraction: 1 },
    });
    expect(fieldStatistics.b?.meanScore).toBeCloseTo(0.6, 10);
    expect(fieldStatistics.b?.errorTypes).toEqual({ content_mismatch: 1 });
  });

  it('computes run-level statistics', () => {
    const { overallScore, run } = aggregator.aggregate({
      samples: [sample(0, 1, 0.2, 0.4), sample(1, 0.5, 1, 0.875)],
      unmatchedPredictionCount: 2,
      unmatchedGroundTruthCount: 1,
    });

    // (0.75 * 1 + 0.6 * 3) / 4
    expect(overallScore).toBeCloseTo(0.6375, 10);
    expect(run.meanWeightedScore).toBe(overallScore);
    expect(run.meanOverallScore).toBeCloseTo(0.675, 10);
    expect(run.matchedCount).toBe(2);
    expect(run.unmatchedPredictionCount).toBe(2);
    expect(run.unmatchedGroundTruthCount).toBe(1);
    expect(run.minScore).toBe(0.4);
    expect(run.maxScore).toBe(0.875);
    expect(run.scoreDistribution).toEqual({ excellent: 0, good: 1, fair: 0, poor: 1 });
    expect(run.mostDifficult).toEqual([
      { sampleId: 0, score: 0.4, mainIssues: ['b'] },
      { sampleId: 1, score: 0.875, mainIssues: [] },
    ]);
  });

  it('keeps at most ten difficult samples, lowest first', () => {
    const samples = Array.from({ length: 12 }, (_, i) => sample(i, 1, 1, 1 - i / 20));
    const { run } = aggregator.aggregate({
      samples,
      unmatchedPredictionCount: 0,
      unmatchedGroundTruthCount: 0,
    });

    expect(run.mostDifficult.map((d) => d.sampleId)).toEqual([11, 10, 9, 8, 7, 6, 5, 4, 3, 2]);
  });

  it('reports every schema field with no samples', () => {
    const { fieldStatistics, overallScore, run } = aggregator.aggregate({
      samples: [],
      unmatchedPredictionCount: 1,
      unmatchedGroundTruthCount: 1,
    });

    expect(Object.keys(fieldStatistics)).toEqual(['a', 'b']);
    expect(fieldStatistics.a).toMatchObject({ meanScore: 0, scores: [], exactMatchRate: 0 });
    expect(overallScore).toBe(0);
    expect(run.minScore).toBeNull();
    expect(run.maxScore).toBeNull();
  });
});
