import { describe, expect, it, vi } from 'vitest';
import { BenchmarkError, createSilentLogger } from '@annobench/core';
import type { SchemaDescriptor } from '@annobench/core';
import { FieldEvaluatorLibrary } from '../src/evaluators/index.js';
import {
  PairScorer,
  computeWeightedScore,
  resolveFieldWeights,
} from '../src/scoring/index.js';
import { classifyError } from '../src/aggregation/index.js';

const schema: SchemaDescriptor = {
  name: 'test',
  fields: [
    { name: 'Gene', evaluator: 'exact_match', weight: 2 },
    { name: 'Direction of effect', evaluator: 'category_equal' },
  ],
};

describe('computeWeightedScore', () => {
  it('equals the plain mean with uniform weights', () => {
    const scores = { a: 0.2, b: 0.4, c: 0.9 };
    expect(computeWeightedScore(scores)).toBeCloseTo(0.5, 10);
    expect(computeWeightedScore(scores, { a: 2, b: 2, c: 2 })).toBeCloseTo(0.5, 10);
  });

  it('weights fields', () => {
    expect(computeWeightedScore({ a: 1, b: 0 }, { a: 3, b: 1 })).toBe(0.75);
  });

  it('returns 0 when the total weight is zero', () => {
    expect(computeWeightedScore({ a: 1, b: 1 }, { a: 0, b: 0 })).toBe(0);
    expect(computeWeightedScore({})).toBe(0);
  });
});

describe('resolveFieldWeights', () => {
  it('prefers overrides, then schema weights, then 1', () => {
    expect(resolveFieldWeights(schema)).toEqual({ Gene: 2, 'Direction of effect': 1 });
    expect(resolveFieldWeights(schema, { Gene: 0.5, Other: 9 })).toEqual({
      Gene: 0.5,
      'Direction of effect': 1,
    });
  });
});

describe('classifyError', () => {
  it('classifies in precedence order', () => {
    expect(classifyError('x', 'x', 1)).toBeUndefined();
    expect(classifyError(null, 'abc', 0)).toBe('missing_prediction');
    expect(classifyError('abc', null, 0)).toBe('unexpected_prediction');
    expect(classifyError('ab', 'abcdefgh', 0.2)).toBe('incomplete_extraction');
    expect(classifyError('abcdefghij', 'abc', 0.3)).toBe('over_extraction');
    expect(classifyError('abcd', 'wxyz', 0)).toBe('content_mismatch');
    expect(classifyError(null, null, 0.5)).toBe('content_mismatch');
  });
});

describe('PairScorer', () => {
  it('scores every schema field and takes the weighted mean', () => {
    const scorer = new PairScorer({ schema });
    const pair = scorer.score(
      { Gene: 'CYP2C9', 'Direction of effect': 'decreased' },
      { Gene: 'cyp2c9', 'Direction of effect': 'increased' },
      3,
      5
    );

    expect(pair.fieldScores).toEqual({ Gene: 1, 'Direction of effect': 0 });
    expect(pair.score).toBeCloseTo(2 / 3, 10);
    expect(pair.predictionIndex).toBe(3);
    expect(pair.groundTruthIndex).toBe(5);
    expect(pair.fieldResults.Gene).toMatchObject({ exactMatch: true, errorType: undefined });
    expect(pair.fieldResults['Direction of effect']).toMatchObject({
      exactMatch: false,
      errorType: 'content_mismatch',
      predicted: 'decreased',
      expected: 'increased',
    });
  });

  it('scores missing fields instead of skipping them', () => {
    const pair = new PairScorer({ schema }).score({}, { Gene: 'VKORC1' });

    expect(Object.keys(pair.fieldScores)).toEqual(['Gene', 'Direction of effect']);
    expect(pair.fieldScores.Gene).toBe(0);
    expect(pair.fieldResults.Gene?.errorType).toBe('missing_prediction');
    expect(pair.fieldScores['Direction of effect']).toBe(1);
    expect(pair.fieldResults['Direction of effect']?.exactMatch).toBe(true);
  });

  it('applies weight overrides', () => {
    const scorer = new PairScorer({ schema, fieldWeights: { Gene: 1, 'Direction of effect': 3 } });
    const pair = scorer.score(
      { Gene: 'CYP2C9', 'Direction of effect': 'decreased' },
      { Gene: 'CYP2C9', 'Direction of effect': 'increased' }
    );
    expect(pair.score).toBe(0.25);
  });

  it('degrades a throwing evaluator to 0 and logs a warning', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const library = new FieldEvaluatorLibrary().register('boom', () => {
      throw new Error('bad value');
    });
    const scorer = new PairScorer({
      schema: { name: 'custom', fields: [{ name: 'Gene', evaluator: 'boom' }] },
      library,
      logger,
    });

    expect(scorer.score({ Gene: 'a' }, { Gene: 'a' }).fieldScores.Gene).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      'Evaluator failed; field scored 0',
      expect.objectContaining({ field: 'Gene', evaluator: 'boom', error: 'bad value' })
    );
  });

  it('clamps evaluator output into [0, 1]', () => {
    const library = new FieldEvaluatorLibrary()
      .register('too_high', () => 1.5)
      .register('not_a_number', () => Number.NaN);
    const scorer = new PairScorer({
      schema: {
        name: 'custom',
        fields: [
          { name: 'a', evaluator: 'too_high' },
          { name: 'b', evaluator: 'not_a_number' },
        ],
      },
      library,
    });

    expect(scorer.score({}, {}).fieldScores).toEqual({ a: 1, b: 0 });
  });

  it('rejects unknown evaluators up front', () => {
    expect(
      () => new PairScorer({ schema: { name: 'bad', fields: [{ name: 'a', evaluator: 'nope' }] } })
    ).toThrow(BenchmarkError);
  });
});
