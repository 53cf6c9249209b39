import { describe, expect, it } from 'vitest';
import { BenchmarkError } from '@annobench/core';
import type { AnnotationInstance, SchemaDescriptor } from '@annobench/core';
import { PairScorer } from '../src/scoring/index.js';
import { InstanceMatcher, alignByKey } from '../src/matching/index.js';

const schema: SchemaDescriptor = {
  name: 'test',
  fields: [
    { name: 'Gene', evaluator: 'exact_match' },
    { name: 'Drug', evaluator: 'exact_match' },
  ],
};

const scorer = new PairScorer({ schema });

function rec(gene: string, drug: string): AnnotationInstance {
  return { Gene: gene, Drug: drug };
}

/** Deterministic PRNG so failures reproduce */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('InstanceMatcher', () => {
  it('pairs records by content regardless of order', () => {
    const result = new InstanceMatcher(scorer).match(
      [rec('A', 'x'), rec('B', 'y')],
      [rec('B', 'y'), rec('A', 'x')]
    );

    expect(result.pairs.map((p) => [p.predictionIndex, p.groundTruthIndex])).toEqual([
      [0, 1],
      [1, 0],
    ]);
    expect(result.unmatchedPredictions).toEqual([]);
    expect(result.unmatchedGroundTruths).toEqual([]);
    expect(result.candidateCount).toBe(2);
  });

  it('lets several predictions share a ground truth', () => {
    const result = new InstanceMatcher(scorer).match([rec('A', 'x'), rec('A', 'x')], [rec('A', 'x')]);

    expect(result.pairs.map((p) => [p.predictionIndex, p.groundTruthIndex])).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });

  it('leaves pairs below the threshold unmatched', () => {
    const predictions = [rec('A', 'x')];
    const groundTruths = [rec('A', 'z')];

    const strict = new InstanceMatcher(scorer).match(predictions, groundTruths);
    expect(strict.pairs).toEqual([]);
    expect(strict.unmatchedPredictions).toEqual([0]);
    expect(strict.unmatchedGroundTruths).toEqual([0]);

    const lenient = new InstanceMatcher(scorer, 0.5).match(predictions, groundTruths);
    expect(lenient.pairs).toHaveLength(1);
    expect(lenient.pairs[0]?.score).toBe(0.5);
  });

  it('assigns the best candidates first', () => {
    const result = new InstanceMatcher(scorer, 0.5).match(
      [rec('A', 'q'), rec('A', 'x')],
      [rec('A', 'x')]
    );

    expect(result.pairs.map((p) => [p.predictionIndex, p.score])).toEqual([
      [1, 1],
      [0, 0.5],
    ]);
  });

  it('gives each prediction its best ground truth only', () => {
    const result = new InstanceMatcher(scorer, 0.5).match(
      [rec('A', 'x')],
      [rec('A', 'y'), rec('A', 'x')]
    );

    expect(result.pairs.map((p) => p.groundTruthIndex)).toEqual([1]);
    expect(result.candidateCount).toBe(2);
    expect(result.unmatchedGroundTruths).toEqual([0]);
  });

  it('breaks score ties by prediction order', () => {
    const result = new InstanceMatcher(scorer).match(
      [rec('B', 'y'), rec('A', 'x'), rec('A', 'x')],
      [rec('A', 'x'), rec('B', 'y')]
    );

    expect(result.pairs.map((p) => p.predictionIndex)).toEqual([0, 1, 2]);
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => new InstanceMatcher(scorer, 1.5)).toThrow(BenchmarkError);
    expect(() => new InstanceMatcher(scorer, -0.1)).toThrow(BenchmarkError);
  });

  it('holds its invariants on random inputs', () => {
    const random = mulberry32(42);
    const pick = (values: string[]) => values[Math.floor(random() * values.length)] ?? '';
    const genes = ['A', 'B', 'C'];
    const drugs = ['x', 'y', 'z', ''];
    const randomList = () =>
      Array.from({ length: Math.floor(random() * 6) }, () => rec(pick(genes), pick(drugs)));

    for (let round = 0; round < 200; round++) {
      const threshold = [0, 0.5, 0.7, 1][round % 4] ?? 0.7;
      const predictions = randomList();
      const groundTruths = randomList();
      const result = new InstanceMatcher(scorer, threshold).match(predictions, groundTruths);

      const predictionIndices = result.pairs.map((p) => p.predictionIndex);
      expect(new Set(predictionIndices).size).toBe(predictionIndices.length);
      for (const pair of result.pairs) {
        expect(pair.score).toBeGreaterThanOrEqual(threshold);
      }
      expect(result.pairs.length + result.unmatchedPredictions.length).toBe(predictions.length);

      const covered = new Set(result.pairs.map((p) => p.groundTruthIndex));
      expect(covered.size + result.unmatchedGroundTruths.length).toBe(groundTruths.length);
    }
  });
});

describe('alignByKey', () => {
  const keyed = (id: string, value?: string): AnnotationInstance => ({ ID: id, Gene: value });

  it('pairs each ground truth with the first unused prediction of the same key', () => {
    const result = alignByKey(
      [keyed('1', 'a'), keyed('2', 'b'), keyed(' 2 ', 'c')],
      [keyed('2', 'b'), keyed('3'), keyed('2', 'c')],
      scorer,
      'ID'
    );

    expect(result.pairs.map((p) => [p.predictionIndex, p.groundTruthIndex])).toEqual([
      [1, 0],
      [2, 2],
    ]);
    expect(result.unmatchedPredictions).toEqual([0]);
    expect(result.unmatchedGroundTruths).toEqual([1]);
  });

  it('ignores the content score', () => {
    const result = alignByKey([keyed('1', 'a')], [keyed('1', 'zzz')], scorer, 'ID');
    expect(result.pairs).toHaveLength(1);
    expect(result.pairs[0]?.fieldScores.Gene).toBe(0);
  });

  it('never pairs records without a key', () => {
    const result = alignByKey([{ Gene: 'a' }], [{ Gene: 'a' }], scorer, 'ID');
    expect(result.pairs).toEqual([]);
  });
});
