/**
 * Key Aligner
 *
 * Pairs records by a shared identifier field instead of by content.
 */

import { normalizeText } from '@annobench/core';
import type { AnnotationInstance } from '@annobench/core';
import type { MatchSet, PairScore } from '../types/index.js';
import type { PairScorer } from '../scoring/index.js';

/**
 * Each ground truth takes the first unassigned prediction with an equal
 * key. Records without a key are never paired. No threshold applies.
 */
export function alignByKey(
  predictions: AnnotationInstance[],
  groundTruths: AnnotationInstance[],
  scorer: PairScorer,
  keyField: string
): MatchSet {
  const assignedPredictions = new Set<number>();
  const coveredGroundTruths = new Set<number>();
  const pairs: PairScore[] = [];

  const predictionKeys = predictions.map((p) => normalizeText(p[keyField]));

  groundTruths.forEach((groundTruth, g) => {
    const key = normalizeText(groundTruth[keyField]);
    if (key === null) return;

    const p = predictionKeys.findIndex(
      (candidate, i) => candidate === key && !assignedPredictions.has(i)
    );
    const prediction = predictions[p];
    if (p < 0 || prediction === undefined) return;

    assignedPredictions.add(p);
    coveredGroundTruths.add(g);
    pairs.push(scorer.score(prediction, groundTruth, p, g));
  });

  return {
    pairs,
    unmatchedPredictions: predictions
      .map((_, i) => i)
      .filter((i) => !assignedPredictions.has(i)),
    unmatchedGroundTruths: groundTruths
      .map((_, i) => i)
      .filter((i) => !coveredGroundTruths.has(i)),
    candidateCount: pairs.length,
  };
}
