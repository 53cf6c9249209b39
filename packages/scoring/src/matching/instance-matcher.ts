/**
 * Instance Matcher
 *
 * Pairs predicted records with ground-truth records when no shared
 * identifier exists: score every combination, keep those at or above the
 * threshold, then assign greedily from the best score down.
 */

import { BenchmarkError } from '@annobench/core';
import type { AnnotationInstance } from '@annobench/core';
import type { MatchSet, PairScore } from '../types/index.js';
import type { PairScorer } from '../scoring/index.js';

export const DEFAULT_MATCHING_THRESHOLD = 0.7;

export class InstanceMatcher {
  constructor(
    private readonly scorer: PairScorer,
    private readonly threshold: number = DEFAULT_MATCHING_THRESHOLD
  ) {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new BenchmarkError({
        code: 'INVALID_OPTIONS',
        message: `Matching threshold must be between 0 and 1 (got ${threshold})`,
      });
    }
  }

  /**
   * Match predictions to ground truths.
   *
   * Each prediction is assigned at most once. Several predictions may share
   * a ground truth. Records left over are reported but not scored.
   */
  match(predictions: AnnotationInstance[], groundTruths: AnnotationInstance[]): MatchSet {
    const candidates = this.findCandidates(predictions, groundTruths);

    const assignedPredictions = new Set<number>();
    const coveredGroundTruths = new Set<number>();
    const pairs: PairScore[] = [];

    for (const candidate of candidates) {
      if (assignedPredictions.has(candidate.predictionIndex)) continue;

      assignedPredictions.add(candidate.predictionIndex);
      coveredGroundTruths.add(candidate.groundTruthIndex);
      pairs.push(candidate);
    }

    return {
      pairs,
      unmatchedPredictions: predictions
        .map((_, i) => i)
        .filter((i) => !assignedPredictions.has(i)),
      unmatchedGroundTruths: groundTruths
        .map((_, i) => i)
        .filter((i) => !coveredGroundTruths.has(i)),
      candidateCount: candidates.length,
    };
  }

  /**
   * All pairs at or above the threshold, best first. Ties keep
   * prediction order, then ground-truth order.
   */
  private findCandidates(
    predictions: AnnotationInstance[],
    groundTruths: AnnotationInstance[]
  ): PairScore[] {
    const candidates: PairScore[] = [];

    predictions.forEach((prediction, p) => {
      groundTruths.forEach((groundTruth, g) => {
        const pair = this.scorer.score(prediction, groundTruth, p, g);
        if (pair.score >= this.threshold) {
          candidates.push(pair);
        }
      });
    });

    // Array.prototype.sort is stable
    return candidates.sort((a, b) => b.score - a.score);
  }
}
