/**
 * Consistency Validator
 *
 * Audits a predicted record for contradictory values and discounts the
 * field scores each contradiction implicates.
 */

import { BenchmarkError } from '@annobench/core';
import type { AnnotationInstance, ConsistencyFields } from '@annobench/core';
import type {
  ConsistencyCheck,
  ConsistencyIssue,
  PenalizedField,
  PenaltyInfo,
} from '../types/index.js';
import { BUILT_IN_CHECKS } from './checks.js';

export const DEFAULT_PENALTY_PER_ISSUE = 0.05;
export const DEFAULT_MAX_PENALTY = 0.3;

export interface ConsistencyValidatorOptions {
  /** Reduction per issue (default: 0.05) */
  penaltyPerIssue?: number;
  /** Cap on the total reduction (default: 0.3) */
  maxPenalty?: number;
  /** Extra checks run after the built-in ones */
  checks?: ConsistencyCheck[];
}

export interface PenaltyOutcome {
  fieldScores: Record<string, number>;
  penalty: PenaltyInfo;
}

function assertFraction(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new BenchmarkError({
      code: 'INVALID_OPTIONS',
      message: `${name} must be between 0 and 1 (got ${value})`,
    });
  }
}

export class ConsistencyValidator {
  private readonly penaltyPerIssue: number;
  private readonly maxPenalty: number;
  private readonly checks: ConsistencyCheck[];

  constructor(
    private readonly fields: ConsistencyFields,
    options: ConsistencyValidatorOptions = {}
  ) {
    this.penaltyPerIssue = options.penaltyPerIssue ?? DEFAULT_PENALTY_PER_ISSUE;
    this.maxPenalty = options.maxPenalty ?? DEFAULT_MAX_PENALTY;
    assertFraction('penaltyPerIssue', this.penaltyPerIssue);
    assertFraction('maxPenalty', this.maxPenalty);
    this.checks = [...BUILT_IN_CHECKS, ...(options.checks ?? [])];
  }

  /**
   * Run every check against one predicted record.
   *
   * @param related - Records sharing the cross-reference key; omit to skip
   *   the referential check
   */
  validate(
    instance: AnnotationInstance,
    related?: readonly AnnotationInstance[]
  ): ConsistencyIssue[] {
    return this.checks.flatMap((check) => check({ instance, related, fields: this.fields }));
  }

  /**
   * Fractional reduction for a number of issues
   */
  computePenalty(issueCount: number): number {
    return Math.min(this.penaltyPerIssue * issueCount, this.maxPenalty);
  }

  /**
   * Discount the targeted fields. The penalty is applied once per field,
   * however many issues target it. Fields absent from `fieldScores` are
   * ignored. The input map is not modified.
   */
  applyPenalties(
    fieldScores: Record<string, number>,
    issues: readonly ConsistencyIssue[]
  ): PenaltyOutcome {
    const scores = { ...fieldScores };
    const penalizedFields: Record<string, PenalizedField> = {};
    const issuesByField: Record<string, string[]> = {};

    if (issues.length === 0) {
      return { fieldScores: scores, penalty: { totalPenalty: 0, penalizedFields, issuesByField } };
    }

    const totalPenalty = this.computePenalty(issues.length);

    for (const issue of issues) {
      const targets = issue.fields === 'all' ? Object.keys(scores) : issue.fields;
      for (const field of targets) {
        if (!(field in scores)) continue;
        (issuesByField[field] ??= []).push(issue.message);
      }
    }

    for (const field of Object.keys(issuesByField)) {
      const originalScore = scores[field] ?? 0;
      const penalizedScore = originalScore * (1 - totalPenalty);
      scores[field] = penalizedScore;
      penalizedFields[field] = {
        originalScore,
        penalizedScore,
        penaltyPercentage: totalPenalty * 100,
      };
    }

    return { fieldScores: scores, penalty: { totalPenalty, penalizedFields, issuesByField } };
  }
}
