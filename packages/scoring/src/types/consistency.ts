/**
 * Consistency Types
 *
 * Logical contradictions found inside a single predicted record.
 */

import type { AnnotationInstance, ConsistencyFields } from '@annobench/core';

export type ConsistencyIssueCode =
  | 'REFERENTIAL_INTEGRITY'  // Cross-reference id not found among related records
  | 'STATISTICAL_SIGN'       // Significant p-value with a no-effect ratio
  | 'INTERVAL_ORDER'         // CI start not below CI stop
  | 'INTERVAL_CONTAINMENT'   // Ratio statistic outside its CI
  | 'FREQUENCY_BOUNDS'       // Frequency outside [0, 1]
  | 'CUSTOM';                // Raised by a caller-supplied check

/**
 * A detected contradiction and the fields it discounts.
 * `'all'` targets every scored field of the record.
 */
export interface ConsistencyIssue {
  code: ConsistencyIssueCode;
  message: string;
  fields: readonly string[] | 'all';
}

/** Input handed to every consistency check */
export interface ConsistencyCheckContext {
  instance: AnnotationInstance;
  /** Records sharing a cross-reference key; undefined when not supplied */
  related?: readonly AnnotationInstance[];
  fields: ConsistencyFields;
}

export type ConsistencyCheck = (context: ConsistencyCheckContext) => ConsistencyIssue[];

export interface PenalizedField {
  originalScore: number;
  penalizedScore: number;
  /** Reduction applied, in percent */
  penaltyPercentage: number;
}

/** What the validator did to one record's scores */
export interface PenaltyInfo {
  /** Fractional reduction applied to every targeted field (0 when no issues) */
  totalPenalty: number;
  penalizedFields: Record<string, PenalizedField>;
  /** Field → messages of the issues that targeted it */
  issuesByField: Record<string, string[]>;
}
