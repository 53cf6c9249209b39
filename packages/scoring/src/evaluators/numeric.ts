/**
 * Numeric and statistic comparison
 */

import { parseNumeric, toText } from '@annobench/core';
import type { AnnotationValue, ToleranceBands } from '@annobench/core';

export const DEFAULT_NUMERIC_BANDS: Required<ToleranceBands> = {
  exactWeight: 1.0,
  tolerance5pct: 0.9,
  tolerance10pct: 0.8,
};

/** Bands used for the magnitude half of a compound statistic */
export const DEFAULT_STATISTIC_BANDS: Required<ToleranceBands> = {
  exactWeight: 1.0,
  tolerance5pct: 0.9,
  tolerance10pct: 0.7,
};

export type StatisticOperator = '<' | '>' | '≤' | '≥' | '=';

/** An inequality and its magnitude, e.g. "<0.05" */
export interface ParsedStatistic {
  operator: StatisticOperator;
  /** Null when the text after the operator is not a number */
  magnitude: number | null;
}

const OPERATOR_PATTERN = /[<>=≤≥]=?/;
const OPERATOR_SPELLINGS: Record<string, StatisticOperator> = {
  '<': '<',
  '>': '>',
  '=': '=',
  '==': '=',
  '<=': '≤',
  '>=': '≥',
  '≤': '≤',
  '≥': '≥',
  '≤=': '≤',
  '≥=': '≥',
};

function resolveBands(
  bands: ToleranceBands | undefined,
  defaults: Required<ToleranceBands>
): Required<ToleranceBands> {
  return {
    exactWeight: bands?.exactWeight ?? defaults.exactWeight,
    tolerance5pct: bands?.tolerance5pct ?? defaults.tolerance5pct,
    tolerance10pct: bands?.tolerance10pct ?? defaults.tolerance10pct,
  };
}

/**
 * Score two parsed numbers by relative difference.
 *
 * The difference is taken relative to the larger magnitude, so the result
 * does not depend on argument order. A zero against a non-zero scores 0.
 */
export function scoreNumericDifference(
  a: number,
  b: number,
  bands?: ToleranceBands,
  defaults: Required<ToleranceBands> = DEFAULT_NUMERIC_BANDS
): number {
  const { exactWeight, tolerance5pct, tolerance10pct } = resolveBands(bands, defaults);

  if (a === b) return exactWeight;
  if (a === 0 || b === 0) return 0;

  const relative = Math.abs(a - b) / Math.max(Math.abs(a), Math.abs(b));
  if (relative <= 0.05) return tolerance5pct;
  if (relative <= 0.1) return tolerance10pct;
  return 0;
}

/**
 * numeric_tolerance_match: non-numeric values count as absent.
 */
export function numericToleranceMatch(
  predicted: AnnotationValue,
  expected: AnnotationValue,
  bands?: ToleranceBands
): number {
  const predictedNum = parseNumeric(predicted);
  const expectedNum = parseNumeric(expected);

  if (predictedNum === null && expectedNum === null) return 1;
  if (predictedNum === null || expectedNum === null) return 0;

  return scoreNumericDifference(predictedNum, expectedNum, bands);
}

/**
 * Split a statistic such as "p < 0.05" or "≤1.2 × 10^-3" into operator and magnitude.
 * Returns null for absent values; a missing operator means "=".
 */
export function parseStatistic(value: AnnotationValue): ParsedStatistic | null {
  const text = toText(value);
  if (text === null) return null;

  const match = OPERATOR_PATTERN.exec(text);
  const operator = (match && OPERATOR_SPELLINGS[match[0]]) || '=';

  const rest = text.replace(/^p\s*(?=[<>=≤≥\s])/i, '').replace(/[<>=≤≥\s]/g, '');
  return { operator, magnitude: parseNumeric(rest) };
}

/**
 * Compare statistic magnitudes. Values in (0, 1), the p-value range, are
 * compared on a log10 scale; anything else linearly.
 */
function compareMagnitudes(
  a: number | null,
  b: number | null,
  bands?: ToleranceBands
): number {
  if (a === null && b === null) return 1;
  if (a === null || b === null) return 0;

  const inUnitInterval = (x: number) => x > 0 && x < 1;
  if (inUnitInterval(a) && inUnitInterval(b)) {
    return scoreNumericDifference(Math.log10(a), Math.log10(b), bands, DEFAULT_STATISTIC_BANDS);
  }
  return scoreNumericDifference(a, b, bands, DEFAULT_STATISTIC_BANDS);
}

/**
 * compound_statistic_match: half for the operator, half for the magnitude.
 */
export function compoundStatisticMatch(
  predicted: AnnotationValue,
  expected: AnnotationValue,
  bands?: ToleranceBands
): number {
  const predictedStat = parseStatistic(predicted);
  const expectedStat = parseStatistic(expected);

  if (predictedStat === null && expectedStat === null) return 1;
  if (predictedStat === null || expectedStat === null) return 0;

  const operatorScore = predictedStat.operator === expectedStat.operator ? 1 : 0;
  const valueScore = compareMagnitudes(predictedStat.magnitude, expectedStat.magnitude, bands);

  return 0.5 * operatorScore + 0.5 * valueScore;
}
