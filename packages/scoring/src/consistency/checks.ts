/**
 * Built-in consistency checks
 *
 * Each check reads the fields named in the schema's consistency map and
 * reports the fields its issue discounts. A check whose fields are not
 * mapped, or whose values are absent, reports nothing.
 */

import { normalizeText, parseNumeric, toText } from '@annobench/core';
import type { AnnotationInstance } from '@annobench/core';
import type { ConsistencyCheck, ConsistencyIssue } from '../types/index.js';
import { parseStatistic } from '../evaluators/index.js';

/** p-values below this indicate significance */
export const SIGNIFICANCE_LEVEL = 0.05;

function numericField(instance: AnnotationInstance, field: string | undefined): number | null {
  return field === undefined ? null : parseNumeric(instance[field]);
}

function mapped(...fields: Array<string | undefined>): string[] {
  return fields.filter((f): f is string => f !== undefined);
}

/**
 * Cross-reference id must appear among the related records.
 * Runs only when related records were supplied.
 */
export const checkReferentialIntegrity: ConsistencyCheck = ({ instance, related, fields }) => {
  const ref = fields.crossReference;
  if (!ref || related === undefined) return [];

  const id = normalizeText(instance[ref.field]);
  if (id === null) return [];

  const relatedField = ref.relatedField ?? ref.field;
  const found = related.some((other) => normalizeText(other[relatedField]) === id);
  if (found) return [];

  return [
    {
      code: 'REFERENTIAL_INTEGRITY',
      message: `${ref.field} "${toText(instance[ref.field])}" not found in related annotations`,
      fields: [ref.field],
    },
  ];
};

/**
 * A significant p-value contradicts a ratio statistic of exactly 1.0.
 */
export const checkStatisticalSign: ConsistencyCheck = ({ instance, fields }) => {
  if (fields.pValue === undefined || fields.ratioStat === undefined) return [];

  const stat = parseStatistic(instance[fields.pValue]);
  const ratio = numericField(instance, fields.ratioStat);
  if (stat === null || stat.magnitude === null || ratio === null) return [];

  // A lower bound (">", "≥") never establishes significance
  const upperBounded = stat.operator === '=' || stat.operator === '<' || stat.operator === '≤';
  const significant =
    (upperBounded && stat.magnitude < SIGNIFICANCE_LEVEL) ||
    (stat.operator === '<' && stat.magnitude === SIGNIFICANCE_LEVEL);
  if (!significant || ratio !== 1) return [];

  return [
    {
      code: 'STATISTICAL_SIGN',
      message: `${fields.pValue} indicates significance (${toText(instance[fields.pValue])}) but ${fields.ratioStat} is 1.0 (no effect)`,
      fields: mapped(fields.pValue, fields.ratioStat, fields.ratioStatType),
    },
  ];
};

/**
 * Confidence interval start must be strictly below its stop.
 */
export const checkIntervalOrder: ConsistencyCheck = ({ instance, fields }) => {
  const start = numericField(instance, fields.ciStart);
  const stop = numericField(instance, fields.ciStop);
  if (start === null || stop === null || start < stop) return [];

  return [
    {
      code: 'INTERVAL_ORDER',
      message: `${fields.ciStart} (${start}) must be less than ${fields.ciStop} (${stop})`,
      fields: mapped(fields.ciStart, fields.ciStop, fields.ratioStat),
    },
  ];
};

/**
 * Ratio statistic must lie inside a well-ordered confidence interval.
 */
export const checkIntervalContainment: ConsistencyCheck = ({ instance, fields }) => {
  const start = numericField(instance, fields.ciStart);
  const stop = numericField(instance, fields.ciStop);
  const ratio = numericField(instance, fields.ratioStat);
  if (start === null || stop === null || ratio === null || start >= stop) return [];
  if (ratio >= start && ratio <= stop) return [];

  return [
    {
      code: 'INTERVAL_CONTAINMENT',
      message: `${fields.ratioStat} (${ratio}) lies outside confidence interval [${start}, ${stop}]`,
      fields: mapped(fields.ciStart, fields.ciStop, fields.ratioStat),
    },
  ];
};

/**
 * Frequencies must lie in [0, 1]. One issue per offending field.
 */
export const checkFrequencyBounds: ConsistencyCheck = ({ instance, fields }) => {
  const frequencies = fields.frequencies ?? [];
  const targets = [...frequencies, ...(fields.sampleSizes ?? [])];
  const issues: ConsistencyIssue[] = [];

  for (const field of frequencies) {
    const value = numericField(instance, field);
    if (value === null || (value >= 0 && value <= 1)) continue;
    issues.push({
      code: 'FREQUENCY_BOUNDS',
      message: `${field} (${value}) must be between 0 and 1`,
      fields: targets,
    });
  }

  return issues;
};

export const BUILT_IN_CHECKS: readonly ConsistencyCheck[] = [
  checkReferentialIntegrity,
  checkStatisticalSign,
  checkIntervalOrder,
  checkIntervalContainment,
  checkFrequencyBounds,
];
