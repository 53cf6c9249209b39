/**
 * Error taxonomy for imperfect field scores
 */

import { toText } from '@annobench/core';
import type { AnnotationValue } from '@annobench/core';
import type { ErrorType } from '../types/index.js';

/**
 * Classify why a field scored below 1. First matching rule wins.
 * Returns undefined for perfect scores.
 */
export function classifyError(
  predicted: AnnotationValue,
  expected: AnnotationValue,
  score: number
): ErrorType | undefined {
  if (score >= 1) return undefined;

  const p = toText(predicted);
  const e = toText(expected);

  if (p === null && e !== null) return 'missing_prediction';
  if (p !== null && e === null) return 'unexpected_prediction';
  if (p !== null && e !== null) {
    if (p.length < e.length * 0.5) return 'incomplete_extraction';
    if (p.length > e.length * 2) return 'over_extraction';
  }
  return 'content_mismatch';
}
