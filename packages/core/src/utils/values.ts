/**
 * Helpers for reading annotation field values
 */

import type { AnnotationInstance, AnnotationValue } from '../types/index.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const TIMES_TEN_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+))[x×*]10\^?([+-]?\d+)$/i;

/**
 * Whether a value counts as missing: null, undefined, NaN or a blank string.
 */
export function isAbsent(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

/**
 * Trimmed string form of a value, or null when absent.
 */
export function toText(value: AnnotationValue): string | null {
  if (isAbsent(value)) return null;
  return String(value).trim();
}

/**
 * Case-folded, trimmed string form used for equality checks.
 */
export function normalizeText(
  value: AnnotationValue,
  options?: { collapseWhitespace?: boolean }
): string | null {
  const text = toText(value);
  if (text === null) return null;
  const folded = text.toLowerCase();
  return options?.collapseWhitespace ? folded.replace(/\s+/g, ' ') : folded;
}

/**
 * Parse a number from a field value.
 *
 * Accepts thousands separators, a leading `$`, exponent notation (`1.2e-5`)
 * and "times ten" notation (`1.2 × 10^-5`). Anything else is null.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const cleaned = value.replace(/[,\s$]/g, '').replace(/−/g, '-');
  if (cleaned === '') return null;

  if (DECIMAL_PATTERN.test(cleaned)) {
    return Number(cleaned);
  }

  const timesTen = TIMES_TEN_PATTERN.exec(cleaned);
  if (timesTen) {
    const parsed = Number(`${timesTen[1]}e${timesTen[2]}`);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

/**
 * Extract all unique field names from an array of records
 */
export function extractFieldNames(records: AnnotationInstance[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}
