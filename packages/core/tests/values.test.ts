import { describe, expect, it } from 'vitest';
import { extractFieldNames, isAbsent, normalizeText, parseNumeric, toText } from '../src/index.js';

describe('isAbsent', () => {
  it('treats null, undefined, NaN and blank strings as absent', () => {
    expect([null, undefined, NaN, '', '   '].map(isAbsent)).toEqual([true, true, true, true, true]);
  });

  it('treats zero and text as present', () => {
    expect(isAbsent(0)).toBe(false);
    expect(isAbsent('n/a')).toBe(false);
  });
});

describe('toText / normalizeText', () => {
  it('trims and stringifies', () => {
    expect(toText('  CYP2D6 ')).toBe('CYP2D6');
    expect(toText(3)).toBe('3');
    expect(toText('  ')).toBeNull();
  });

  it('case-folds and optionally collapses whitespace', () => {
    expect(normalizeText('  Poor  Metabolizer ')).toBe('poor  metabolizer');
    expect(normalizeText('  Poor  Metabolizer ', { collapseWhitespace: true })).toBe(
      'poor metabolizer'
    );
  });
});

describe('parseNumeric', () => {
  it('parses plain, grouped and currency numbers', () => {
    expect(parseNumeric('1,234')).toBe(1234);
    expect(parseNumeric('$5')).toBe(5);
    expect(parseNumeric('−0.5')).toBe(-0.5);
    expect(parseNumeric(42)).toBe(42);
  });

  it('parses exponent and times-ten notation', () => {
    expect(parseNumeric('1.2e-5')).toBe(1.2e-5);
    expect(parseNumeric('1.2 × 10^-5')).toBe(1.2e-5);
    expect(parseNumeric('3x10-4')).toBe(3e-4);
  });

  it('returns null for anything else', () => {
    expect(parseNumeric('abc')).toBeNull();
    expect(parseNumeric('')).toBeNull();
    expect(parseNumeric('<0.05')).toBeNull();
    expect(parseNumeric(Infinity)).toBeNull();
    expect(parseNumeric(null)).toBeNull();
  });
});

describe('extractFieldNames', () => {
  it('lists field names in first-seen order', () => {
    expect(extractFieldNames([{ a: 1, b: 2 }, { b: 3, c: 4 }])).toEqual(['a', 'b', 'c']);
  });
});
