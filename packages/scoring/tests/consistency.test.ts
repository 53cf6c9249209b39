import { describe, expect, it } from 'vitest';
import { BenchmarkError } from '@annobench/core';
import type { AnnotationInstance, ConsistencyFields } from '@annobench/core';
import { ConsistencyValidator } from '../src/consistency/index.js';
import type { ConsistencyIssue } from '../src/types/index.js';

const fields: ConsistencyFields = {
  crossReference: { field: 'Variant Annotation ID' },
  pValue: 'P Value',
  ratioStat: 'Ratio Stat',
  ratioStatType: 'Ratio Stat Type',
  ciStart: 'Confidence Interval Start',
  ciStop: 'Confidence Interval Stop',
  frequencies: ['Frequency in Cases', 'Frequency in Controls'],
  sampleSizes: ['Study Cases', 'Study Controls'],
};

const complete: AnnotationInstance = {
  'Variant Annotation ID': 'VA1',
  'P Value': '0.2',
  'Ratio Stat Type': 'OR',
  'Ratio Stat': '1.4',
  'Confidence Interval Start': '0.9',
  'Confidence Interval Stop': '2.1',
  'Frequency in Cases': '0.31',
  'Frequency in Controls': '0.22',
  'Study Cases': '120',
  'Study Controls': '240',
};

const validator = new ConsistencyValidator(fields);

function codes(issues: ConsistencyIssue[]): string[] {
  return issues.map((i) => i.code);
}

describe('ConsistencyValidator.validate', () => {
  it('finds nothing wrong with a consistent record', () => {
    expect(validator.validate(complete)).toEqual([]);
  });

  it('flags a significant p-value with a no-effect ratio', () => {
    const issues = validator.validate({
      ...complete,
      'P Value': '0.01',
      'Ratio Stat': '1.0',
    });

    expect(issues).toEqual([
      {
        code: 'STATISTICAL_SIGN',
        message: 'P Value indicates significance (0.01) but Ratio Stat is 1.0 (no effect)',
        fields: ['P Value', 'Ratio Stat', 'Ratio Stat Type'],
      },
    ]);
  });

  it('never treats a lower bound on p as significant', () => {
    expect(validator.validate({ ...complete, 'P Value': '> 0.01', 'Ratio Stat': '1.0' })).toEqual([]);
    expect(validator.validate({ ...complete, 'P Value': '≥ 0.001', 'Ratio Stat': '1.0' })).toEqual(
      []
    );
  });

  it('treats an upper bound below 0.05 as significant', () => {
    const issues = validator.validate({ ...complete, 'P Value': '≤ 0.01', 'Ratio Stat': '1.0' });
    expect(codes(issues)).toEqual(['STATISTICAL_SIGN']);
  });

  it('treats "< 0.05" as significant', () => {
    const issues = validator.validate({ ...complete, 'P Value': '< 0.05', 'Ratio Stat': 1 });
    expect(codes(issues)).toEqual(['STATISTICAL_SIGN']);
  });

  it('flags an inverted confidence interval without checking containment', () => {
    const issues = validator.validate({
      ...complete,
      'Confidence Interval Start': '2',
      'Confidence Interval Stop': '1',
    });

    expect(issues).toEqual([
      {
        code: 'INTERVAL_ORDER',
        message: 'Confidence Interval Start (2) must be less than Confidence Interval Stop (1)',
        fields: ['Confidence Interval Start', 'Confidence Interval Stop', 'Ratio Stat'],
      },
    ]);
  });

  it('flags a ratio outside its interval', () => {
    const issues = validator.validate({ ...complete, 'Ratio Stat': '3' });
    expect(issues[0]?.message).toBe(
      'Ratio Stat (3) lies outside confidence interval [0.9, 2.1]'
    );
    expect(codes(issues)).toEqual(['INTERVAL_CONTAINMENT']);
  });

  it('flags each frequency outside [0, 1]', () => {
    const issues = validator.validate({
      ...complete,
      'Frequency in Cases': '1.4',
      'Frequency in Controls': '-0.1',
    });

    expect(issues.map((i) => i.message)).toEqual([
      'Frequency in Cases (1.4) must be between 0 and 1',
      'Frequency in Controls (-0.1) must be between 0 and 1',
    ]);
    expect(issues[0]?.fields).toEqual([
      'Frequency in Cases',
      'Frequency in Controls',
      'Study Cases',
      'Study Controls',
    ]);
  });

  it('checks cross-references only when related records are given', () => {
    expect(validator.validate(complete)).toEqual([]);
    expect(validator.validate(complete, [{ 'Variant Annotation ID': 'va1' }])).toEqual([]);

    const issues = validator.validate(complete, []);
    expect(issues).toEqual([
      {
        code: 'REFERENTIAL_INTEGRITY',
        message: 'Variant Annotation ID "VA1" not found in related annotations',
        fields: ['Variant Annotation ID'],
      },
    ]);
  });

  it('skips checks whose values are missing', () => {
    expect(validator.validate({})).toEqual([]);
    expect(validator.validate({}, [])).toEqual([]);
  });

  it('runs extra checks after the built-in ones', () => {
    const custom = new ConsistencyValidator(fields, {
      checks: [() => [{ code: 'CUSTOM', message: 'custom rule', fields: 'all' }]],
    });
    expect(codes(custom.validate({ ...complete, 'Ratio Stat': '3' }))).toEqual([
      'INTERVAL_CONTAINMENT',
      'CUSTOM',
    ]);
  });
});

describe('ConsistencyValidator.applyPenalties', () => {
  const scores = {
    'P Value': 0.9,
    'Ratio Stat': 1,
    'Ratio Stat Type': 1,
    'Study Type': 1,
  };

  it('discounts the implicated fields by 5% for one issue', () => {
    const issues = validator.validate({ ...complete, 'P Value': '0.01', 'Ratio Stat': '1.0' });
    const { fieldScores, penalty } = validator.applyPenalties(scores, issues);

    expect(fieldScores['P Value']).toBeCloseTo(0.9 * 0.95, 10);
    expect(fieldScores['Ratio Stat']).toBeCloseTo(0.95, 10);
    expect(fieldScores['Ratio Stat Type']).toBeCloseTo(0.95, 10);
    expect(fieldScores['Study Type']).toBe(1);
    expect(penalty.totalPenalty).toBe(0.05);
    expect(penalty.penalizedFields['P Value']).toMatchObject({ originalScore: 0.9 });
    expect(penalty.penalizedFields['P Value']?.penaltyPercentage).toBeCloseTo(5, 10);
    expect(Object.keys(penalty.issuesByField)).toEqual(['P Value', 'Ratio Stat', 'Ratio Stat Type']);
  });

  it('does not modify the input scores', () => {
    const input = { a: 1 };
    validator.applyPenalties(input, [{ code: 'CUSTOM', message: 'm', fields: ['a'] }]);
    expect(input).toEqual({ a: 1 });
  });

  it('applies the combined penalty once per field', () => {
    const issues: ConsistencyIssue[] = [
      { code: 'CUSTOM', message: 'first', fields: ['a'] },
      { code: 'CUSTOM', message: 'second', fields: ['a', 'b'] },
    ];
    const { fieldScores, penalty } = validator.applyPenalties({ a: 1, b: 0.5, c: 1 }, issues);

    expect(penalty.totalPenalty).toBeCloseTo(0.1, 10);
    expect(fieldScores.a).toBeCloseTo(0.9, 10);
    expect(fieldScores.b).toBeCloseTo(0.45, 10);
    expect(fieldScores.c).toBe(1);
    expect(penalty.issuesByField).toEqual({ a: ['first', 'second'], b: ['second'] });
  });

  it('caps the penalty at 30%', () => {
    const issues: ConsistencyIssue[] = Array.from({ length: 7 }, (_, i): ConsistencyIssue => ({
      code: 'CUSTOM',
      message: `issue ${i}`,
      fields: 'all',
    }));
    const { fieldScores, penalty } = validator.applyPenalties({ a: 1, b: 0.5 }, issues);

    expect(penalty.totalPenalty).toBe(0.3);
    expect(fieldScores.a).toBeCloseTo(0.7, 10);
    expect(fieldScores.b).toBeCloseTo(0.35, 10);
  });

  it('ignores targets outside the score map', () => {
    const { fieldScores, penalty } = validator.applyPenalties({ a: 1 }, [
      { code: 'CUSTOM', message: 'm', fields: ['missing'] },
    ]);
    expect(fieldScores).toEqual({ a: 1 });
    expect(penalty.penalizedFields).toEqual({});
  });

  it('reports no penalty without issues', () => {
    expect(validator.applyPenalties({ a: 1 }, [])).toEqual({
      fieldScores: { a: 1 },
      penalty: { totalPenalty: 0, penalizedFields: {}, issuesByField: {} },
    });
  });

  it('honours custom penalty settings', () => {
    const custom = new ConsistencyValidator(fields, { penaltyPerIssue: 0.2, maxPenalty: 0.25 });
    expect(custom.computePenalty(1)).toBe(0.2);
    expect(custom.computePenalty(2)).toBe(0.25);
  });

  it('rejects penalties outside [0, 1]', () => {
    expect(() => new ConsistencyValidator(fields, { penaltyPerIssue: 2 })).toThrow(BenchmarkError);
  });
});
