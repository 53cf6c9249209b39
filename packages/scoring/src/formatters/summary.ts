/**
 * Aggregated summary of a score report, without per-sample detail
 */

import type { SchemaDescriptor } from '@annobench/core';
import type { EvaluationStatus, FieldValuePair, ScoreReport } from '../types/index.js';

export interface LowScoringField {
  mean_score: number;
  scores: number[];
  sample_values?: FieldValuePair[];
}

export interface PenaltySummary {
  total_penalty: number;
  penalized_fields: string[];
  issues_count: number;
}

export interface AggregatedSummary {
  overall_score: number;
  total_samples: number;
  status: EvaluationStatus;
  field_scores?: ScoreReport['field_scores'];
  /** Fields with mean < 1, highest mean first */
  low_scoring_fields?: Record<string, LowScoringField>;
  /** Unique issue messages, first occurrence order */
  dependency_issues?: string[];
  /** One entry per sample that was penalized */
  penalties?: PenaltySummary[];
}

/**
 * Summarize a report. Fields the schema marks as display-excluded are
 * left out of `low_scoring_fields`.
 */
export function createAggregatedSummary(
  report: ScoreReport,
  schema?: Pick<SchemaDescriptor, 'displayExcluded'>
): AggregatedSummary {
  const summary: AggregatedSummary = {
    overall_score: report.overall_score,
    total_samples: report.total_samples,
    status: report.status,
  };

  const fieldEntries = Object.entries(report.field_scores);
  if (fieldEntries.length > 0) {
    const fieldScores: ScoreReport['field_scores'] = {};
    for (const [field, data] of fieldEntries) {
      fieldScores[field] = { mean_score: data.mean_score, scores: [...data.scores] };
    }
    summary.field_scores = fieldScores;
  }

  const excluded = new Set(schema?.displayExcluded ?? []);
  const lowScoring = fieldEntries
    .filter(([field, data]) => data.mean_score < 1 && !excluded.has(field))
    .sort((a, b) => b[1].mean_score - a[1].mean_score);

  if (lowScoring.length > 0 && report.detailed_results.length > 0) {
    const low: Record<string, LowScoringField> = {};
    for (const [field, data] of lowScoring) {
      const info: LowScoringField = { mean_score: data.mean_score, scores: data.scores };
      const values = report.detailed_results.flatMap((dr) => {
        const value = dr.field_values[field];
        return value ? [value] : [];
      });
      if (values.length > 0) {
        info.sample_values = values;
      }
      low[field] = info;
    }
    summary.low_scoring_fields = low;
  }

  const issues = new Set(report.detailed_results.flatMap((dr) => dr.dependency_issues));
  if (issues.size > 0) {
    summary.dependency_issues = [...issues];
  }

  const penalties = report.detailed_results
    .map((dr) => dr.penalty_info)
    .filter((p) => p.total_penalty > 0)
    .map((p) => ({
      total_penalty: p.total_penalty,
      penalized_fields: Object.keys(p.penalized_fields),
      issues_count: Object.keys(p.issues_by_field).length,
    }));
  if (penalties.length > 0) {
    summary.penalties = penalties;
  }

  return summary;
}
