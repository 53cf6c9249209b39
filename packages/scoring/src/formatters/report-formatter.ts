/**
 * Score Report Formatter
 *
 * Converts evaluation results to the snake_case wire report and to
 * plain text for people.
 */

import type {
  DetailedResult,
  EvaluationResult,
  FieldValuePair,
  SampleResult,
  ScoreReport,
  SerializedPenaltyInfo,
} from '../types/index.js';

const MAX_LISTED_ISSUES = 10;

function serializePenalty(sample: SampleResult): SerializedPenaltyInfo {
  const penalizedFields: SerializedPenaltyInfo['penalized_fields'] = {};
  for (const [field, info] of Object.entries(sample.penalty.penalizedFields)) {
    penalizedFields[field] = {
      original_score: info.originalScore,
      penalized_score: info.penalizedScore,
      penalty_percentage: info.penaltyPercentage,
    };
  }
  return {
    total_penalty: sample.penalty.totalPenalty,
    penalized_fields: penalizedFields,
    issues_by_field: sample.penalty.issuesByField,
  };
}

function toDetailedResult(sample: SampleResult): DetailedResult {
  const fieldValues: Record<string, FieldValuePair> = {};
  for (const [field, result] of Object.entries(sample.fieldResults)) {
    // undefined does not survive JSON
    fieldValues[field] = {
      ground_truth: result.expected ?? null,
      prediction: result.predicted ?? null,
    };
  }

  return {
    sample_id: sample.sampleId,
    field_scores: { ...sample.fieldScores },
    dependency_issues: sample.issues.map((issue) => issue.message),
    field_values: fieldValues,
    penalty_info: serializePenalty(sample),
  };
}

/**
 * Convert an evaluation result to the JSON-serializable report
 */
export function toScoreReport(result: EvaluationResult): ScoreReport {
  const fieldScores: ScoreReport['field_scores'] = {};
  const fieldStatistics: NonNullable<ScoreReport['field_statistics']> = {};

  for (const [field, stats] of Object.entries(result.fieldStatistics)) {
    fieldScores[field] = { mean_score: stats.meanScore, scores: [...stats.scores] };
    fieldStatistics[field] = {
      mean_score: stats.meanScore,
      exact_match_count: stats.exactMatchCount,
      exact_match_rate: stats.exactMatchRate,
      error_types: { ...stats.errorTypes },
    };
  }

  const { run } = result;
  return {
    total_samples: result.totalSamples,
    field_scores: fieldScores,
    overall_score: result.overallScore,
    detailed_results: result.samples.map(toDetailedResult),
    status: result.status,
    field_statistics: fieldStatistics,
    run_statistics: {
      matched_count: run.matchedCount,
      unmatched_prediction_count: run.unmatchedPredictionCount,
      unmatched_ground_truth_count: run.unmatchedGroundTruthCount,
      mean_overall_score: run.meanOverallScore,
      mean_weighted_score: run.meanWeightedScore,
      min_score: run.minScore,
      max_score: run.maxScore,
      score_distribution: { ...run.scoreDistribution },
      most_difficult: run.mostDifficult.map((d) => ({
        sample_id: d.sampleId,
        score: d.score,
        main_issues: [...d.mainIssues],
      })),
    },
  };
}

function pct(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

/**
 * Format an evaluation result as plain text
 */
export function formatScoreReport(result: EvaluationResult): string {
  const lines: string[] = [];
  const { run } = result;

  lines.push(`## Score Report: ${result.schema}`);
  lines.push(`Mode: ${result.mode}`);
  lines.push(`Status: ${result.status}`);
  lines.push('');

  // Summary
  lines.push(`### Summary`);
  lines.push(`- Overall Score: ${pct(result.overallScore)}`);
  lines.push(`- Matched Pairs: ${run.matchedCount}`);
  lines.push(`- Unmatched Predictions: ${run.unmatchedPredictionCount}`);
  lines.push(`- Unmatched Ground Truths: ${run.unmatchedGroundTruthCount}`);
  if (run.minScore !== null && run.maxScore !== null) {
    lines.push(`- Pair Score Range: ${pct(run.minScore)} - ${pct(run.maxScore)}`);
  }
  lines.push('');

  // Field table
  const fields = Object.entries(result.fieldStatistics);
  if (fields.length > 0) {
    lines.push(`### Fields`);
    lines.push('| Field | Mean | Exact | Errors |');
    lines.push('|---|---|---|---|');
    for (const [field, stats] of fields) {
      const errors = Object.entries(stats.errorTypes)
        .map(([type, count]) => `${type}: ${count}`)
        .join(', ');
      lines.push(
        `| ${field} | ${pct(stats.meanScore)} | ${stats.exactMatchCount}/${stats.scores.length} | ${errors || '-'} |`
      );
    }
    lines.push('');
  }

  // Distribution
  if (run.matchedCount > 0) {
    const d = run.scoreDistribution;
    lines.push(`### Score Distribution`);
    lines.push(`- Excellent (>= 90%): ${d.excellent}`);
    lines.push(`- Good (70-90%): ${d.good}`);
    lines.push(`- Fair (50-70%): ${d.fair}`);
    lines.push(`- Poor (< 50%): ${d.poor}`);
    lines.push('');
  }

  // Most difficult
  if (run.mostDifficult.length > 0) {
    lines.push(`### Most Difficult Samples`);
    for (const sample of run.mostDifficult) {
      const issues = sample.mainIssues.length > 0 ? sample.mainIssues.join(', ') : 'none';
      lines.push(`- Sample ${sample.sampleId}: ${pct(sample.score)} (low fields: ${issues})`);
    }
    lines.push('');
  }

  // Dependency issues
  const issues = result.samples.flatMap((s) =>
    s.issues.map((issue) => ({ sampleId: s.sampleId, message: issue.message }))
  );
  if (issues.length > 0) {
    lines.push(`### Dependency Issues (${issues.length})`);
    for (const issue of issues.slice(0, MAX_LISTED_ISSUES)) {
      lines.push(`- Sample ${issue.sampleId}: ${issue.message}`);
    }
    if (issues.length > MAX_LISTED_ISSUES) {
      lines.push(`... and ${issues.length - MAX_LISTED_ISSUES} more`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
