export { toScoreReport, formatScoreReport } from './report-formatter.js';
export { createAggregatedSummary } from './summary.js';
export type { AggregatedSummary, LowScoringField, PenaltySummary } from './summary.js';
export { formatSuiteReport } from './suite-formatter.js';
