export type { ErrorType, FieldResult, PairScore, MatchSet } from './scoring.js';
export type {
  ConsistencyIssueCode,
  ConsistencyIssue,
  ConsistencyCheckContext,
  ConsistencyCheck,
  PenalizedField,
  PenaltyInfo,
} from './consistency.js';
export type {
  EvaluationMode,
  EvaluationStatus,
  ScoreBucket,
  FieldStatistics,
  SampleResult,
  DifficultSample,
  RunStatistics,
  EvaluationResult,
  FieldValuePair,
  SerializedPenaltyInfo,
  DetailedResult,
  ScoreReport,
} from './report.js';
