/**
 * Field Evaluator Exports
 */

export { FieldEvaluatorLibrary } from './evaluator-library.js';
export type { FieldEvaluator } from './evaluator-library.js';
export {
  exactMatch,
  categoryEqual,
  fuzzyEntityMatch,
  semanticSetMatch,
  normalizeEntity,
  bucketSimilarity,
  DEFAULT_ENTITY_PREFIXES,
} from './text.js';
export {
  numericToleranceMatch,
  compoundStatisticMatch,
  parseStatistic,
  scoreNumericDifference,
  DEFAULT_NUMERIC_BANDS,
  DEFAULT_STATISTIC_BANDS,
} from './numeric.js';
export type { ParsedStatistic, StatisticOperator } from './numeric.js';
export { variantIdentityMatch } from './variant-identity.js';
