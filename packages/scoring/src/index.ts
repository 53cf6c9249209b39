/**
 * @annobench/scoring
 *
 * Matches predicted annotation records to ground truth, scores them field
 * by field, penalizes contradictions and aggregates a score report.
 */

// Types
export * from './types/index.js';

// Interfaces
export type { IAnnotationBenchmark, EvaluateOptions } from './interfaces/index.js';

// Evaluators
export * from './evaluators/index.js';

// Pair scoring and matching
export * from './scoring/index.js';
export * from './matching/index.js';

// Consistency
export * from './consistency/index.js';

// Aggregation
export * from './aggregation/index.js';

// Schemas
export {
  PHENOTYPE_SCHEMA,
  DRUG_SCHEMA,
  FUNCTIONAL_SCHEMA,
  STUDY_PARAMETERS_SCHEMA,
  getSchema,
  listSchemas,
  resolveSchema,
} from './schemas/index.js';

// Engine
import {
  AnnotationBenchmark as _AnnotationBenchmark,
  ArticleBenchmark as _ArticleBenchmark,
} from './engine/index.js';
import type { AnnotationBenchmarkOptions, ArticleBenchmarkOptions } from './engine/index.js';
export * from './engine/index.js';

// Config
export * from './config/index.js';

// Formatters
export * from './formatters/index.js';

/**
 * Factory function to create an AnnotationBenchmark
 *
 * @param schema - Built-in schema name or inline descriptor
 */
export function createAnnotationBenchmark(
  schema: AnnotationBenchmarkOptions['schema'],
  options: Omit<AnnotationBenchmarkOptions, 'schema'> = {}
): _AnnotationBenchmark {
  return new _AnnotationBenchmark({ ...options, schema });
}

/**
 * Factory function to create an ArticleBenchmark
 */
export function createArticleBenchmark(options?: ArticleBenchmarkOptions): _ArticleBenchmark {
  return new _ArticleBenchmark(options);
}
