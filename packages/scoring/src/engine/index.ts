export { AnnotationBenchmark } from './annotation-benchmark.js';
export type {
  AnnotationBenchmarkOptions,
  ConsistencyOptions,
  MatchingStrategy,
} from './annotation-benchmark.js';
export { ArticleBenchmark, FAMILY_SCHEMAS } from './article-benchmark.js';
export type {
  AnnotationFamily,
  ArticleAnnotations,
  ArticleBenchmarkOptions,
  ArticleInput,
  ArticleResult,
  BatchResult,
  FamilyResult,
} from './article-benchmark.js';
