export type { IAnnotationBenchmark, EvaluateOptions } from './annotation-benchmark.js';
