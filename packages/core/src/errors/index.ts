export { BenchmarkError, wrapError } from './benchmark-error.js';
export type { BenchmarkErrorCode, BenchmarkErrorDetails } from './benchmark-error.js';
