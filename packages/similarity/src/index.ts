/**
 * @annobench/similarity
 *
 * Deterministic string and token similarity algorithms.
 */

export * from './similarity/index.js';
export * from './types/index.js';
