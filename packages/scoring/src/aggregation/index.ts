export { Aggregator, scoreBucket, MAX_DIFFICULT_SAMPLES, LOW_FIELD_SCORE } from './aggregator.js';
export type { AggregationInput, Aggregation } from './aggregator.js';
export { classifyError } from './error-taxonomy.js';
