export { PairScorer, computeWeightedScore, resolveFieldWeights } from './pair-scorer.js';
export type { PairScorerOptions } from './pair-scorer.js';
