export type {
  SimilarityResult,
  SimilarityAlgorithm,
  CharacterAlgorithm,
  TokenizeOptions,
} from './similarity.js';
