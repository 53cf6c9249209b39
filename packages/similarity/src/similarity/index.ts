export {
  levenshtein,
  jaro,
  jaroWinkler,
  sequenceRatio,
  calculateSimilarity,
} from './string-similarity.js';
export { DEFAULT_STOP_WORDS, tokenize, jaccardIndex, tokenJaccard } from './token-similarity.js';
