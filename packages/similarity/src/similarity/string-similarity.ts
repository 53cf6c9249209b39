/**
 * String Similarity Functions
 *
 * Core algorithms for measuring string similarity.
 * Uses fastest-levenshtein for the edit distance.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { SimilarityResult, CharacterAlgorithm } from '../types/similarity.js';

/**
 * Calculate normalized Levenshtein similarity
 *
 * @param a First string
 * @param b Second string
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Calculate Jaro similarity
 *
 * Based on: number of matching characters and transpositions.
 * Good for short strings like identifiers.
 */
export function jaro(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'jaro' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  const matchWindow = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatches: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatches: boolean[] = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  // Find matches
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, b.length);

    for (let j = start; j < end; j++) {
      if (bMatches[j] || a[i] !== b[j]) continue;
      aMatches[i] = true;
      bMatches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  // Count transpositions
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatches[i]) continue;
    while (!bMatches[k]) k++;
    if (a[i] !== b[k]) transpositions++;
    k++;
  }

  const score =
    (matches / a.length +
      matches / b.length +
      (matches - transpositions / 2) / matches) /
    3;

  return {
    score,
    algorithm: 'jaro',
    details: `Matches: ${matches}, Transpositions: ${transpositions / 2}`,
  };
}

/**
 * Calculate Jaro-Winkler similarity
 *
 * Extension of Jaro that gives more weight to common prefixes.
 *
 * @param prefixScale Scaling factor for common prefix (default: 0.1, max: 0.25)
 */
export function jaroWinkler(
  a: string,
  b: string,
  prefixScale = 0.1
): SimilarityResult {
  const jaroResult = jaro(a, b);

  if (jaroResult.score === 1) {
    return { score: 1, algorithm: 'jaro_winkler' };
  }

  // Calculate common prefix length (max 4 characters)
  let prefixLength = 0;
  const maxPrefix = Math.min(4, Math.min(a.length, b.length));

  for (let i = 0; i < maxPrefix; i++) {
    if (a[i] === b[i]) {
      prefixLength++;
    } else {
      break;
    }
  }

  const scale = Math.min(prefixScale, 0.25);
  const score = jaroResult.score + prefixLength * scale * (1 - jaroResult.score);

  return {
    score,
    algorithm: 'jaro_winkler',
    details: `Jaro: ${jaroResult.score.toFixed(3)}, Common prefix: ${prefixLength}`,
  };
}

type MatchingBlock = { aStart: number; bStart: number; size: number };

/**
 * Longest common contiguous block inside a[aLo, aHi) × b[bLo, bHi).
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const length = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, length);
      if (length > best.size) {
        best = { aStart: i - length + 1, bStart: j - length + 1, size: length };
      }
    }
    previous = current;
  }

  return best;
}

/**
 * Count characters covered by Ratcliff/Obershelp matching blocks
 */
function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHi && bEnd < bHi) {
      queue.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  return matched;
}

/**
 * Calculate the Ratcliff/Obershelp sequence ratio
 *
 * 2·M / (|a| + |b|), where M counts characters in the recursively found
 * longest common blocks. Two empty strings score 1.
 */
export function sequenceRatio(a: string, b: string): SimilarityResult {
  const total = a.length + b.length;
  if (total === 0 || a === b) {
    return { score: 1, algorithm: 'sequence_ratio' };
  }

  const matched = countMatchingCharacters(a, b);
  return {
    score: (2 * matched) / total,
    algorithm: 'sequence_ratio',
    details: `Matched characters: ${matched}, Total length: ${total}`,
  };
}

/**
 * Calculate similarity using specified algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: CharacterAlgorithm,
  options?: { prefixScale?: number }
): SimilarityResult {
  switch (algorithm) {
    case 'levenshtein':
      return levenshtein(a, b);
    case 'jaro':
      return jaro(a, b);
    case 'jaro_winkler':
      return jaroWinkler(a, b, options?.prefixScale);
    case 'sequence_ratio':
      return sequenceRatio(a, b);
    default: {
      const unknown: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(unknown)}`);
    }
  }
}
