/**
 * SignalRadar — String Similarity
 *
 * Symmetric similarity measures in [0, 1] over normalized strings.
 * `upperBound` is a cheap ceiling used to skip pairs that cannot
 * reach a threshold; `minSharedGrams` is the fewest character q-grams
 * two strings must share to reach it, checked against the window's
 * gram index before any exact comparison.
 */

import type { SimilarityAlgorithm } from '../types';

export interface SimilarityMeasure {
  readonly name: SimilarityAlgorithm;
  /**
   * With a threshold, any result below it only means "below the threshold":
   * the measure may stop as soon as the threshold is out of reach.
   */
  compare(a: string, b: string, threshold?: number): number;
  upperBound?(a: string, b: string): number;
  minSharedGrams?(aLength: number, bLength: number, threshold: number): number;
}

/** Longer texts are compared on their leading characters only */
export const MAX_COMPARE_LENGTH = 1000;

/**
 * Lower-case, whitespace-collapsed form the measures compare.
 */
export function similarityKey(value: string, maxLength: number = MAX_COMPARE_LENGTH): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim().slice(0, maxLength);
}

// ============================================================
// Q-GRAMS
// ============================================================

export const GRAM_SIZE = 3;

/**
 * Multiset of overlapping character q-grams. Strings shorter than
 * GRAM_SIZE have none.
 */
export function gramProfile(key: string): Map<string, number> {
  const grams = new Map<string, number>();
  for (let i = 0; i + GRAM_SIZE <= key.length; i++) {
    const gram = key.slice(i, i + GRAM_SIZE);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

// ============================================================
// LEVENSHTEIN
// ============================================================

/**
 * Edit distance. With `maxDistance`, only a diagonal band of that
 * width is filled and anything further apart returns `maxDistance + 1`.
 */
export function levenshteinDistance(a: string, b: string, maxDistance = Number.POSITIVE_INFINITY): number {
  if (a === b) return 0;
  if (Math.abs(a.length - b.length) > maxDistance) return maxDistance + 1;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const band = Math.min(maxDistance, Math.max(a.length, b.length));
  const outside = band + 1;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => (j <= band ? j : outside));
  let current = new Array<number>(b.length + 1).fill(outside);

  for (let i = 1; i <= a.length; i++) {
    const from = Math.max(1, i - band);
    const to = Math.min(b.length, i + band);

    current[0] = i <= band ? i : outside;
    current[from - 1] = from === 1 ? current[0] : outside;
    let rowMin = current[from - 1];

    for (let j = from; j <= to; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const cell = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
      current[j] = cell;
      if (cell < rowMin) rowMin = cell;
    }
    if (to < b.length) current[to + 1] = outside;

    if (rowMin > band) return maxDistance + 1;
    [previous, current] = [current, previous];
  }

  const distance = previous[b.length];
  return distance > band ? maxDistance + 1 : distance;
}

/**
 * Most edits two strings of the longer length `maxLen` can differ by
 * and still score at least `threshold`.
 */
export function maxEditsWithin(maxLen: number, threshold: number): number {
  if (threshold <= 0) return maxLen;
  const reaches = (edits: number): boolean => (maxLen - edits) / maxLen >= threshold;

  let edits = Math.max(0, Math.min(maxLen, Math.floor((1 - threshold) * maxLen)));
  while (edits < maxLen && reaches(edits + 1)) edits++;
  while (edits > 0 && !reaches(edits)) edits--;
  return edits;
}

function lengthRatio(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  return maxLen === 0 ? 1 : Math.min(a.length, b.length) / maxLen;
}

export const levenshtein: SimilarityMeasure = {
  name: 'levenshtein',
  compare(a, b, threshold = 0) {
    const maxLen = Math.max(a.length, b.length);
    if (maxLen === 0) return 1;
    const distance = levenshteinDistance(a, b, maxEditsWithin(maxLen, threshold));
    return Math.max(0, (maxLen - distance) / maxLen);
  },
  upperBound: lengthRatio,
  // q-gram lemma: k edits destroy at most k·q of the longer string's grams
  minSharedGrams(aLength, bLength, threshold) {
    const maxLen = Math.max(aLength, bLength);
    return maxLen - GRAM_SIZE + 1 - maxEditsWithin(maxLen, threshold) * GRAM_SIZE;
  },
};

// ============================================================
// SEQUENCE (Ratcliff/Obershelp)
// ============================================================

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function longestCommonBlock(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }
  return best;
}

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const stack: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (stack.length > 0) {
    const range = stack.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    if (aLo >= aHi || bLo >= bHi) continue;

    const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    stack.push([aLo, block.aStart, bLo, block.bStart]);
    stack.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
  }
  return total;
}

function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

function sharedCharacters(a: string, b: string): number {
  const counts = new Map<string, number>();
  for (const ch of a) counts.set(ch, (counts.get(ch) ?? 0) + 1);

  let shared = 0;
  for (const ch of b) {
    const left = counts.get(ch) ?? 0;
    if (left > 0) {
      shared++;
      counts.set(ch, left - 1);
    }
  }
  return shared;
}

export const sequence: SimilarityMeasure = {
  name: 'sequence',
  // Block choice depends on argument order; take the better of both
  compare: (a, b) => Math.max(sequenceRatio(a, b), sequenceRatio(b, a)),
  // Matched blocks can never use more of a character than both sides hold
  upperBound(a, b) {
    const total = a.length + b.length;
    return total === 0 ? 1 : (2 * sharedCharacters(a, b)) / total;
  },
};

// ============================================================
// TOKEN SET
// ============================================================

function tokenSet(value: string): Set<string> {
  return new Set(value.split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

export const tokenSetRatio: SimilarityMeasure = {
  name: 'token_set',
  compare(a, b, threshold) {
    const left = tokenSet(a);
    const right = tokenSet(b);
    if (left.size === 0 && right.size === 0) return 1;
    if (left.size === 0 || right.size === 0) return 0;

    const shared = [...left].filter(t => right.has(t)).sort();
    const onlyLeft = [...left].filter(t => !right.has(t)).sort();
    const onlyRight = [...right].filter(t => !left.has(t)).sort();

    const base = shared.join(' ');
    const withLeft = [base, onlyLeft.join(' ')].filter(Boolean).join(' ');
    const withRight = [base, onlyRight.join(' ')].filter(Boolean).join(' ');

    return Math.max(
      base ? levenshtein.compare(base, withLeft, threshold) : 0,
      base ? levenshtein.compare(base, withRight, threshold) : 0,
      levenshtein.compare(withLeft, withRight, threshold)
    );
  },
};

// ============================================================
// REGISTRY
// ============================================================

const MEASURES: Record<SimilarityAlgorithm, SimilarityMeasure> = {
  levenshtein,
  sequence,
  token_set: tokenSetRatio,
};

export function getSimilarityMeasure(algorithm: SimilarityAlgorithm): SimilarityMeasure {
  return MEASURES[algorithm];
}
