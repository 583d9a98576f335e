/**
 * SignalRadar — Dedup Module
 */

export { normalizeUrl } from './url';
export {
  getSimilarityMeasure,
  similarityKey,
  levenshteinDistance,
  maxEditsWithin,
  gramProfile,
  GRAM_SIZE,
  levenshtein,
  sequence,
  tokenSetRatio,
  MAX_COMPARE_LENGTH,
  type SimilarityMeasure,
} from './similarity';
export { RecentWindow, type WindowEntry, type WindowItem, type SimilarityField, type GramFloor } from './window';
export { Deduplicator, DUPLICATE_REASONS, type DedupMatch, type DedupStage } from './deduplicator';
