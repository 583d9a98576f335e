/**
 * SignalRadar — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Items
export type {
  SourceKind,
  Engagement,
  Item,
  ScoreBreakdown,
  ScoreContribution,
  ScoredItem,
} from './item';
export { SourceKindSchema, SCORE_CONTRIBUTIONS } from './item';

// Feedback
export type { FeedbackType, FeedbackRecord, FeedbackAggregate } from './feedback';
export { FeedbackTypeSchema } from './feedback';

// Configuration
export type {
  RssSourceConfig,
  HackerNewsSourceConfig,
  RedditSourceConfig,
  GitHubSourceConfig,
  TwitterSourceConfig,
  SourceConfig,
  SourceConfigInput,
  SourceConfigOf,
  ScoringWeights,
  ScoringConfig,
  SimilarityAlgorithm,
  DedupConfig,
  QualityConfig,
  ExtractionConfig,
  FetchConfig,
  DomainConfig,
  TopicVocabulary,
  RadarConfig,
  RadarConfigInput,
} from './config';
export {
  RadarConfigSchema,
  SourceConfigSchema,
  ScoringConfigSchema,
  DEFAULT_STUB_PATTERNS,
} from './config';

// Pipeline
export type {
  QualityRejectReason,
  RelevanceRejectReason,
  DuplicateReason,
  RejectionReason,
  RejectionStage,
  Rejection,
  SourceRunResult,
  CycleCounts,
  CycleSummary,
} from './pipeline';
