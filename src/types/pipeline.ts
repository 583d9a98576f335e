/**
 * SignalRadar — Pipeline Types
 *
 * Rejections are counted outcomes, never exceptions. The cycle summary
 * is the only structure delivery collaborators consume.
 */

import type { ScoredItem, SourceKind } from './item';

// ============================================================
// REJECTION REASONS
// ============================================================

export type QualityRejectReason = 'stub' | 'invalid_url' | 'too_short' | 'stale';
export type RelevanceRejectReason = 'excluded' | 'language' | 'no_match';
export type DuplicateReason =
  | 'duplicate_external_id'
  | 'duplicate_url'
  | 'duplicate_title'
  | 'duplicate_content'
  | 'persistence_conflict';

export type RejectionReason = QualityRejectReason | RelevanceRejectReason | DuplicateReason;
export type RejectionStage = 'quality' | 'relevance' | 'dedup';

export interface Rejection {
  stage: RejectionStage;
  reason: RejectionReason;
  sourceName: string;
  externalId: string;
  detail?: string;
}

// ============================================================
// SOURCE RESULTS
// ============================================================

export interface SourceRunResult {
  sourceName: string;
  sourceKind: SourceKind;
  status: 'ok' | 'unavailable';
  /** Items pulled from the adapter before it finished or failed */
  fetched: number;
  malformed: number;
  durationMs: number;
  error?: string;
}

// ============================================================
// CYCLE SUMMARY
// ============================================================

export interface CycleCounts {
  fetched: number;
  rejectedByFilter: number;
  rejectedByRelevance: number;
  rejectedAsDuplicate: number;
  persisted: number;
}

export interface CycleSummary {
  cycleId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  cancelled: boolean;
  dryRun: boolean;
  /** The cycle could not start; `error` says why and no source ran */
  failed: boolean;
  error?: string;
  fetchedCount: number;
  malformedCount: number;
  /** Items dropped because a store call failed */
  failedCount: number;
  counts: CycleCounts;
  rejectedCounts: Record<RejectionReason, number>;
  rejections: Rejection[];
  sources: SourceRunResult[];
  /** Sorted descending by score */
  persistedItems: ScoredItem[];
}
