/**
 * SignalRadar — Item Store
 *
 * Persistence collaborator. During a cycle the orchestrator is its only writer.
 */

import type { ScoreBreakdown, ScoredItem, SourceKind } from '../types';
import type { PersistenceConflict } from '../lib/errors';

export type InsertResult = { ok: true } | { ok: false; conflict: PersistenceConflict };

export interface ItemStore {
  exists(externalId: string, sourceKind: SourceKind): Promise<boolean>;
  /** Items ingested at or after `since`, newest first */
  recentWindow(since: Date): Promise<ScoredItem[]>;
  /** A unique-key violation is reported as a conflict, never thrown */
  insert(item: ScoredItem): Promise<InsertResult>;
  updateScore(itemId: string, score: number, breakdown: ScoreBreakdown): Promise<void>;
  findById(itemId: string): Promise<ScoredItem | null>;
  updateTags(itemId: string, tags: string[]): Promise<void>;
}
