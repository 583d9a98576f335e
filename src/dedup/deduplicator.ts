/**
 * SignalRadar — Deduplicator
 *
 * Cascade against the recent window, stopping at the first match:
 * source identity → normalized URL → title similarity → content similarity.
 * Similarity stages only run the exact measure on entries that pass the
 * window's gram filter and the measure's upper bound.
 * Pure: never writes to the window or the store.
 */

import type { DedupConfig, DuplicateReason, Item } from '../types';
import { normalizeUrl } from './url';
import { getSimilarityMeasure, similarityKey, type SimilarityMeasure } from './similarity';
import type { GramFloor, RecentWindow, SimilarityField, WindowEntry } from './window';

export type DedupStage = 'external_id' | 'url' | 'title' | 'content';

export interface DedupMatch {
  matchedBy: DedupStage;
  existingId: string;
  similarity: number;
}

export const DUPLICATE_REASONS: Record<DedupStage, DuplicateReason> = {
  external_id: 'duplicate_external_id',
  url: 'duplicate_url',
  title: 'duplicate_title',
  content: 'duplicate_content',
};

export class Deduplicator {
  private readonly measure: SimilarityMeasure;

  constructor(private readonly config: DedupConfig) {
    this.measure = getSimilarityMeasure(config.algorithm);
  }

  findDuplicate(candidate: Item, window: RecentWindow): DedupMatch | null {
    const byIdentity = window.findByIdentity(candidate.sourceKind, candidate.externalId);
    if (byIdentity) {
      return { matchedBy: 'external_id', existingId: byIdentity.id, similarity: 1 };
    }

    const byUrl = window.findByUrl(normalizeUrl(candidate.url));
    if (byUrl) {
      return { matchedBy: 'url', existingId: byUrl.id, similarity: 1 };
    }

    const titleKey = similarityKey(candidate.title);
    if (titleKey) {
      const match = this.scan(window, titleKey, 'titleKey', this.config.titleThreshold);
      if (match) return { matchedBy: 'title', ...match };
    }

    const textKey = similarityKey(candidate.text);
    if (textKey) {
      const match = this.scan(window, textKey, 'textKey', this.config.contentThreshold);
      if (match) return { matchedBy: 'content', ...match };
    }

    return null;
  }

  isDuplicate(candidate: Item, window: RecentWindow): boolean {
    return this.findDuplicate(candidate, window) !== null;
  }

  private scan(
    window: RecentWindow,
    key: string,
    field: SimilarityField,
    threshold: number
  ): { existingId: string; similarity: number } | null {
    const entries = this.measure.minSharedGrams
      ? window.candidates(field, key, this.gramFloor(key, field, threshold))
      : window.scan();

    for (const entry of entries) {
      const other = entry[field];
      if (!other) continue;
      if (this.measure.upperBound && this.measure.upperBound(key, other) < threshold) continue;

      const similarity = this.measure.compare(key, other, threshold);
      if (similarity >= threshold) {
        return { existingId: entry.id, similarity };
      }
    }
    return null;
  }

  private gramFloor(key: string, field: SimilarityField, threshold: number): GramFloor {
    const floors = new Map<number, number>();
    return (entry: WindowEntry) => {
      const length = entry[field].length;
      let floor = floors.get(length);
      if (floor === undefined) {
        floor = this.measure.minSharedGrams?.(key.length, length, threshold) ?? 0;
        floors.set(length, floor);
      }
      return floor;
    };
  }
}
