/**
 * SignalRadar — In-Memory Item Store
 *
 * Same contract as the Supabase store, including the unique
 * (sourceKind, externalId) constraint. Used by tests and dry runs.
 */

import type { ScoreBreakdown, ScoredItem, SourceKind } from '../types';
import { PersistenceConflict } from '../lib/errors';
import type { InsertResult, ItemStore } from './store';

function identity(sourceKind: SourceKind, externalId: string): string {
  return `${sourceKind}:${externalId}`;
}

export class InMemoryItemStore implements ItemStore {
  private readonly items = new Map<string, ScoredItem>();
  private readonly identities = new Set<string>();

  constructor(seed: ScoredItem[] = []) {
    for (const item of seed) {
      this.items.set(item.id, structuredClone(item));
      this.identities.add(identity(item.sourceKind, item.externalId));
    }
  }

  get size(): number {
    return this.items.size;
  }

  all(): ScoredItem[] {
    return Array.from(this.items.values(), item => structuredClone(item));
  }

  async exists(externalId: string, sourceKind: SourceKind): Promise<boolean> {
    return this.identities.has(identity(sourceKind, externalId));
  }

  async recentWindow(since: Date): Promise<ScoredItem[]> {
    const cutoff = since.getTime();
    return this.all()
      .filter(item => new Date(item.fetchedAt).getTime() >= cutoff)
      .sort((a, b) => b.fetchedAt.localeCompare(a.fetchedAt));
  }

  async insert(item: ScoredItem): Promise<InsertResult> {
    const key = identity(item.sourceKind, item.externalId);
    if (this.identities.has(key)) {
      return { ok: false, conflict: new PersistenceConflict(item.externalId, item.sourceKind) };
    }
    this.identities.add(key);
    this.items.set(item.id, structuredClone(item));
    return { ok: true };
  }

  async updateScore(itemId: string, score: number, breakdown: ScoreBreakdown): Promise<void> {
    const item = this.items.get(itemId);
    if (!item) return;
    this.items.set(itemId, { ...item, score, scoreBreakdown: { ...breakdown } });
  }

  async findById(itemId: string): Promise<ScoredItem | null> {
    const item = this.items.get(itemId);
    return item ? structuredClone(item) : null;
  }

  async updateTags(itemId: string, tags: string[]): Promise<void> {
    const item = this.items.get(itemId);
    if (!item) return;
    this.items.set(itemId, { ...item, tags: [...tags] });
  }
}
