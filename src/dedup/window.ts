/**
 * SignalRadar — Recent Window
 *
 * Snapshot of recently persisted items for one cycle, indexed for the
 * dedup cascade. Mutated only through `admit`.
 *
 * Titles and texts are also indexed by character q-gram, so a similarity
 * scan only visits entries sharing enough grams with the candidate.
 */

import type { Item, SourceKind } from '../types';
import { normalizeUrl } from './url';
import { gramProfile, similarityKey } from './similarity';

export interface WindowEntry {
  id: string;
  sourceKind: SourceKind;
  externalId: string;
  urlKey: string;
  titleKey: string;
  textKey: string;
  /** YYYY-MM-DD of ingestion */
  day: string;
}

export type WindowItem = Item & { id: string };

export type SimilarityField = 'titleKey' | 'textKey';

/**
 * Shared-gram floor for an entry; entries below it are skipped.
 */
export type GramFloor = (entry: WindowEntry) => number;

interface Posting {
  entry: WindowEntry;
  count: number;
}

class GramIndex {
  private readonly postings = new Map<string, Posting[]>();

  add(entry: WindowEntry, key: string): void {
    for (const [gram, count] of gramProfile(key)) {
      const list = this.postings.get(gram);
      if (list) list.push({ entry, count });
      else this.postings.set(gram, [{ entry, count }]);
    }
  }

  /** Multiset intersection size with every entry sharing at least one gram */
  shared(key: string): Map<WindowEntry, number> {
    const totals = new Map<WindowEntry, number>();
    for (const [gram, count] of gramProfile(key)) {
      for (const posting of this.postings.get(gram) ?? []) {
        totals.set(posting.entry, (totals.get(posting.entry) ?? 0) + Math.min(count, posting.count));
      }
    }
    return totals;
  }
}

function identityKey(sourceKind: SourceKind, externalId: string): string {
  return `${sourceKind}:${externalId}`;
}

export class RecentWindow {
  private readonly byIdentity = new Map<string, WindowEntry>();
  private readonly byUrl = new Map<string, WindowEntry>();
  private readonly byDay = new Map<string, WindowEntry[]>();
  private readonly grams: Record<SimilarityField, GramIndex> = {
    titleKey: new GramIndex(),
    textKey: new GramIndex(),
  };
  private count = 0;

  static from(items: Iterable<WindowItem>): RecentWindow {
    const window = new RecentWindow();
    for (const item of items) window.admit(item);
    return window;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Add an item. The first item holding an identity or URL keeps it.
   */
  admit(item: WindowItem): WindowEntry {
    const entry: WindowEntry = {
      id: item.id,
      sourceKind: item.sourceKind,
      externalId: item.externalId,
      urlKey: normalizeUrl(item.url),
      titleKey: similarityKey(item.title),
      textKey: similarityKey(item.text),
      day: (item.fetchedAt || item.publishedAt).slice(0, 10),
    };

    const identity = identityKey(entry.sourceKind, entry.externalId);
    if (!this.byIdentity.has(identity)) this.byIdentity.set(identity, entry);
    if (entry.urlKey && !this.byUrl.has(entry.urlKey)) this.byUrl.set(entry.urlKey, entry);

    const bucket = this.byDay.get(entry.day);
    if (bucket) bucket.push(entry);
    else this.byDay.set(entry.day, [entry]);

    this.grams.titleKey.add(entry, entry.titleKey);
    this.grams.textKey.add(entry, entry.textKey);

    this.count++;
    return entry;
  }

  findByIdentity(sourceKind: SourceKind, externalId: string): WindowEntry | undefined {
    return this.byIdentity.get(identityKey(sourceKind, externalId));
  }

  findByUrl(urlKey: string): WindowEntry | undefined {
    return urlKey ? this.byUrl.get(urlKey) : undefined;
  }

  /**
   * Entries for similarity scans, newest day first and newest admitted first within a day.
   */
  *scan(): Generator<WindowEntry, void, undefined> {
    const days = [...this.byDay.keys()].sort().reverse();
    for (const day of days) {
      const bucket = this.byDay.get(day) ?? [];
      for (let i = bucket.length - 1; i >= 0; i--) {
        yield bucket[i];
      }
    }
  }

  /**
   * `scan()` restricted to entries whose `field` shares at least
   * `floor(entry)` q-grams with `key`. A floor of zero or less admits
   * entries that share nothing.
   */
  *candidates(field: SimilarityField, key: string, floor: GramFloor): Generator<WindowEntry, void, undefined> {
    const shared = this.grams[field].shared(key);
    for (const entry of this.scan()) {
      if ((shared.get(entry) ?? 0) >= floor(entry)) yield entry;
    }
  }
}
