/**
 * SignalRadar — Item Normalizer
 *
 * Shared helpers every adapter uses to turn a source entry into an Item:
 * UTC timestamps, engagement counters, text assembly.
 */

import type { Engagement, Item, SourceKind } from '../types';
import { MalformedItem } from '../lib/errors';

// ============================================================
// TIMESTAMPS
// ============================================================

export interface ResolvedTimestamp {
  publishedAt: string;
  timestampInferred: boolean;
}

/**
 * Resolve a source timestamp to UTC ISO-8601.
 * Missing or unparseable values fall back to fetch time and are flagged.
 */
export function resolvePublishedAt(
  value: string | Date | null | undefined,
  fetchedAt: Date
): ResolvedTimestamp {
  if (value !== null && value !== undefined && value !== '') {
    const parsed = value instanceof Date ? value : new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return { publishedAt: parsed.toISOString(), timestampInferred: false };
    }
  }
  return { publishedAt: fetchedAt.toISOString(), timestampInferred: true };
}

/**
 * Unix seconds (HN, Reddit) to a Date, or undefined when absent.
 */
export function fromEpochSeconds(seconds: number | null | undefined): Date | undefined {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds)) return undefined;
  return new Date(seconds * 1000);
}

// ============================================================
// COUNTERS
// ============================================================

/**
 * Non-negative integer, or 0 for anything else.
 */
export function toCount(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

export function toEngagement(values: Partial<Record<keyof Engagement, unknown>>): Engagement {
  return {
    likes: toCount(values.likes),
    shares: toCount(values.shares),
    replies: toCount(values.replies),
  };
}

// ============================================================
// TEXT
// ============================================================

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Strip markup and decode the common entities.
 */
export function stripHtml(value: string): string {
  return value
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith('#x') || entity.startsWith('#X')) {
        return String.fromCodePoint(parseInt(entity.slice(2), 16));
      }
      if (entity.startsWith('#')) {
        return String.fromCodePoint(parseInt(entity.slice(1), 10));
      }
      return ENTITIES[entity.toLowerCase()] ?? match;
    })
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Title and body joined the way the analysis stages read them.
 */
export function composeText(title: string, body: string): string {
  const t = title.trim();
  const b = body.trim();
  if (!t) return b;
  if (!b) return t;
  return `${t}\n\n${b}`;
}

/**
 * Primary language subtag: "en-US" → "en".
 */
export function normalizeLanguage(value: string | null | undefined): string | undefined {
  const primary = (value ?? '').trim().toLowerCase().split(/[-_]/)[0];
  return primary || undefined;
}

// ============================================================
// ITEM ASSEMBLY
// ============================================================

export interface ItemDraft {
  externalId: string;
  sourceKind: SourceKind;
  sourceName: string;
  title?: string | null;
  body?: string | null;
  url?: string | null;
  authorId?: string | null;
  authorName?: string | null;
  authorFollowers?: number | null;
  engagement?: Partial<Record<keyof Engagement, unknown>>;
  publishedAt?: string | Date | null;
  language?: string | null;
  tags?: string[];
  fetchedAt: Date;
}

/**
 * Build an Item from a draft.
 * An entry with no identifier or no text at all is malformed.
 */
export function buildItem(draft: ItemDraft): Item {
  const externalId = draft.externalId.trim();
  if (!externalId) {
    throw new MalformedItem(draft.sourceName, 'missing identifier');
  }

  const title = stripHtml(draft.title ?? '');
  const body = stripHtml(draft.body ?? '');
  if (!title && !body) {
    throw new MalformedItem(draft.sourceName, 'entry has neither title nor body', externalId);
  }

  const { publishedAt, timestampInferred } = resolvePublishedAt(draft.publishedAt, draft.fetchedAt);
  const tags = [...new Set((draft.tags ?? []).map(t => t.trim().toLowerCase()).filter(Boolean))].sort();

  return {
    externalId,
    sourceKind: draft.sourceKind,
    sourceName: draft.sourceName,
    title,
    body,
    text: composeText(title, body),
    url: (draft.url ?? '').trim(),
    authorId: draft.authorId ?? '',
    authorName: draft.authorName ?? '',
    authorFollowers: toCount(draft.authorFollowers),
    engagement: toEngagement(draft.engagement ?? {}),
    publishedAt,
    timestampInferred,
    fetchedAt: draft.fetchedAt.toISOString(),
    language: normalizeLanguage(draft.language),
    tags,
    keywords: [],
  };
}
