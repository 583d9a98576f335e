/**
 * SignalRadar — Supabase Item Store
 *
 * Table `items`, unique on (source_kind, external_id). A unique-key
 * violation on insert (Postgres 23505) is a lost race, reported as a
 * PersistenceConflict result. Any other error is StoreUnavailable.
 *
 * PostgREST caps every response at its max-rows setting, so window
 * reads page through `.range()` until a short page comes back.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { SourceKindSchema, type ScoreBreakdown, type ScoredItem, type SourceKind } from '../types';
import { PersistenceConflict } from '../lib/errors';
import { composeText } from '../feeds/normalizer';
import { handleSupabaseError } from './client';
import type { InsertResult, ItemStore } from './store';

const UNIQUE_VIOLATION = '23505';
const NOT_FOUND = 'PGRST116';
export const WINDOW_PAGE_SIZE = 1000;

// ============================================================
// ROW MAPPING
// ============================================================

const ScoreBreakdownSchema = z.object({
  engagement: z.number(),
  authority: z.number(),
  source: z.number(),
  tags: z.number(),
  feedback: z.number(),
  recencyFactor: z.number(),
});

const ItemRowSchema = z.object({
  id: z.string(),
  external_id: z.string(),
  source_kind: SourceKindSchema,
  source_name: z.string(),
  title: z.string().nullable(),
  body: z.string().nullable(),
  url: z.string().nullable(),
  author_id: z.string().nullable(),
  author_name: z.string().nullable(),
  author_followers: z.number().nullable(),
  likes: z.number().nullable(),
  shares: z.number().nullable(),
  replies: z.number().nullable(),
  published_at: z.string(),
  timestamp_inferred: z.boolean().nullable(),
  fetched_at: z.string(),
  language: z.string().nullable(),
  tags: z.array(z.string()).nullable(),
  keywords: z.array(z.string()).nullable(),
  score: z.number(),
  score_breakdown: ScoreBreakdownSchema,
});

type ItemRow = z.infer<typeof ItemRowSchema>;

function toRow(item: ScoredItem): ItemRow {
  return {
    id: item.id,
    external_id: item.externalId,
    source_kind: item.sourceKind,
    source_name: item.sourceName,
    title: item.title,
    body: item.body,
    url: item.url,
    author_id: item.authorId,
    author_name: item.authorName,
    author_followers: item.authorFollowers,
    likes: item.engagement.likes,
    shares: item.engagement.shares,
    replies: item.engagement.replies,
    published_at: item.publishedAt,
    timestamp_inferred: item.timestampInferred,
    fetched_at: item.fetchedAt,
    language: item.language ?? null,
    tags: item.tags,
    keywords: item.keywords,
    score: item.score,
    score_breakdown: item.scoreBreakdown,
  };
}

function fromRow(row: ItemRow): ScoredItem {
  const title = row.title ?? '';
  const body = row.body ?? '';
  return {
    id: row.id,
    externalId: row.external_id,
    sourceKind: row.source_kind,
    sourceName: row.source_name,
    title,
    body,
    text: composeText(title, body),
    url: row.url ?? '',
    authorId: row.author_id ?? '',
    authorName: row.author_name ?? '',
    authorFollowers: row.author_followers ?? 0,
    engagement: {
      likes: row.likes ?? 0,
      shares: row.shares ?? 0,
      replies: row.replies ?? 0,
    },
    publishedAt: new Date(row.published_at).toISOString(),
    timestampInferred: row.timestamp_inferred ?? false,
    fetchedAt: new Date(row.fetched_at).toISOString(),
    language: row.language ?? undefined,
    tags: row.tags ?? [],
    keywords: row.keywords ?? [],
    score: row.score,
    scoreBreakdown: row.score_breakdown,
  };
}

// ============================================================
// STORE
// ============================================================

export class SupabaseItemStore implements ItemStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'items',
    private readonly pageSize = WINDOW_PAGE_SIZE
  ) {}

  async exists(externalId: string, sourceKind: SourceKind): Promise<boolean> {
    const { count, error } = await this.client
      .from(this.table)
      .select('id', { count: 'exact', head: true })
      .eq('source_kind', sourceKind)
      .eq('external_id', externalId);

    if (error) throw handleSupabaseError(error, 'exists');
    return (count ?? 0) > 0;
  }

  async recentWindow(since: Date): Promise<ScoredItem[]> {
    const items: ScoredItem[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.client
        .from(this.table)
        .select('*')
        .gte('fetched_at', since.toISOString())
        .order('fetched_at', { ascending: false })
        .order('id', { ascending: true })
        .range(from, from + this.pageSize - 1);

      if (error) throw handleSupabaseError(error, 'window load');

      const rows = z.array(ItemRowSchema).parse(data ?? []);
      items.push(...rows.map(fromRow));
      if (rows.length < this.pageSize) break;
    }

    return items;
  }

  async insert(item: ScoredItem): Promise<InsertResult> {
    const { error } = await this.client.from(this.table).insert(toRow(item));

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        return { ok: false, conflict: new PersistenceConflict(item.externalId, item.sourceKind) };
      }
      throw handleSupabaseError(error, 'insert');
    }
    return { ok: true };
  }

  async updateScore(itemId: string, score: number, breakdown: ScoreBreakdown): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .update({ score, score_breakdown: breakdown })
      .eq('id', itemId);

    if (error) throw handleSupabaseError(error, 'score update');
  }

  async findById(itemId: string): Promise<ScoredItem | null> {
    const { data, error } = await this.client.from(this.table).select('*').eq('id', itemId).single();

    if (error) {
      if (error.code === NOT_FOUND) return null;
      throw handleSupabaseError(error, 'lookup');
    }
    return fromRow(ItemRowSchema.parse(data));
  }

  async updateTags(itemId: string, tags: string[]): Promise<void> {
    const { error } = await this.client.from(this.table).update({ tags }).eq('id', itemId);

    if (error) throw handleSupabaseError(error, 'tag update');
  }
}
