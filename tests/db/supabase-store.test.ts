/**
 * Supabase Item Store Tests
 *
 * The client is real; its fetch is replaced by an in-process PostgREST stand-in.
 */

import { describe, it, expect } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { SupabaseItemStore } from '../../src/db/supabase-store';
import { StoreUnavailable } from '../../src/lib/errors';
import { jsonResponse } from '../helpers';

function itemRow(index: number) {
  return {
    id: `item-${index}`,
    external_id: `ext-${index}`,
    source_kind: 'rss',
    source_name: 'test-feed',
    title: `Robot story ${index}`,
    body: 'Body text',
    url: `https://news.example.com/${index}`,
    author_id: null,
    author_name: null,
    author_followers: null,
    likes: 1,
    shares: 0,
    replies: 0,
    published_at: '2026-03-10T08:00:00.000Z',
    timestamp_inferred: false,
    fetched_at: '2026-03-10T09:00:00.000Z',
    language: null,
    tags: [],
    keywords: ['robot'],
    score: 1,
    score_breakdown: { engagement: 1, authority: 0, source: 0, tags: 0, feedback: 0, recencyFactor: 1 },
  };
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/**
 * Serves `rows` through offset/limit paging, like PostgREST, and records every page asked for.
 */
function pagedTable(rows: unknown[]) {
  const pages: Array<{ offset: number; limit: number }> = [];
  const fakeFetch: typeof fetch = async input => {
    const url = requestUrl(input);
    const offset = Number(url.searchParams.get('offset') ?? 0);
    const limit = Number(url.searchParams.get('limit') ?? rows.length);
    pages.push({ offset, limit });
    return jsonResponse(rows.slice(offset, offset + limit));
  };
  return { fakeFetch, pages };
}

function storeWith(fakeFetch: typeof fetch, pageSize: number): SupabaseItemStore {
  const client = createClient('http://localhost:54321', 'test-secret', {
    auth: { autoRefreshToken: false, persistSession: false },
    global: { fetch: fakeFetch },
  });
  return new SupabaseItemStore(client, 'items', pageSize);
}

describe('SupabaseItemStore.recentWindow', () => {
  const since = new Date('2026-03-03T00:00:00.000Z');

  it('should page until a short page comes back', async () => {
    const { fakeFetch, pages } = pagedTable([0, 1, 2, 3, 4].map(itemRow));
    const items = await storeWith(fakeFetch, 2).recentWindow(since);

    expect(items.map(item => item.id)).toEqual(['item-0', 'item-1', 'item-2', 'item-3', 'item-4']);
    expect(pages).toEqual([
      { offset: 0, limit: 2 },
      { offset: 2, limit: 2 },
      { offset: 4, limit: 2 },
    ]);
  });

  it('should ask for one more page when the last one is full', async () => {
    const { fakeFetch, pages } = pagedTable([0, 1, 2, 3].map(itemRow));
    const items = await storeWith(fakeFetch, 2).recentWindow(since);

    expect(items).toHaveLength(4);
    expect(pages.map(page => page.offset)).toEqual([0, 2, 4]);
  });

  it('should map rows into scored items', async () => {
    const { fakeFetch } = pagedTable([itemRow(7)]);
    const [item] = await storeWith(fakeFetch, 2).recentWindow(since);

    expect(item.text).toBe('Robot story 7\n\nBody text');
    expect(item.authorFollowers).toBe(0);
    expect(item.engagement).toEqual({ likes: 1, shares: 0, replies: 0 });
  });

  it('should raise StoreUnavailable when a page fails', async () => {
    const failing: typeof fetch = async () => jsonResponse({ message: 'connection reset', code: 'XX000' }, 500);

    const error = await storeWith(failing, 2)
      .recentWindow(since)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailable);
    expect(error).toMatchObject({ operation: 'window load', reason: 'connection reset (code: XX000)' });
  });
});
