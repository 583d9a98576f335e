/**
 * Shared fixtures for tests.
 */

import { parseConfig } from '../src/config';
import { composeText } from '../src/feeds/normalizer';
import { AdapterRegistry, SourceAdapter, type FetchContext } from '../src/feeds/base';
import { MalformedItem } from '../src/lib/errors';
import type { Item, RadarConfig, RadarConfigInput, RssSourceConfig, ScoredItem } from '../src/types';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function makeConfig(input: RadarConfigInput = {}): RadarConfig {
  return parseConfig({ ...input, domain: { keywords: ['robot'], ...input.domain } });
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  const title = overrides.title ?? 'Open-source robot arm reaches new precision record';
  const body =
    overrides.body ??
    'A research lab released firmware and CAD files for a six-axis robot arm with sub-millimetre repeatability.';
  return {
    externalId: 'ext-1',
    sourceKind: 'rss',
    sourceName: 'test-feed',
    url: 'https://example.com/articles/robot-arm',
    authorId: '',
    authorName: '',
    authorFollowers: 0,
    engagement: { likes: 0, shares: 0, replies: 0 },
    publishedAt: NOW.toISOString(),
    timestampInferred: false,
    fetchedAt: NOW.toISOString(),
    tags: [],
    keywords: [],
    ...overrides,
    title,
    body,
    text: overrides.text ?? composeText(title, body),
  };
}

export function makeScoredItem(overrides: Partial<ScoredItem> = {}): ScoredItem {
  return {
    ...makeItem(overrides),
    id: overrides.id ?? 'item-1',
    score: overrides.score ?? 0,
    scoreBreakdown: overrides.scoreBreakdown ?? {
      engagement: 0,
      authority: 0,
      source: 0,
      tags: 0,
      feedback: 0,
      recencyFactor: 1,
    },
  };
}

export function makeFetchContext(overrides: Partial<FetchContext> = {}): FetchContext {
  return {
    signal: new AbortController().signal,
    now: NOW,
    onMalformed: () => undefined,
    ...overrides,
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

// ============================================================
// SCRIPTED SOURCES
// ============================================================

export interface ScriptedBehavior {
  items?: Item[];
  /** Reported through onMalformed before any item */
  malformed?: number;
  /** Thrown before any item */
  fail?: Error;
  /** Never yields; returns once the fetch signal aborts */
  stall?: boolean;
  /** Runs when the consumer asks for the item after index */
  afterYield?: (index: number) => void;
}

/**
 * RSS-kind adapter whose output is scripted per source name.
 */
export class ScriptedSource extends SourceAdapter<'rss'> {
  readonly kind = 'rss' as const;

  constructor(private readonly behaviors: Record<string, ScriptedBehavior>) {
    super();
  }

  async *fetch(source: RssSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    const behavior = this.behaviors[source.name] ?? {};

    for (let i = 0; i < (behavior.malformed ?? 0); i++) {
      context.onMalformed(new MalformedItem(source.name, 'entry has no link', `bad-${i}`));
    }
    if (behavior.fail) throw behavior.fail;

    if (behavior.stall) {
      await new Promise<void>(resolve => context.signal.addEventListener('abort', () => resolve(), { once: true }));
      return;
    }

    const items = behavior.items ?? [];
    for (let i = 0; i < items.length; i++) {
      yield { ...items[i], sourceName: source.name };
      behavior.afterYield?.(i);
    }
  }
}

export function scriptedRegistry(behaviors: Record<string, ScriptedBehavior>): AdapterRegistry {
  return new AdapterRegistry().register(new ScriptedSource(behaviors));
}

export function rssSources(...names: string[]): Array<{ kind: 'rss'; name: string; url: string }> {
  return names.map(name => ({ kind: 'rss' as const, name, url: `https://feeds.example.com/${name}.xml` }));
}

const ARTICLES: Array<[string, string]> = [
  [
    'Warehouse robot fleet doubles picking speed',
    'Logistics operator reports that its autonomous mobile robots now handle twice the parcels per hour.',
  ],
  [
    'Surgical robot approved for knee replacement',
    'Regulators cleared a robotic system that assists orthopaedic surgeons with bone cuts during knee procedures.',
  ],
  [
    'Quadruped robot learns to open doors',
    'Researchers trained a four-legged machine in simulation before transferring the door-opening policy to hardware.',
  ],
];

/**
 * One of three mutually distinct, relevant items.
 */
export function makeArticle(index: 0 | 1 | 2, overrides: Partial<Item> = {}): Item {
  const [title, body] = ARTICLES[index];
  return makeItem({
    externalId: `post-${index}`,
    url: `https://news.example.com/posts/${index}`,
    title,
    body,
    ...overrides,
  });
}
