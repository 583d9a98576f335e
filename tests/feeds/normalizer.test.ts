/**
 * Tests for item normalization helpers
 */

import { describe, it, expect } from 'vitest';
import {
  buildItem,
  composeText,
  fromEpochSeconds,
  normalizeLanguage,
  resolvePublishedAt,
  stripHtml,
  toCount,
} from '../../src/feeds/normalizer';
import { MalformedItem } from '../../src/lib/errors';
import { NOW } from '../helpers';

describe('resolvePublishedAt', () => {
  it('should convert offsets to UTC', () => {
    expect(resolvePublishedAt('2026-03-09T12:00:00+02:00', NOW)).toEqual({
      publishedAt: '2026-03-09T10:00:00.000Z',
      timestampInferred: false,
    });
  });

  it('should fall back to fetch time for missing or invalid values', () => {
    const inferred = { publishedAt: NOW.toISOString(), timestampInferred: true };
    expect(resolvePublishedAt(undefined, NOW)).toEqual(inferred);
    expect(resolvePublishedAt('', NOW)).toEqual(inferred);
    expect(resolvePublishedAt('yesterday-ish', NOW)).toEqual(inferred);
  });
});

describe('fromEpochSeconds', () => {
  it('should convert unix seconds', () => {
    expect(fromEpochSeconds(1773050400)?.toISOString()).toBe('2026-03-09T10:00:00.000Z');
  });

  it('should return undefined when absent', () => {
    expect(fromEpochSeconds(undefined)).toBeUndefined();
  });
});

describe('toCount', () => {
  it('should floor positives and zero everything else', () => {
    expect(toCount(12.7)).toBe(12);
    expect(toCount(-3)).toBe(0);
    expect(toCount('5')).toBe(0);
    expect(toCount(Number.NaN)).toBe(0);
  });
});

describe('stripHtml', () => {
  it('should remove tags, scripts and decode entities', () => {
    expect(stripHtml('<p>Robots &amp; drones</p><script>alert(1)</script> &#8217;ok&#x21;')).toBe(
      'Robots & drones ’ok!'
    );
  });
});

describe('composeText', () => {
  it('should join title and body with a blank line', () => {
    expect(composeText('Title', 'Body')).toBe('Title\n\nBody');
    expect(composeText('', 'Body')).toBe('Body');
    expect(composeText('Title', '  ')).toBe('Title');
  });
});

describe('normalizeLanguage', () => {
  it('should keep the primary subtag', () => {
    expect(normalizeLanguage('en-US')).toBe('en');
    expect(normalizeLanguage('pt_BR')).toBe('pt');
    expect(normalizeLanguage('')).toBeUndefined();
  });
});

describe('buildItem', () => {
  const base = { sourceKind: 'rss' as const, sourceName: 'feed', fetchedAt: NOW };

  it('should normalize text, tags and counters', () => {
    const item = buildItem({
      ...base,
      externalId: ' abc ',
      title: '<b>Robot</b> news',
      body: 'Body text',
      tags: ['Research', 'research', ' AI '],
      engagement: { likes: 3, shares: -1 },
      authorFollowers: null,
    });

    expect(item.externalId).toBe('abc');
    expect(item.title).toBe('Robot news');
    expect(item.text).toBe('Robot news\n\nBody text');
    expect(item.tags).toEqual(['ai', 'research']);
    expect(item.engagement).toEqual({ likes: 3, shares: 0, replies: 0 });
    expect(item.authorFollowers).toBe(0);
    expect(item.timestampInferred).toBe(true);
    expect(item.fetchedAt).toBe(NOW.toISOString());
    expect(item.keywords).toEqual([]);
  });

  it('should reject an entry without identifier', () => {
    expect(() => buildItem({ ...base, externalId: '  ', title: 'x' })).toThrow(MalformedItem);
  });

  it('should reject an entry with neither title nor body', () => {
    expect(() => buildItem({ ...base, externalId: 'x', title: '<p></p>', body: null })).toThrow(
      'entry has neither title nor body'
    );
  });
});
