/**
 * Tests for the quality filter
 */

import { describe, it, expect } from 'vitest';
import { evaluateQuality, isAcceptable } from '../../src/quality/filter';
import { NOW, makeConfig, makeItem } from '../helpers';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('evaluateQuality', () => {
  const quality = makeConfig().quality;

  it('should accept a complete item', () => {
    expect(evaluateQuality(makeItem(), quality, NOW)).toEqual({ accepted: true });
  });

  it('should flag "Read more..." as a stub, not as too short', () => {
    expect(evaluateQuality(makeItem({ title: '', body: 'Read more...' }), quality, NOW)).toEqual({
      accepted: false,
      reason: 'stub',
      detail: 'stub phrase "read more" with 0 chars of content',
    });
  });

  it('should flag a body that repeats the title', () => {
    const verdict = evaluateQuality(
      makeItem({ title: 'Robot arm reaches new precision record', body: 'Robot  arm reaches new PRECISION record' }),
      quality,
      NOW
    );
    expect(verdict).toEqual({ accepted: false, reason: 'stub', detail: 'body repeats title' });
  });

  it('should accept a stub phrase inside real content', () => {
    const item = makeItem({
      body: 'A research lab released firmware and CAD files for a six-axis robot arm. Read more',
    });
    expect(isAcceptable(item, quality, NOW)).toBe(true);
  });

  it('should check stubs before URLs', () => {
    const verdict = evaluateQuality(makeItem({ title: '', body: 'Click here', url: 'bad' }), quality, NOW);
    expect(verdict).toMatchObject({ accepted: false, reason: 'stub' });
  });

  it('should reject relative and non-http URLs', () => {
    expect(evaluateQuality(makeItem({ url: 'not a url' }), quality, NOW)).toEqual({
      accepted: false,
      reason: 'invalid_url',
      detail: 'not an absolute URL: not a url',
    });
    expect(evaluateQuality(makeItem({ url: 'ftp://example.com/file' }), quality, NOW)).toEqual({
      accepted: false,
      reason: 'invalid_url',
      detail: 'unsupported scheme ftp:',
    });
  });

  it('should allow an empty URL', () => {
    expect(isAcceptable(makeItem({ url: '' }), quality, NOW)).toBe(true);
  });

  it('should reject short text', () => {
    expect(evaluateQuality(makeItem({ title: '', body: 'Robot arm update today' }), quality, NOW)).toEqual({
      accepted: false,
      reason: 'too_short',
      detail: '22 chars, minimum 40',
    });
  });

  it('should never accept text under the minimum length', () => {
    for (let length = 0; length < quality.minLength; length++) {
      const item = makeItem({ title: '', body: 'x'.repeat(length) });
      expect(isAcceptable(item, quality, NOW)).toBe(false);
    }
  });

  it('should honour a custom minimum length', () => {
    const relaxed = makeConfig({ quality: { minLength: 10 } }).quality;
    expect(isAcceptable(makeItem({ title: '', body: 'Robot arm update today' }), relaxed, NOW)).toBe(true);
  });

  it('should reject stale items only when an age limit is set', () => {
    const old = makeItem({ publishedAt: new Date(NOW.getTime() - 15 * DAY_MS).toISOString() });

    expect(isAcceptable(old, quality, NOW)).toBe(true);
    expect(evaluateQuality(old, makeConfig({ quality: { maxAgeDays: 14 } }).quality, NOW)).toEqual({
      accepted: false,
      reason: 'stale',
      detail: 'published 15 days ago, maximum 14',
    });
  });
});
