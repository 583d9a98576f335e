/**
 * SignalRadar — Quality Filter
 *
 * Deterministic checks that drop stubs, broken links and near-empty
 * items before any analysis runs. First failing check wins:
 * stub → invalid_url → too_short → stale.
 */

import type { Item, QualityConfig, QualityRejectReason } from '../types';

export type QualityVerdict =
  | { accepted: true }
  | { accepted: false; reason: QualityRejectReason; detail: string };

const DAY_MS = 24 * 60 * 60 * 1000;

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function stripPunctuation(value: string): string {
  return value.replace(/[^\p{L}\p{N}\s]/gu, ' ');
}

// ============================================================
// CHECKS
// ============================================================

function checkStub(item: Item, config: QualityConfig): string | null {
  const title = normalizeWhitespace(item.title).toLowerCase();
  const body = normalizeWhitespace(item.body).toLowerCase();
  if (title && body && title === body) {
    return 'body repeats title';
  }

  const text = normalizeWhitespace(item.text).toLowerCase();
  const phrases = config.stubPatterns.map(p => p.toLowerCase()).filter(p => text.includes(p));
  if (phrases.length === 0) return null;

  let remainder = text;
  for (const phrase of phrases) {
    remainder = remainder.split(phrase).join(' ');
  }
  remainder = normalizeWhitespace(stripPunctuation(remainder));

  if (remainder.length < config.minLength) {
    return `stub phrase "${phrases[0]}" with ${remainder.length} chars of content`;
  }
  return null;
}

function checkUrl(item: Item): string | null {
  if (!item.url) return null;
  let parsed: URL;
  try {
    parsed = new URL(item.url);
  } catch {
    return `not an absolute URL: ${item.url}`;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `unsupported scheme ${parsed.protocol}`;
  }
  return null;
}

function checkLength(item: Item, config: QualityConfig): string | null {
  const length = normalizeWhitespace(item.text).length;
  return length < config.minLength ? `${length} chars, minimum ${config.minLength}` : null;
}

function checkAge(item: Item, config: QualityConfig, now: Date): string | null {
  if (config.maxAgeDays <= 0) return null;
  const ageMs = now.getTime() - new Date(item.publishedAt).getTime();
  if (ageMs > config.maxAgeDays * DAY_MS) {
    return `published ${Math.floor(ageMs / DAY_MS)} days ago, maximum ${config.maxAgeDays}`;
  }
  return null;
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Evaluate an item and report the first failing check.
 */
export function evaluateQuality(item: Item, config: QualityConfig, now: Date = new Date()): QualityVerdict {
  const checks: Array<[QualityRejectReason, () => string | null]> = [
    ['stub', () => checkStub(item, config)],
    ['invalid_url', () => checkUrl(item)],
    ['too_short', () => checkLength(item, config)],
    ['stale', () => checkAge(item, config, now)],
  ];

  for (const [reason, check] of checks) {
    const detail = check();
    if (detail !== null) {
      return { accepted: false, reason, detail };
    }
  }
  return { accepted: true };
}

export function isAcceptable(item: Item, config: QualityConfig, now: Date = new Date()): boolean {
  return evaluateQuality(item, config, now).accepted;
}
