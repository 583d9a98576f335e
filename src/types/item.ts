/**
 * SignalRadar — Item Types
 *
 * Every adapter normalizes its entries into an Item before the
 * quality filter sees them. Items are transient until persisted.
 */

import { z } from 'zod';

// ============================================================
// SOURCE KIND
// ============================================================

export const SourceKindSchema = z.enum(['rss', 'hacker_news', 'reddit', 'github', 'twitter']);
export type SourceKind = z.infer<typeof SourceKindSchema>;

// ============================================================
// ENGAGEMENT
// ============================================================

/**
 * Source-neutral engagement counters.
 * Upvotes map to likes; retweets, forks and crossposts map to shares.
 */
export interface Engagement {
  likes: number;
  shares: number;
  replies: number;
}

// ============================================================
// ITEM
// ============================================================

export interface Item {
  /** Source-scoped identifier; not the dedup key */
  externalId: string;
  sourceKind: SourceKind;
  sourceName: string;

  title: string;
  /** Summary or body without the title */
  body: string;
  /** Title and body joined; used for analysis */
  text: string;
  /** Canonical link, empty when the source has none */
  url: string;

  authorId: string;
  authorName: string;
  authorFollowers: number;

  engagement: Engagement;

  /** ISO-8601, UTC */
  publishedAt: string;
  /** True when the source gave no usable timestamp and fetch time was used */
  timestampInferred: boolean;
  fetchedAt: string;
  language?: string;

  /** Topic labels, sorted, no duplicates */
  tags: string[];
  keywords: string[];
}

// ============================================================
// SCORED ITEM
// ============================================================

/**
 * Named contributions before the recency multiplier, plus the multiplier.
 * `sumContributions(b) * b.recencyFactor` reproduces the score.
 */
export interface ScoreBreakdown {
  engagement: number;
  authority: number;
  source: number;
  tags: number;
  feedback: number;
  recencyFactor: number;
}

export type ScoreContribution = Exclude<keyof ScoreBreakdown, 'recencyFactor'>;

export const SCORE_CONTRIBUTIONS: readonly ScoreContribution[] = [
  'engagement',
  'authority',
  'source',
  'tags',
  'feedback',
] as const;

export interface ScoredItem extends Item {
  id: string;
  score: number;
  scoreBreakdown: ScoreBreakdown;
}
