/**
 * SignalRadar — Scoring Engine
 *
 * score = (engagement + authority + source + tags + feedback) × recency
 *
 * Pure. The final score is never clamped, so the breakdown always
 * reproduces it.
 */

import { nanoid } from 'nanoid';
import type {
  FeedbackAggregate,
  Item,
  ScoreBreakdown,
  ScoredItem,
  ScoringConfig,
} from '../types';
import { SCORE_CONTRIBUTIONS } from '../types';

const HOUR_MS = 60 * 60 * 1000;

export interface ScoreResult {
  score: number;
  scoreBreakdown: ScoreBreakdown;
}

/**
 * Sum of the named contributions, before the recency multiplier.
 */
export function sumContributions(breakdown: ScoreBreakdown): number {
  return SCORE_CONTRIBUTIONS.reduce((sum, key) => sum + breakdown[key], 0);
}

/**
 * Exponential half-life decay in [0, 1]. Future timestamps count as age 0.
 */
export function recencyFactor(
  item: Pick<Item, 'publishedAt' | 'timestampInferred'>,
  recency: ScoringConfig['recency'],
  now: Date
): number {
  const published = new Date(item.publishedAt).getTime();
  const ageHours = Number.isFinite(published) ? Math.max(0, (now.getTime() - published) / HOUR_MS) : 0;

  let factor = Math.pow(0.5, ageHours / recency.halfLifeHours);
  if (item.timestampInferred) factor *= recency.inferredTimestampFactor;

  return Math.min(1, Math.max(0, factor));
}

export function computeScore(
  item: Item,
  feedback: FeedbackAggregate,
  config: ScoringConfig,
  now: Date = new Date()
): ScoreResult {
  const { weights } = config;
  const { likes, shares, replies } = item.engagement;

  const scoreBreakdown: ScoreBreakdown = {
    engagement: likes * weights.likes + shares * weights.shares + replies * weights.replies,
    authority: Math.log(1 + item.authorFollowers) * weights.authority,
    source: config.sourceBonus[item.sourceKind] ?? 0,
    tags: item.tags.reduce((sum, tag) => sum + (config.tagBonus[tag] ?? 0), 0),
    feedback: feedback.weightedSum * weights.feedback,
    recencyFactor: recencyFactor(item, config.recency, now),
  };

  return {
    score: sumContributions(scoreBreakdown) * scoreBreakdown.recencyFactor,
    scoreBreakdown,
  };
}

/**
 * Score an item. A new item gets a fresh id; pass the stored id when rescoring.
 */
export function scoreItem(
  item: Item,
  feedback: FeedbackAggregate,
  config: ScoringConfig,
  now: Date = new Date(),
  id: string = nanoid()
): ScoredItem {
  return { ...item, id, ...computeScore(item, feedback, config, now) };
}
