/**
 * SignalRadar — Rescoring
 *
 * Recomputes stored scores once feedback has arrived. Only `score`
 * and `scoreBreakdown` change.
 */

import type { RadarConfig, ScoredItem } from '../types';
import type { ItemStore } from '../db';
import type { FeedbackSource } from '../feedback';
import { mapWithConcurrency } from '../lib/concurrency';
import { logger } from '../lib/logger';
import { scoreItem } from './engine';

export interface RescoreDeps {
  config: RadarConfig;
  store: ItemStore;
  feedback: FeedbackSource;
}

const log = logger.child({ component: 'rescore' });

async function rescore(deps: RescoreDeps, item: ScoredItem, now: Date): Promise<ScoredItem> {
  const aggregate = await deps.feedback.getFeedbackAggregate(item.id);
  const rescored = scoreItem(item, aggregate, deps.config.scoring, now, item.id);
  await deps.store.updateScore(item.id, rescored.score, rescored.scoreBreakdown);
  return rescored;
}

/**
 * Rescore one persisted item. Returns null when the id is unknown.
 */
export async function rescoreItem(
  deps: RescoreDeps,
  itemId: string,
  now: Date = new Date()
): Promise<ScoredItem | null> {
  const item = await deps.store.findById(itemId);
  if (!item) {
    log.warn('Item not found for rescoring', { itemId });
    return null;
  }

  const rescored = await rescore(deps, item, now);
  log.info('Item rescored', { itemId, previous: item.score, score: rescored.score });
  return rescored;
}

/**
 * Rescore every item ingested since `since`.
 */
export async function rescoreRecent(
  deps: RescoreDeps,
  since: Date,
  now: Date = new Date()
): Promise<ScoredItem[]> {
  const items = await deps.store.recentWindow(since);
  const rescored = await mapWithConcurrency(items, deps.config.fetch.concurrency, item =>
    rescore(deps, item, now)
  );

  log.info('Recent items rescored', { since: since.toISOString(), count: rescored.length });
  return rescored;
}
