/**
 * SignalRadar — Tag Backfill
 *
 * Re-runs topic extraction on persisted items that were stored without tags.
 */

import type { RadarConfig } from '../types';
import type { ItemStore } from '../db';
import { KeywordExtractor, applyExtraction } from '../nlp';
import { logger } from '../lib/logger';

export interface BackfillDeps {
  config: RadarConfig;
  store: ItemStore;
}

export interface BackfillResult {
  scanned: number;
  untagged: number;
  updated: number;
}

export async function backfillTags(deps: BackfillDeps, since: Date): Promise<BackfillResult> {
  const extractor = new KeywordExtractor(deps.config.topics, deps.config.extraction);
  const items = await deps.store.recentWindow(since);
  const untagged = items.filter(item => item.tags.length === 0);
  let updated = 0;

  for (const item of untagged) {
    const { tags } = applyExtraction(item, extractor.extract(item.text));
    if (tags.length === 0) continue;

    await deps.store.updateTags(item.id, tags);
    updated++;
  }

  logger.info('Tag backfill complete', {
    since: since.toISOString(),
    scanned: items.length,
    untagged: untagged.length,
    updated,
  });

  return { scanned: items.length, untagged: untagged.length, updated };
}
