/**
 * SignalRadar — Backfill Tags Script
 *
 * Tags persisted items that were stored without topics.
 *
 * Usage:
 *   npm run backfill-tags                  # Last 7 days
 *   npm run backfill-tags -- --days 30
 */

import { loadConfig } from '../src/config';
import { backfillTags, createRadarContext } from '../src/pipeline';
import { logger } from '../src/lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDays(): number {
  const args = process.argv.slice(2);
  const index = args.indexOf('--days');
  if (index === -1 || !args[index + 1]) return 7;
  return parseInt(args[index + 1], 10);
}

async function main(): Promise<void> {
  const days = parseDays();
  if (!Number.isFinite(days) || days <= 0) {
    console.error('--days takes a positive number');
    process.exit(1);
  }

  const context = createRadarContext({ config: loadConfig() });
  const result = await backfillTags(context, new Date(Date.now() - days * DAY_MS));

  console.log(`Scanned ${result.scanned} items, ${result.untagged} untagged, ${result.updated} updated`);
}

main().catch((error: unknown) => {
  logger.error('Tag backfill failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
