/**
 * SignalRadar — Rescore Script
 *
 * Recomputes stored scores from current feedback.
 *
 * Usage:
 *   npm run rescore -- <itemId>            # One item
 *   npm run rescore -- --recent <days>     # Everything ingested in the last N days
 */

import { loadConfig } from '../src/config';
import { createRadarContext } from '../src/pipeline';
import { rescoreItem, rescoreRecent } from '../src/scoring';
import { logger } from '../src/lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

interface RescoreOptions {
  itemId?: string;
  recentDays?: number;
}

function parseArgs(): RescoreOptions {
  const args = process.argv.slice(2);
  const options: RescoreOptions = {};

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--recent' && args[i + 1]) {
      options.recentDays = parseInt(args[i + 1], 10);
      i++;
    } else if (!args[i].startsWith('--')) {
      options.itemId = args[i];
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs();
  const context = createRadarContext({ config: loadConfig() });

  if (options.recentDays !== undefined) {
    if (!Number.isFinite(options.recentDays) || options.recentDays <= 0) {
      console.error('--recent takes a positive number of days');
      process.exit(1);
    }
    const since = new Date(Date.now() - options.recentDays * DAY_MS);
    const items = await rescoreRecent(context, since);
    console.log(`Rescored ${items.length} items ingested since ${since.toISOString()}`);
    return;
  }

  if (!options.itemId) {
    console.error('Usage: rescore <itemId> | --recent <days>');
    process.exit(1);
  }

  const item = await rescoreItem(context, options.itemId);
  if (!item) {
    console.error(`Item ${options.itemId} not found`);
    process.exit(1);
  }
  console.log(`${item.id}: score ${item.score.toFixed(4)}`);
  console.log(JSON.stringify(item.scoreBreakdown, null, 2));
}

main().catch((error: unknown) => {
  logger.error('Rescore failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
