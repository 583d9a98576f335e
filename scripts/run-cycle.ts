/**
 * SignalRadar — Run Cycle Script
 *
 * Runs one ingestion cycle: fetch → filter → extract → dedup → score → persist.
 *
 * Usage:
 *   npm run cycle                          # Uses config/radar.config.json
 *   npm run cycle -- --config <path>       # Another config file
 *   npm run cycle -- --dry-run             # Don't write to the store
 *   npm run cycle -- --source <name>       # Only this source (repeatable)
 *   npm run cycle -- --json                # Print the full summary as JSON
 */

import { loadConfig, loadEnv } from '../src/config';
import { createRadarContext } from '../src/pipeline';
import { InMemoryItemStore } from '../src/db';
import { InMemoryFeedbackSource } from '../src/feedback';
import { logger } from '../src/lib/logger';
import type { CycleSummary } from '../src/types';

// ============================================================
// CONFIGURATION
// ============================================================

interface CycleScriptOptions {
  configPath?: string;
  dryRun: boolean;
  json: boolean;
  sources: string[];
}

function parseArgs(): CycleScriptOptions {
  const args = process.argv.slice(2);
  const options: CycleScriptOptions = { dryRun: false, json: false, sources: [] };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config' && args[i + 1]) {
      options.configPath = args[i + 1];
      i++;
    } else if (args[i] === '--source' && args[i + 1]) {
      options.sources.push(args[i + 1]);
      i++;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--json') {
      options.json = true;
    }
  }

  return options;
}

// ============================================================
// OUTPUT
// ============================================================

function printSummary(summary: CycleSummary): void {
  const { counts } = summary;
  console.log(`\nCycle ${summary.cycleId}${summary.dryRun ? ' (dry run)' : ''}${summary.cancelled ? ' (cancelled)' : ''}`);
  if (summary.failed) console.log(`  FAILED:      ${summary.error ?? 'unknown'}`);
  console.log(`  Duration:    ${summary.durationMs}ms`);
  console.log(`  Fetched:     ${counts.fetched} (${summary.malformedCount} malformed entries skipped)`);
  console.log(`  Filtered:    ${counts.rejectedByFilter}`);
  console.log(`  Irrelevant:  ${counts.rejectedByRelevance}`);
  console.log(`  Duplicates:  ${counts.rejectedAsDuplicate}`);
  console.log(`  Persisted:   ${counts.persisted}`);

  const reasons = Object.entries(summary.rejectedCounts).filter(([, n]) => n > 0);
  if (reasons.length > 0) {
    console.log('\nRejections:');
    for (const [reason, n] of reasons) console.log(`  ${reason.padEnd(22)} ${n}`);
  }

  console.log('\nSources:');
  for (const source of summary.sources) {
    const status = source.status === 'ok' ? 'ok' : `UNAVAILABLE (${source.error ?? 'unknown'})`;
    console.log(`  ${source.sourceName.padEnd(24)} ${String(source.fetched).padStart(4)} items  ${status}`);
  }

  if (summary.persistedItems.length > 0) {
    console.log('\nTop items:');
    for (const item of summary.persistedItems.slice(0, 10)) {
      console.log(`  ${item.score.toFixed(2).padStart(9)}  ${item.title || item.text.slice(0, 80)}`);
      console.log(`             ${item.url}`);
    }
  }
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig(options.configPath);
  const env = loadEnv();

  // A dry run needs no database: fall back to an empty in-memory store
  const offline = options.dryRun && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY);
  if (offline) {
    logger.warn('Supabase not configured; dry run uses an empty in-memory window');
  }

  const context = createRadarContext({
    config,
    env,
    store: offline ? new InMemoryItemStore() : undefined,
    feedback: offline ? new InMemoryFeedbackSource() : undefined,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received; finishing items in hand');
    controller.abort();
  });

  const summary = await context.orchestrator.runCycle({
    dryRun: options.dryRun,
    signal: controller.signal,
    sources: options.sources.length > 0 ? options.sources : undefined,
  });

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    printSummary(summary);
  }

  if (summary.failed) process.exitCode = 1;
}

main().catch((error: unknown) => {
  logger.error('Cycle failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
