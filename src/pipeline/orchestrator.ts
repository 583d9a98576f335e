/**
 * SignalRadar — Pipeline Orchestrator
 *
 * Runs one fetch cycle:
 * 1. Load the recent window from the store
 * 2. Pull every enabled source through its adapter (bounded pool, per-source deadline)
 * 3. Per item: quality → extract + relevance → dedup → score → insert → admit
 * 4. Summarize counts, rejections and per-source outcomes
 *
 * If the window cannot be loaded no source runs and the summary is
 * marked failed.
 *
 * The orchestrator is the only writer to the store during a cycle;
 * dedup, insert and admit run under one serial gate.
 */

import { nanoid } from 'nanoid';
import type {
  CycleSummary,
  Item,
  RadarConfig,
  Rejection,
  RejectionReason,
  RejectionStage,
  ScoredItem,
  SourceConfig,
  SourceRunResult,
} from '../types';
import type { AdapterRegistry } from '../feeds';
import type { ItemStore } from '../db';
import { evaluateQuality } from '../quality';
import { KeywordExtractor, applyExtraction, evaluateRelevance } from '../nlp';
import { Deduplicator, DUPLICATE_REASONS, RecentWindow } from '../dedup';
import { scoreItem } from '../scoring';
import { EMPTY_FEEDBACK } from '../feedback';
import { SerialGate, iterateWithDeadline, mapWithConcurrency } from '../lib/concurrency';
import { SourceUnavailable, toSourceUnavailable } from '../lib/errors';
import { logger, errorMessage, timeOperation } from '../lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

function emptyRejectionCounts(): Record<RejectionReason, number> {
  return {
    stub: 0,
    invalid_url: 0,
    too_short: 0,
    stale: 0,
    excluded: 0,
    language: 0,
    no_match: 0,
    duplicate_external_id: 0,
    duplicate_url: 0,
    duplicate_title: 0,
    duplicate_content: 0,
    persistence_conflict: 0,
  };
}

function skippedSource(source: SourceConfig, reason: string): SourceRunResult {
  return {
    sourceName: source.name,
    sourceKind: source.kind,
    status: 'unavailable',
    fetched: 0,
    malformed: 0,
    durationMs: 0,
    error: reason,
  };
}

// ============================================================
// TYPES
// ============================================================

export interface CycleOptions {
  /** Run every stage but never insert */
  dryRun?: boolean;
  /** Stops pulling further items; items in hand still finish */
  signal?: AbortSignal;
  /** Only run these source names */
  sources?: string[];
}

export interface OrchestratorDeps {
  config: RadarConfig;
  store: ItemStore;
  registry: AdapterRegistry;
  /** Cycle clock */
  clock?: () => Date;
}

/**
 * Mutable state shared by every source within one cycle.
 */
interface CycleState {
  now: Date;
  dryRun: boolean;
  window: RecentWindow;
  gate: SerialGate;
  rejections: Rejection[];
  persisted: ScoredItem[];
  fetched: number;
  malformed: number;
  failed: number;
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export class PipelineOrchestrator {
  private readonly config: RadarConfig;
  private readonly store: ItemStore;
  private readonly registry: AdapterRegistry;
  private readonly clock: () => Date;
  private readonly extractor: KeywordExtractor;
  private readonly deduplicator: Deduplicator;
  private readonly log = logger.child({ component: 'orchestrator' });

  private running = false;
  private last: CycleSummary | null = null;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.registry = deps.registry;
    this.clock = deps.clock ?? (() => new Date());
    this.extractor = new KeywordExtractor(deps.config.topics, deps.config.extraction);
    this.deduplicator = new Deduplicator(deps.config.dedup);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get lastSummary(): CycleSummary | null {
    return this.last;
  }

  async runCycle(options: CycleOptions = {}): Promise<CycleSummary> {
    this.running = true;
    try {
      const summary = await this.execute(options);
      this.last = summary;
      return summary;
    } finally {
      this.running = false;
    }
  }

  private async execute(options: CycleOptions): Promise<CycleSummary> {
    const cycleId = nanoid();
    const startedAt = this.clock();
    const dryRun = options.dryRun ?? false;
    const log = this.log.child({ cycleId });

    const sources = this.config.sources.filter(
      source => source.enabled && (!options.sources || options.sources.includes(source.name))
    );

    const state: CycleState = {
      now: startedAt,
      dryRun,
      window: new RecentWindow(),
      gate: new SerialGate(),
      rejections: [],
      persisted: [],
      fetched: 0,
      malformed: 0,
      failed: 0,
    };

    const since = new Date(startedAt.getTime() - this.config.dedup.windowDays * DAY_MS);
    try {
      state.window = RecentWindow.from(
        await timeOperation('Recent window load', () => this.store.recentWindow(since), log)
      );
    } catch (error) {
      const reason = `window unavailable: ${errorMessage(error)}`;
      log.error('Cycle failed', { reason });
      const skipped = sources.map(source => skippedSource(source, reason));
      return {
        ...this.summarize(cycleId, startedAt, this.clock(), state, skipped, false),
        failed: true,
        error: reason,
      };
    }

    log.info('Starting cycle', { dryRun, sources: sources.length, windowSize: state.window.size });

    const results = await mapWithConcurrency(sources, this.config.fetch.concurrency, source =>
      this.runSource(source, state, options.signal)
    );

    const completedAt = this.clock();
    const summary = this.summarize(cycleId, startedAt, completedAt, state, results, options.signal?.aborted ?? false);

    log.info('Cycle complete', {
      durationMs: summary.durationMs,
      cancelled: summary.cancelled,
      ...summary.counts,
      malformed: summary.malformedCount,
      unavailableSources: results.filter(r => r.status === 'unavailable').length,
    });

    return summary;
  }

  // ============================================================
  // SOURCES
  // ============================================================

  private async runSource(source: SourceConfig, state: CycleState, stop?: AbortSignal): Promise<SourceRunResult> {
    const start = Date.now();
    const log = this.log.child({ source: source.name });
    const result: SourceRunResult = {
      sourceName: source.name,
      sourceKind: source.kind,
      status: 'ok',
      fetched: 0,
      malformed: 0,
      durationMs: 0,
    };

    const adapter = this.registry.get(source.kind);
    if (!adapter) {
      log.warn('No adapter registered', { kind: source.kind });
      return { ...result, status: 'unavailable', error: `no adapter registered for ${source.kind}` };
    }

    const controller = new AbortController();
    const cancel = (): void => controller.abort();
    stop?.addEventListener('abort', cancel, { once: true });

    const { timeoutMs, maxItemsPerSource } = this.config.fetch;

    try {
      const items = adapter.fetch(source, {
        signal: controller.signal,
        now: state.now,
        onMalformed: () => {
          result.malformed++;
          state.malformed++;
        },
      });

      const bounded = iterateWithDeadline(items, {
        timeoutMs,
        stop,
        onTimeout: () => {
          controller.abort();
          return new SourceUnavailable(source.name, `timed out after ${timeoutMs}ms`);
        },
      });

      for await (const item of bounded) {
        result.fetched++;
        state.fetched++;
        await this.processItem(item, state);
        if (result.fetched >= maxItemsPerSource) break;
      }
    } catch (error) {
      const failure = toSourceUnavailable(source.name, error);
      result.status = 'unavailable';
      result.error = failure.reason;
      log.warn('Source unavailable', { reason: failure.reason, fetched: result.fetched });
    } finally {
      stop?.removeEventListener('abort', cancel);
      result.durationMs = Date.now() - start;
    }

    log.debug('Source finished', { status: result.status, fetched: result.fetched, malformed: result.malformed });
    return result;
  }

  // ============================================================
  // ITEMS
  // ============================================================

  private async processItem(item: Item, state: CycleState): Promise<void> {
    try {
      await this.evaluate(item, state);
    } catch (error) {
      // Store failures drop the item, never the source
      state.failed++;
      this.log.error('Item processing failed', {
        source: item.sourceName,
        externalId: item.externalId,
        error: errorMessage(error),
      });
    }
  }

  private async evaluate(item: Item, state: CycleState): Promise<void> {
    const quality = evaluateQuality(item, this.config.quality, state.now);
    if (!quality.accepted) {
      this.reject(state, item, 'quality', quality.reason, quality.detail);
      return;
    }

    const extraction = this.extractor.extract(item.text);
    const relevance = evaluateRelevance(item, extraction, this.config.domain);
    if (!relevance.relevant) {
      this.reject(state, item, 'relevance', relevance.reason, relevance.detail);
      return;
    }

    const candidate = applyExtraction(item, extraction);

    await state.gate.run(async () => {
      if (await this.store.exists(candidate.externalId, candidate.sourceKind)) {
        this.reject(state, candidate, 'dedup', 'duplicate_external_id', 'already persisted');
        return;
      }

      const match = this.deduplicator.findDuplicate(candidate, state.window);
      if (match) {
        this.reject(
          state,
          candidate,
          'dedup',
          DUPLICATE_REASONS[match.matchedBy],
          `matches ${match.existingId} (similarity ${match.similarity.toFixed(2)})`
        );
        return;
      }

      const scored = scoreItem(candidate, EMPTY_FEEDBACK, this.config.scoring, state.now);

      if (!state.dryRun) {
        const inserted = await this.store.insert(scored);
        if (!inserted.ok) {
          this.reject(state, candidate, 'dedup', 'persistence_conflict', inserted.conflict.message);
          return;
        }
      }

      state.window.admit(scored);
      state.persisted.push(scored);
    });
  }

  private reject(
    state: CycleState,
    item: Item,
    stage: RejectionStage,
    reason: RejectionReason,
    detail: string
  ): void {
    state.rejections.push({ stage, reason, sourceName: item.sourceName, externalId: item.externalId, detail });
    this.log.debug('Item rejected', { source: item.sourceName, externalId: item.externalId, stage, reason });
  }

  // ============================================================
  // SUMMARY
  // ============================================================

  private summarize(
    cycleId: string,
    startedAt: Date,
    completedAt: Date,
    state: CycleState,
    sources: SourceRunResult[],
    cancelled: boolean
  ): CycleSummary {
    const rejectedCounts = emptyRejectionCounts();
    const byStage: Record<RejectionStage, number> = { quality: 0, relevance: 0, dedup: 0 };

    for (const rejection of state.rejections) {
      rejectedCounts[rejection.reason]++;
      byStage[rejection.stage]++;
    }

    return {
      cycleId,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      cancelled,
      dryRun: state.dryRun,
      failed: false,
      fetchedCount: state.fetched,
      malformedCount: state.malformed,
      failedCount: state.failed,
      counts: {
        fetched: state.fetched,
        rejectedByFilter: byStage.quality,
        rejectedByRelevance: byStage.relevance,
        rejectedAsDuplicate: byStage.dedup,
        persisted: state.persisted.length,
      },
      rejectedCounts,
      rejections: state.rejections,
      sources,
      persistedItems: [...state.persisted].sort((a, b) => b.score - a.score),
    };
  }
}
