/**
 * SignalRadar — Source Adapter Base
 *
 * Each source kind implements `fetch` as a lazy sequence of Items.
 * A bad entry is skipped and reported; a failed connection, HTTP
 * error or rejected credential fails the whole call with SourceUnavailable.
 */

import type { Item, SourceConfigOf, SourceKind } from '../types';
import { MalformedItem, SourceUnavailable } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

/**
 * Per-call context handed to an adapter by the orchestrator.
 */
export interface FetchContext {
  /** Aborted on timeout or cycle cancellation */
  signal: AbortSignal;
  /** Fetch clock; used when an entry has no timestamp */
  now: Date;
  onMalformed: (error: MalformedItem) => void;
}

const USER_AGENT = 'SignalRadar/1.0';

/**
 * Abstract base class for source adapters.
 */
export abstract class SourceAdapter<K extends SourceKind = SourceKind> {
  abstract readonly kind: K;

  protected logger = logger.child({ adapter: this.constructor.name });

  /**
   * Fetch items for one configured source.
   */
  abstract fetch(source: SourceConfigOf<K>, context: FetchContext): AsyncIterable<Item>;

  /**
   * Normalize entries one at a time, skipping the ones that throw MalformedItem.
   */
  protected *normalizeEntries<E>(
    sourceName: string,
    entries: Iterable<E>,
    normalize: (entry: E) => Item,
    context: FetchContext
  ): Generator<Item, void, undefined> {
    for (const entry of entries) {
      let item: Item;
      try {
        item = normalize(entry);
      } catch (error) {
        if (!(error instanceof MalformedItem)) throw error;
        this.logger.warn('Skipping malformed entry', { source: sourceName, reason: error.reason });
        context.onMalformed(error);
        continue;
      }
      yield item;
    }
  }

  /**
   * GET a URL and return the body. Any transport or HTTP failure is SourceUnavailable.
   */
  protected async request(
    sourceName: string,
    url: string,
    context: FetchContext,
    headers: Record<string, string> = {}
  ): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: { 'User-Agent': USER_AGENT, ...headers },
        signal: context.signal,
      });
    } catch (error) {
      throw new SourceUnavailable(sourceName, `request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (res.status === 401 || res.status === 403) {
      throw new SourceUnavailable(sourceName, `authentication rejected (HTTP ${res.status})`);
    }
    if (!res.ok) {
      throw new SourceUnavailable(sourceName, `HTTP ${res.status}`);
    }
    return res;
  }

  protected async requestJson(
    sourceName: string,
    url: string,
    context: FetchContext,
    headers: Record<string, string> = {}
  ): Promise<unknown> {
    const res = await this.request(sourceName, url, context, { Accept: 'application/json', ...headers });
    try {
      const body: unknown = await res.json();
      return body;
    } catch (error) {
      throw new SourceUnavailable(sourceName, `invalid JSON response: ${errorMessage(error)}`, { cause: error });
    }
  }
}

// ============================================================
// REGISTRY
// ============================================================

/**
 * Adapters keyed on source kind. Owned by the process context.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<SourceKind, SourceAdapter>();

  register(adapter: SourceAdapter): this {
    this.adapters.set(adapter.kind, adapter);
    logger.debug('Adapter registered', { kind: adapter.kind });
    return this;
  }

  get(kind: SourceKind): SourceAdapter | undefined {
    return this.adapters.get(kind);
  }

  kinds(): SourceKind[] {
    return Array.from(this.adapters.keys());
  }
}
