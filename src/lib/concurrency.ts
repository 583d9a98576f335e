/**
 * SignalRadar — Concurrency Helpers
 *
 * Bounded worker pool, deadline-bounded async iteration and a
 * single-writer gate for the persistence step.
 */

import { logger, errorMessage } from './logger';

/**
 * Map over items with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const ret: R[] = new Array<R>(items.length);
  let next = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const idx = next++;
      ret[idx] = await fn(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return ret;
}

type RaceOutcome<T> =
  | { status: 'settled'; value: T }
  | { status: 'timeout' }
  | { status: 'stopped' };

/**
 * Race a promise against a timeout and an optional stop signal.
 * Timers and listeners are always released.
 */
export function raceWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  stop?: AbortSignal
): Promise<RaceOutcome<T>> {
  if (stop?.aborted) return Promise.resolve({ status: 'stopped' });

  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      resolve({ status: 'timeout' });
    }, timeoutMs);

    const onStop = (): void => {
      cleanup();
      resolve({ status: 'stopped' });
    };

    function cleanup(): void {
      clearTimeout(timer);
      stop?.removeEventListener('abort', onStop);
    }

    stop?.addEventListener('abort', onStop, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve({ status: 'settled', value });
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

export interface DeadlineOptions {
  /** Total time the source may spend producing values */
  timeoutMs: number;
  /** Error thrown when the budget runs out */
  onTimeout: () => Error;
  /** Stops pulling further values without raising */
  stop?: AbortSignal;
}

/**
 * Iterate an async source under a time budget.
 *
 * Only time spent waiting on the source counts against the budget;
 * time the consumer spends on a yielded value does not.
 */
export async function* iterateWithDeadline<T>(
  source: AsyncIterable<T>,
  options: DeadlineOptions
): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  let remaining = options.timeoutMs;
  let exhausted = false;

  try {
    while (true) {
      if (options.stop?.aborted) return;
      if (remaining <= 0) throw options.onTimeout();

      const startedAt = Date.now();
      const outcome = await raceWithTimeout(iterator.next(), remaining, options.stop);
      remaining -= Date.now() - startedAt;

      if (outcome.status === 'stopped') return;
      if (outcome.status === 'timeout') throw options.onTimeout();
      if (outcome.value.done) {
        exhausted = true;
        return;
      }
      yield outcome.value.value;
    }
  } finally {
    if (!exhausted) closeQuietly(iterator);
  }
}

function closeQuietly(iterator: AsyncIterator<unknown>): void {
  // Not awaited: a stuck source must not hold the caller.
  void iterator.return?.()?.catch((error: unknown) => {
    logger.debug('Source iterator failed to close', { error: errorMessage(error) });
  });
}

/**
 * Runs tasks one at a time in submission order.
 */
export class SerialGate {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not block the ones queued after it;
    // its error still reaches the caller through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
