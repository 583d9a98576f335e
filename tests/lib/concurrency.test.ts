/**
 * Tests for the concurrency helpers
 */

import { describe, it, expect } from 'vitest';
import {
  SerialGate,
  iterateWithDeadline,
  mapWithConcurrency,
  raceWithTimeout,
} from '../../src/lib/concurrency';
import { collect } from '../helpers';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('should keep input order in results', async () => {
    const result = await mapWithConcurrency([30, 10, 20], 3, async ms => {
      await sleep(ms);
      return ms * 2;
    });
    expect(result).toEqual([60, 20, 40]);
  });

  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    });
    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async x => x)).toEqual([]);
  });
});

describe('raceWithTimeout', () => {
  it('should settle with the value when the promise wins', async () => {
    expect(await raceWithTimeout(Promise.resolve(7), 50)).toEqual({ status: 'settled', value: 7 });
  });

  it('should report a timeout', async () => {
    expect(await raceWithTimeout(new Promise(() => undefined), 10)).toEqual({ status: 'timeout' });
  });

  it('should report a stop when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await raceWithTimeout(Promise.resolve(1), 50, controller.signal)).toEqual({ status: 'stopped' });
  });

  it('should propagate rejections', async () => {
    await expect(raceWithTimeout(Promise.reject(new Error('boom')), 50)).rejects.toThrow('boom');
  });
});

describe('iterateWithDeadline', () => {
  async function* slow(delays: number[]): AsyncGenerator<number> {
    for (const delay of delays) {
      await sleep(delay);
      yield delay;
    }
  }

  it('should pass every value through when the source is fast', async () => {
    const values = await collect(
      iterateWithDeadline(slow([1, 2, 3]), { timeoutMs: 500, onTimeout: () => new Error('timeout') })
    );
    expect(values).toEqual([1, 2, 3]);
  });

  it('should throw the timeout error when a source stalls', async () => {
    const stalled = {
      [Symbol.asyncIterator]: () => ({ next: () => new Promise<IteratorResult<number>>(() => undefined) }),
    };
    await expect(
      collect(iterateWithDeadline(stalled, { timeoutMs: 20, onTimeout: () => new Error('deadline') }))
    ).rejects.toThrow('deadline');
  });

  it('should stop quietly when the stop signal fires', async () => {
    const controller = new AbortController();
    const values: number[] = [];
    for await (const value of iterateWithDeadline(slow([1, 1, 1, 1]), {
      timeoutMs: 500,
      onTimeout: () => new Error('timeout'),
      stop: controller.signal,
    })) {
      values.push(value);
      if (values.length === 2) controller.abort();
    }
    expect(values).toEqual([1, 1]);
  });
});

describe('SerialGate', () => {
  it('should run tasks one at a time in submission order', async () => {
    const gate = new SerialGate();
    const events: string[] = [];

    await Promise.all([
      gate.run(async () => {
        events.push('a:start');
        await sleep(10);
        events.push('a:end');
      }),
      gate.run(async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should keep running after a task fails', async () => {
    const gate = new SerialGate();
    const failed = gate.run(async () => {
      throw new Error('first');
    });
    const next = gate.run(async () => 'second');

    await expect(failed).rejects.toThrow('first');
    await expect(next).resolves.toBe('second');
  });
});
