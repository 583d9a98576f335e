import { describe, it, expect } from 'vitest';
import { backfillTags } from '../../src/pipeline/backfill';
import { InMemoryItemStore } from '../../src/db/memory-store';
import { makeConfig, makeScoredItem } from '../helpers';

describe('backfillTags', () => {
  it('should tag untagged items that now match a topic', async () => {
    const store = new InMemoryItemStore([
      makeScoredItem({ id: 'arm', externalId: 'a' }),
      makeScoredItem({ id: 'tagged', externalId: 'b', tags: ['hardware'] }),
      makeScoredItem({
        id: 'other',
        externalId: 'c',
        title: 'Quadruped robot learns to open doors',
        body: 'Researchers trained a four-legged machine in simulation first.',
      }),
    ]);
    const config = makeConfig({ topics: { manipulation: ['robot arm'] } });

    const result = await backfillTags({ config, store }, new Date('2026-03-01T00:00:00.000Z'));

    expect(result).toEqual({ scanned: 3, untagged: 2, updated: 1 });
    expect((await store.findById('arm'))?.tags).toEqual(['manipulation']);
    expect((await store.findById('tagged'))?.tags).toEqual(['hardware']);
    expect((await store.findById('other'))?.tags).toEqual([]);
  });
});
