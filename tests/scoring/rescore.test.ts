import { describe, it, expect } from 'vitest';
import { rescoreItem, rescoreRecent } from '../../src/scoring/rescore';
import { InMemoryItemStore } from '../../src/db/memory-store';
import { InMemoryFeedbackSource } from '../../src/feedback/source';
import { NOW, makeConfig, makeScoredItem } from '../helpers';

function setup() {
  const store = new InMemoryItemStore([
    makeScoredItem({ id: 'item-1', externalId: 'a' }),
    makeScoredItem({ id: 'item-2', externalId: 'b', fetchedAt: '2026-02-01T00:00:00.000Z' }),
  ]);
  const feedback = new InMemoryFeedbackSource([
    { itemId: 'item-1', feedbackType: 'like', weight: 1 },
    { itemId: 'item-1', feedbackType: 'save', weight: 2 },
    { itemId: 'item-1', feedbackType: 'dislike', weight: 1 },
  ]);
  return { store, feedback, deps: { config: makeConfig(), store, feedback } };
}

describe('rescoreItem', () => {
  it('should fold feedback into the stored score', async () => {
    const { store, deps } = setup();

    const rescored = await rescoreItem(deps, 'item-1', NOW);

    expect(rescored?.score).toBe(6);
    expect(rescored?.scoreBreakdown.feedback).toBe(6);
    expect((await store.findById('item-1'))?.score).toBe(6);
  });

  it('should return null for an unknown id', async () => {
    const { deps } = setup();
    expect(await rescoreItem(deps, 'missing', NOW)).toBeNull();
  });
});

describe('rescoreRecent', () => {
  it('should rescore only items inside the window', async () => {
    const { store, feedback, deps } = setup();
    feedback.record({ itemId: 'item-2', feedbackType: 'like', weight: 5 });

    const rescored = await rescoreRecent(deps, new Date('2026-03-09T12:00:00.000Z'), NOW);

    expect(rescored.map(item => item.id)).toEqual(['item-1']);
    expect((await store.findById('item-2'))?.score).toBe(0);
  });
});
