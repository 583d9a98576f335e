import { describe, it, expect } from 'vitest';
import { EMPTY_FEEDBACK, aggregateFeedback } from '../../src/feedback/aggregate';
import { InMemoryFeedbackSource } from '../../src/feedback/source';

describe('aggregateFeedback', () => {
  it('should sum signed weights and count each type', () => {
    const aggregate = aggregateFeedback([
      { itemId: 'item-1', feedbackType: 'like', weight: 1 },
      { itemId: 'item-1', feedbackType: 'dislike', weight: 2 },
      { itemId: 'item-1', feedbackType: 'save', weight: 0.5 },
    ]);

    expect(aggregate).toEqual({ weightedSum: -0.5, counts: { like: 1, dislike: 1, save: 1 } });
  });

  it('should skip records with invalid weights', () => {
    const aggregate = aggregateFeedback([
      { itemId: 'item-1', feedbackType: 'like', weight: Number.NaN },
      { itemId: 'item-1', feedbackType: 'like', weight: -1 },
      { itemId: 'item-1', feedbackType: 'save', weight: 3 },
    ]);

    expect(aggregate).toEqual({ weightedSum: 3, counts: { like: 0, dislike: 0, save: 1 } });
  });

  it('should equal the empty aggregate for no records', () => {
    expect(aggregateFeedback([])).toEqual(EMPTY_FEEDBACK);
  });
});

describe('InMemoryFeedbackSource', () => {
  it('should aggregate only the requested item', async () => {
    const source = new InMemoryFeedbackSource([{ itemId: 'item-1', feedbackType: 'like', weight: 1 }]);
    source.record({ itemId: 'item-2', feedbackType: 'like', weight: 4 });

    expect((await source.getFeedbackAggregate('item-1')).weightedSum).toBe(1);
    expect((await source.getFeedbackAggregate('item-2')).weightedSum).toBe(4);
    expect((await source.getFeedbackAggregate('item-3')).weightedSum).toBe(0);
  });
});
