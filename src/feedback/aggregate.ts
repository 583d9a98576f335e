/**
 * SignalRadar — Feedback Aggregation
 *
 * Folds raw feedback records into the weighted sum the scoring
 * engine consumes. Likes and saves count positive, dislikes negative.
 */

import type { FeedbackAggregate, FeedbackRecord, FeedbackType } from '../types';
import { logger } from '../lib/logger';

const SIGN: Record<FeedbackType, number> = {
  like: 1,
  save: 1,
  dislike: -1,
};

export const EMPTY_FEEDBACK: Readonly<FeedbackAggregate> = Object.freeze({
  weightedSum: 0,
  counts: Object.freeze({ like: 0, dislike: 0, save: 0 }),
});

export function aggregateFeedback(records: Iterable<FeedbackRecord>): FeedbackAggregate {
  const counts: Record<FeedbackType, number> = { like: 0, dislike: 0, save: 0 };
  let weightedSum = 0;

  for (const record of records) {
    if (!Number.isFinite(record.weight) || record.weight < 0) {
      logger.warn('Skipping feedback record with invalid weight', {
        itemId: record.itemId,
        weight: record.weight,
      });
      continue;
    }
    counts[record.feedbackType]++;
    weightedSum += SIGN[record.feedbackType] * record.weight;
  }

  return { weightedSum, counts };
}
