/**
 * SignalRadar — Feedback Types
 *
 * Feedback is owned by an external subsystem; the pipeline only reads it.
 */

import { z } from 'zod';

export const FeedbackTypeSchema = z.enum(['like', 'dislike', 'save']);
export type FeedbackType = z.infer<typeof FeedbackTypeSchema>;

export interface FeedbackRecord {
  itemId: string;
  feedbackType: FeedbackType;
  weight: number;
}

export interface FeedbackAggregate {
  /** Σ sign(type) × weight; dislikes count negative */
  weightedSum: number;
  counts: Record<FeedbackType, number>;
}
