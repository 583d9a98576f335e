/**
 * SignalRadar — Feedback Sources
 *
 * Read side of the feedback subsystem. Recording feedback belongs to
 * the delivery channels; the pipeline only aggregates it.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { FeedbackTypeSchema, type FeedbackAggregate, type FeedbackRecord } from '../types';
import { handleSupabaseError } from '../db/client';
import { aggregateFeedback } from './aggregate';

export interface FeedbackSource {
  getFeedbackAggregate(itemId: string): Promise<FeedbackAggregate>;
}

// ============================================================
// IN-MEMORY
// ============================================================

export class InMemoryFeedbackSource implements FeedbackSource {
  private readonly records: FeedbackRecord[] = [];

  constructor(records: FeedbackRecord[] = []) {
    this.records.push(...records);
  }

  record(record: FeedbackRecord): void {
    this.records.push(record);
  }

  async getFeedbackAggregate(itemId: string): Promise<FeedbackAggregate> {
    return aggregateFeedback(this.records.filter(r => r.itemId === itemId));
  }
}

// ============================================================
// SUPABASE
// ============================================================

const FeedbackRowSchema = z.object({
  item_id: z.string(),
  feedback_type: FeedbackTypeSchema,
  weight: z.number().nullable(),
});

export class SupabaseFeedbackSource implements FeedbackSource {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'item_feedback'
  ) {}

  async getFeedbackAggregate(itemId: string): Promise<FeedbackAggregate> {
    const { data, error } = await this.client
      .from(this.table)
      .select('item_id, feedback_type, weight')
      .eq('item_id', itemId);

    if (error) throw handleSupabaseError(error, 'feedback lookup');

    const rows = z.array(FeedbackRowSchema).parse(data ?? []);
    return aggregateFeedback(
      rows.map(row => ({
        itemId: row.item_id,
        feedbackType: row.feedback_type,
        weight: row.weight ?? 1,
      }))
    );
  }
}
