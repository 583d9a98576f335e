/**
 * SignalRadar — Feedback Module
 */

export { aggregateFeedback, EMPTY_FEEDBACK } from './aggregate';
export {
  InMemoryFeedbackSource,
  SupabaseFeedbackSource,
  type FeedbackSource,
} from './source';
