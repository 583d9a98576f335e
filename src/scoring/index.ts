/**
 * SignalRadar — Scoring Module
 */

export {
  computeScore,
  scoreItem,
  sumContributions,
  recencyFactor,
  type ScoreResult,
} from './engine';
export { rescoreItem, rescoreRecent, type RescoreDeps } from './rescore';
