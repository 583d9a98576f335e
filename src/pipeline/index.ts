/**
 * SignalRadar — Pipeline Module
 */

export { PipelineOrchestrator, type CycleOptions, type OrchestratorDeps } from './orchestrator';
export { createRadarContext, type RadarContext, type RadarContextOptions } from './context';
export { backfillTags, type BackfillDeps, type BackfillResult } from './backfill';
