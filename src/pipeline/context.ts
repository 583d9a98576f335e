/**
 * SignalRadar — Process Context
 *
 * Everything a cycle needs, built once per process and passed explicitly.
 */

import type { RadarConfig } from '../types';
import { createDefaultRegistry, type AdapterRegistry } from '../feeds';
import { SupabaseItemStore, getAdminClient, type ItemStore } from '../db';
import { SupabaseFeedbackSource, type FeedbackSource } from '../feedback';
import { loadEnv, type RadarEnv } from '../config';
import { PipelineOrchestrator } from './orchestrator';

export interface RadarContext {
  config: RadarConfig;
  store: ItemStore;
  feedback: FeedbackSource;
  registry: AdapterRegistry;
  orchestrator: PipelineOrchestrator;
  clock: () => Date;
}

export interface RadarContextOptions {
  config: RadarConfig;
  store?: ItemStore;
  feedback?: FeedbackSource;
  registry?: AdapterRegistry;
  env?: RadarEnv;
  clock?: () => Date;
}

/**
 * Build the context. Collaborators not supplied default to the
 * Supabase-backed store and feedback source and the built-in adapters.
 */
export function createRadarContext(options: RadarContextOptions): RadarContext {
  const env = options.env ?? loadEnv();
  const store = options.store ?? new SupabaseItemStore(getAdminClient(env));
  const feedback = options.feedback ?? new SupabaseFeedbackSource(getAdminClient(env));
  const registry =
    options.registry ??
    createDefaultRegistry({
      githubToken: env.GITHUB_TOKEN,
      twitterBearerToken: env.TWITTER_BEARER_TOKEN,
    });

  const clock = options.clock ?? (() => new Date());
  const orchestrator = new PipelineOrchestrator({ config: options.config, store, registry, clock });

  return { config: options.config, store, feedback, registry, orchestrator, clock };
}
