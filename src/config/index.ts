/**
 * SignalRadar — Configuration Loader
 *
 * Reads the JSON pipeline config and the process environment.
 * Any invalid or unknown key is a ConfigurationError; the cycle
 * never runs on a config that failed validation.
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { RadarConfigSchema, type RadarConfig } from '../types';
import { ConfigurationError } from '../lib/errors';
import { logger } from '../lib/logger';

export const DEFAULT_CONFIG_PATH = 'config/radar.config.json';

// ============================================================
// PIPELINE CONFIG
// ============================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(input: unknown): RadarConfig {
  const result = RadarConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load and validate the config file.
 * Path resolution: explicit argument, then RADAR_CONFIG, then the default.
 */
export function loadConfig(path?: string): RadarConfig {
  const configPath = resolve(path ?? process.env.RADAR_CONFIG ?? DEFAULT_CONFIG_PATH);

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError([
      `cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([
      `config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const config = parseConfig(json);

  logger.info('Configuration loaded', {
    path: configPath,
    sources: config.sources.length,
    topics: Object.keys(config.topics).length,
    keywords: config.domain.keywords.length,
  });

  return config;
}

// ============================================================
// ENVIRONMENT
// ============================================================

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  GITHUB_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TWITTER_BEARER_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CONTROL_PORT: z.coerce.number().int().positive().default(3001),
});

export type RadarEnv = z.infer<typeof EnvSchema>;

/**
 * Read the environment variables the pipeline uses.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): RadarEnv {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}
