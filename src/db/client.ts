/**
 * SignalRadar — Supabase Client
 *
 * The pipeline writes with the service role key; nothing here runs
 * with a user session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { loadEnv, type RadarEnv } from '../config';
import { ConfigurationError, StoreUnavailable } from '../lib/errors';

// ============================================================
// CLIENT INSTANCE
// ============================================================

let adminClient: SupabaseClient | null = null;

/**
 * Service-role client built from the environment on first use.
 */
export function getAdminClient(env: RadarEnv = loadEnv()): SupabaseClient {
  if (adminClient) return adminClient;

  const missing: string[] = [];
  if (!env.SUPABASE_URL) missing.push('SUPABASE_URL is required for persistence');
  if (!env.SUPABASE_SERVICE_ROLE_KEY) missing.push('SUPABASE_SERVICE_ROLE_KEY is required for persistence');
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new ConfigurationError(missing);
  }

  adminClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return adminClient;
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown, operation: string): StoreUnavailable {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new StoreUnavailable(operation, `${error.message}${code ? ` (code: ${code})` : ''}`, { cause: error });
  }
  return new StoreUnavailable(operation, 'unknown Supabase error', { cause: error });
}
