/**
 * SignalRadar — Persistence Module
 */

export type { ItemStore, InsertResult } from './store';
export { InMemoryItemStore } from './memory-store';
export { SupabaseItemStore } from './supabase-store';
export { getAdminClient, handleSupabaseError } from './client';
