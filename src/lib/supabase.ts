/**
 * Supabase Client Configuration
 * Provides the anonymous client for token checks and the admin client for data access
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from '../config/env.js';

const SERVER_AUTH_OPTIONS = {
  autoRefreshToken: false,
  persistSession: false,
  detectSessionInUrl: false,
};

/**
 * Create a Supabase client with the anon key
 * Use this to verify caller tokens
 */
export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.anonKey, { auth: SERVER_AUTH_OPTIONS });
}

/**
 * Create a Supabase admin client that bypasses RLS
 * Required by the auth admin API; never hand it to callers
 */
export function createSupabaseAdmin(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.serviceKey, { auth: SERVER_AUTH_OPTIONS });
}
