/**
 * Popcast — Supabase Client
 *
 * Service-role client for the remote ledger table.
 * Background job only: no user sessions, no token refresh.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface LedgerClientOptions {
  url: string;
  serviceRoleKey: string;
  /** Override the HTTP implementation (tests) */
  fetch?: typeof fetch;
}

/**
 * Create a service-role Supabase client.
 */
export function createLedgerClient(options: LedgerClientOptions): SupabaseClient {
  return createClient(options.url, options.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

/**
 * Render a Supabase or PostgREST error as one log-friendly line
 */
export function describeSupabaseError(error: unknown): string {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' && error.code ? ` (code: ${error.code})` : '';
    return `Supabase error: ${error.message}${code}`;
  }
  return 'Unknown Supabase error';
}
