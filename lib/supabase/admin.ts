/**
 * Service Role Supabase Client
 *
 * The lifecycle engine runs server-side only (workflow callers and Inngest
 * workers), so every storage adapter shares one service-role client.
 * NEVER expose the service_role key to client-side code.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

let serviceClient: SupabaseClient | null = null;

/**
 * Create (once) a Supabase client with service_role privileges.
 *
 * @throws Error if SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is missing.
 */
export function getServiceSupabase(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  if (serviceClient) return serviceClient;

  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key) {
    throw new Error(
      'Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY. ' +
      'Order lifecycle operations require service_role access.'
    );
  }

  serviceClient = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return serviceClient;
}

/** Postgres unique_violation, raised for an already-applied ledger entry */
export const UNIQUE_VIOLATION = '23505';
