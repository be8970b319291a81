import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Config } from './config.js';
import { ConfigError } from './errors.js';

let client: SupabaseClient | null = null;

export function getClient(config: Config): SupabaseClient {
  if (client) return client;
  if (!config.supabase) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_ANON_KEY env vars are required for publishing');
  }

  client = createClient(config.supabase.url, config.supabase.anonKey, {
    auth: { persistSession: false },
    global: { headers: { 'X-Client-Info': 'campus-energy/1.0' } },
  });

  return client;
}
