import { env } from '../config.js';
import { SqliteProfileStore } from './sqlite.js';
import { SupabaseProfileStore } from './supabase-store.js';
import { supabaseGatewayFromEnv } from './supabase.js';
import type { ProfileStore } from './types.js';

export * from './types.js';
export { SqliteProfileStore } from './sqlite.js';
export { SupabaseProfileStore } from './supabase-store.js';

export interface StoreSelection {
  backend?: 'sqlite' | 'supabase';
  databasePath?: string;
  clock?: () => Date;
}

/** Open the configured backend. Defaults come from env. */
export function createProfileStore(opts: StoreSelection = {}): ProfileStore {
  const backend = opts.backend ?? env.STORE_BACKEND;
  if (backend === 'supabase') {
    return new SupabaseProfileStore(supabaseGatewayFromEnv(), { clock: opts.clock });
  }
  return new SqliteProfileStore({ path: opts.databasePath ?? env.DATABASE_PATH, clock: opts.clock });
}
