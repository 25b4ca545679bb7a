/**
 * Row access over Supabase (PostgREST).
 *
 * The profile store talks to a RowGateway rather than the Supabase client so
 * tests can run the same store code against an in-process table fake.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type RowFilter = Record<string, string | number | boolean>;

export interface RowQuery {
  eq?: RowFilter;
  /** Strictly-less-than on a numeric column (keyset paging). */
  lt?: { column: string; value: number };
  order?: ReadonlyArray<{ column: string; ascending: boolean }>;
  limit?: number;
}

export interface RowGateway {
  insert(table: string, row: Record<string, unknown>): Promise<unknown>;
  select(table: string, query?: RowQuery): Promise<unknown[]>;
  count(table: string, match: RowFilter): Promise<number>;
  update(table: string, match: RowFilter, patch: Record<string, unknown>): Promise<unknown[]>;
  remove(table: string, match: RowFilter): Promise<void>;
}

export class RowGatewayError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'RowGatewayError';
  }
}

/** Postgres SQLSTATE for a unique-constraint violation. */
export const UNIQUE_VIOLATION = '23505';

function isConnError(message: string): boolean {
  return ['ECONNREFUSED', 'fetch failed', 'network timeout', 'ETIMEDOUT'].some(m => message.includes(m));
}

// ─── Supabase implementation ──────────────────────────────────────────────────

export class SupabaseRowGateway implements RowGateway {
  private _client: SupabaseClient | null = null;

  constructor(
    private readonly url: string,
    private readonly serviceKey: string,
  ) {}

  private client(): SupabaseClient {
    if (!this._client) {
      this._client = createClient(this.url, this.serviceKey, { auth: { persistSession: false } });
    }
    return this._client;
  }

  private fail(op: string, table: string, error: { message: string; code?: string }): RowGatewayError {
    if (isConnError(error.message)) {
      logger.warn('Supabase unreachable', { op, table, error: error.message });
    }
    return new RowGatewayError(`${op} ${table}: ${error.message}`, error.code);
  }

  async insert(table: string, row: Record<string, unknown>): Promise<unknown> {
    const { data, error } = await this.client().from(table).insert(row).select().single();
    if (error) throw this.fail('insert', table, error);
    return data;
  }

  async select(table: string, query: RowQuery = {}): Promise<unknown[]> {
    let q = this.client().from(table).select('*');
    for (const [k, v] of Object.entries(query.eq ?? {})) q = q.eq(k, v);
    if (query.lt) q = q.lt(query.lt.column, query.lt.value);
    for (const o of query.order ?? []) q = q.order(o.column, { ascending: o.ascending });
    if (query.limit !== undefined) q = q.limit(query.limit);
    const { data, error } = await q;
    if (error) throw this.fail('select', table, error);
    return data ?? [];
  }

  async count(table: string, match: RowFilter): Promise<number> {
    let q = this.client().from(table).select('*', { count: 'exact', head: true });
    for (const [k, v] of Object.entries(match)) q = q.eq(k, v);
    const { count, error } = await q;
    if (error) throw this.fail('count', table, error);
    return count ?? 0;
  }

  async update(table: string, match: RowFilter, patch: Record<string, unknown>): Promise<unknown[]> {
    let q = this.client().from(table).update(patch);
    for (const [k, v] of Object.entries(match)) q = q.eq(k, v);
    const { data, error } = await q.select();
    if (error) throw this.fail('update', table, error);
    return data ?? [];
  }

  async remove(table: string, match: RowFilter): Promise<void> {
    let q = this.client().from(table).delete();
    for (const [k, v] of Object.entries(match)) q = q.eq(k, v);
    const { error } = await q;
    if (error) throw this.fail('delete', table, error);
  }
}

export function supabaseGatewayFromEnv(): SupabaseRowGateway {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY must be set for STORE_BACKEND=supabase');
  }
  return new SupabaseRowGateway(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY);
}
