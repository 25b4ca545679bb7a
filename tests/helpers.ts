import { RowGatewayError, UNIQUE_VIOLATION, type RowFilter, type RowGateway, type RowQuery } from '../src/db/supabase.js';
import { SqliteProfileStore } from '../src/db/sqlite.js';
import { DEFAULT_VOICE_MATCH, resolveVoiceMatchConfig, type VoiceMatchConfig } from '../src/config.js';
import { parseFeatureVector, type FeatureVector } from '../src/voice/features.js';
import type { SimilarityScorer } from '../src/voice/similarity.js';

// ── Feature vectors ──────────────────────────────────────────────────────────

export interface RawVector {
  mfcc: number[];
  spectral: { centroid: number; rolloff: number; bandwidth: number; zeroCrossingRate: number };
  prosodic: { pitchMean: number; pitchStd: number; pitchRange: number; energy: number; speakingRate: number };
  quality: { durationSec: number; rmsEnergy: number };
}

export interface VectorOverrides {
  mfcc?: number[];
  spectral?: Partial<RawVector['spectral']>;
  prosodic?: Partial<RawVector['prosodic']>;
  quality?: Partial<RawVector['quality']>;
}

/** Plain JSON-shaped vector, as an extractor would emit it. */
export function rawVector(overrides: VectorOverrides = {}): RawVector {
  return {
    mfcc: overrides.mfcc ?? [-200, 80, -10, 20, -5, 10, -3, 6, -2, 4, -1, 2, -0.5],
    spectral: { centroid: 1500, rolloff: 3000, bandwidth: 1800, zeroCrossingRate: 0.08, ...overrides.spectral },
    prosodic: { pitchMean: 150, pitchStd: 20, pitchRange: 90, energy: 0.05, speakingRate: 3.2, ...overrides.prosodic },
    quality: { durationSec: 4, rmsEnergy: 0.06, ...overrides.quality },
  };
}

export function vector(overrides: VectorOverrides = {}): FeatureVector {
  return parseFeatureVector(rawVector(overrides), { minDurationSec: 0 });
}

/** Vector tagged by pitchMean so table scorers can tell samples apart. */
export function tagged(tag: number): RawVector {
  return rawVector({ prosodic: { pitchMean: tag } });
}

/** Scorer whose answer depends only on the stored sample's pitchMean tag. */
export class TagScorer implements SimilarityScorer {
  constructor(private readonly table: Record<number, number>, private readonly fallback = 0) {}

  score(_probe: FeatureVector, stored: FeatureVector): number {
    return this.table[stored.prosodic.pitchMean] ?? this.fallback;
  }
}

export class ConstantScorer implements SimilarityScorer {
  constructor(private readonly value: number) {}

  score(): number {
    return this.value;
  }
}

// ── Stores and config ────────────────────────────────────────────────────────

/** Clock that advances one second per reading. */
export function tickingClock(start = '2026-01-01T00:00:00.000Z'): () => Date {
  let t = Date.parse(start);
  return () => {
    const d = new Date(t);
    t += 1_000;
    return d;
  };
}

export function memoryStore(): SqliteProfileStore {
  return new SqliteProfileStore({ path: ':memory:', clock: tickingClock() });
}

export function testConfig(overrides: Partial<VoiceMatchConfig> = {}): VoiceMatchConfig {
  return resolveVoiceMatchConfig({ analysisTimeoutMs: 1_000, ...overrides }, DEFAULT_VOICE_MATCH);
}

// ── In-process Supabase stand-in ─────────────────────────────────────────────

type Row = Record<string, unknown>;

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const x = String(a);
  const y = String(b);
  return x === y ? 0 : x < y ? -1 : 1;
}

function matches(row: Row, filter: RowFilter): boolean {
  return Object.entries(filter).every(([k, v]) => row[k] === v);
}

/**
 * Tables in memory with the constraints the migration declares: unique
 * username, unique (user_id, sample_index), append-only audit log.
 */
export class InMemoryRowGateway implements RowGateway {
  readonly tables = new Map<string, Row[]>();
  private nextLogId = 1;
  /** When set, the next call throws this error once. */
  failNext: Error | null = null;

  private table(name: string): Row[] {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = [];
      this.tables.set(name, rows);
    }
    return rows;
  }

  private maybeFail(): void {
    const err = this.failNext;
    if (err) {
      this.failNext = null;
      throw err;
    }
  }

  async insert(table: string, row: Row): Promise<unknown> {
    this.maybeFail();
    const rows = this.table(table);
    if (table === 'users' && rows.some(r => r['username'] === row['username'])) {
      throw new RowGatewayError('duplicate key value violates unique constraint "users_username_key"', UNIQUE_VIOLATION);
    }
    if (table === 'voice_profiles'
      && rows.some(r => r['user_id'] === row['user_id'] && r['sample_index'] === row['sample_index'])) {
      throw new RowGatewayError('duplicate key value violates unique constraint', UNIQUE_VIOLATION);
    }
    const stored: Row = table === 'authentication_logs' ? { log_id: this.nextLogId++, ...row } : { ...row };
    rows.push(stored);
    return { ...stored };
  }

  async select(table: string, query: RowQuery = {}): Promise<unknown[]> {
    this.maybeFail();
    let rows = this.table(table).filter(r => matches(r, query.eq ?? {}));
    const lt = query.lt;
    if (lt) rows = rows.filter(r => compareValues(r[lt.column], lt.value) < 0);
    const order = query.order ?? [];
    rows = [...rows].sort((a, b) => {
      for (const o of order) {
        const c = compareValues(a[o.column], b[o.column]);
        if (c !== 0) return o.ascending ? c : -c;
      }
      return 0;
    });
    if (query.limit !== undefined) rows = rows.slice(0, query.limit);
    return rows.map(r => ({ ...r }));
  }

  async count(table: string, match: RowFilter): Promise<number> {
    this.maybeFail();
    return this.table(table).filter(r => matches(r, match)).length;
  }

  async update(table: string, match: RowFilter, patch: Row): Promise<unknown[]> {
    this.maybeFail();
    if (table === 'authentication_logs' || table === 'voice_profiles') {
      throw new RowGatewayError(`UPDATE on ${table} is not permitted`, 'P0001');
    }
    const hit = this.table(table).filter(r => matches(r, match));
    for (const r of hit) Object.assign(r, patch);
    return hit.map(r => ({ ...r }));
  }

  async remove(table: string, match: RowFilter): Promise<void> {
    this.maybeFail();
    if (table !== 'enrollment_sessions') {
      throw new RowGatewayError(`DELETE on ${table} is not permitted`, 'P0001');
    }
    this.tables.set(table, this.table(table).filter(r => !matches(r, match)));
  }
}
