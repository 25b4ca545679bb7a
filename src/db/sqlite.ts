/**
 * Local profile store on better-sqlite3.
 *
 * Append-only logging and the no-hard-delete rule are enforced by triggers,
 * so they hold even for writes that bypass this class. Each vector append is
 * one transaction, serialized per profile.
 */
import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  DuplicateUsername,
  ProfileInactive,
  ProfileNotFound,
  StorageFailure,
  VoiceMatchError,
  errorMessage,
} from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger } from '../utils/logger.js';
import { groupByUser, toAttempt, toProfile, toSample, toSession, UserRowSchema } from './rows.js';
import {
  ATTEMPT_PAGE_SIZE,
  type AttemptStats,
  type AuthenticationAttempt,
  type EnrolledSample,
  type EnrollmentSession,
  type NewAuthenticationAttempt,
  type NewProfile,
  type NewSample,
  type Profile,
  type ProfileStore,
} from './types.js';

const log = logger.child('sqlite');

const VerdictCountSchema = z.object({
  verdict: z.enum(['accept', 'reject', 'unknown']),
  n:       z.number().int(),
});

export const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id     TEXT    PRIMARY KEY,
    username    TEXT    NOT NULL UNIQUE,
    full_name   TEXT,
    email       TEXT,
    is_active   INTEGER NOT NULL DEFAULT 1,
    created_at  TEXT    NOT NULL,
    updated_at  TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS voice_profiles (
    sample_id     TEXT    PRIMARY KEY,
    user_id       TEXT    NOT NULL REFERENCES users (user_id),
    sample_index  INTEGER NOT NULL,
    features      TEXT    NOT NULL,
    transcript    TEXT,
    analysis      TEXT,
    quality_score REAL    NOT NULL,
    created_at    TEXT    NOT NULL,
    UNIQUE (user_id, sample_index)
  );

  CREATE TABLE IF NOT EXISTS authentication_logs (
    log_id            INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at        TEXT    NOT NULL,
    mode              TEXT    NOT NULL CHECK (mode IN ('verification', 'identification')),
    claimed_username  TEXT,
    candidate_user_id TEXT    REFERENCES users (user_id),
    matched_user_id   TEXT    REFERENCES users (user_id),
    similarity_score  REAL    NOT NULL,
    ai_confidence     REAL,
    fused_score       REAL    NOT NULL,
    verdict           TEXT    NOT NULL CHECK (verdict IN ('accept', 'reject', 'unknown')),
    ai_skipped        INTEGER NOT NULL DEFAULT 0,
    commentary        TEXT    NOT NULL DEFAULT ''
  );

  CREATE INDEX IF NOT EXISTS idx_auth_logs_candidate
    ON authentication_logs (candidate_user_id, log_id);

  CREATE TABLE IF NOT EXISTS enrollment_sessions (
    session_id       TEXT    PRIMARY KEY,
    user_id          TEXT    NOT NULL REFERENCES users (user_id),
    required_samples INTEGER NOT NULL,
    baseline_count   INTEGER NOT NULL,
    started_at       TEXT    NOT NULL
  );

  CREATE TRIGGER IF NOT EXISTS authentication_logs_no_update
    BEFORE UPDATE ON authentication_logs
    BEGIN SELECT RAISE(ABORT, 'authentication_logs is append-only'); END;

  CREATE TRIGGER IF NOT EXISTS authentication_logs_no_delete
    BEFORE DELETE ON authentication_logs
    BEGIN SELECT RAISE(ABORT, 'authentication_logs is append-only'); END;

  CREATE TRIGGER IF NOT EXISTS voice_profiles_no_update
    BEFORE UPDATE ON voice_profiles
    BEGIN SELECT RAISE(ABORT, 'enrolled samples are immutable'); END;

  CREATE TRIGGER IF NOT EXISTS voice_profiles_no_delete
    BEFORE DELETE ON voice_profiles
    BEGIN SELECT RAISE(ABORT, 'enrolled samples are immutable'); END;

  CREATE TRIGGER IF NOT EXISTS users_no_delete
    BEFORE DELETE ON users
    BEGIN SELECT RAISE(ABORT, 'users are soft-deleted only'); END;
`;

export interface SqliteStoreOptions {
  /** File path, or ':memory:'. */
  path: string;
  clock?: () => Date;
}

export class SqliteProfileStore implements ProfileStore {
  readonly db: Database.Database;
  private readonly clock: () => Date;
  private readonly locks = new KeyedMutex();

  constructor(opts: SqliteStoreOptions) {
    if (opts.path !== ':memory:') mkdirSync(dirname(opts.path), { recursive: true });
    this.db = new Database(opts.path);
    this.db.pragma('foreign_keys = ON');
    if (opts.path !== ':memory:') this.db.pragma('journal_mode = WAL');
    this.db.exec(SQLITE_SCHEMA);
    this.clock = opts.clock ?? (() => new Date());
    log.debug('SQLite profile store opened', { path: opts.path });
  }

  private now(): string {
    return this.clock().toISOString();
  }

  /** Domain errors pass through; anything else from the driver is a StorageFailure. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof VoiceMatchError) throw err;
      log.error(`SQLite ${operation} failed`, { err });
      throw new StorageFailure(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private loadSamples(userIds: readonly string[]): Map<string, EnrolledSample[]> {
    const stmt = this.db.prepare('SELECT * FROM voice_profiles WHERE user_id = ? ORDER BY sample_index');
    return groupByUser(userIds.flatMap(id => stmt.all(id)).map(toSample));
  }

  private hydrate(userRows: readonly unknown[]): Profile[] {
    const ids = userRows.map(r => UserRowSchema.parse(r).user_id);
    const samples = this.loadSamples(ids);
    return userRows.map((row, i) => toProfile(row, samples.get(ids[i] ?? '') ?? []));
  }

  private selectUser(userId: string): unknown {
    return this.db.prepare('SELECT * FROM users WHERE user_id = ?').get(userId);
  }

  // ── Profiles ────────────────────────────────────────────────────────────────

  async createProfile(input: NewProfile): Promise<Profile> {
    return this.guard('createProfile', () => {
      const existing = this.db.prepare('SELECT 1 FROM users WHERE username = ?').get(input.username);
      if (existing) throw new DuplicateUsername(input.username);
      const userId = randomUUID();
      const ts = this.now();
      try {
        this.db.prepare(
          `INSERT INTO users (user_id, username, full_name, email, is_active, created_at, updated_at)
           VALUES (?, ?, ?, ?, 1, ?, ?)`,
        ).run(userId, input.username, input.fullName ?? '', input.email ?? '', ts, ts);
      } catch (err) {
        if (err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          throw new DuplicateUsername(input.username);
        }
        throw err;
      }
      log.info('Profile created', { userId, username: input.username });
      return toProfile(this.selectUser(userId), []);
    });
  }

  async getProfile(userId: string): Promise<Profile | null> {
    return this.guard('getProfile', () => {
      const row = this.selectUser(userId);
      return row ? this.hydrate([row])[0] ?? null : null;
    });
  }

  async findByUsername(username: string): Promise<Profile | null> {
    return this.guard('findByUsername', () => {
      const row = this.db.prepare('SELECT * FROM users WHERE username = ?').get(username);
      return row ? this.hydrate([row])[0] ?? null : null;
    });
  }

  async appendVector(userId: string, sample: NewSample): Promise<EnrolledSample> {
    return this.locks.run(userId, async () => this.guard('appendVector', () => {
      const append = this.db.transaction((): EnrolledSample => {
        const user = this.selectUser(userId);
        if (!user) throw new ProfileNotFound(userId);
        if (!UserRowSchema.parse(user).is_active) throw new ProfileInactive(userId);

        const next = this.db.prepare(
          'SELECT COALESCE(MAX(sample_index) + 1, 0) AS next FROM voice_profiles WHERE user_id = ?',
        ).pluck().get(userId);
        const sampleIndex = typeof next === 'number' ? next : 0;
        const sampleId = randomUUID();
        const ts = this.now();

        this.db.prepare(
          `INSERT INTO voice_profiles
             (sample_id, user_id, sample_index, features, transcript, analysis, quality_score, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          sampleId, userId, sampleIndex, JSON.stringify(sample.vector),
          sample.transcript ?? '', sample.analysis ?? null, sample.qualityScore, ts,
        );
        this.db.prepare('UPDATE users SET updated_at = ? WHERE user_id = ?').run(ts, userId);

        return toSample(this.db.prepare('SELECT * FROM voice_profiles WHERE sample_id = ?').get(sampleId));
      });
      const stored = append();
      log.info('Voice sample appended', { userId, sampleIndex: stored.sampleIndex });
      return stored;
    }));
  }

  async deactivate(userId: string): Promise<void> {
    return this.locks.run(userId, async () => this.guard('deactivate', () => {
      const user = this.selectUser(userId);
      if (!user) throw new ProfileNotFound(userId);
      if (!UserRowSchema.parse(user).is_active) return;
      this.db.prepare('UPDATE users SET is_active = 0, updated_at = ? WHERE user_id = ?').run(this.now(), userId);
      log.info('Profile deactivated', { userId });
    }));
  }

  async listActiveCandidates(): Promise<Profile[]> {
    return this.guard('listActiveCandidates', () => {
      const rows = this.db.prepare(
        `SELECT * FROM users u
         WHERE u.is_active = 1
           AND EXISTS (SELECT 1 FROM voice_profiles v WHERE v.user_id = u.user_id)
         ORDER BY u.created_at, u.user_id`,
      ).all();
      return this.hydrate(rows);
    });
  }

  async listProfiles(opts: { activeOnly?: boolean } = {}): Promise<Profile[]> {
    return this.guard('listProfiles', () => {
      const where = opts.activeOnly ? 'WHERE is_active = 1' : '';
      return this.hydrate(this.db.prepare(`SELECT * FROM users ${where} ORDER BY username`).all());
    });
  }

  // ── Authentication log ──────────────────────────────────────────────────────

  async recordAttempt(attempt: NewAuthenticationAttempt): Promise<AuthenticationAttempt> {
    return this.guard('recordAttempt', () => {
      const info = this.db.prepare(
        `INSERT INTO authentication_logs
           (created_at, mode, claimed_username, candidate_user_id, matched_user_id,
            similarity_score, ai_confidence, fused_score, verdict, ai_skipped, commentary)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        this.now(), attempt.mode, attempt.claimedUsername, attempt.candidateUserId, attempt.matchedUserId,
        attempt.similarityScore, attempt.aiConfidence, attempt.fusedScore, attempt.verdict,
        attempt.aiSkipped ? 1 : 0, attempt.commentary,
      );
      return toAttempt(
        this.db.prepare('SELECT * FROM authentication_logs WHERE log_id = ?').get(info.lastInsertRowid),
      );
    });
  }

  async *attemptsForProfile(userId: string): AsyncGenerator<AuthenticationAttempt> {
    const page = this.db.prepare(
      `SELECT * FROM authentication_logs
       WHERE candidate_user_id = ? AND log_id < ?
       ORDER BY log_id DESC LIMIT ?`,
    );
    let cursor = Number.MAX_SAFE_INTEGER;
    for (;;) {
      const rows = this.guard('attemptsForProfile', () => page.all(userId, cursor, ATTEMPT_PAGE_SIZE));
      for (const row of rows) {
        const attempt = toAttempt(row);
        cursor = attempt.attemptId;
        yield attempt;
      }
      if (rows.length < ATTEMPT_PAGE_SIZE) return;
    }
  }

  async attemptStats(): Promise<AttemptStats> {
    return this.guard('attemptStats', () => {
      const rows = this.db.prepare(
        'SELECT verdict, COUNT(*) AS n FROM authentication_logs GROUP BY verdict',
      ).all();
      const stats: AttemptStats = { total: 0, accepted: 0, rejected: 0, unknown: 0 };
      for (const row of rows) {
        const { verdict, n } = VerdictCountSchema.parse(row);
        stats.total += n;
        if (verdict === 'accept') stats.accepted += n;
        else if (verdict === 'reject') stats.rejected += n;
        else stats.unknown += n;
      }
      return stats;
    });
  }

  // ── Enrollment sessions ─────────────────────────────────────────────────────

  async createEnrollmentSession(userId: string, requiredSamples: number): Promise<EnrollmentSession> {
    return this.guard('createEnrollmentSession', () => {
      const baseline = this.db.prepare('SELECT COUNT(*) FROM voice_profiles WHERE user_id = ?').pluck().get(userId);
      const sessionId = randomUUID();
      this.db.prepare(
        `INSERT INTO enrollment_sessions (session_id, user_id, required_samples, baseline_count, started_at)
         VALUES (?, ?, ?, ?, ?)`,
      ).run(sessionId, userId, requiredSamples, typeof baseline === 'number' ? baseline : 0, this.now());
      return toSession(this.db.prepare('SELECT * FROM enrollment_sessions WHERE session_id = ?').get(sessionId));
    });
  }

  async getEnrollmentSession(sessionId: string): Promise<EnrollmentSession | null> {
    return this.guard('getEnrollmentSession', () => {
      const row = this.db.prepare('SELECT * FROM enrollment_sessions WHERE session_id = ?').get(sessionId);
      return row ? toSession(row) : null;
    });
  }

  async deleteEnrollmentSession(sessionId: string): Promise<void> {
    this.guard('deleteEnrollmentSession', () => {
      this.db.prepare('DELETE FROM enrollment_sessions WHERE session_id = ?').run(sessionId);
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
