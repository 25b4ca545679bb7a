/**
 * Profile store over a RowGateway (Supabase in production).
 *
 * PostgREST has no multi-statement transactions, so a vector append is a
 * single row insert. The (user_id, sample_index) unique key plus the
 * per-profile lock keep indices contiguous; the users.updated_at touch that
 * follows is best-effort. Append-only rules live in migrations/ as triggers.
 */
import { randomUUID } from 'node:crypto';
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
import { RowGatewayError, UNIQUE_VIOLATION, type RowGateway } from './supabase.js';
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

const log = logger.child('supabase');

const IndexRowSchema = z.object({ sample_index: z.number().int() });

export interface SupabaseStoreOptions {
  clock?: () => Date;
}

export class SupabaseProfileStore implements ProfileStore {
  private readonly clock: () => Date;
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly rows: RowGateway,
    opts: SupabaseStoreOptions = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof VoiceMatchError) throw err;
      log.error(`Supabase ${operation} failed`, { err });
      throw new StorageFailure(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async hydrate(userRows: readonly unknown[]): Promise<Profile[]> {
    const ids = userRows.map(r => UserRowSchema.parse(r).user_id);
    const perUser = await Promise.all(ids.map(id =>
      this.rows.select('voice_profiles', {
        eq: { user_id: id },
        order: [{ column: 'sample_index', ascending: true }],
      }),
    ));
    const samples = groupByUser(perUser.flat().map(toSample));
    return userRows.map((row, i) => toProfile(row, samples.get(ids[i] ?? '') ?? []));
  }

  private async selectUser(match: { user_id: string } | { username: string }): Promise<unknown> {
    const [row] = await this.rows.select('users', { eq: match, limit: 1 });
    return row;
  }

  private async one(match: { user_id: string } | { username: string }): Promise<Profile | null> {
    const row = await this.selectUser(match);
    if (!row) return null;
    const [profile] = await this.hydrate([row]);
    return profile ?? null;
  }

  // ── Profiles ────────────────────────────────────────────────────────────────

  async createProfile(input: NewProfile): Promise<Profile> {
    return this.guard('createProfile', async () => {
      if (await this.selectUser({ username: input.username })) throw new DuplicateUsername(input.username);
      const ts = this.now();
      let row: unknown;
      try {
        row = await this.rows.insert('users', {
          user_id:    randomUUID(),
          username:   input.username,
          full_name:  input.fullName ?? '',
          email:      input.email ?? '',
          is_active:  true,
          created_at: ts,
          updated_at: ts,
        });
      } catch (err) {
        if (err instanceof RowGatewayError && err.code === UNIQUE_VIOLATION) {
          throw new DuplicateUsername(input.username);
        }
        throw err;
      }
      const profile = toProfile(row, []);
      log.info('Profile created', { userId: profile.userId, username: profile.username });
      return profile;
    });
  }

  async getProfile(userId: string): Promise<Profile | null> {
    return this.guard('getProfile', () => this.one({ user_id: userId }));
  }

  async findByUsername(username: string): Promise<Profile | null> {
    return this.guard('findByUsername', () => this.one({ username }));
  }

  async appendVector(userId: string, sample: NewSample): Promise<EnrolledSample> {
    return this.locks.run(userId, () => this.guard('appendVector', async () => {
      const user = await this.selectUser({ user_id: userId });
      if (!user) throw new ProfileNotFound(userId);
      if (!UserRowSchema.parse(user).is_active) throw new ProfileInactive(userId);

      const [last] = await this.rows.select('voice_profiles', {
        eq: { user_id: userId },
        order: [{ column: 'sample_index', ascending: false }],
        limit: 1,
      });
      const sampleIndex = last ? IndexRowSchema.parse(last).sample_index + 1 : 0;
      const ts = this.now();

      const stored = toSample(await this.rows.insert('voice_profiles', {
        sample_id:     randomUUID(),
        user_id:       userId,
        sample_index:  sampleIndex,
        features:      sample.vector,
        transcript:    sample.transcript ?? '',
        analysis:      sample.analysis ?? null,
        quality_score: sample.qualityScore,
        created_at:    ts,
      }));

      try {
        await this.rows.update('users', { user_id: userId }, { updated_at: ts });
      } catch (err) {
        log.warn('Could not touch users.updated_at after append', { userId, err });
      }
      log.info('Voice sample appended', { userId, sampleIndex: stored.sampleIndex });
      return stored;
    }));
  }

  async deactivate(userId: string): Promise<void> {
    return this.locks.run(userId, () => this.guard('deactivate', async () => {
      const user = await this.selectUser({ user_id: userId });
      if (!user) throw new ProfileNotFound(userId);
      if (!UserRowSchema.parse(user).is_active) return;
      await this.rows.update('users', { user_id: userId }, { is_active: false, updated_at: this.now() });
      log.info('Profile deactivated', { userId });
    }));
  }

  async listActiveCandidates(): Promise<Profile[]> {
    return this.guard('listActiveCandidates', async () => {
      const users = await this.rows.select('users', {
        eq: { is_active: true },
        order: [{ column: 'created_at', ascending: true }, { column: 'user_id', ascending: true }],
      });
      const profiles = await this.hydrate(users);
      return profiles.filter(p => p.samples.length > 0);
    });
  }

  async listProfiles(opts: { activeOnly?: boolean } = {}): Promise<Profile[]> {
    return this.guard('listProfiles', async () => {
      const users = await this.rows.select('users', {
        eq: opts.activeOnly ? { is_active: true } : {},
        order: [{ column: 'username', ascending: true }],
      });
      return this.hydrate(users);
    });
  }

  // ── Authentication log ──────────────────────────────────────────────────────

  async recordAttempt(attempt: NewAuthenticationAttempt): Promise<AuthenticationAttempt> {
    return this.guard('recordAttempt', async () => toAttempt(await this.rows.insert('authentication_logs', {
      created_at:        this.now(),
      mode:              attempt.mode,
      claimed_username:  attempt.claimedUsername,
      candidate_user_id: attempt.candidateUserId,
      matched_user_id:   attempt.matchedUserId,
      similarity_score:  attempt.similarityScore,
      ai_confidence:     attempt.aiConfidence,
      fused_score:       attempt.fusedScore,
      verdict:           attempt.verdict,
      ai_skipped:        attempt.aiSkipped,
      commentary:        attempt.commentary,
    })));
  }

  async *attemptsForProfile(userId: string): AsyncGenerator<AuthenticationAttempt> {
    let cursor = Number.MAX_SAFE_INTEGER;
    for (;;) {
      const rows = await this.guard('attemptsForProfile', () => this.rows.select('authentication_logs', {
        eq: { candidate_user_id: userId },
        lt: { column: 'log_id', value: cursor },
        order: [{ column: 'log_id', ascending: false }],
        limit: ATTEMPT_PAGE_SIZE,
      }));
      for (const row of rows) {
        const attempt = toAttempt(row);
        cursor = attempt.attemptId;
        yield attempt;
      }
      if (rows.length < ATTEMPT_PAGE_SIZE) return;
    }
  }

  async attemptStats(): Promise<AttemptStats> {
    return this.guard('attemptStats', async () => {
      const [accepted, rejected, unknown] = await Promise.all([
        this.rows.count('authentication_logs', { verdict: 'accept' }),
        this.rows.count('authentication_logs', { verdict: 'reject' }),
        this.rows.count('authentication_logs', { verdict: 'unknown' }),
      ]);
      return { total: accepted + rejected + unknown, accepted, rejected, unknown };
    });
  }

  // ── Enrollment sessions ─────────────────────────────────────────────────────

  async createEnrollmentSession(userId: string, requiredSamples: number): Promise<EnrollmentSession> {
    return this.guard('createEnrollmentSession', async () => {
      const baseline = await this.rows.count('voice_profiles', { user_id: userId });
      return toSession(await this.rows.insert('enrollment_sessions', {
        session_id:       randomUUID(),
        user_id:          userId,
        required_samples: requiredSamples,
        baseline_count:   baseline,
        started_at:       this.now(),
      }));
    });
  }

  async getEnrollmentSession(sessionId: string): Promise<EnrollmentSession | null> {
    return this.guard('getEnrollmentSession', async () => {
      const [row] = await this.rows.select('enrollment_sessions', { eq: { session_id: sessionId }, limit: 1 });
      return row ? toSession(row) : null;
    });
  }

  async deleteEnrollmentSession(sessionId: string): Promise<void> {
    await this.guard('deleteEnrollmentSession', () =>
      this.rows.remove('enrollment_sessions', { session_id: sessionId }));
  }

  async close(): Promise<void> {
    // supabase-js holds no sockets between requests
  }
}
