import { beforeEach, describe, expect, it } from 'vitest';
import { RowGatewayError, UNIQUE_VIOLATION } from '../src/db/supabase.js';
import { SupabaseProfileStore } from '../src/db/supabase-store.js';
import type { NewAuthenticationAttempt, NewSample } from '../src/db/types.js';
import { DuplicateUsername, ProfileInactive, ProfileNotFound, StorageFailure } from '../src/errors.js';
import { InMemoryRowGateway, tickingClock, vector } from './helpers.js';

const sample = (pitch = 150): NewSample => ({
  vector: vector({ prosodic: { pitchMean: pitch } }),
  transcript: '',
  analysis: 'clear tenor',
  qualityScore: 0.8,
});

const rejectFor = (candidateUserId: string): NewAuthenticationAttempt => ({
  mode: 'verification',
  claimedUsername: 'alice',
  candidateUserId,
  matchedUserId: null,
  similarityScore: 0.4,
  aiConfidence: 0.3,
  fusedScore: 0.36,
  verdict: 'reject',
  aiSkipped: false,
  commentary: 'similarity 0.400 below 0.8',
});

describe('SupabaseProfileStore', () => {
  let rows: InMemoryRowGateway;
  let store: SupabaseProfileStore;

  beforeEach(() => {
    rows = new InMemoryRowGateway();
    store = new SupabaseProfileStore(rows, { clock: tickingClock() });
  });

  it('creates and reads back profiles', async () => {
    const p = await store.createProfile({ username: 'alice', fullName: 'Alice Example' });
    expect(p).toMatchObject({ username: 'alice', fullName: 'Alice Example', email: '', isActive: true, samples: [] });
    expect(await store.findByUsername('alice')).toEqual(p);
    expect(await store.getProfile('missing')).toBeNull();
  });

  it('rejects duplicate usernames', async () => {
    await store.createProfile({ username: 'alice' });
    await expect(store.createProfile({ username: 'alice' })).rejects.toThrow(DuplicateUsername);
  });

  it('maps a unique violation from the database to DuplicateUsername', async () => {
    // Both pre-checks run before either insert lands.
    const [first, second] = await Promise.allSettled([
      store.createProfile({ username: 'bob' }),
      store.createProfile({ username: 'bob' }),
    ]);
    expect(first.status).toBe('fulfilled');
    expect(second.status === 'rejected' ? second.reason : null).toBeInstanceOf(DuplicateUsername);
  });

  it('appends contiguous samples under concurrency', async () => {
    const p = await store.createProfile({ username: 'alice' });
    await Promise.all([1, 2, 3, 4].map(i => store.appendVector(p.userId, sample(200 + i))));
    const profile = await store.getProfile(p.userId);
    expect(profile?.samples.map(s => s.sampleIndex)).toEqual([0, 1, 2, 3]);
    expect(profile?.samples.map(s => s.vector.prosodic.pitchMean)).toEqual([201, 202, 203, 204]);
    expect(profile?.samples[0]?.analysis).toBe('clear tenor');
  });

  it('refuses appends to missing or inactive profiles', async () => {
    await expect(store.appendVector('missing', sample())).rejects.toThrow(ProfileNotFound);
    const p = await store.createProfile({ username: 'alice' });
    await store.deactivate(p.userId);
    await store.deactivate(p.userId);
    await expect(store.appendVector(p.userId, sample())).rejects.toThrow(ProfileInactive);
  });

  it('lists only active candidates with samples', async () => {
    const alice = await store.createProfile({ username: 'alice' });
    const bob = await store.createProfile({ username: 'bob' });
    await store.createProfile({ username: 'carol' });
    await store.appendVector(bob.userId, sample());
    await store.appendVector(alice.userId, sample());
    expect((await store.listActiveCandidates()).map(p => p.username)).toEqual(['alice', 'bob']);
    await store.deactivate(alice.userId);
    expect((await store.listActiveCandidates()).map(p => p.username)).toEqual(['bob']);
    expect((await store.listProfiles({ activeOnly: true })).map(p => p.username)).toEqual(['bob', 'carol']);
  });

  it('pages attempts newest first across page boundaries', async () => {
    const p = await store.createProfile({ username: 'alice' });
    for (let i = 0; i < 75; i++) await store.recordAttempt(rejectFor(p.userId));
    const ids: number[] = [];
    for await (const a of store.attemptsForProfile(p.userId)) ids.push(a.attemptId);
    expect(ids).toHaveLength(75);
    expect(ids[0]).toBe(75);
    expect(ids[74]).toBe(1);
  });

  it('counts attempts by verdict', async () => {
    const p = await store.createProfile({ username: 'alice' });
    await store.recordAttempt(rejectFor(p.userId));
    await store.recordAttempt({ ...rejectFor(p.userId), verdict: 'accept', matchedUserId: p.userId });
    expect(await store.attemptStats()).toEqual({ total: 2, accepted: 1, rejected: 1, unknown: 0 });
  });

  it('manages enrollment sessions', async () => {
    const p = await store.createProfile({ username: 'alice' });
    await store.appendVector(p.userId, sample());
    await store.appendVector(p.userId, sample());
    const session = await store.createEnrollmentSession(p.userId, 2);
    expect(session.baselineCount).toBe(2);
    expect(await store.getEnrollmentSession(session.sessionId)).toEqual(session);
    await store.deleteEnrollmentSession(session.sessionId);
    expect(await store.getEnrollmentSession(session.sessionId)).toBeNull();
  });

  it('wraps gateway errors in StorageFailure', async () => {
    rows.failNext = new RowGatewayError('insert authentication_logs: fetch failed');
    await expect(store.recordAttempt(rejectFor('x'))).rejects.toThrow(StorageFailure);
  });

  it('does not mistake other constraint errors for duplicates', async () => {
    rows.failNext = new RowGatewayError('select users: permission denied', '42501');
    await expect(store.createProfile({ username: 'alice' })).rejects.toThrow(StorageFailure);
    expect(UNIQUE_VIOLATION).toBe('23505');
  });
});
