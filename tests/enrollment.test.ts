import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StubAnalysisGateway } from '../src/ai/gateway.js';
import type { SqliteProfileStore } from '../src/db/sqlite.js';
import { EnrollmentService } from '../src/enrollment/service.js';
import {
  DuplicateUsername,
  EnrollmentSessionNotFound,
  InvalidFeatureVector,
  ProfileInactive,
  ProfileNotFound,
} from '../src/errors.js';
import { ConstantScorer, memoryStore, rawVector, tagged, testConfig } from './helpers.js';

describe('EnrollmentService', () => {
  let store: SqliteProfileStore;
  let gateway: StubAnalysisGateway;
  let service: EnrollmentService;

  beforeEach(() => {
    store = memoryStore();
    gateway = new StubAnalysisGateway();
    service = new EnrollmentService({ store, gateway, config: testConfig(), scorer: new ConstantScorer(0.8) });
  });

  afterEach(async () => {
    await store.close();
  });

  it('walks a profile through a full enrollment', async () => {
    const { profile, session } = await service.begin({ username: 'alice', fullName: 'Alice Example' });
    expect(session).toMatchObject({ userId: profile.userId, requiredSamples: 3, baselineCount: 0 });

    const first = await service.submitSample(session.sessionId, { features: tagged(140) });
    expect(first).toMatchObject({ samplesCollected: 1, requiredSamples: 3, complete: false, consistency: null });
    const second = await service.submitSample(session.sessionId, { features: tagged(150) });
    expect(second.complete).toBe(false);
    const third = await service.submitSample(session.sessionId, { features: tagged(160) });

    expect(third).toMatchObject({ samplesCollected: 3, complete: true });
    expect(third.consistency).toBeCloseTo(0.8, 12);
    expect(await store.getEnrollmentSession(session.sessionId)).toBeNull();
    await expect(service.submitSample(session.sessionId, { features: tagged(170) }))
      .rejects.toThrow(EnrollmentSessionNotFound);
    expect((await store.getProfile(profile.userId))?.samples).toHaveLength(3);
  });

  it('stores transcript, AI notes and quality with each sample', async () => {
    const { session } = await service.begin({ username: 'alice' });
    const progress = await service.submitSample(session.sessionId, {
      features: rawVector(),
      audio: Buffer.from('RIFF'),
    });
    expect(progress.sample).toMatchObject({
      sampleIndex: 0,
      transcript: 'stub transcript',
      analysis: 'stub voice analysis',
      qualityScore: 0.9,
    });
    expect(gateway.calls).toEqual({ transcribe: 1, compareVoices: 0, analyzeCharacteristics: 1 });
  });

  it('still stores the sample when the AI services are down', async () => {
    const offline = new EnrollmentService({
      store,
      gateway: new StubAnalysisGateway({ failAnalysis: true, failTranscription: true }),
      config: testConfig(),
    });
    const { session } = await offline.begin({ username: 'bob' });
    const progress = await offline.submitSample(session.sessionId, { features: rawVector(), audio: Buffer.from('RIFF') });
    expect(progress.sample.transcript).toBe('');
    expect(progress.sample.analysis).toBeNull();
  });

  it('keeps appended vectors when a session is abandoned', async () => {
    const { profile, session } = await service.begin({ username: 'alice' });
    await service.submitSample(session.sessionId, { features: rawVector() });
    await service.abandon(session.sessionId);

    expect(await store.getEnrollmentSession(session.sessionId)).toBeNull();
    expect((await store.getProfile(profile.userId))?.samples).toHaveLength(1);
    await expect(service.abandon(session.sessionId)).rejects.toThrow(EnrollmentSessionNotFound);
  });

  it('resumes from the existing sample count', async () => {
    const { profile, session } = await service.begin({ username: 'alice' });
    await service.submitSample(session.sessionId, { features: rawVector() });
    await service.abandon(session.sessionId);

    const resumed = await service.resume(profile.userId, 2);
    expect(resumed.baselineCount).toBe(1);
    const a = await service.submitSample(resumed.sessionId, { features: rawVector() });
    const b = await service.submitSample(resumed.sessionId, { features: rawVector() });
    expect([a.samplesCollected, b.samplesCollected]).toEqual([1, 2]);
    expect(b.complete).toBe(true);
    expect(b.sample.sampleIndex).toBe(2);
  });

  it('adds samples beyond the minimum', async () => {
    const { profile, session } = await service.begin({ username: 'alice', requiredSamples: 1 });
    await service.submitSample(session.sessionId, { features: rawVector() });

    const early = await service.addSample(profile.userId, { features: rawVector() });
    expect(early).toMatchObject({ totalSamples: 2, enrollmentComplete: false });
    const later = await service.addSample(profile.userId, { features: rawVector() });
    expect(later).toMatchObject({ totalSamples: 3, enrollmentComplete: true });
    const extra = await service.addSample(profile.userId, { features: rawVector() });
    expect(extra.sample.sampleIndex).toBe(3);
  });

  it('validates before storing anything', async () => {
    const { profile, session } = await service.begin({ username: 'alice' });
    await expect(service.submitSample(session.sessionId, { features: rawVector({ quality: { durationSec: 1.5 } }) }))
      .rejects.toThrow(InvalidFeatureVector);
    expect((await store.getProfile(profile.userId))?.samples).toHaveLength(0);
    expect(gateway.calls.analyzeCharacteristics).toBe(0);
  });

  it('refuses silent samples', async () => {
    const { profile, session } = await service.begin({ username: 'alice' });
    const silent = rawVector({ mfcc: Array<number>(13).fill(0), quality: { rmsEnergy: 0 } });
    await expect(service.submitSample(session.sessionId, { features: silent }))
      .rejects.toThrow('Sample is silent: RMS energy 0.0000 < 0.01 minimum');
    await expect(service.addSample(profile.userId, { features: silent })).rejects.toThrow(InvalidFeatureVector);
    expect((await store.getProfile(profile.userId))?.samples).toHaveLength(0);
  });

  it('rejects duplicate usernames, unknown and inactive profiles', async () => {
    const { profile } = await service.begin({ username: 'alice' });
    await expect(service.begin({ username: 'alice' })).rejects.toThrow(DuplicateUsername);
    await expect(service.resume('missing')).rejects.toThrow(ProfileNotFound);
    await expect(service.addSample('missing', { features: rawVector() })).rejects.toThrow(ProfileNotFound);
    await store.deactivate(profile.userId);
    await expect(service.resume(profile.userId)).rejects.toThrow(ProfileInactive);
  });

  it('rejects a non-positive sample requirement', async () => {
    await expect(service.begin({ username: 'alice', requiredSamples: 0 }))
      .rejects.toThrow('requiredSamples must be a positive integer, got 0');
    expect(await store.findByUsername('alice')).toBeNull();
  });
});
