/**
 * Enrollment lifecycle.
 *
 * A session tracks progress toward `requiredSamples` new vectors for one
 * profile. Progress is derived from the profile's sample count, so vectors
 * appended by any path count. Completing or abandoning a session deletes it;
 * vectors already appended stay on the profile.
 */
import type { VoiceMatchConfig } from '../config.js';
import { callWithin, type AnalysisGateway } from '../ai/gateway.js';
import {
  isEnrollmentComplete,
  type EnrolledSample,
  type EnrollmentSession,
  type NewSample,
  type Profile,
  type ProfileStore,
} from '../db/types.js';
import {
  AnalysisUnavailable,
  EnrollmentSessionNotFound,
  ProfileInactive,
  ProfileNotFound,
  TranscriptionUnavailable,
  errorMessage,
} from '../errors.js';
import { logger } from '../utils/logger.js';
import { parseFeatureVector } from '../voice/features.js';
import { enrollmentConsistency, sampleQualityScore } from '../voice/quality.js';
import { WeightedSimilarityScorer, type SimilarityScorer } from '../voice/similarity.js';

const log = logger.child('enrollment');

export interface SampleSubmission {
  features: unknown;
  audio?: Buffer;
}

export interface BeginEnrollment {
  username: string;
  fullName?: string;
  email?: string;
  /** Defaults to the configured minimum sample count. */
  requiredSamples?: number;
}

export interface EnrollmentProgress {
  sessionId: string;
  userId: string;
  sample: EnrolledSample;
  /** New vectors since the session started. */
  samplesCollected: number;
  requiredSamples: number;
  complete: boolean;
  /** Mean pairwise similarity of all the profile's samples; set once complete. */
  consistency: number | null;
}

export interface AddSampleResult {
  sample: EnrolledSample;
  totalSamples: number;
  enrollmentComplete: boolean;
}

export interface EnrollmentServiceDeps {
  store: ProfileStore;
  gateway: AnalysisGateway;
  config: VoiceMatchConfig;
  scorer?: SimilarityScorer;
}

export class EnrollmentService {
  private readonly store: ProfileStore;
  private readonly gateway: AnalysisGateway;
  private readonly config: VoiceMatchConfig;
  private readonly scorer: SimilarityScorer;

  constructor(deps: EnrollmentServiceDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.config = deps.config;
    this.scorer = deps.scorer ?? new WeightedSimilarityScorer();
  }

  async begin(input: BeginEnrollment): Promise<{ profile: Profile; session: EnrollmentSession }> {
    const required = this.requiredSamples(input.requiredSamples);
    const profile = await this.store.createProfile({
      username: input.username,
      fullName: input.fullName,
      email: input.email,
    });
    const session = await this.store.createEnrollmentSession(profile.userId, required);
    log.info('Enrollment started', { userId: profile.userId, sessionId: session.sessionId, required });
    return { profile, session };
  }

  /** Start a fresh session for a profile that already exists. */
  async resume(userId: string, requiredSamples?: number): Promise<EnrollmentSession> {
    const required = this.requiredSamples(requiredSamples);
    const profile = await this.store.getProfile(userId);
    if (!profile) throw new ProfileNotFound(userId);
    if (!profile.isActive) throw new ProfileInactive(userId);
    const session = await this.store.createEnrollmentSession(userId, required);
    log.info('Enrollment resumed', { userId, sessionId: session.sessionId, baseline: session.baselineCount });
    return session;
  }

  async submitSample(sessionId: string, submission: SampleSubmission): Promise<EnrollmentProgress> {
    const session = await this.store.getEnrollmentSession(sessionId);
    if (!session) throw new EnrollmentSessionNotFound(sessionId);

    const prepared = await this.prepareSample(submission);
    const sample = await this.store.appendVector(session.userId, prepared);

    const profile = await this.store.getProfile(session.userId);
    if (!profile) throw new ProfileNotFound(session.userId);

    const samplesCollected = Math.max(0, profile.samples.length - session.baselineCount);
    const complete = samplesCollected >= session.requiredSamples;
    let consistency: number | null = null;
    if (complete) {
      await this.store.deleteEnrollmentSession(sessionId);
      consistency = enrollmentConsistency(profile.samples.map(s => s.vector), this.scorer);
      log.info('Enrollment complete', { userId: session.userId, samples: profile.samples.length, consistency });
    } else {
      log.debug('Enrollment sample stored', { sessionId, samplesCollected, required: session.requiredSamples });
    }

    return {
      sessionId,
      userId: session.userId,
      sample,
      samplesCollected,
      requiredSamples: session.requiredSamples,
      complete,
      consistency,
    };
  }

  async abandon(sessionId: string): Promise<void> {
    const session = await this.store.getEnrollmentSession(sessionId);
    if (!session) throw new EnrollmentSessionNotFound(sessionId);
    await this.store.deleteEnrollmentSession(sessionId);
    log.info('Enrollment abandoned', { sessionId, userId: session.userId });
  }

  /** Append a vector to an existing profile outside any session. */
  async addSample(userId: string, submission: SampleSubmission): Promise<AddSampleResult> {
    const prepared = await this.prepareSample(submission);
    const sample = await this.store.appendVector(userId, prepared);
    const profile = await this.store.getProfile(userId);
    if (!profile) throw new ProfileNotFound(userId);
    return {
      sample,
      totalSamples: profile.samples.length,
      enrollmentComplete: isEnrollmentComplete(profile, this.config.minSampleCount),
    };
  }

  // ── Sample preparation ──────────────────────────────────────────────────────

  private requiredSamples(requested: number | undefined): number {
    const required = requested ?? this.config.minSampleCount;
    if (!Number.isInteger(required) || required < 1) {
      throw new RangeError(`requiredSamples must be a positive integer, got ${required}`);
    }
    return required;
  }

  /** Validate, then gather transcript and AI notes; both degrade to empty. */
  private async prepareSample(submission: SampleSubmission): Promise<NewSample> {
    const vector = parseFeatureVector(submission.features, {
      minDurationSec: this.config.minSampleDurationSec,
      minRmsEnergy:   this.config.minRmsEnergy,
    });
    const budget = this.config.analysisTimeoutMs;

    let transcript = '';
    if (submission.audio) {
      const audio = submission.audio;
      try {
        transcript = await callWithin(
          budget,
          signal => this.gateway.transcribe(audio, { signal }),
          () => new TranscriptionUnavailable(`Transcription timed out after ${budget}ms`),
        );
      } catch (err) {
        log.warn('Enrollment transcription skipped', { error: errorMessage(err) });
      }
    }

    let analysis: string | null = null;
    try {
      analysis = await callWithin(
        budget,
        signal => this.gateway.analyzeCharacteristics(vector, transcript, { signal }),
        () => new AnalysisUnavailable(`Voice analysis timed out after ${budget}ms`),
      );
    } catch (err) {
      log.warn('Enrollment voice analysis skipped', { error: errorMessage(err) });
    }

    return { vector, transcript, analysis, qualityScore: sampleQualityScore(vector) };
  }
}
