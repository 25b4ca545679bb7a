/**
 * Decision engine: one authentication request in, one verdict and exactly one
 * audit record out.
 *
 *   Collected → Scored → Fused → Decided
 *
 * Gateway trouble (unavailable service, bad response, timeout) degrades the
 * request to signal-only scoring. A storage failure while recording the
 * attempt is fatal and no verdict is returned.
 */
import type { VoiceMatchConfig } from '../config.js';
import { callWithin, type AnalysisGateway } from '../ai/gateway.js';
import type {
  AuthenticationAttempt,
  AuthMode,
  NewAuthenticationAttempt,
  Profile,
  ProfileStore,
} from '../db/types.js';
import {
  AnalysisUnavailable,
  InvalidFeatureVector,
  StorageFailure,
  TranscriptionUnavailable,
  errorMessage,
} from '../errors.js';
import { logger } from '../utils/logger.js';
import { parseFeatureVector, type FeatureVector } from '../voice/features.js';
import {
  clamp01,
  compareAgainstSamples,
  WeightedSimilarityScorer,
  type SimilarityScorer,
} from '../voice/similarity.js';
import { decide, fuseScores, rankCandidates, type ScoredCandidate } from './fusion.js';

const log = logger.child('engine');

export interface AuthenticationRequest {
  /** Untrusted feature vector, validated here. */
  features: unknown;
  /** Raw audio for transcription; omitted when only features are available. */
  audio?: Buffer;
  /** Present → verification against this profile; absent → identification. */
  claimedUsername?: string;
}

export interface AuthenticationResult {
  verdict: AuthenticationAttempt['verdict'];
  attempt: AuthenticationAttempt;
  /** Every scored candidate, best first. */
  ranking: ScoredCandidate[];
  transcript: string;
}

export interface DecisionEngineDeps {
  store: ProfileStore;
  gateway: AnalysisGateway;
  config: VoiceMatchConfig;
  scorer?: SimilarityScorer;
}

interface Collected {
  transcript: string;
  candidates: Profile[];
  notes: string[];
}

export class DecisionEngine {
  private readonly store: ProfileStore;
  private readonly gateway: AnalysisGateway;
  private readonly config: VoiceMatchConfig;
  private readonly scorer: SimilarityScorer;

  constructor(deps: DecisionEngineDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.config = deps.config;
    this.scorer = deps.scorer ?? new WeightedSimilarityScorer();
  }

  async authenticate(req: AuthenticationRequest): Promise<AuthenticationResult> {
    const mode: AuthMode = req.claimedUsername !== undefined ? 'verification' : 'identification';
    const claimedUsername = req.claimedUsername ?? null;

    let probe: FeatureVector;
    try {
      probe = parseFeatureVector(req.features, {
        minDurationSec: this.config.minSampleDurationSec,
        minRmsEnergy:   this.config.minRmsEnergy,
      });
    } catch (err) {
      if (!(err instanceof InvalidFeatureVector)) throw err;
      log.warn('Rejected invalid feature vector', { mode, error: err.message });
      await this.record({
        mode,
        claimedUsername,
        candidateUserId: null,
        matchedUserId:   null,
        similarityScore: 0,
        aiConfidence:    null,
        fusedScore:      0,
        verdict:         'reject',
        aiSkipped:       true,
        commentary:      `invalid feature vector: ${err.message}`,
      });
      throw err;
    }

    const collected = await this.collect(mode, req);
    log.debug('Collected', { mode, candidates: collected.candidates.length });

    const scored = await Promise.all(
      collected.candidates.map(profile => this.scoreCandidate(profile, probe, collected.transcript)),
    );
    log.debug('Scored', { candidates: scored.length });

    const ranking = rankCandidates(scored);
    const top = ranking[0];
    log.debug('Fused', { top: top ? { userId: top.userId, fused: top.fused } : null });

    const decision = decide(top, mode, this.config);
    const commentary = [
      ...collected.notes,
      top?.commentary ?? '',
      decision.reason,
    ].filter(Boolean).join(' | ');

    const attempt = await this.record({
      mode,
      claimedUsername,
      candidateUserId: top?.userId ?? null,
      matchedUserId:   decision.verdict === 'accept' && top ? top.userId : null,
      similarityScore: top?.similarity ?? 0,
      aiConfidence:    top?.aiConfidence ?? null,
      fusedScore:      top?.fused ?? 0,
      verdict:         decision.verdict,
      aiSkipped:       top?.aiSkipped ?? false,
      commentary,
    });

    log.info('Decided', {
      mode,
      verdict: decision.verdict,
      userId: attempt.matchedUserId,
      fused: attempt.fusedScore,
      aiSkipped: attempt.aiSkipped,
    });
    return { verdict: decision.verdict, attempt, ranking, transcript: collected.transcript };
  }

  // ── Collected ───────────────────────────────────────────────────────────────

  private async collect(mode: AuthMode, req: AuthenticationRequest): Promise<Collected> {
    const notes: string[] = [];

    let transcript = '';
    if (req.audio) {
      const audio = req.audio;
      try {
        transcript = await callWithin(
          this.config.analysisTimeoutMs,
          signal => this.gateway.transcribe(audio, { signal }),
          () => new TranscriptionUnavailable(`Transcription timed out after ${this.config.analysisTimeoutMs}ms`),
        );
      } catch (err) {
        log.warn('Transcription degraded', { error: errorMessage(err) });
        notes.push(`transcription unavailable: ${errorMessage(err)}`);
      }
    }

    let candidates: Profile[];
    if (mode === 'verification') {
      const username = req.claimedUsername ?? '';
      const profile = await this.store.findByUsername(username);
      if (!profile) {
        notes.push(`no profile named '${username}'`);
        candidates = [];
      } else if (!profile.isActive) {
        notes.push(`profile '${username}' is deactivated`);
        candidates = [];
      } else if (profile.samples.length === 0) {
        notes.push(`profile '${username}' has no enrolled samples`);
        candidates = [];
      } else {
        candidates = [profile];
      }
    } else {
      candidates = (await this.store.listActiveCandidates()).filter(p => p.samples.length > 0);
    }

    return { transcript, candidates, notes };
  }

  // ── Scored / Fused ──────────────────────────────────────────────────────────

  private async scoreCandidate(profile: Profile, probe: FeatureVector, transcript: string): Promise<ScoredCandidate> {
    const comparison = compareAgainstSamples(
      this.scorer, probe, profile.samples.map(s => s.vector), this.config.aggregation,
    );
    const reference = profile.samples[comparison.bestIndex];

    let aiConfidence: number | null = null;
    let commentary: string;
    if (!reference) {
      commentary = 'AI analysis skipped: no reference sample';
    } else {
      try {
        const ai = await callWithin(
          this.config.analysisTimeoutMs,
          signal => this.gateway.compareVoices(probe, transcript, reference.vector, reference.transcript, { signal }),
          () => new AnalysisUnavailable(`AI comparison timed out after ${this.config.analysisTimeoutMs}ms`),
        );
        aiConfidence = clamp01(ai.confidence);
        commentary = ai.commentary;
      } catch (err) {
        log.warn('AI comparison degraded', { userId: profile.userId, error: errorMessage(err) });
        commentary = `AI analysis skipped: ${errorMessage(err)}`;
      }
    }

    return {
      userId:       profile.userId,
      username:     profile.username,
      createdAt:    profile.createdAt,
      similarity:   comparison.score,
      aiConfidence,
      fused:        fuseScores(comparison.score, aiConfidence, this.config),
      aiSkipped:    aiConfidence === null,
      commentary,
    };
  }

  // ── Decided ─────────────────────────────────────────────────────────────────

  private async record(attempt: NewAuthenticationAttempt): Promise<AuthenticationAttempt> {
    try {
      return await this.store.recordAttempt(attempt);
    } catch (err) {
      if (err instanceof StorageFailure) throw err;
      throw new StorageFailure(`Could not record authentication attempt: ${errorMessage(err)}`, { cause: err });
    }
  }
}
