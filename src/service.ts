/**
 * voiceguard: library entry point.
 *
 * createVoiceIdService() wires a profile store, an analysis gateway, the
 * decision engine and the enrollment service from one VoiceMatchConfig.
 */
import { env, resolveVoiceMatchConfig, type VoiceMatchConfig } from './config.js';
import { AiAnalysisGateway } from './ai/analysis.js';
import { OfflineAnalysisGateway, type AnalysisGateway } from './ai/gateway.js';
import { createProfileStore } from './db/index.js';
import {
  isEnrollmentComplete,
  type AttemptStats,
  type AuthenticationAttempt,
  type Profile,
  type ProfileStore,
} from './db/types.js';
import { DecisionEngine, type AuthenticationRequest, type AuthenticationResult } from './engine/decision.js';
import { EnrollmentService } from './enrollment/service.js';
import { ProfileNotFound } from './errors.js';
import { logger } from './utils/logger.js';
import type { SimilarityScorer } from './voice/similarity.js';

export * from './errors.js';
export type * from './db/types.js';
export { resolveVoiceMatchConfig, DEFAULT_VOICE_MATCH, type VoiceMatchConfig } from './config.js';
export { StubAnalysisGateway, OfflineAnalysisGateway, type AnalysisGateway } from './ai/gateway.js';
export { DecisionEngine, type AuthenticationRequest, type AuthenticationResult } from './engine/decision.js';
export { EnrollmentService } from './enrollment/service.js';
export { parseFeatureVector, type FeatureVector } from './voice/features.js';
export { WeightedSimilarityScorer, aggregateScores } from './voice/similarity.js';

const log = logger.child('service');

const RECENT_ATTEMPTS = 5;

export interface UserInfo {
  profile: Profile;
  sampleCount: number;
  enrollmentComplete: boolean;
  totalAttempts: number;
  acceptedAttempts: number;
  lastAttemptAt: string | null;
  /** Most recent first. */
  recentAttempts: AuthenticationAttempt[];
}

export interface SystemStats extends AttemptStats {
  totalUsers: number;
  activeUsers: number;
  enrolledUsers: number;
  /** accepted / total, 0 when there are no attempts. */
  successRate: number;
}

export interface VoiceIdServiceOptions {
  store?: ProfileStore;
  gateway?: AnalysisGateway;
  config?: Partial<VoiceMatchConfig>;
  scorer?: SimilarityScorer;
}

/** Pick the gateway ANALYSIS_PROVIDER asks for; without any API key, run offline. */
export function analysisGatewayFromEnv(): AnalysisGateway {
  if (env.ANALYSIS_PROVIDER === 'none') return new OfflineAnalysisGateway();
  if (!env.OPENAI_API_KEY && !env.ANTHROPIC_API_KEY) {
    log.warn('No AI API keys configured; authenticating on signal similarity only');
    return new OfflineAnalysisGateway();
  }
  return new AiAnalysisGateway();
}

export class VoiceIdService {
  readonly engine: DecisionEngine;
  readonly enrollment: EnrollmentService;

  constructor(
    readonly store: ProfileStore,
    readonly gateway: AnalysisGateway,
    readonly config: VoiceMatchConfig,
    scorer?: SimilarityScorer,
  ) {
    this.engine = new DecisionEngine({ store, gateway, config, scorer });
    this.enrollment = new EnrollmentService({ store, gateway, config, scorer });
  }

  authenticate(req: AuthenticationRequest): Promise<AuthenticationResult> {
    return this.engine.authenticate(req);
  }

  async requireProfile(username: string): Promise<Profile> {
    const profile = await this.store.findByUsername(username);
    if (!profile) throw new ProfileNotFound(username);
    return profile;
  }

  async deactivateUser(username: string): Promise<Profile> {
    const profile = await this.requireProfile(username);
    await this.store.deactivate(profile.userId);
    return (await this.store.getProfile(profile.userId)) ?? profile;
  }

  async history(username: string, limit = 20): Promise<AuthenticationAttempt[]> {
    const profile = await this.requireProfile(username);
    const out: AuthenticationAttempt[] = [];
    if (limit <= 0) return out;
    for await (const attempt of this.store.attemptsForProfile(profile.userId)) {
      out.push(attempt);
      if (out.length >= limit) break;
    }
    return out;
  }

  async userInfo(username: string): Promise<UserInfo> {
    const profile = await this.requireProfile(username);
    let totalAttempts = 0;
    let acceptedAttempts = 0;
    const recentAttempts: AuthenticationAttempt[] = [];
    for await (const attempt of this.store.attemptsForProfile(profile.userId)) {
      totalAttempts++;
      if (attempt.verdict === 'accept') acceptedAttempts++;
      if (recentAttempts.length < RECENT_ATTEMPTS) recentAttempts.push(attempt);
    }
    return {
      profile,
      sampleCount: profile.samples.length,
      enrollmentComplete: isEnrollmentComplete(profile, this.config.minSampleCount),
      totalAttempts,
      acceptedAttempts,
      lastAttemptAt: recentAttempts[0]?.timestamp ?? null,
      recentAttempts,
    };
  }

  async systemStats(): Promise<SystemStats> {
    const [profiles, attempts] = await Promise.all([this.store.listProfiles(), this.store.attemptStats()]);
    const active = profiles.filter(p => p.isActive);
    return {
      ...attempts,
      totalUsers: profiles.length,
      activeUsers: active.length,
      enrolledUsers: active.filter(p => isEnrollmentComplete(p, this.config.minSampleCount)).length,
      successRate: attempts.total ? attempts.accepted / attempts.total : 0,
    };
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

export function createVoiceIdService(opts: VoiceIdServiceOptions = {}): VoiceIdService {
  const config = resolveVoiceMatchConfig(opts.config);
  const store = opts.store ?? createProfileStore();
  const gateway = opts.gateway ?? analysisGatewayFromEnv();
  return new VoiceIdService(store, gateway, config, opts.scorer);
}
