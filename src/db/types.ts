/**
 * Profile store contract and the records it persists.
 *
 * Two backends implement ProfileStore: SQLite (local, default) and Supabase.
 * Both keep authentication_logs append-only and never delete users.
 */
import type { FeatureVector } from '../voice/features.js';

export type Verdict = 'accept' | 'reject' | 'unknown';
export type AuthMode = 'verification' | 'identification';

export interface EnrolledSample {
  sampleId: string;
  userId: string;
  /** 0-based, contiguous, insertion order. */
  sampleIndex: number;
  vector: FeatureVector;
  transcript: string;
  /** AI description captured at enrollment; null when analysis was skipped. */
  analysis: string | null;
  qualityScore: number;
  createdAt: string;
}

export interface Profile {
  userId: string;
  username: string;
  fullName: string;
  email: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
  /** Ordered by sampleIndex. */
  samples: EnrolledSample[];
}

export interface NewProfile {
  username: string;
  fullName?: string;
  email?: string;
}

export interface NewSample {
  vector: FeatureVector;
  transcript?: string;
  analysis?: string | null;
  qualityScore: number;
}

export interface AuthenticationAttempt {
  attemptId: number;
  timestamp: string;
  mode: AuthMode;
  claimedUsername: string | null;
  /** Hinted or top-ranked profile that was evaluated. */
  candidateUserId: string | null;
  /** Set only when the verdict is accept. */
  matchedUserId: string | null;
  similarityScore: number;
  /** Null when AI analysis was skipped. */
  aiConfidence: number | null;
  fusedScore: number;
  verdict: Verdict;
  aiSkipped: boolean;
  commentary: string;
}

export type NewAuthenticationAttempt = Omit<AuthenticationAttempt, 'attemptId' | 'timestamp'>;

export interface EnrollmentSession {
  sessionId: string;
  userId: string;
  requiredSamples: number;
  /** Sample count of the profile when the session started. */
  baselineCount: number;
  startedAt: string;
}

export interface AttemptStats {
  total: number;
  accepted: number;
  rejected: number;
  unknown: number;
}

export interface ProfileStore {
  createProfile(input: NewProfile): Promise<Profile>;
  getProfile(userId: string): Promise<Profile | null>;
  findByUsername(username: string): Promise<Profile | null>;
  /** Atomic; serialized per profile. Throws ProfileNotFound / ProfileInactive. */
  appendVector(userId: string, sample: NewSample): Promise<EnrolledSample>;
  /** Idempotent soft delete. Throws ProfileNotFound. */
  deactivate(userId: string): Promise<void>;
  /** Active profiles with at least one sample, oldest first. */
  listActiveCandidates(): Promise<Profile[]>;
  listProfiles(opts?: { activeOnly?: boolean }): Promise<Profile[]>;
  /** Append-only. Storage errors surface as StorageFailure. */
  recordAttempt(attempt: NewAuthenticationAttempt): Promise<AuthenticationAttempt>;
  /** Lazily paged, most recent first. */
  attemptsForProfile(userId: string): AsyncIterable<AuthenticationAttempt>;
  attemptStats(): Promise<AttemptStats>;

  createEnrollmentSession(userId: string, requiredSamples: number): Promise<EnrollmentSession>;
  getEnrollmentSession(sessionId: string): Promise<EnrollmentSession | null>;
  deleteEnrollmentSession(sessionId: string): Promise<void>;

  close(): Promise<void>;
}

/** Enrollment completion is derived from the sample count, never stored. */
export function isEnrollmentComplete(profile: Pick<Profile, 'samples'>, minSampleCount: number): boolean {
  return profile.samples.length >= minSampleCount;
}

export const ATTEMPT_PAGE_SIZE = 50;
