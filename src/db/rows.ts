/**
 * Row schemas shared by both backends. SQLite hands back 0/1 and JSON text
 * where Postgres hands back booleans and jsonb, so the schemas accept both.
 */
import { z } from 'zod';
import { parseFeatureVector } from '../voice/features.js';
import type {
  AuthenticationAttempt,
  EnrolledSample,
  EnrollmentSession,
  Profile,
} from './types.js';

const bool = z.union([z.boolean(), z.number()]).transform(v => Boolean(v));
const jsonValue = z.preprocess(v => (typeof v === 'string' ? JSON.parse(v) : v), z.unknown());
const nullableText = z.string().nullable().optional().transform(v => v ?? null);

export const UserRowSchema = z.object({
  user_id:    z.string(),
  username:   z.string(),
  full_name:  nullableText,
  email:      nullableText,
  is_active:  bool,
  created_at: z.string(),
  updated_at: z.string(),
});

export const SampleRowSchema = z.object({
  sample_id:     z.string(),
  user_id:       z.string(),
  sample_index:  z.number().int(),
  features:      jsonValue,
  transcript:    nullableText,
  analysis:      nullableText,
  quality_score: z.number(),
  created_at:    z.string(),
});

export const AttemptRowSchema = z.object({
  log_id:            z.number().int(),
  created_at:        z.string(),
  mode:              z.enum(['verification', 'identification']),
  claimed_username:  nullableText,
  candidate_user_id: nullableText,
  matched_user_id:   nullableText,
  similarity_score:  z.number(),
  ai_confidence:     z.number().nullable(),
  fused_score:       z.number(),
  verdict:           z.enum(['accept', 'reject', 'unknown']),
  ai_skipped:        bool,
  commentary:        z.string(),
});

export const SessionRowSchema = z.object({
  session_id:       z.string(),
  user_id:          z.string(),
  required_samples: z.number().int(),
  baseline_count:   z.number().int(),
  started_at:       z.string(),
});

export function toSample(raw: unknown): EnrolledSample {
  const r = SampleRowSchema.parse(raw);
  return {
    sampleId:     r.sample_id,
    userId:       r.user_id,
    sampleIndex:  r.sample_index,
    // Stored vectors were length-checked on the way in; only re-check shape.
    vector:       parseFeatureVector(r.features, { minDurationSec: 0 }),
    transcript:   r.transcript ?? '',
    analysis:     r.analysis,
    qualityScore: r.quality_score,
    createdAt:    r.created_at,
  };
}

export function toProfile(rawUser: unknown, samples: readonly EnrolledSample[]): Profile {
  const u = UserRowSchema.parse(rawUser);
  return {
    userId:    u.user_id,
    username:  u.username,
    fullName:  u.full_name ?? '',
    email:     u.email ?? '',
    isActive:  u.is_active,
    createdAt: u.created_at,
    updatedAt: u.updated_at,
    samples:   [...samples].sort((a, b) => a.sampleIndex - b.sampleIndex),
  };
}

export function toAttempt(raw: unknown): AuthenticationAttempt {
  const r = AttemptRowSchema.parse(raw);
  return {
    attemptId:       r.log_id,
    timestamp:       r.created_at,
    mode:            r.mode,
    claimedUsername: r.claimed_username,
    candidateUserId: r.candidate_user_id,
    matchedUserId:   r.matched_user_id,
    similarityScore: r.similarity_score,
    aiConfidence:    r.ai_confidence,
    fusedScore:      r.fused_score,
    verdict:         r.verdict,
    aiSkipped:       r.ai_skipped,
    commentary:      r.commentary,
  };
}

export function toSession(raw: unknown): EnrollmentSession {
  const r = SessionRowSchema.parse(raw);
  return {
    sessionId:       r.session_id,
    userId:          r.user_id,
    requiredSamples: r.required_samples,
    baselineCount:   r.baseline_count,
    startedAt:       r.started_at,
  };
}

export function groupByUser(samples: readonly EnrolledSample[]): Map<string, EnrolledSample[]> {
  const grouped = new Map<string, EnrolledSample[]>();
  for (const sample of samples) {
    const list = grouped.get(sample.userId);
    if (list) list.push(sample);
    else grouped.set(sample.userId, [sample]);
  }
  return grouped;
}
