/**
 * Score fusion, candidate ranking and the accept/reject/unknown rule.
 * Pure functions; the decision engine feeds them and persists the result.
 */
import type { VoiceMatchConfig } from '../config.js';
import type { AuthMode, Verdict } from '../db/types.js';
import { clamp01 } from '../voice/similarity.js';

export interface ScoredCandidate {
  userId: string;
  username: string;
  /** Profile creation time, ISO 8601. Used as a ranking tie-break. */
  createdAt: string;
  similarity: number;
  /** Null when AI analysis was skipped for this candidate. */
  aiConfidence: number | null;
  fused: number;
  aiSkipped: boolean;
  commentary: string;
}

/**
 * fused = w1·similarity + w2·ai. Without an AI score the similarity stands
 * alone (w1 = 1, w2 = 0).
 */
export function fuseScores(
  similarity: number,
  aiConfidence: number | null,
  weights: Pick<VoiceMatchConfig, 'similarityWeight' | 'aiWeight'>,
): number {
  if (aiConfidence === null) return clamp01(similarity);
  return clamp01(weights.similarityWeight * similarity + weights.aiWeight * clamp01(aiConfidence));
}

function compareNumbersDesc(a: number, b: number): number {
  return a === b ? 0 : a > b ? -1 : 1;
}

function compareStringsAsc(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

/** Total order: fused desc, similarity desc, oldest profile, userId. */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  return compareNumbersDesc(a.fused, b.fused)
    || compareNumbersDesc(a.similarity, b.similarity)
    || compareStringsAsc(a.createdAt, b.createdAt)
    || compareStringsAsc(a.userId, b.userId);
}

export function rankCandidates(candidates: readonly ScoredCandidate[]): ScoredCandidate[] {
  return [...candidates].sort(compareCandidates);
}

export interface Decision {
  verdict: Verdict;
  reason: string;
}

export function decide(
  top: ScoredCandidate | undefined,
  mode: AuthMode,
  config: Pick<VoiceMatchConfig, 'similarityThreshold' | 'minConfidenceScore'>,
): Decision {
  if (!top) return { verdict: 'unknown', reason: 'no candidate profiles' };

  const misses: string[] = [];
  if (top.fused < config.minConfidenceScore) {
    misses.push(`fused ${top.fused.toFixed(3)} below ${config.minConfidenceScore}`);
  }
  if (top.similarity < config.similarityThreshold) {
    misses.push(`similarity ${top.similarity.toFixed(3)} below ${config.similarityThreshold}`);
  }
  if (misses.length === 0) return { verdict: 'accept', reason: `matched ${top.username}` };
  return {
    verdict: mode === 'verification' ? 'reject' : 'unknown',
    reason: misses.join(', '),
  };
}
