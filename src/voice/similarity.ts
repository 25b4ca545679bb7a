/**
 * Signal-based similarity between feature vectors.
 *
 * score(a, b) is bounded to [0, 1], symmetric and reflexive. Each component
 * (MFCC, spectral, prosodic) is clamped before weighting so a single noisy
 * dimension cannot push the total out of range.
 */
import { SIMILARITY_COMPONENT_WEIGHTS, type AggregationPolicy } from '../config.js';
import {
  assertScorable,
  PROSODIC_KEYS,
  SPECTRAL_KEYS,
  type FeatureVector,
} from './features.js';

export interface SimilarityScorer {
  score(a: FeatureVector, b: FeatureVector): number;
}

export interface ComponentWeights {
  mfcc: number;
  spectral: number;
  prosodic: number;
}

export interface ComponentScores {
  mfcc: number;
  spectral: number;
  prosodic: number;
}

const EPSILON = 1e-6;

export function clamp01(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.min(1, Math.max(0, x));
}

/** Cosine similarity with negatives floored at 0. Two silent vectors match. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 && normB === 0) return 1;
  if (normA === 0 || normB === 0) return 0;
  return clamp01(dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

/** 1 − |x − y| / max(|x|, |y|, ε), clamped. */
export function relativeAgreement(x: number, y: number): number {
  const scale = Math.max(Math.abs(x), Math.abs(y), EPSILON);
  return clamp01(1 - Math.abs(x - y) / scale);
}

function meanAgreement(pairs: ReadonlyArray<readonly [number, number]>): number {
  if (pairs.length === 0) return 1;
  const total = pairs.reduce((sum, [x, y]) => sum + relativeAgreement(x, y), 0);
  return clamp01(total / pairs.length);
}

export class WeightedSimilarityScorer implements SimilarityScorer {
  private readonly weights: ComponentWeights;

  constructor(weights: ComponentWeights = SIMILARITY_COMPONENT_WEIGHTS) {
    const sum = weights.mfcc + weights.spectral + weights.prosodic;
    if ([weights.mfcc, weights.spectral, weights.prosodic].some(w => w < 0) || Math.abs(sum - 1) > 1e-6) {
      throw new Error(`Similarity component weights must be non-negative and sum to 1 (got ${sum})`);
    }
    this.weights = { ...weights };
  }

  components(a: FeatureVector, b: FeatureVector): ComponentScores {
    assertScorable(a);
    assertScorable(b);
    return {
      mfcc:     cosineSimilarity(a.mfcc, b.mfcc),
      spectral: meanAgreement(SPECTRAL_KEYS.map(k => [a.spectral[k], b.spectral[k]] as const)),
      prosodic: meanAgreement(PROSODIC_KEYS.map(k => [a.prosodic[k], b.prosodic[k]] as const)),
    };
  }

  score(a: FeatureVector, b: FeatureVector): number {
    const c = this.components(a, b);
    const w = this.weights;
    return clamp01(w.mfcc * c.mfcc + w.spectral * c.spectral + w.prosodic * c.prosodic);
  }
}

// ── Multi-sample aggregation ──────────────────────────────────────────────────
// Every call site that reduces a profile's per-sample scores goes through
// aggregateScores() with the configured policy.

/**
 * Reduce per-sample scores (in enrollment order) to one candidate score.
 * - max:     best single sample
 * - mean:    arithmetic mean
 * - recency: linear weights 1..n, newest sample heaviest
 */
export function aggregateScores(scores: readonly number[], policy: AggregationPolicy): number {
  if (scores.length === 0) return 0;
  switch (policy) {
    case 'max':
      return clamp01(Math.max(...scores));
    case 'mean':
      return clamp01(scores.reduce((sum, s) => sum + s, 0) / scores.length);
    case 'recency': {
      let weighted = 0;
      let totalWeight = 0;
      scores.forEach((s, i) => {
        weighted += s * (i + 1);
        totalWeight += i + 1;
      });
      return clamp01(weighted / totalWeight);
    }
  }
}

export interface SampleComparison {
  /** Aggregated score under the requested policy. */
  score: number;
  perSample: number[];
  /** Index of the single closest stored sample (earliest wins ties), -1 if none. */
  bestIndex: number;
}

export function compareAgainstSamples(
  scorer: SimilarityScorer,
  probe: FeatureVector,
  samples: readonly FeatureVector[],
  policy: AggregationPolicy,
): SampleComparison {
  const perSample = samples.map(s => scorer.score(probe, s));
  let bestIndex = -1;
  perSample.forEach((s, i) => {
    if (bestIndex === -1 || s > (perSample[bestIndex] ?? -Infinity)) bestIndex = i;
  });
  return { score: aggregateScores(perSample, policy), perSample, bestIndex };
}
