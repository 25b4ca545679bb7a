import { SAMPLE_QUALITY } from '../config.js';
import type { FeatureVector } from './features.js';
import type { SimilarityScorer } from './similarity.js';

/**
 * Recording quality of a single enrollment sample in [0, 1].
 * Rewards audible level, adequate length, detected pitch and non-silent MFCCs.
 */
export function sampleQualityScore(v: FeatureVector): number {
  const q = SAMPLE_QUALITY;
  let score = q.base;
  if (v.quality.rmsEnergy > q.rmsAudible) score += q.bonus;
  if (v.quality.rmsEnergy > q.rmsStrong) score += q.bonus;
  if (v.quality.durationSec >= q.durationGood) score += q.bonus;
  if (v.quality.durationSec >= q.durationLong) score += q.bonus;
  if (v.prosodic.pitchMean > 0) score += q.bonus;
  if (v.mfcc.some(c => c !== 0)) score += q.bonus;
  return Math.min(1, Number(score.toFixed(4)));
}

/**
 * Mean pairwise similarity across a profile's samples. A low value means the
 * enrollment recordings disagree with each other and matching will be weak.
 * Null with fewer than two samples.
 */
export function enrollmentConsistency(
  samples: readonly FeatureVector[],
  scorer: SimilarityScorer,
): number | null {
  if (samples.length < 2) return null;
  let total = 0;
  let pairs = 0;
  for (let i = 0; i < samples.length; i++) {
    for (let j = i + 1; j < samples.length; j++) {
      const a = samples[i];
      const b = samples[j];
      if (!a || !b) continue;
      total += scorer.score(a, b);
      pairs++;
    }
  }
  return pairs ? total / pairs : null;
}
