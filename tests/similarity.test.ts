import { describe, expect, it } from 'vitest';
import { InvalidFeatureVector } from '../src/errors.js';
import type { FeatureVector } from '../src/voice/features.js';
import {
  aggregateScores,
  clamp01,
  compareAgainstSamples,
  cosineSimilarity,
  relativeAgreement,
  WeightedSimilarityScorer,
} from '../src/voice/similarity.js';
import { TagScorer, vector } from './helpers.js';

const scorer = new WeightedSimilarityScorer();

describe('primitives', () => {
  it('clamps to the unit interval and maps NaN to 0', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(1.7)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(0.42)).toBe(0.42);
  });

  it('floors negative cosine at zero', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1, 12);
  });

  it('treats two silent vectors as identical and one as unrelated', () => {
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 2])).toBe(0);
  });

  it('measures relative agreement against the larger magnitude', () => {
    expect(relativeAgreement(100, 50)).toBe(0.5);
    expect(relativeAgreement(0, 0)).toBe(1);
    expect(relativeAgreement(5, -5)).toBe(0);
  });
});

describe('WeightedSimilarityScorer', () => {
  const a = vector();
  const b = vector({
    mfcc: [-180, 70, -12, 25, -4, 8, -2, 5, -3, 3, -1, 1, -0.2],
    prosodic: { pitchMean: 210, speakingRate: 4 },
  });
  const opposite = vector({
    mfcc: [200, -80, 10, -20, 5, -10, 3, -6, 2, -4, 1, -2, 0.5],
    spectral: { centroid: 4000, rolloff: 8000, bandwidth: 100, zeroCrossingRate: 0.4 },
    prosodic: { pitchMean: 300, pitchStd: 80, pitchRange: 10, energy: 0.5, speakingRate: 7 },
  });

  it('is reflexive', () => {
    expect(scorer.score(a, a)).toBeCloseTo(1, 10);
    expect(scorer.score(opposite, opposite)).toBeCloseTo(1, 10);
  });

  it('is symmetric', () => {
    expect(scorer.score(a, b)).toBe(scorer.score(b, a));
    expect(scorer.score(a, opposite)).toBe(scorer.score(opposite, a));
  });

  it('stays within [0, 1]', () => {
    for (const [x, y] of [[a, b], [a, opposite], [b, opposite]] as const) {
      const s = scorer.score(x, y);
      expect(s).toBeGreaterThanOrEqual(0);
      expect(s).toBeLessThanOrEqual(1);
    }
    expect(scorer.components(a, opposite).mfcc).toBe(0);
  });

  it('weights a single spectral difference by its component share', () => {
    const moved = vector({ spectral: { centroid: 1000 } });
    const c = scorer.components(a, moved);
    expect(c.spectral).toBeCloseTo((1 - 500 / 1500 + 3) / 4, 10);
    expect(c.prosodic).toBe(1);
    expect(scorer.score(a, moved)).toBeCloseTo(0.5 + 0.25 * c.spectral + 0.25, 10);
  });

  it('rejects weights that do not sum to one', () => {
    expect(() => new WeightedSimilarityScorer({ mfcc: 0.5, spectral: 0.5, prosodic: 0.5 }))
      .toThrow(/must be non-negative and sum to 1/);
  });

  it('fails on malformed vectors', () => {
    const bad: FeatureVector = { ...a, mfcc: [1, 2] };
    expect(() => scorer.score(a, bad)).toThrow(InvalidFeatureVector);
  });
});

describe('aggregateScores', () => {
  const scores = [0.2, 0.9, 0.5];

  it('takes the best sample under max', () => {
    expect(aggregateScores(scores, 'max')).toBe(0.9);
  });

  it('averages under mean', () => {
    expect(aggregateScores(scores, 'mean')).toBeCloseTo(1.6 / 3, 12);
  });

  it('weights newer samples more under recency', () => {
    expect(aggregateScores(scores, 'recency')).toBeCloseTo((0.2 + 1.8 + 1.5) / 6, 12);
  });

  it('scores an empty set as zero', () => {
    expect(aggregateScores([], 'max')).toBe(0);
    expect(aggregateScores([], 'mean')).toBe(0);
    expect(aggregateScores([], 'recency')).toBe(0);
  });
});

describe('compareAgainstSamples', () => {
  const probe = vector({ prosodic: { pitchMean: 999 } });

  it('reports the earliest best sample on ties', () => {
    const tagScorer = new TagScorer({ 100: 0.4, 110: 0.8, 120: 0.8 });
    const samples = [100, 110, 120].map(tag => vector({ prosodic: { pitchMean: tag } }));
    const result = compareAgainstSamples(tagScorer, probe, samples, 'mean');
    expect(result.bestIndex).toBe(1);
    expect(result.perSample).toEqual([0.4, 0.8, 0.8]);
    expect(result.score).toBeCloseTo(2 / 3, 12);
  });

  it('returns -1 and zero for no samples', () => {
    expect(compareAgainstSamples(scorer, probe, [], 'max')).toEqual({ score: 0, perSample: [], bestIndex: -1 });
  });
});
