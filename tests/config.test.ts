import { describe, expect, it } from 'vitest';
import { DEFAULT_VOICE_MATCH, resolveVoiceMatchConfig } from '../src/config.js';

describe('resolveVoiceMatchConfig', () => {
  it('returns the documented defaults', () => {
    expect(resolveVoiceMatchConfig({}, DEFAULT_VOICE_MATCH)).toEqual({
      similarityThreshold:  0.8,
      minConfidenceScore:   0.7,
      minSampleCount:       3,
      similarityWeight:     0.6,
      aiWeight:             0.4,
      analysisTimeoutMs:    15_000,
      minSampleDurationSec: 3,
      minRmsEnergy:         0.01,
      aggregation:          'max',
    });
  });

  it('applies overrides', () => {
    const c = resolveVoiceMatchConfig({ similarityWeight: 0.5, aiWeight: 0.5, aggregation: 'recency' }, DEFAULT_VOICE_MATCH);
    expect(c.similarityWeight).toBe(0.5);
    expect(c.aggregation).toBe('recency');
  });

  it('rejects fusion weights that do not sum to one', () => {
    expect(() => resolveVoiceMatchConfig({ aiWeight: 0.5 }, DEFAULT_VOICE_MATCH))
      .toThrow('Invalid voice match config: aiWeight: similarityWeight + aiWeight must equal 1');
  });

  it('rejects out-of-range thresholds', () => {
    expect(() => resolveVoiceMatchConfig({ similarityThreshold: 1.5 }, DEFAULT_VOICE_MATCH))
      .toThrow(/similarityThreshold/);
    expect(() => resolveVoiceMatchConfig({ minSampleCount: 0 }, DEFAULT_VOICE_MATCH))
      .toThrow(/minSampleCount/);
  });
});
