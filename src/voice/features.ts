/**
 * Feature vector: the immutable numeric summary of one voice sample.
 *
 * Vectors are produced by an external extractor (MFCC / spectral / pitch
 * tracking) and arrive here as JSON. Everything that enters scoring or the
 * profile store goes through parseFeatureVector() first.
 */
import { z } from 'zod';
import { InvalidFeatureVector } from '../errors.js';

export const MFCC_COEFFICIENTS = 13;

export const SPECTRAL_KEYS = ['centroid', 'rolloff', 'bandwidth', 'zeroCrossingRate'] as const;
export const PROSODIC_KEYS = ['pitchMean', 'pitchStd', 'pitchRange', 'energy', 'speakingRate'] as const;

export type SpectralKey = typeof SPECTRAL_KEYS[number];
export type ProsodicKey = typeof PROSODIC_KEYS[number];

export type SpectralDescriptors = Readonly<Record<SpectralKey, number>>;
export type ProsodicDescriptors = Readonly<Record<ProsodicKey, number>>;

export interface AudioQuality {
  readonly durationSec: number;
  readonly rmsEnergy: number;
}

export interface FeatureVector {
  /** Per-coefficient MFCC means, exactly MFCC_COEFFICIENTS long. */
  readonly mfcc: readonly number[];
  readonly spectral: SpectralDescriptors;
  readonly prosodic: ProsodicDescriptors;
  readonly quality: AudioQuality;
}

// ── Schema ────────────────────────────────────────────────────────────────────

const finite = z.number().finite();

export const FeatureVectorSchema = z.object({
  mfcc:     z.array(finite).length(MFCC_COEFFICIENTS),
  spectral: z.object({
    centroid:         finite,
    rolloff:          finite,
    bandwidth:        finite,
    zeroCrossingRate: finite,
  }).strict(),
  prosodic: z.object({
    pitchMean:    finite,
    pitchStd:     finite,
    pitchRange:   finite,
    energy:       finite,
    speakingRate: finite,
  }).strict(),
  quality:  z.object({
    durationSec: finite.nonnegative(),
    rmsEnergy:   finite.nonnegative(),
  }).strict(),
}).strict();

// ── Parsing ───────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Samples shorter than this are rejected outright. */
  minDurationSec: number;
  /** Samples whose RMS energy is below this are silence. Defaults to 0. */
  minRmsEnergy?: number;
}

/**
 * Validate untrusted input into a frozen FeatureVector.
 * Throws InvalidFeatureVector listing every offending path.
 */
export function parseFeatureVector(input: unknown, opts: ParseOptions): FeatureVector {
  const result = FeatureVectorSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidFeatureVector('Malformed feature vector', issues);
  }
  const v = result.data;
  if (v.quality.durationSec < opts.minDurationSec) {
    throw new InvalidFeatureVector(
      `Sample too short: ${v.quality.durationSec.toFixed(2)}s < ${opts.minDurationSec}s minimum`,
    );
  }
  const minRms = opts.minRmsEnergy ?? 0;
  if (v.quality.rmsEnergy < minRms) {
    throw new InvalidFeatureVector(
      `Sample is silent: RMS energy ${v.quality.rmsEnergy.toFixed(4)} < ${minRms} minimum`,
    );
  }
  return freezeVector(v);
}

function freezeVector(v: z.infer<typeof FeatureVectorSchema>): FeatureVector {
  return Object.freeze({
    mfcc:     Object.freeze([...v.mfcc]),
    spectral: Object.freeze({ ...v.spectral }),
    prosodic: Object.freeze({ ...v.prosodic }),
    quality:  Object.freeze({ ...v.quality }),
  });
}

/**
 * Cheap structural check for vectors that did not come through
 * parseFeatureVector (e.g. rows read back from storage or built in code).
 */
export function assertScorable(v: FeatureVector): void {
  if (v.mfcc.length !== MFCC_COEFFICIENTS) {
    throw new InvalidFeatureVector(
      `MFCC arity mismatch: expected ${MFCC_COEFFICIENTS}, got ${v.mfcc.length}`,
    );
  }
  const values = [
    ...v.mfcc,
    ...SPECTRAL_KEYS.map(k => v.spectral[k]),
    ...PROSODIC_KEYS.map(k => v.prosodic[k]),
  ];
  if (!values.every(Number.isFinite)) {
    throw new InvalidFeatureVector('Feature vector contains non-finite values');
  }
}

/** One-line human summary used in AI prompts and CLI output. */
export function summarizeFeatures(v: FeatureVector): string {
  const mfccHead = v.mfcc.slice(0, 8);
  const mfccMean = mfccHead.reduce((sum, x) => sum + x, 0) / mfccHead.length;
  return [
    `Duration: ${v.quality.durationSec.toFixed(2)}s`,
    `RMS energy: ${v.quality.rmsEnergy.toFixed(4)}`,
    `Prosodic: pitch_mean ${v.prosodic.pitchMean.toFixed(2)}, pitch_std ${v.prosodic.pitchStd.toFixed(2)}, ` +
      `pitch_range ${v.prosodic.pitchRange.toFixed(2)}, speaking_rate ${v.prosodic.speakingRate.toFixed(2)}`,
    `Spectral: centroid ${v.spectral.centroid.toFixed(2)}, rolloff ${v.spectral.rolloff.toFixed(2)}, ` +
      `bandwidth ${v.spectral.bandwidth.toFixed(2)}, zcr ${v.spectral.zeroCrossingRate.toFixed(4)}`,
    `MFCC (avg first 8): ${mfccMean.toFixed(4)}`,
  ].join(' | ');
}
