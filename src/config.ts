import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

// Blank lines copied from .env.example should read as "not set".
const optionalString = z.preprocess(
  v => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().min(1).optional(),
);

const unitInterval = z.coerce.number().min(0).max(1);

export const AGGREGATION_POLICIES = ['max', 'mean', 'recency'] as const;

export type AggregationPolicy = typeof AGGREGATION_POLICIES[number];

const EnvSchema = z.object({
  // AI services
  ANALYSIS_PROVIDER:       z.enum(['ai', 'none']).default('ai'),
  OPENAI_API_KEY:          optionalString,
  ANTHROPIC_API_KEY:       optionalString,
  ANALYSIS_TIMEOUT_MS:     z.coerce.number().int().positive().default(15_000),

  // Storage
  STORE_BACKEND:           z.enum(['sqlite', 'supabase']).default('sqlite'),
  DATABASE_PATH:           z.string().min(1).default('data/voice_profiles.db'),
  SUPABASE_URL:            z.preprocess(v => (v === '' ? undefined : v), z.string().url().optional()),
  SUPABASE_SERVICE_KEY:    optionalString,

  // Decision thresholds
  SIMILARITY_THRESHOLD:    unitInterval.default(0.8),
  MIN_CONFIDENCE_SCORE:    unitInterval.default(0.7),
  MIN_SAMPLE_COUNT:        z.coerce.number().int().min(1).default(3),
  MIN_SAMPLE_DURATION_SEC: z.coerce.number().nonnegative().default(3),
  MIN_RMS_ENERGY:          z.coerce.number().nonnegative().default(0.01),
  AI_WEIGHT:               unitInterval.default(0.4),
  SIMILARITY_WEIGHT:       unitInterval.optional(),
  SCORE_AGGREGATION:       z.enum(AGGREGATION_POLICIES).default('max'),

  // Notifications
  TELEGRAM_BOT_TOKEN:      optionalString,
  TELEGRAM_CHAT_ID:        optionalString,

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
}).superRefine((e, ctx) => {
  if (e.SIMILARITY_WEIGHT !== undefined && Math.abs(e.SIMILARITY_WEIGHT + e.AI_WEIGHT - 1) > 1e-6) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SIMILARITY_WEIGHT'],
      message: 'SIMILARITY_WEIGHT + AI_WEIGHT must equal 1',
    });
  }
  if (e.STORE_BACKEND === 'supabase') {
    if (!e.SUPABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'required for supabase backend' });
    }
    if (!e.SUPABASE_SERVICE_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_SERVICE_KEY'], message: 'required for supabase backend' });
    }
  }
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Voice Match ───────────────────────────────────────────────────────────────

/**
 * Everything the decision engine, enrollment flow and profile store need.
 * Passed explicitly at construction; `VOICE_MATCH` is the env-derived instance.
 */
export interface VoiceMatchConfig {
  /** Top candidate's aggregated similarity must reach this to accept. */
  similarityThreshold: number;
  /** Top candidate's fused score must reach this to accept. */
  minConfidenceScore: number;
  /** Vector count at which a profile counts as enrolled. */
  minSampleCount: number;
  similarityWeight: number;
  aiWeight: number;
  /** Upper bound on each gateway call before it is treated as unavailable. */
  analysisTimeoutMs: number;
  minSampleDurationSec: number;
  /** Samples quieter than this RMS level are treated as silence and rejected. */
  minRmsEnergy: number;
  aggregation: AggregationPolicy;
}

const VoiceMatchConfigSchema = z.object({
  similarityThreshold:  z.number().min(0).max(1),
  minConfidenceScore:   z.number().min(0).max(1),
  minSampleCount:       z.number().int().min(1),
  similarityWeight:     z.number().min(0).max(1),
  aiWeight:             z.number().min(0).max(1),
  analysisTimeoutMs:    z.number().int().positive(),
  minSampleDurationSec: z.number().nonnegative(),
  minRmsEnergy:         z.number().nonnegative(),
  aggregation:          z.enum(AGGREGATION_POLICIES),
}).refine(c => Math.abs(c.similarityWeight + c.aiWeight - 1) < 1e-6, {
  message: 'similarityWeight + aiWeight must equal 1',
  path: ['aiWeight'],
});

export const DEFAULT_VOICE_MATCH: Readonly<VoiceMatchConfig> = Object.freeze({
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

export const VOICE_MATCH: Readonly<VoiceMatchConfig> = Object.freeze({
  similarityThreshold:  env.SIMILARITY_THRESHOLD,
  minConfidenceScore:   env.MIN_CONFIDENCE_SCORE,
  minSampleCount:       env.MIN_SAMPLE_COUNT,
  similarityWeight:     env.SIMILARITY_WEIGHT ?? 1 - env.AI_WEIGHT,
  aiWeight:             env.AI_WEIGHT,
  analysisTimeoutMs:    env.ANALYSIS_TIMEOUT_MS,
  minSampleDurationSec: env.MIN_SAMPLE_DURATION_SEC,
  minRmsEnergy:         env.MIN_RMS_ENERGY,
  aggregation:          env.SCORE_AGGREGATION,
});

/** Merge overrides onto a base config and validate the result. */
export function resolveVoiceMatchConfig(
  overrides: Partial<VoiceMatchConfig> = {},
  base: Readonly<VoiceMatchConfig> = VOICE_MATCH,
): VoiceMatchConfig {
  const result = VoiceMatchConfigSchema.safeParse({ ...base, ...overrides });
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid voice match config: ${problems}`);
  }
  return result.data;
}

// ── Similarity Weights ────────────────────────────────────────────────────────

export const SIMILARITY_COMPONENT_WEIGHTS = {
  mfcc:     0.5,   // timbre carries most of the speaker identity
  spectral: 0.25,
  prosodic: 0.25,
} as const;

// ── Sample Quality ────────────────────────────────────────────────────────────

export const SAMPLE_QUALITY = {
  base:             0.4,
  rmsAudible:       0.01,
  rmsStrong:        0.05,
  durationGood:     3,     // seconds
  durationLong:     5,
  bonus:            0.1,
} as const;

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxAttempts:  2,
  baseDelayMs:  500,
} as const;

// ── AI Models ─────────────────────────────────────────────────────────────────

export const AI_MODELS = {
  analysis:      'claude-sonnet-4-6',
  fallback:      'gpt-4o',
  transcription: 'whisper-1',
} as const;
