/**
 * Production AnalysisGateway: Whisper for transcription, Claude (GPT-4o
 * fallback) for voice comparison and characteristic notes.
 *
 * Every failure is normalised to TranscriptionUnavailable / AnalysisUnavailable
 * so the decision engine can degrade to signal-only scoring.
 */
import { z } from 'zod';
import { RETRY_POLICY } from '../config.js';
import { AnalysisUnavailable, errorMessage, TranscriptionUnavailable } from '../errors.js';
import { telegram } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { summarizeFeatures, type FeatureVector } from '../voice/features.js';
import { clamp01 } from '../voice/similarity.js';
import { runCompletion } from './claude.js';
import type { AnalysisGateway, CallOptions, VoiceComparison } from './gateway.js';
import { transcribeAudio } from './openai.js';

const log = logger.child('analysis');

const COMPARE_SYSTEM =
  'You are an expert voice comparison analyst. Provide an objective comparison based only on the voice features provided.';
const PROFILE_SYSTEM =
  'You are an expert voice analyst. Describe voice characteristics objectively from the features provided.';

// ── Response parsing ──────────────────────────────────────────────────────────

const ComparisonSchema = z.object({
  same_speaker_probability: z.preprocess(
    v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite(),
  ).transform(clamp01),
  recommendation:           z.string().optional(),
  similarities:             z.array(z.string()).optional(),
  differences:              z.array(z.string()).optional(),
  analysis_notes:           z.string().optional(),
});

function extractJsonObject(text: string): unknown {
  const clean = text.replace(/```(?:json)?/g, '').trim();
  const start = clean.indexOf('{');
  const end = clean.lastIndexOf('}');
  if (start === -1 || end <= start) throw new Error('No JSON object in response');
  return JSON.parse(clean.slice(start, end + 1));
}

/** Turn a model reply into a VoiceComparison, or throw AnalysisUnavailable. */
export function parseComparisonResponse(text: string): VoiceComparison {
  let raw: unknown;
  try {
    raw = extractJsonObject(text);
  } catch (err) {
    throw new AnalysisUnavailable(`Unparseable comparison response: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ComparisonSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new AnalysisUnavailable(`Comparison response missing or invalid fields: ${fields}`);
  }
  const r = parsed.data;
  const parts = [
    r.recommendation ? `recommendation: ${r.recommendation}` : '',
    r.analysis_notes ?? '',
    r.differences?.length ? `differences: ${r.differences.join('; ')}` : '',
  ].filter(Boolean);
  return {
    confidence: r.same_speaker_probability,
    commentary: parts.join(' | ') || 'no commentary',
  };
}

// ── Prompts ───────────────────────────────────────────────────────────────────

export function buildComparisonPrompt(
  a: FeatureVector, transcriptA: string,
  b: FeatureVector, transcriptB: string,
): string {
  return (
    `Compare these two voice samples and determine if they are from the same speaker.\n\n` +
    `VOICE SAMPLE 1:\nFeatures: ${summarizeFeatures(a)}\nTranscript: "${transcriptA}"\n\n` +
    `VOICE SAMPLE 2:\nFeatures: ${summarizeFeatures(b)}\nTranscript: "${transcriptB}"\n\n` +
    `Consider pitch, tone, speaking rate and spectral character. Transcript content is not evidence of identity.\n\n` +
    `Respond with this exact JSON format (no markdown, no explanation):\n` +
    `{\n` +
    `  "same_speaker_probability": <number 0.0-1.0>,\n` +
    `  "recommendation": "<accept|reject|uncertain>",\n` +
    `  "similarities": ["..."],\n` +
    `  "differences": ["..."],\n` +
    `  "analysis_notes": "<one or two sentences>"\n` +
    `}`
  );
}

function buildCharacteristicsPrompt(v: FeatureVector, transcript: string): string {
  return (
    `Describe the distinctive characteristics of this voice sample in at most three sentences ` +
    `(pitch, tone quality, speaking rhythm). Plain text only.\n\n` +
    `Features: ${summarizeFeatures(v)}\nTranscript: "${transcript}"`
  );
}

// ── Gateway ───────────────────────────────────────────────────────────────────

export class AiAnalysisGateway implements AnalysisGateway {
  private analysisDown = false;

  async transcribe(audio: Buffer, opts: CallOptions = {}): Promise<string> {
    try {
      return await withRetry(() => transcribeAudio(audio, opts.signal), {
        maxAttempts: RETRY_POLICY.maxAttempts,
        baseDelayMs: RETRY_POLICY.baseDelayMs,
        signal: opts.signal,
      });
    } catch (err) {
      log.warn('Transcription failed', { err });
      throw new TranscriptionUnavailable(`Transcription failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async compareVoices(
    a: FeatureVector, commentaryA: string,
    b: FeatureVector, commentaryB: string,
    opts: CallOptions = {},
  ): Promise<VoiceComparison> {
    const text = await this.complete({
      system: COMPARE_SYSTEM,
      prompt: buildComparisonPrompt(a, commentaryA, b, commentaryB),
      maxTokens: 600,
      temperature: 0.2,
      signal: opts.signal,
    });
    const comparison = parseComparisonResponse(text);
    log.debug('Voice comparison complete', { confidence: comparison.confidence });
    return comparison;
  }

  async analyzeCharacteristics(v: FeatureVector, transcript: string, opts: CallOptions = {}): Promise<string> {
    const text = await this.complete({
      system: PROFILE_SYSTEM,
      prompt: buildCharacteristicsPrompt(v, transcript),
      maxTokens: 300,
      temperature: 0.3,
      signal: opts.signal,
    });
    return text.trim();
  }

  private async complete(req: Parameters<typeof runCompletion>[0]): Promise<string> {
    try {
      const text = await withRetry(() => runCompletion(req), {
        maxAttempts: RETRY_POLICY.maxAttempts,
        baseDelayMs: RETRY_POLICY.baseDelayMs,
        signal: req.signal,
      });
      if (this.analysisDown) {
        this.analysisDown = false;
        log.info('AI analysis service recovered');
      }
      return text;
    } catch (err) {
      log.warn('AI analysis call failed', { err });
      if (!this.analysisDown) {
        this.analysisDown = true;
        await telegram.alert(`AI voice analysis unavailable; authenticating on signal similarity only. ${errorMessage(err)}`);
      }
      throw new AnalysisUnavailable(`AI analysis failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
