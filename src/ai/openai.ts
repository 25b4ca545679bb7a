/**
 * OpenAI client: Whisper transcription, and the GPT-4o fallback used by claude.ts.
 */
import OpenAI, { toFile } from 'openai';
import { AI_MODELS, env } from '../config.js';
import { logger } from '../utils/logger.js';

let _openai: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  if (!env.OPENAI_API_KEY) throw new Error('OPENAI_API_KEY is not set');
  if (!_openai) _openai = new OpenAI({ apiKey: env.OPENAI_API_KEY, maxRetries: 0 });
  return _openai;
}

/** Speech-to-text for one WAV-encoded sample. */
export async function transcribeAudio(audio: Buffer, signal?: AbortSignal): Promise<string> {
  logger.debug('openai.transcribe', { bytes: audio.byteLength });
  const file = await toFile(audio, 'sample.wav', { type: 'audio/wav' });
  const res = await getOpenAI().audio.transcriptions.create(
    { model: AI_MODELS.transcription, file },
    { signal },
  );
  return res.text.trim();
}
