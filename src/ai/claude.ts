/**
 * Text completion client: Anthropic Claude primary, GPT-4o fallback.
 * All voice comparison and characteristic prompts go through here.
 * Never import Anthropic/OpenAI directly outside src/ai.
 */
import Anthropic from '@anthropic-ai/sdk';
import { AI_MODELS, env } from '../config.js';
import { logger } from '../utils/logger.js';
import { telegram } from '../monitoring/telegram.js';
import { getOpenAI } from './openai.js';

let _anthropic: Anthropic | null = null;
let fallbackActive = false;

function getAnthropic(): Anthropic | null {
  if (!env.ANTHROPIC_API_KEY) return null;
  if (!_anthropic) _anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY, maxRetries: 0 });
  return _anthropic;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

function shouldFallBack(err: unknown): boolean {
  if (err instanceof Anthropic.APIConnectionError) return true;
  if (!(err instanceof Anthropic.APIError) || err.status === undefined) return false;
  return err.status >= 500 || err.status === 429;
}

export async function runCompletion(req: CompletionRequest): Promise<string> {
  const anthropic = getAnthropic();
  if (!anthropic) return gpt4oCompletion(req);

  try {
    const res = await anthropic.messages.create({
      model: AI_MODELS.analysis,
      max_tokens: req.maxTokens ?? 800,
      temperature: req.temperature ?? 0.2,
      system: req.system,
      messages: [{ role: 'user', content: req.prompt }],
    }, { signal: req.signal });
    if (fallbackActive) {
      fallbackActive = false;
      logger.info('Claude recovered, leaving GPT-4o fallback');
    }
    return res.content.flatMap(b => (b.type === 'text' ? [b.text] : [])).join('');
  } catch (err) {
    if (shouldFallBack(err) && env.OPENAI_API_KEY && !req.signal?.aborted) {
      logger.warn('Claude unavailable, falling back to GPT-4o', { err });
      if (!fallbackActive) {
        fallbackActive = true;
        await telegram.alert('Claude unavailable; voice comparison running on GPT-4o fallback.');
      }
      return gpt4oCompletion(req);
    }
    throw err;
  }
}

async function gpt4oCompletion(req: CompletionRequest): Promise<string> {
  const res = await getOpenAI().chat.completions.create({
    model: AI_MODELS.fallback,
    max_tokens: req.maxTokens ?? 800,
    temperature: req.temperature ?? 0.2,
    messages: [
      { role: 'system', content: req.system },
      { role: 'user', content: req.prompt },
    ],
  }, { signal: req.signal });
  return res.choices[0]?.message?.content ?? '';
}
