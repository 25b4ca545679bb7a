import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/ai/claude.js', () => ({ runCompletion: vi.fn() }));
vi.mock('../src/ai/openai.js', () => ({ transcribeAudio: vi.fn() }));

import { AiAnalysisGateway, buildComparisonPrompt, parseComparisonResponse } from '../src/ai/analysis.js';
import { runCompletion } from '../src/ai/claude.js';
import { transcribeAudio } from '../src/ai/openai.js';
import { AnalysisUnavailable, TranscriptionUnavailable } from '../src/errors.js';
import { vector } from './helpers.js';

describe('parseComparisonResponse', () => {
  it('reads a fenced JSON reply', () => {
    const reply = '```json\n{"same_speaker_probability": 0.82, "recommendation": "accept", ' +
      '"analysis_notes": "Similar pitch contour."}\n```';
    expect(parseComparisonResponse(reply)).toEqual({
      confidence: 0.82,
      commentary: 'recommendation: accept | Similar pitch contour.',
    });
  });

  it('finds the object inside surrounding prose', () => {
    const reply = 'Here you go: {"same_speaker_probability": "0.4", "differences": ["rate", "pitch"]} hope it helps';
    expect(parseComparisonResponse(reply)).toEqual({
      confidence: 0.4,
      commentary: 'differences: rate; pitch',
    });
  });

  it('clamps probabilities outside [0, 1]', () => {
    expect(parseComparisonResponse('{"same_speaker_probability": 1.3}')).toEqual({
      confidence: 1,
      commentary: 'no commentary',
    });
  });

  it('rejects replies without JSON', () => {
    expect(() => parseComparisonResponse('I cannot compare these.'))
      .toThrow('Unparseable comparison response: No JSON object in response');
  });

  it('rejects a missing probability', () => {
    expect(() => parseComparisonResponse('{"analysis_notes": "unsure"}'))
      .toThrow('Comparison response missing or invalid fields: same_speaker_probability');
    expect(() => parseComparisonResponse('{"same_speaker_probability": null}')).toThrow(AnalysisUnavailable);
  });
});

describe('buildComparisonPrompt', () => {
  it('includes both transcripts', () => {
    const prompt = buildComparisonPrompt(vector(), 'open sesame', vector(), 'hello there');
    expect(prompt).toContain('Transcript: "open sesame"');
    expect(prompt).toContain('Transcript: "hello there"');
    expect(prompt).toContain('"same_speaker_probability"');
  });
});

describe('AiAnalysisGateway', () => {
  beforeEach(() => {
    vi.mocked(runCompletion).mockReset();
    vi.mocked(transcribeAudio).mockReset();
  });

  it('parses a model comparison', async () => {
    vi.mocked(runCompletion).mockResolvedValueOnce('{"same_speaker_probability": 0.91}');
    const gateway = new AiAnalysisGateway();
    await expect(gateway.compareVoices(vector(), 'a', vector(), 'b')).resolves.toEqual({
      confidence: 0.91,
      commentary: 'no commentary',
    });
  });

  it('maps model failures to AnalysisUnavailable', async () => {
    vi.mocked(runCompletion).mockRejectedValue(new Error('overloaded'));
    const gateway = new AiAnalysisGateway();
    await expect(gateway.analyzeCharacteristics(vector(), '')).rejects.toThrow(AnalysisUnavailable);
    expect(runCompletion).toHaveBeenCalledTimes(2);
  });

  it('maps transcription failures to TranscriptionUnavailable', async () => {
    vi.mocked(transcribeAudio).mockRejectedValue(new Error('502'));
    const gateway = new AiAnalysisGateway();
    await expect(gateway.transcribe(Buffer.from('RIFF'))).rejects.toThrow(TranscriptionUnavailable);
  });

  it('trims characteristic notes', async () => {
    vi.mocked(runCompletion).mockResolvedValueOnce('  Low, steady voice.\n');
    await expect(new AiAnalysisGateway().analyzeCharacteristics(vector(), 'hi')).resolves.toBe('Low, steady voice.');
  });
});
