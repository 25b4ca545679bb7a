import { afterEach, describe, expect, it, vi } from 'vitest';

describe('check-env', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('passes with only an Anthropic key and notes degraded transcription', async () => {
    vi.stubEnv('ANALYSIS_PROVIDER', 'ai');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('STORE_BACKEND', 'sqlite');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('process.exit called');
    });

    await expect(import('../scripts/check-env.js')).resolves.toBeDefined();

    const lines = out.mock.calls.map(args => String(args[0]));
    expect(lines.some(l => l.includes('OPENAI_API_KEY') && l.includes('transcription degrades'))).toBe(true);
    expect(lines.some(l => l.includes('All required checks passed.'))).toBe(true);
    expect(err).not.toHaveBeenCalled();
  });
});
