/**
 * External Analysis Gateway: the only way the core talks to speech-to-text
 * and language-model services. Any object with these three methods can be
 * plugged into the decision engine and enrollment service.
 */
import { AnalysisUnavailable, TranscriptionUnavailable } from '../errors.js';
import { withTimeout } from '../utils/retry.js';
import type { FeatureVector } from '../voice/features.js';

export interface VoiceComparison {
  /** Same-speaker probability in [0, 1]. */
  confidence: number;
  commentary: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface AnalysisGateway {
  /** Throws TranscriptionUnavailable on any service failure. */
  transcribe(audio: Buffer, opts?: CallOptions): Promise<string>;
  /** Throws AnalysisUnavailable on any service failure or unusable response. */
  compareVoices(
    vectorA: FeatureVector,
    commentaryA: string,
    vectorB: FeatureVector,
    commentaryB: string,
    opts?: CallOptions,
  ): Promise<VoiceComparison>;
  /** Short description of a sample's voice, stored alongside enrollment samples. */
  analyzeCharacteristics(vector: FeatureVector, transcript: string, opts?: CallOptions): Promise<string>;
}

/**
 * Run one gateway call under a hard time budget. On expiry the call's signal
 * is aborted and the promise rejects with `onTimeout()`, whatever the
 * gateway implementation does with the signal.
 */
export function callWithin<T>(
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  return withTimeout(call(controller.signal), timeoutMs, () => {
    controller.abort();
    return onTimeout();
  });
}

// ── Offline gateway ───────────────────────────────────────────────────────────

/** Used when ANALYSIS_PROVIDER=none: every call degrades immediately. */
export class OfflineAnalysisGateway implements AnalysisGateway {
  async transcribe(): Promise<string> {
    throw new TranscriptionUnavailable('Transcription disabled (ANALYSIS_PROVIDER=none)');
  }

  async compareVoices(): Promise<VoiceComparison> {
    throw new AnalysisUnavailable('AI analysis disabled (ANALYSIS_PROVIDER=none)');
  }

  async analyzeCharacteristics(): Promise<string> {
    throw new AnalysisUnavailable('AI analysis disabled (ANALYSIS_PROVIDER=none)');
  }
}

// ── Deterministic stub ────────────────────────────────────────────────────────

export interface StubGatewayOptions {
  /** Fixed confidence, or a function of the compared pair. */
  confidence?: number | ((a: FeatureVector, b: FeatureVector) => number);
  transcript?: string;
  analysis?: string;
  /** When set, the corresponding call throws its *Unavailable error. */
  failTranscription?: boolean;
  failAnalysis?: boolean;
  /** Delay before answering, to exercise timeouts. */
  delayMs?: number;
}

/** Scriptable gateway for tests and demos. Records every call it receives. */
export class StubAnalysisGateway implements AnalysisGateway {
  readonly calls = { transcribe: 0, compareVoices: 0, analyzeCharacteristics: 0 };

  constructor(private readonly opts: StubGatewayOptions = {}) {}

  /** Waits delayMs, cut short if the caller aborts. */
  private pause(signal?: AbortSignal): Promise<void> {
    const ms = this.opts.delayMs;
    if (!ms) return Promise.resolve();
    return new Promise(resolve => {
      const timer = setTimeout(done, ms);
      function done(): void {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      }
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  async transcribe(_audio: Buffer, opts: CallOptions = {}): Promise<string> {
    this.calls.transcribe++;
    await this.pause(opts.signal);
    if (this.opts.failTranscription) throw new TranscriptionUnavailable('stub transcription unavailable');
    return this.opts.transcript ?? 'stub transcript';
  }

  async compareVoices(
    a: FeatureVector, _ca: string,
    b: FeatureVector, _cb: string,
    opts: CallOptions = {},
  ): Promise<VoiceComparison> {
    this.calls.compareVoices++;
    await this.pause(opts.signal);
    if (this.opts.failAnalysis) throw new AnalysisUnavailable('stub analysis unavailable');
    const c = this.opts.confidence;
    const confidence = typeof c === 'function' ? c(a, b) : c ?? 0.5;
    return { confidence, commentary: `stub comparison (${confidence.toFixed(2)})` };
  }

  async analyzeCharacteristics(_v: FeatureVector, _t: string, opts: CallOptions = {}): Promise<string> {
    this.calls.analyzeCharacteristics++;
    await this.pause(opts.signal);
    if (this.opts.failAnalysis) throw new AnalysisUnavailable('stub analysis unavailable');
    return this.opts.analysis ?? 'stub voice analysis';
  }
}
