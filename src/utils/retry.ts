import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  /** Aborting stops further attempts; the last error is rethrown. */
  signal?: AbortSignal;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
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

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2, signal,
    isRetryable = (e) => !(e instanceof NonRetryableError), onRetry } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt === maxAttempts || signal?.aborted) throw err;
      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${attempt}/${maxAttempts} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await sleep(delay, signal);
      if (signal?.aborted) throw err;
    }
  }
  throw lastErr;
}

/**
 * Rejects with `onTimeout()` if `promise` has not settled within `ms`.
 * The timer is cleared either way so nothing keeps the process alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      value => { clearTimeout(timer); resolve(value); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}
