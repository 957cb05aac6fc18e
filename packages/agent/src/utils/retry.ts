import { TimeoutError } from '../errors.js';

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter; 0.1 spreads each delay by ±10%. */
  jitterFactor: number;
}

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Retries after the first attempt. `Infinity` keeps going until aborted. */
  maxRetries?: number;
  isRetryable?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  signal?: AbortSignal;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterFactor: 0,
};

/**
 * Delay before retry number `attempt` (1-indexed): base * 2^(attempt-1),
 * jittered, clamped to the cap.
 */
export function backoffDelay(attempt: number, config: BackoffConfig = DEFAULT_BACKOFF): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter =
    config.jitterFactor > 0
      ? Math.random() * exponential * config.jitterFactor * 2 - exponential * config.jitterFactor
      : 0;
  return Math.min(Math.max(exponential + jitter, 0), config.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` until it resolves, sleeping with exponential backoff between
 * attempts. Rethrows the last error once retries are exhausted or the
 * error is not retryable.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config: BackoffConfig = {
    baseDelayMs: options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_BACKOFF.jitterFactor,
  };
  const maxRetries = options.maxRetries ?? 3;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const retryable = options.isRetryable ? options.isRetryable(error) : true;

      if (!retryable || attempt > maxRetries || options.signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, config);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}

/**
 * Settle with `promise`, or reject with a TimeoutError after `timeoutMs`.
 * The underlying operation is abandoned, not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Aborted');
}
