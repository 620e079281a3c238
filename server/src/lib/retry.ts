import { CancelledError } from './errors.js';

// Cap server-requested waits so a hostile Retry-After cannot stall a run.
const MAX_RETRY_AFTER_MS = 60_000;

export interface RetryOptions<T> {
  maxAttempts?: number;
  baseDelay?: number;
  /** Whether a settled result should be attempted again */
  shouldRetry: (result: T) => boolean;
  /** Server-requested delay carried by a result, 0 when none */
  retryAfterMs?: (result: T) => number;
  onRetry?: (attempt: number, result: T) => void;
  signal?: AbortSignal;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new CancelledError();
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Re-run `fn` while its result is retryable, up to `maxAttempts` attempts.
 *
 * Unlike exception-driven retry, `fn` reports failures as values, so the
 * final result is returned whether or not it succeeded. Rejections from
 * `fn` propagate immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelay = options.baseDelay ?? 1000;

  let attempt = 1;
  for (;;) {
    if (options.signal?.aborted) throw abortReason(options.signal);

    const result = await fn(attempt);
    if (attempt >= maxAttempts || !options.shouldRetry(result)) {
      return { result, attempts: attempt };
    }

    options.onRetry?.(attempt, result);

    // Prefer the provider's Retry-After; fall back to jittered exponential backoff
    const retryAfterMs = options.retryAfterMs?.(result) ?? 0;
    const delay = retryAfterMs > 0
      ? Math.min(retryAfterMs, MAX_RETRY_AFTER_MS)
      : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
    await sleep(delay, options.signal);
    attempt += 1;
  }
}
