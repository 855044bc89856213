import { isNetworkError, SourceError } from "./errors.js";

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  /** Cancels a pending backoff; the retry loop then fails with "Sync aborted". */
  signal?: AbortSignal;
  /** Called before each backoff with the upcoming attempt number (1-based). */
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

export function isRetryableError(err: unknown): boolean {
  if (err instanceof SourceError) return err.retryable;
  return isNetworkError(err);
}

/** Exponential backoff capped at `maxDelayMs`, plus up to 10% jitter. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return Math.round(delay + delay * 0.1 * Math.random());
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SourceError("Sync aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SourceError("Sync aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const retryOn = opts.retryOn ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !retryOn(err)) throw err;
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      opts.onRetry?.(attempt + 1, delay, err);
      await abortableSleep(delay, opts.signal);
    }
  }
}

