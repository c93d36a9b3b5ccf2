/**
 * Retry helpers with exponential backoff, shared by the engine's node retry
 * and the tool dispatcher's per-call retry.
 */

export interface RetryOptions {
  /** Extra attempts after the first one. */
  readonly retries: number;
  /** Delay before the first retry; doubles on every further retry. */
  readonly initialDelayMs: number;
  readonly maxDelayMs?: number;
  readonly shouldRetry: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  readonly signal?: AbortSignal;
}

export function backoffDelay(retryIndex: number, initialDelayMs: number, maxDelayMs = 30_000): number {
  return Math.min(initialDelayMs * 2 ** retryIndex, maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it succeeds, throws an error `shouldRetry` rejects, or the
 * retry budget is spent. `fn` receives the 1-based attempt number.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { retries, initialDelayMs, maxDelayMs, shouldRetry, onRetry, signal } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt > retries || !shouldRetry(error) || signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt - 1, initialDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** Races `promise` against a timer; the timer is always cleared. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
