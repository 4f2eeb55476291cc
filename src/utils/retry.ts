/**
 * Exponential backoff for upstream calls.
 * With maxAttempts = 1 (the default) the function runs exactly once.
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 1,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Only errors this accepts are retried; others are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  /** Stops further attempts and cuts the backoff wait short */
  signal?: AbortSignal;
}

/**
 * Executes a function with exponential backoff retry logic.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, onLog, signal } = options;
  const maxAttempts = Math.max(1, config.maxAttempts);
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn(attempt);
      onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      const willRetry = attempt < maxAttempts && !signal?.aborted && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!willRetry) {
        throw error;
      }

      await sleep(delay, signal);
      if (signal?.aborted) {
        throw error;
      }

      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }
}

/**
 * Sleep that ends early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
