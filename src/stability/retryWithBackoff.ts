import { logger } from '@/services/logger';

export interface RetryOptions {
  /** Total attempts including the first call. */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Return false to stop retrying on this error. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait with the 1-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Stops further attempts once aborted; the current attempt finishes. */
  signal?: AbortSignal;
  label?: string;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryExhaustedError';
  }
}

export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'jitter' | 'exponentialBase'> = {},
  random: () => number = Math.random,
): number {
  const { initialDelay = 100, maxDelay = 5000, jitter = true, exponentialBase = 2 } = options;
  const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt - 1);
  // random 0-25% of the delay
  const jitterAmount = jitter ? random() * 0.25 * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitterAmount, maxDelay);
}

/**
 * Retry with exponential backoff and jitter. Throws `RetryExhaustedError`
 * carrying the attempt count once attempts run out or `shouldRetry` says stop.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts = 3, shouldRetry, onRetry, signal, label = 'operation' } = options;

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const stop =
        attempt === maxAttempts || signal?.aborted === true || (shouldRetry ? !shouldRetry(error, attempt) : false);
      if (stop) throw new RetryExhaustedError(attempt, error);

      const delay = computeBackoffDelay(attempt, options);
      onRetry?.(error, attempt, delay);
      logger.debug('retry:scheduled', { label, attempt, maxAttempts, delayMs: Math.round(delay) });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw new RetryExhaustedError(maxAttempts, lastError);
}
