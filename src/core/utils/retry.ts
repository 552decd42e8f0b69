/**
 * Retry utility with fixed or exponential backoff
 */

export interface RetryOptions {
  /** Number of retry attempts after the first one */
  maxRetries: number;
  /** Delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier applied to the delay after each retry (1 = fixed delay) */
  backoffMultiplier: number;
  /** Delay before every attempt, including the first */
  beforeAttemptMs: number;
  /** Return false to stop retrying on this error (default: every error is retryable) */
  shouldRetry?: (error: Error) => boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 2,
  initialDelayMs: 5000,
  maxDelayMs: 30000,
  backoffMultiplier: 1,
  beforeAttemptMs: 0,
};

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Error thrown when every attempt failed
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(lastError: Error, attempts: number) {
    super(lastError.message, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Execute an operation with retry logic
 *
 * @param operation - Async function to execute; receives the 1-based attempt number
 * @param options - Retry configuration options
 * @param onRetry - Optional callback called before each retry wait
 * @returns The result of the operation and the number of attempts it took
 * @throws RetryExhaustedError carrying the last error when attempts run out
 *   or the error is not retryable
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
): Promise<{ value: T; attempts: number }> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier, beforeAttemptMs, shouldRetry } =
    opts;

  let delay = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    await sleep(beforeAttemptMs);

    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt > maxRetries || (shouldRetry && !shouldRetry(lastError))) {
        throw new RetryExhaustedError(lastError, attempt);
      }

      onRetry?.(attempt, lastError, delay);

      await sleep(delay);

      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
