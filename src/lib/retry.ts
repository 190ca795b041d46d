/**
 * Retry with exponential backoff.
 *
 * Delay before attempt n+1 is min(baseDelayMs * 2^(n-1), maxDelayMs).
 */

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Backoff delay for the given (1-based) failed attempt.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run fn until it resolves or maxAttempts is reached.
 *
 * @throws RetryExhaustedError wrapping the last failure
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, onRetry, sleep = defaultSleep } = options;
  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}
