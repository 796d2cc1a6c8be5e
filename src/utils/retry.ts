import { RetriesExhaustedError, toError } from '../errors';

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retryCount: number;
  /** Base delay; the wait after attempt n is backoffMs * n. */
  backoffMs: number;
  sleepFn?: SleepFn;
  /** Errors rejected here are rethrown as-is without further attempts. */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, totalAttempts: number, error: Error) => void;
}

export async function retryWithLinearBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleepFn = options.sleepFn ?? sleep;
  const totalAttempts = Math.max(0, options.retryCount) + 1;
  let lastError: Error = new Error('No attempts were made');

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);
      if (options.shouldRetry && !options.shouldRetry(lastError)) {
        throw lastError;
      }
      if (attempt < totalAttempts) {
        options.onRetry?.(attempt, totalAttempts, lastError);
        await sleepFn(options.backoffMs * attempt);
      }
    }
  }
  throw new RetriesExhaustedError(totalAttempts, lastError);
}
