// Retry with exponential backoff + jitter for transient failures

import { isTransientError } from "../errors.js";
import { logger } from "../logger.js";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

export type RetryOptions = {
  policy: RetryPolicy;
  label: string;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateBackoff(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * policy.baseDelayMs;
  return Math.min(exponentialDelay + jitter, policy.maxDelayMs);
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, label } = options;
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const canRetry = attempt < maxAttempts - 1 && !options.signal?.aborted && shouldRetry(error);
      if (!canRetry) {
        throw error;
      }

      const delay = calculateBackoff(attempt, policy, options.random);
      logger.warn(`${label} failed, retrying`, {
        attempt: attempt + 1,
        maxAttempts,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay);
    }
  }
}
