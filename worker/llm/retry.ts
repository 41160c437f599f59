import type { RetryConfig } from '../config';
import { sleep as defaultSleep } from '../services/utils';

export type AttemptReport = {
  attempt: number;
  error: unknown;
  /** Delay before the next attempt; null after the final failure. */
  nextDelayMs: number | null;
};

export type RetryExecutor = {
  execute<T>(operation: (attempt: number) => Promise<T>): Promise<T>;
};

/** Delay before retry `attempt` (1-based): min(base * 2^(attempt-1), max). */
export const computeBackoffDelay = (attempt: number, policy: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>) =>
  Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);

/**
 * Runs an operation up to `maxAttempts` times with exponential backoff
 * between attempts. Any thrown failure is retried; the last one is
 * rethrown once attempts run out.
 */
export const createRetryExecutor = (
  policy: RetryConfig,
  deps: { sleep?: (ms: number) => Promise<void>; onFailedAttempt?: (report: AttemptReport) => void } = {}
): RetryExecutor => {
  const wait = deps.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  return {
    async execute(operation) {
      let lastError: unknown;
      for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        try {
          return await operation(attempt);
        } catch (error) {
          lastError = error;
          const isFinal = attempt === maxAttempts;
          const delayMs = isFinal ? null : computeBackoffDelay(attempt, policy);
          deps.onFailedAttempt?.({ attempt, error, nextDelayMs: delayMs });
          if (delayMs !== null) await wait(delayMs);
        }
      }
      throw lastError;
    },
  };
};
