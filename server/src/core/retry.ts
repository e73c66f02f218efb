import { setTimeout as delay } from "node:timers/promises";
import type { RetryPolicy } from "../config";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export const MAX_ATTEMPTS = 2;

/**
 * Runs `task` up to `policy.maxAttempts` times (never more than
 * {@link MAX_ATTEMPTS}), waiting a fixed `delayMs` between attempts.
 * Errors rejected by `shouldRetry` are rethrown immediately.
 */
export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  options: {
    policy: RetryPolicy;
    shouldRetry: (error: unknown) => boolean;
    sleep?: Sleep;
    onRetry?: (error: unknown, attempt: number) => void;
  },
): Promise<T> => {
  const { policy, shouldRetry, sleep = defaultSleep, onRetry } = options;
  const attempts = Math.min(Math.max(1, Math.floor(policy.maxAttempts)), MAX_ATTEMPTS);

  let attempt = 1;

  while (true) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) throw error;

      onRetry?.(error, attempt);

      await sleep(policy.delayMs);

      attempt += 1;
    }
  }
};
