import { setTimeout as delay } from "node:timers/promises";
import { TransientError } from "./errors";
import { describeError, logJson, type Logger } from "./logger";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of baseDelayMs added as random jitter, 0 disables it. */
  jitterRatio: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterRatio: 0.2,
};

export type RetryOptions = {
  context: string;
  isRetryable: (error: unknown) => boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
};

export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random) {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = policy.baseDelayMs * policy.jitterRatio * random();
  return Math.round(capped + jitter);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const sleep = options.sleep ?? delay;
  const logger = options.logger ?? console;

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new TransientError(
          `${options.context} failed after ${attempt} attempt(s): ${describeError(error)}`,
          attempt,
          { cause: error },
        );
      }

      const backoff = computeBackoff(policy, attempt, options.random);
      logJson(
        "warn",
        "retry.scheduled",
        {
          context: options.context,
          attempt,
          maxAttempts,
          backoff,
          error: describeError(error),
        },
        logger,
      );
      await sleep(backoff);
    }
  }
}
