/**
 * Retry policy for stage execution.
 *
 * A policy is data plus a predicate: how many attempts, how long to wait
 * before each retry, and which errors are worth retrying. The executor
 * re-runs the same task with an incremented attempt number; callers are
 * responsible for passing the same input each time.
 *
 *   attempt 1 ── fail (retryable) ── wait backoff(1) ── attempt 2 ── …
 *
 * Delays grow geometrically and are capped:
 *
 *   backoff(n) = min(initialDelayMs × multiplier^(n−1), maxDelayMs)
 */

import type { CoordinatorConfig } from "../config/pipeline/index.js";
import { isRetryableError } from "../errors/index.js";
import { sleep } from "./timeout.js";

export interface RetryPolicy {
  /** Total attempts including the first; at least 1 */
  readonly maxAttempts: number;
  /** Delay before retry `n` (1-based) */
  delayMs(retry: number): number;
  shouldRetry(error: unknown): boolean;
}

export interface RetryPolicyOptions {
  retries: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Defaults to the `retryable` flag of pipeline errors */
  isRetryable?: (error: unknown) => boolean;
}

export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const { retries, initialDelayMs, multiplier, maxDelayMs } = options;
  const isRetryable = options.isRetryable ?? isRetryableError;

  return {
    maxAttempts: Math.max(0, Math.floor(retries)) + 1,
    delayMs: (retry) => Math.min(initialDelayMs * Math.pow(multiplier, retry - 1), maxDelayMs),
    shouldRetry: isRetryable,
  };
}

/**
 * Policy described by the coordinator section of the pipeline config.
 */
export function retryPolicyFromConfig(config: CoordinatorConfig): RetryPolicy {
  return createRetryPolicy({
    retries: config.retryAttempts,
    initialDelayMs: config.retryBackoffMs,
    multiplier: config.retryBackoffMultiplier,
    maxDelayMs: config.maxRetryDelayMs,
  });
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryHooks {
  /** Aborting stops the backoff wait and ends the loop */
  signal?: AbortSignal;
  /** Called before each wait */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Run `task` under `policy`. Never throws: the final outcome, success or
 * the last error, is returned with the number of attempts made.
 */
export async function executeWithRetry<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const wait = hooks.wait ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return { ok: true, value: await task(attempt), attempts: attempt };
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.shouldRetry(error)) {
        return { ok: false, error, attempts: attempt };
      }

      const delayMs = policy.delayMs(attempt);
      hooks.onRetry?.({ attempt, delayMs, error });

      try {
        await wait(delayMs, hooks.signal);
      } catch (waitError) {
        return { ok: false, error: waitError, attempts: attempt };
      }
    }
  }
}
