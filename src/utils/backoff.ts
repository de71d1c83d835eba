/**
 * Exponential Backoff with Jitter
 *
 * Delay after the n-th failure (1-indexed) is
 * min(baseDelay * multiplier^(n-1), maxDelay), randomized by +/- jitterFraction.
 * With the defaults: 500ms, 1s, 2s, 4s, 8s (capped).
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module utils/backoff
 */

import { setTimeout as delay } from 'timers/promises';

export interface RetryPolicy {
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Growth factor per failure (default: 2) */
  multiplier: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 8000,
  jitterFraction: 0.25,
};

/**
 * Calculate the wait after a failure, with jitter.
 *
 * @param failure - 1-indexed number of the failure just observed
 * @param policy - Optional partial retry policy
 * @param random - Source of uniform [0, 1) values
 * @returns Delay in milliseconds (always >= 0)
 */
export function calculateBackoffDelay(
  failure: number,
  policy?: Partial<RetryPolicy>,
  random: () => number = Math.random
): number {
  const cfg = { ...DEFAULT_RETRY_POLICY, ...policy };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(cfg.multiplier, Math.max(0, failure - 1));
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep for `delayMs`. Only a timer is pending while waiting; the caller's
 * other work keeps running.
 *
 * @param delayMs - Wait in milliseconds
 * @param signal - Aborting rejects the wait with an AbortError
 */
export async function backoffSleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  if (delayMs <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(delayMs, undefined, { signal });
}
