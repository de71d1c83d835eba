/**
 * Retry Executor
 *
 * Runs one operation with exponential backoff. Errors are classified as
 * retryable or terminal; a terminal error ends the loop at once. The wait
 * between attempts is a timer only, so other documents keep moving.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module pipeline/retry-executor
 */

import { backoffSleep, calculateBackoffDelay, type RetryPolicy } from '../../utils/backoff.js';
import {
  AdapterTimeoutError,
  PipelineCancelledError,
  PipelineError,
  StorageWriteError,
  TransientIOError,
  errorMessage,
  isServerError,
} from './errors.js';

export type ErrorClass = 'retryable' | 'terminal';

export type Classifier = (error: unknown) => ErrorClass;

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: 'exhausted' | 'terminal'; error: unknown; attempts: number };

export interface RetryNotice {
  /** Attempt that just failed (1-indexed) */
  attempt: number;
  error: unknown;
  delayMs: number;
}

export interface ExecuteOptions {
  /** Aborting cancels the pending wait and stops further attempts */
  signal?: AbortSignal;
  /** Called after a retryable failure when another attempt will follow */
  onRetry?: (notice: RetryNotice) => void;
  /** Name used in log lines */
  label?: string;
  /** Wait implementation */
  sleep?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
  /** Jitter source */
  random?: () => number;
}

/**
 * Default error classification.
 *
 * @param timeoutIsTerminal - Treat adapter timeouts as terminal instead of retryable
 */
export function createClassifier(timeoutIsTerminal = false): Classifier {
  return (error: unknown): ErrorClass => {
    if (error instanceof PipelineCancelledError) return 'terminal';
    if (error instanceof AdapterTimeoutError) return timeoutIsTerminal ? 'terminal' : 'retryable';
    if (error instanceof TransientIOError || error instanceof StorageWriteError) return 'retryable';
    if (error instanceof PipelineError) return 'terminal';
    return isServerError(error) ? 'retryable' : 'terminal';
  };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Execute `operation` under `policy`.
 *
 * Returns `ok: true` on success, `reason: 'terminal'` as soon as a terminal
 * error is seen, and `reason: 'exhausted'` after `maxAttempts` retryable
 * failures.
 *
 * @throws PipelineCancelledError if the signal aborts before or between attempts
 */
export async function execute<T>(
  operation: (attempt: number) => Promise<T>,
  classify: Classifier,
  policy: RetryPolicy,
  options: ExecuteOptions = {}
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? backoffSleep;
  const label = options.label ?? 'operation';
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new PipelineCancelledError(`${label} cancelled before attempt ${attempt}`);
    }

    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;

      if (classify(error) === 'terminal') {
        return { ok: false, reason: 'terminal', error, attempts: attempt };
      }
      if (attempt >= maxAttempts) {
        console.error(`[Retry] ${label} exhausted after ${attempt} attempts: ${errorMessage(error)}`);
        return { ok: false, reason: 'exhausted', error, attempts: attempt };
      }

      const delayMs = calculateBackoffDelay(attempt, policy, options.random);
      console.error(
        `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`
      );
      options.onRetry?.({ attempt, error, delayMs });

      try {
        await sleep(delayMs, options.signal);
      } catch (sleepError) {
        if (isAbortError(sleepError) || options.signal?.aborted) {
          throw new PipelineCancelledError(`${label} cancelled during backoff`);
        }
        throw sleepError;
      }
    }
  }
}
