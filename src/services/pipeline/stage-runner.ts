/**
 * Stage runner: one adapter call under the run's retry policy, with a
 * per-attempt timeout and the run's cancellation signal.
 *
 * @module pipeline/stage-runner
 */

import type { RetryPolicy } from '../../utils/backoff.js';
import type { RunContext } from './context.js';
import { createClassifier, execute, type Classifier, type RetryNotice, type RetryResult } from './retry-executor.js';
import { withTimeout } from './timeout.js';

export interface RetrySettings extends RetryPolicy {
  /** Treat adapter timeouts as terminal instead of retryable */
  timeoutIsTerminal: boolean;
}

export interface StageTimeouts {
  downloadMs: number;
  extractMs: number;
  storeMs: number;
}

export interface StageRunnerHooks {
  sleep?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export class StageRunner {
  readonly classify: Classifier;

  constructor(
    private readonly retry: RetrySettings,
    private readonly hooks: StageRunnerHooks = {}
  ) {
    this.classify = createClassifier(retry.timeoutIsTerminal);
  }

  run<T>(
    label: string,
    timeoutMs: number,
    ctx: RunContext,
    fn: (signal: AbortSignal) => Promise<T>,
    onRetry?: (notice: RetryNotice) => void
  ): Promise<RetryResult<T>> {
    return execute(
      () => withTimeout(label, timeoutMs, fn, ctx.signal),
      this.classify,
      this.retry,
      {
        signal: ctx.signal,
        onRetry,
        label,
        sleep: this.hooks.sleep,
        random: this.hooks.random,
      }
    );
  }
}
