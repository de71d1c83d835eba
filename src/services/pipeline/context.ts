/**
 * Run context: cancellation, counters and per-stage latencies of one run.
 * Passed explicitly to every stage; nothing here is global.
 *
 * @module pipeline/context
 */

import { v4 as uuidv4 } from 'uuid';
import type { AuditActor } from '../../models/audit.js';

export const RUN_COUNTERS = ['processed', 'skipped', 'reviewed', 'dead_lettered', 'failed'] as const;
export type RunCounter = (typeof RUN_COUNTERS)[number];

export const TIMED_STAGES = ['download', 'extract', 'store'] as const;
export type TimedStage = (typeof TIMED_STAGES)[number];

export interface RunSummary {
  run_id: string;
  worker_id: string;
  /** Documents that reached STORED in this run */
  processed: number;
  skipped: number;
  reviewed: number;
  dead_lettered: number;
  /** Candidates that never got a fingerprint, or failed outside a lifecycle */
  failed: number;
  cancelled: boolean;
  duration_ms: number;
  latency_p95_ms: Record<TimedStage, number | null>;
}

/**
 * 95th percentile by nearest rank
 */
export function p95(samples: readonly number[]): number | null {
  if (samples.length === 0) return null;
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil(0.95 * sorted.length) - 1;
  return sorted[Math.max(0, rank)] ?? null;
}

export class RunContext {
  readonly runId = uuidv4();
  readonly startedAt = Date.now();
  private readonly counters: Record<RunCounter, number> = {
    processed: 0,
    skipped: 0,
    reviewed: 0,
    dead_lettered: 0,
    failed: 0,
  };
  private readonly latencies: Record<TimedStage, number[]> = {
    download: [],
    extract: [],
    store: [],
  };

  constructor(
    readonly workerId: string,
    readonly signal: AbortSignal = new AbortController().signal,
    readonly actor: AuditActor = 'system'
  ) {}

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  increment(counter: RunCounter): void {
    this.counters[counter]++;
  }

  count(counter: RunCounter): number {
    return this.counters[counter];
  }

  recordLatency(stage: TimedStage, ms: number): void {
    this.latencies[stage].push(ms);
  }

  /**
   * Time an async stage call and record its latency, success or not
   */
  async timed<T>(stage: TimedStage, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.recordLatency(stage, Math.round(performance.now() - start));
    }
  }

  summary(): RunSummary {
    return {
      run_id: this.runId,
      worker_id: this.workerId,
      ...this.counters,
      cancelled: this.signal.aborted,
      duration_ms: Date.now() - this.startedAt,
      latency_p95_ms: {
        download: p95(this.latencies.download),
        extract: p95(this.latencies.extract),
        store: p95(this.latencies.store),
      },
    };
  }
}
