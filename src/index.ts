/**
 * Document intake pipeline
 *
 * Library entry point. The CLI lives in bin.ts.
 *
 * @module index
 */

export * from './models/index.js';

export { DatabaseService, DatabaseError, DatabaseErrorCode, MigrationError } from './services/storage/database/index.js';
export type { PipelineStats } from './services/storage/database/index.js';

export { transition, nextState, allowedEvents, isTerminal, TRANSITION_EVENTS } from './services/pipeline/state-machine.js';
export type { TransitionEvent } from './services/pipeline/state-machine.js';
export { SqliteClaimStore, CachedClaimStore } from './services/pipeline/claim-store.js';
export type { ClaimStore } from './services/pipeline/claim-store.js';
export { execute, createClassifier } from './services/pipeline/retry-executor.js';
export type { RetryResult, Classifier } from './services/pipeline/retry-executor.js';
export { scorePayload, decide, validatePayload, DEFAULT_VALIDATION_CONFIG } from './services/pipeline/validation-scorer.js';
export type { ValidationConfig } from './services/pipeline/validation-scorer.js';
export { DeadLetterStore } from './services/pipeline/dead-letter.js';
export { ReviewRouter } from './services/pipeline/review-router.js';
export { PipelineOrchestrator } from './services/pipeline/orchestrator.js';
export type { PipelineSettings, PipelineDeps, LifecycleOutcome } from './services/pipeline/orchestrator.js';
export { ReplayController } from './services/pipeline/replay.js';
export type { ReplayOutcome, ReplayReport } from './services/pipeline/replay.js';
export { RunContext } from './services/pipeline/context.js';
export type { RunSummary } from './services/pipeline/context.js';
export * from './services/pipeline/errors.js';
export { calculateBackoffDelay, DEFAULT_RETRY_POLICY } from './utils/backoff.js';
export type { RetryPolicy } from './utils/backoff.js';

export type {
  IngestionAdapter,
  ExtractionAdapter,
  ExtractionResult,
  StorageAdapter,
  LedgerRecord,
  RowRef,
} from './services/adapters/types.js';

export { loadPipelineConfig, toPipelineSettings } from './server/config.js';
export type { PipelineConfig } from './server/config.js';
export { createRuntime, buildAdapters } from './server/runtime.js';
export type { PipelineRuntime } from './server/runtime.js';
export { createMonitorServer } from './server/monitor.js';
export { runCli } from './cli/commands.js';
