/**
 * Pipeline Orchestrator
 *
 * Drives each document through
 * DISCOVERED -> CLAIMED -> DOWNLOADING -> EXTRACTING -> VALIDATING -> terminal.
 *
 * Rules:
 * - A document is worked on only under a claim from the claim store.
 * - Every state change is decided by the state machine first, then the side
 *   effect runs, then the new state is committed with one audit entry.
 * - A stage that exhausts its retries, or fails terminally, moves the
 *   document to DEAD_LETTER together with a dead-letter entry that records
 *   where replay should resume.
 * - A candidate whose bytes cannot be fetched has no fingerprint. Its failure
 *   is dead-lettered on a placeholder document keyed by source id alone.
 * - A document is re-read once its claim is held; one that another worker
 *   finished in the meantime is skipped.
 * - An invalid transition is an integrity fault: logged under [INTEGRITY],
 *   dead-lettered, never silently ignored.
 * - Cancellation releases the claim as ABANDONED and leaves the document in
 *   its last committed state.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for the run summary
 * and the JSON-RPC protocol.
 *
 * @module pipeline/orchestrator
 */

import type { DatabaseService } from '../storage/database/index.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/database/index.js';
import type {
  ExtractionAdapter,
  ExtractionResult,
  IngestionAdapter,
  StorageAdapter,
} from '../adapters/types.js';
import {
  fingerprintKey,
  unfetchedFingerprint,
  type FileRef,
  type Fingerprint,
  type PipelineDocument,
  type PipelineState,
  type RetryStage,
} from '../../models/document.js';
import type { ClaimOutcome } from '../../models/claim.js';
import type { ResumePoint } from '../../models/dead-letter.js';
import type { StructuredPayload } from '../../models/invoice.js';
import type { ValidationResult } from '../../models/validation.js';
import { computeHash } from '../../utils/hash.js';
import type { ClaimStore } from './claim-store.js';
import type { RunContext, RunSummary } from './context.js';
import { DeadLetterStore } from './dead-letter.js';
import { ReviewRouter } from './review-router.js';
import type { RetryNotice, RetryResult } from './retry-executor.js';
import { StageRunner, type RetrySettings, type StageRunnerHooks, type StageTimeouts } from './stage-runner.js';
import { isTerminal, transition } from './state-machine.js';
import { TransitionRecorder } from './transitions.js';
import { validatePayload, type ValidationConfig } from './validation-scorer.js';
import {
  ContentMismatchError,
  ExtractionError,
  InvalidTransitionError,
  PipelineCancelledError,
  errorMessage,
  errorName,
  failureKindOf,
} from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineSettings {
  workerId: string;
  /** Documents processed in parallel within one run */
  concurrency: number;
  retry: RetrySettings;
  timeouts: StageTimeouts;
  validation: ValidationConfig;
}

export interface PipelineDeps {
  db: DatabaseService;
  claims: ClaimStore;
  ingestion: IngestionAdapter;
  extraction: ExtractionAdapter;
  storage: StorageAdapter;
  settings: PipelineSettings;
  hooks?: StageRunnerHooks;
}

export type LifecycleOutcome = Exclude<ClaimOutcome, 'STALE'>;

/**
 * What became of one listed candidate. SKIPPED: already processed, finished
 * or claimed elsewhere. FAILED: not fetched, and nothing new was recorded.
 */
export type CandidateOutcome = LifecycleOutcome | 'SKIPPED' | 'FAILED';

export type FetchFailure = Extract<RetryResult<Uint8Array>, { ok: false }>;

/** Where a lifecycle run enters, and what earlier stages already produced */
export interface LifecycleStart {
  resumeAt: ResumePoint;
  /** Content already fetched and verified against the fingerprint */
  bytes: Uint8Array | null;
  /** Payload from a previous extraction; skips the extractor when present */
  payload: StructuredPayload | null;
  provider: string | null;
  /** Download that already failed before the document was fingerprinted */
  fetchFailure?: FetchFailure;
}

/** The document being worked on; updated after every commit */
interface Tracked {
  doc: PipelineDocument;
}

interface Escalation {
  retryStage: RetryStage;
  resumeAt: ResumePoint;
  payload: StructuredPayload | null;
  provider: string | null;
  validation?: ValidationResult;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class PipelineOrchestrator {
  readonly recorder: TransitionRecorder;
  readonly deadLetters: DeadLetterStore;
  private readonly reviews: ReviewRouter;
  private readonly runner: StageRunner;

  constructor(private readonly deps: PipelineDeps) {
    this.recorder = new TransitionRecorder(deps.db);
    this.deadLetters = new DeadLetterStore(deps.db);
    this.runner = new StageRunner(deps.settings.retry, deps.hooks);
    this.reviews = new ReviewRouter(deps.db, this.recorder, deps.storage, deps.settings.timeouts.storeMs);
  }

  /**
   * One polling pass: list candidates and run each new one to a terminal
   * outcome with up to `concurrency` documents in flight.
   */
  async pollOnce(ctx: RunContext): Promise<RunSummary> {
    const concurrency = Math.max(1, this.deps.settings.concurrency);
    console.error(
      `[Orchestrator] Run ${ctx.runId} started (worker ${ctx.workerId}, ingestion ${this.deps.ingestion.name}, concurrency ${concurrency})`
    );

    const candidates = this.deps.ingestion.listCandidates(ctx.signal)[Symbol.asyncIterator]();
    const results = await Promise.allSettled(
      Array.from({ length: concurrency }, () => this.work(candidates, ctx))
    );
    await candidates.return?.();

    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
    }

    const summary = ctx.summary();
    logSummary('Orchestrator', summary);
    return summary;
  }

  private async work(candidates: AsyncIterator<FileRef>, ctx: RunContext): Promise<void> {
    while (!ctx.cancelled) {
      const next = await candidates.next();
      if (next.done) return;

      try {
        await this.handleCandidate(next.value, ctx);
      } catch (error) {
        if (error instanceof PipelineCancelledError) return;
        console.error(
          `[Orchestrator] ${next.value.source_id} failed outside the lifecycle: ${errorMessage(error)}`
        );
        ctx.increment('failed');
      }
    }
  }

  /**
   * Fingerprint a candidate, skip it if done, claim it and run it. A candidate
   * whose bytes cannot be fetched is dead-lettered against its source's
   * placeholder document.
   *
   * @throws PipelineCancelledError if the run is cancelled before a claim is taken
   */
  async handleCandidate(ref: FileRef, ctx: RunContext): Promise<CandidateOutcome> {
    const fetched = await ctx.timed('download', () =>
      this.runner.run('download', this.deps.settings.timeouts.downloadMs, ctx, (signal) =>
        this.deps.ingestion.download(ref, signal)
      )
    );
    if (!fetched.ok) {
      console.error(
        `[Orchestrator] Could not fetch ${ref.source_id} (${fetched.reason} after ${fetched.attempts} attempts): ${errorMessage(fetched.error)}`
      );
      return this.recordFetchFailure(ref, fetched, ctx);
    }

    const fingerprint: Fingerprint = {
      source_id: ref.source_id,
      content_hash: computeHash(fetched.value),
    };

    if (await this.deps.claims.isProcessed(fingerprint)) {
      ctx.increment('skipped');
      return 'SKIPPED';
    }

    const existing = this.deps.db.getDocumentByFingerprint(fingerprint);
    if (existing && isTerminal(existing.state)) {
      if (existing.state === 'STORED') {
        await this.settleStoredClaim(existing, ctx);
      }
      ctx.increment('skipped');
      return 'SKIPPED';
    }
    if (!existing) this.ensureDocument(ref, fingerprint);

    const attempt = await this.deps.claims.tryClaim(fingerprint, ctx.workerId);
    if (attempt.status !== 'claimed') {
      if (attempt.status === 'already_claimed') {
        console.error(
          `[Orchestrator] ${ref.source_id} is claimed by ${attempt.owner.worker_id} since ${attempt.owner.claimed_at}; skipping`
        );
      }
      ctx.increment('skipped');
      return 'SKIPPED';
    }

    const claimed = await this.loadClaimed(fingerprint, attempt.claimId);
    if (claimed === null) {
      ctx.increment('skipped');
      return 'SKIPPED';
    }

    let doc: PipelineDocument;
    try {
      doc = this.recoverIfStarted(claimed, 'RECOVER', attempt.claimId, ctx);
    } catch (error) {
      await this.deps.claims.release(attempt.claimId, 'ABANDONED');
      throw error;
    }

    return this.runLifecycle(doc, attempt.claimId, ctx, {
      resumeAt: 'DISCOVERED',
      bytes: fetched.value,
      payload: null,
      provider: null,
    });
  }

  /**
   * Re-read a document once its claim is held. Another worker may have
   * finished it between the first read and the claim; in that case the claim
   * is released with the outcome already reached and null is returned.
   */
  private async loadClaimed(fingerprint: Fingerprint, claimId: string): Promise<PipelineDocument | null> {
    const doc = this.deps.db.getDocumentByFingerprint(fingerprint);
    if (doc === null) {
      await this.deps.claims.release(claimId, 'ABANDONED');
      throw new DatabaseError(
        `Document for ${fingerprintKey(fingerprint)} disappeared under its claim`,
        DatabaseErrorCode.DOCUMENT_NOT_FOUND
      );
    }
    const finished = terminalOutcome(doc.state);
    if (finished !== null) {
      console.error(
        `[Orchestrator] ${fingerprint.source_id} reached ${doc.state} before the claim was taken; skipping`
      );
      await this.deps.claims.release(claimId, finished);
      return null;
    }
    return doc;
  }

  /**
   * Put a claimed document left mid-lifecycle (or dead-lettered, for a
   * placeholder) back at DISCOVERED
   */
  private recoverIfStarted(
    doc: PipelineDocument,
    action: 'RECOVER' | 'REDISCOVER',
    claimId: string,
    ctx: RunContext
  ): PipelineDocument {
    if (doc.state === 'DISCOVERED') return doc;
    console.error(`[Orchestrator] Recovering ${doc.fingerprint.source_id} from ${doc.state}`);
    return this.deps.db.transaction(() =>
      this.recorder.force(doc, 'DISCOVERED', action, ctx.actor, { last_error: null }, {
        claim_id: claimId,
        recovered_from: doc.state,
      })
    );
  }

  /**
   * A source that cannot be read has no content hash. Its failure is recorded
   * on a placeholder document keyed by source id alone, which goes through
   * CLAIM and START_DOWNLOAD and then escalates to DEAD_LETTER like any
   * download failure. A placeholder that already has a pending entry is left
   * alone.
   */
  private async recordFetchFailure(
    ref: FileRef,
    failure: FetchFailure,
    ctx: RunContext
  ): Promise<CandidateOutcome> {
    const fingerprint = unfetchedFingerprint(ref.source_id);
    const attempt = await this.deps.claims.tryClaim(fingerprint, ctx.workerId);
    if (attempt.status !== 'claimed') {
      console.error(`[Orchestrator] Fetch failure of ${ref.source_id} is being recorded elsewhere`);
      ctx.increment('failed');
      return 'FAILED';
    }

    let doc: PipelineDocument;
    try {
      const current = this.deps.db.getDocumentByFingerprint(fingerprint) ?? this.ensureDocument(ref, fingerprint);
      if (current.state === 'DEAD_LETTER' && this.deadLetters.hasPending(current.id)) {
        console.error(`[Orchestrator] ${ref.source_id} still cannot be fetched; its dead-letter entry is pending`);
        await this.deps.claims.release(attempt.claimId, 'DEAD_LETTER');
        ctx.increment('failed');
        return 'FAILED';
      }
      const action = current.state === 'DEAD_LETTER' ? 'REDISCOVER' : 'RECOVER';
      const started = this.recoverIfStarted(current, action, attempt.claimId, ctx);
      doc = this.recorder.update(started, {
        retry_counts: {
          ...started.retry_counts,
          DOWNLOADING: started.retry_counts.DOWNLOADING + failure.attempts - 1,
        },
        last_error: errorMessage(failure.error),
      });
    } catch (error) {
      await this.deps.claims.release(attempt.claimId, 'ABANDONED');
      throw error;
    }

    return this.runLifecycle(doc, attempt.claimId, ctx, {
      resumeAt: 'DISCOVERED',
      bytes: null,
      payload: null,
      provider: null,
      fetchFailure: failure,
    });
  }

  /**
   * Insert a new document, or load the one a concurrent worker just inserted
   */
  private ensureDocument(ref: FileRef, fingerprint: Fingerprint): PipelineDocument {
    try {
      return this.deps.db.insertDocument(ref, fingerprint);
    } catch (error) {
      if (error instanceof DatabaseError && error.code === DatabaseErrorCode.CONSTRAINT_VIOLATION) {
        const existing = this.deps.db.getDocumentByFingerprint(fingerprint);
        if (existing) return existing;
      }
      throw error;
    }
  }

  /**
   * A run that crashed between committing STORED and releasing its claim
   * leaves the claim store unaware. Record the outcome now.
   */
  private async settleStoredClaim(doc: PipelineDocument, ctx: RunContext): Promise<void> {
    const attempt = await this.deps.claims.tryClaim(doc.fingerprint, ctx.workerId);
    if (attempt.status === 'claimed') {
      await this.deps.claims.release(attempt.claimId, 'STORED');
      console.error(`[Orchestrator] Settled claim for already stored ${doc.fingerprint.source_id}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Run a claimed document to a terminal outcome and release the claim with it.
   * The document must be in `start.resumeAt`.
   */
  async runLifecycle(
    doc: PipelineDocument,
    claimId: string,
    ctx: RunContext,
    start: LifecycleStart
  ): Promise<LifecycleOutcome> {
    const tracked: Tracked = { doc };
    let outcome: LifecycleOutcome;

    try {
      outcome = await this.advance(tracked, claimId, ctx, start);
      if (outcome === 'DEAD_LETTER') ctx.increment('dead_lettered');
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        console.error(
          `[Orchestrator] ${doc.fingerprint.source_id} cancelled in ${tracked.doc.state}; claim released as ABANDONED`
        );
        await this.deps.claims.release(claimId, 'ABANDONED');
        return 'ABANDONED';
      }
      try {
        outcome = this.forceDeadLetter(tracked, error, ctx);
      } catch (fault) {
        await this.deps.claims.release(claimId, 'ABANDONED');
        throw fault;
      }
    }

    await this.deps.claims.release(claimId, outcome);
    return outcome;
  }

  private async advance(
    tracked: Tracked,
    claimId: string,
    ctx: RunContext,
    start: LifecycleStart
  ): Promise<LifecycleOutcome> {
    const { recorder } = this;
    let bytes = start.bytes;
    let payload = start.payload;
    let provider = start.provider;

    if (start.resumeAt === 'DISCOVERED') {
      tracked.doc = recorder.commit(tracked.doc, 'CLAIM', ctx.actor, {}, {
        claim_id: claimId,
        worker_id: ctx.workerId,
      });
      tracked.doc = recorder.commit(tracked.doc, 'START_DOWNLOAD', ctx.actor);

      if (bytes === null) {
        const downloaded = start.fetchFailure ?? (await this.downloadVerified(tracked, ctx));
        if (!downloaded.ok) {
          return this.escalate(tracked, downloaded.error, ctx, {
            retryStage: 'DOWNLOADING',
            resumeAt: 'DISCOVERED',
            payload: null,
            provider: null,
          });
        }
        bytes = downloaded.value;
      }
      tracked.doc = recorder.commit(tracked.doc, 'DOWNLOADED', ctx.actor, {}, { size: bytes.byteLength });
    }

    if (payload === null) {
      if (bytes === null) {
        const downloaded = await this.downloadVerified(tracked, ctx);
        if (!downloaded.ok) {
          return this.escalate(tracked, downloaded.error, ctx, {
            retryStage: 'DOWNLOADING',
            resumeAt: 'EXTRACTING',
            payload: null,
            provider: null,
          });
        }
        bytes = downloaded.value;
      }

      const extracted = await this.extract(tracked, bytes, ctx);
      if (!extracted.ok) {
        return this.escalate(tracked, extracted.error, ctx, {
          retryStage: 'EXTRACTING',
          resumeAt: 'EXTRACTING',
          payload: null,
          provider: extracted.error instanceof ExtractionError ? extracted.error.provider : null,
        });
      }
      payload = extracted.value.payload;
      provider = extracted.value.provider;
    }

    tracked.doc = recorder.commit(tracked.doc, 'EXTRACTED', ctx.actor, { payload }, { provider });

    const verdict = validatePayload(payload, this.deps.settings.validation);
    if (verdict.decision === 'review') {
      const routed = await this.reviews.routeToReview(tracked.doc, verdict.result, verdict.reasonCode, ctx);
      tracked.doc = routed.document;
      ctx.increment('reviewed');
      return 'NEEDS_REVIEW';
    }

    // Decide before writing to the ledger
    transition(tracked.doc, 'ACCEPT');
    const document = tracked.doc;
    const storedPayload = payload;
    const stored = await ctx.timed('store', () =>
      this.runner.run(
        'store',
        this.deps.settings.timeouts.storeMs,
        ctx,
        (signal) =>
          this.deps.storage.append(
            {
              document_id: document.id,
              fingerprint: document.fingerprint,
              file_ref: document.file_ref,
              payload: storedPayload,
              validation: verdict.result,
              provider,
            },
            signal
          ),
        (notice) => this.countRetry(tracked, 'STORING', notice)
      )
    );
    if (!stored.ok) {
      return this.escalate(tracked, stored.error, ctx, {
        retryStage: 'STORING',
        resumeAt: 'EXTRACTING',
        payload,
        provider,
        validation: verdict.result,
      });
    }

    tracked.doc = recorder.commit(tracked.doc, 'ACCEPT', ctx.actor, { validation: verdict.result }, {
      backend: stored.value.backend,
      row_id: stored.value.row_id,
      created: stored.value.created,
      confidence: verdict.result.confidence,
    });
    ctx.increment('processed');
    console.error(`[Orchestrator] ${tracked.doc.fingerprint.source_id} stored as ${stored.value.row_id}`);
    return 'STORED';
  }

  /**
   * Fetch the content again and check it still has the fingerprinted hash
   */
  private downloadVerified(tracked: Tracked, ctx: RunContext): Promise<RetryResult<Uint8Array>> {
    const { file_ref: ref, fingerprint } = tracked.doc;
    return ctx.timed('download', () =>
      this.runner.run(
        'download',
        this.deps.settings.timeouts.downloadMs,
        ctx,
        async (signal) => {
          const bytes = await this.deps.ingestion.download(ref, signal);
          const actual = computeHash(bytes);
          if (actual !== fingerprint.content_hash) {
            throw new ContentMismatchError(ref.source_id, fingerprint.content_hash, actual);
          }
          return bytes;
        },
        (notice) => this.countRetry(tracked, 'DOWNLOADING', notice)
      )
    );
  }

  /**
   * Extraction retries go through the table: EXTRACTING -> FAILED -> EXTRACTING,
   * both audited, with the per-stage counter bumped.
   */
  private extract(tracked: Tracked, bytes: Uint8Array, ctx: RunContext): Promise<RetryResult<ExtractionResult>> {
    const mimeType = tracked.doc.file_ref.mime_type;
    return ctx.timed('extract', () =>
      this.runner.run(
        'extract',
        this.deps.settings.timeouts.extractMs,
        ctx,
        (signal) => this.deps.extraction.extract(bytes, mimeType, signal),
        (notice) => {
          const doc = tracked.doc;
          tracked.doc = this.deps.db.transaction(() => {
            const failed = this.recorder.apply(
              doc,
              'FAIL',
              ctx.actor,
              {
                retry_counts: { ...doc.retry_counts, EXTRACTING: doc.retry_counts.EXTRACTING + 1 },
                last_error: errorMessage(notice.error),
              },
              { attempt: notice.attempt, error: errorName(notice.error) }
            );
            return this.recorder.apply(failed, 'RETRY', ctx.actor, {}, { delay_ms: notice.delayMs });
          });
        }
      )
    );
  }

  /**
   * Download and store retries happen inside one state; only the counter moves
   */
  private countRetry(tracked: Tracked, stage: RetryStage, notice: RetryNotice): void {
    const doc = tracked.doc;
    tracked.doc = this.recorder.update(doc, {
      retry_counts: { ...doc.retry_counts, [stage]: doc.retry_counts[stage] + 1 },
      last_error: errorMessage(notice.error),
    });
  }

  /**
   * FAIL, dead-letter entry, EXHAUST: one transaction
   */
  private escalate(tracked: Tracked, error: unknown, ctx: RunContext, info: Escalation): LifecycleOutcome {
    if (error instanceof PipelineCancelledError) throw error;
    if (error instanceof InvalidTransitionError) throw error;

    const doc = tracked.doc;
    const kind = failureKindOf(error);
    const message = errorMessage(error);

    tracked.doc = this.deps.db.transaction(() => {
      const changes = info.validation ? { last_error: message, validation: info.validation } : { last_error: message };
      const failed = this.recorder.apply(doc, 'FAIL', ctx.actor, changes, {
        error: errorName(error),
        failure_kind: kind,
      });
      const entry = this.deadLetters.record(
        failed,
        doc.state,
        kind,
        {
          resume_at: info.resumeAt,
          file_ref: doc.file_ref,
          payload: info.payload,
          provider: info.provider,
          error_name: errorName(error),
        },
        message,
        doc.retry_counts[info.retryStage]
      );
      return this.recorder.apply(failed, 'EXHAUST', ctx.actor, {}, { entry_id: entry.id });
    });
    return 'DEAD_LETTER';
  }

  /**
   * Dead-letter a document outside the transition table: integrity faults
   * and errors nothing else classified. A document already in DEAD_LETTER
   * keeps the entry it has.
   */
  private forceDeadLetter(tracked: Tracked, error: unknown, ctx: RunContext): LifecycleOutcome {
    const integrity = error instanceof InvalidTransitionError;
    const tag = integrity ? '[INTEGRITY]' : '[Orchestrator]';
    console.error(`${tag} ${tracked.doc.fingerprint.source_id}: ${errorMessage(error)}`);

    const current = this.deps.db.getDocument(tracked.doc.id) ?? tracked.doc;
    const finished = terminalOutcome(current.state);
    if (finished !== null) {
      tracked.doc = current;
      return finished;
    }

    tracked.doc = this.deps.db.transaction(() => {
      const entry = this.deadLetters.record(
        current,
        current.state,
        failureKindOf(error),
        {
          resume_at: 'DISCOVERED',
          file_ref: current.file_ref,
          payload: null,
          provider: null,
          error_name: errorName(error),
        },
        errorMessage(error),
        0
      );
      return this.recorder.force(
        current,
        'DEAD_LETTER',
        'INTEGRITY_FAULT',
        ctx.actor,
        { last_error: errorMessage(error) },
        { entry_id: entry.id, error: errorName(error) }
      );
    });
    ctx.increment('dead_lettered');
    return 'DEAD_LETTER';
  }
}

/**
 * The claim outcome matching a terminal state, or null while the document is
 * still in flight
 */
export function terminalOutcome(state: PipelineState): LifecycleOutcome | null {
  switch (state) {
    case 'STORED':
    case 'NEEDS_REVIEW':
    case 'DEAD_LETTER':
      return state;
    default:
      return null;
  }
}

/**
 * One stderr line per run
 */
export function logSummary(tag: string, summary: RunSummary): void {
  const p95 = summary.latency_p95_ms;
  console.error(
    `[${tag}] Run ${summary.run_id} ${summary.cancelled ? 'cancelled' : 'finished'} in ${summary.duration_ms}ms: ` +
      `processed=${summary.processed} skipped=${summary.skipped} reviewed=${summary.reviewed} ` +
      `dead_lettered=${summary.dead_lettered} failed=${summary.failed} ` +
      `p95_ms(download=${p95.download ?? '-'} extract=${p95.extract ?? '-'} store=${p95.store ?? '-'})`
  );
}
