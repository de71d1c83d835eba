/**
 * Replay Controller
 *
 * Re-submits dead-lettered documents through the orchestrator under a new
 * claim, resuming at the stage the entry recorded. Only a document still in
 * DEAD_LETTER is replayed. An entry recorded for a source that could not be
 * fetched is replayed by discovering the source again.
 *
 * @module pipeline/replay
 */

import type { DatabaseService } from '../storage/database/index.js';
import { isUnfetched, type PipelineDocument } from '../../models/document.js';
import type { DeadLetterEntry, ReplayStatus } from '../../models/dead-letter.js';
import type { ClaimStore } from './claim-store.js';
import type { RunContext, RunSummary } from './context.js';
import type { CandidateOutcome, PipelineOrchestrator } from './orchestrator.js';
import { logSummary, terminalOutcome } from './orchestrator.js';
import { PipelineCancelledError, errorMessage } from './errors.js';

export type ReplayStatusOutcome =
  | 'stored'
  | 'reviewed'
  | 'dead_lettered'
  | 'abandoned'
  | 'already_processed'
  | 'claim_conflict'
  | 'not_found'
  | 'not_replayable'
  | 'failed';

export interface ReplayOutcome {
  entry_id: string;
  source_id: string | null;
  status: ReplayStatusOutcome;
  detail?: string;
}

export interface ReplayReport {
  outcomes: ReplayOutcome[];
  summary: RunSummary;
}

const CANDIDATE_STATUS: Record<CandidateOutcome, ReplayStatusOutcome> = {
  STORED: 'stored',
  NEEDS_REVIEW: 'reviewed',
  DEAD_LETTER: 'dead_lettered',
  ABANDONED: 'abandoned',
  SKIPPED: 'already_processed',
  FAILED: 'failed',
};

type EntryBase = Pick<ReplayOutcome, 'entry_id' | 'source_id'>;

/** Page size when walking entries by status */
const BATCH_SIZE = 100;

export class ReplayController {
  constructor(
    private readonly db: DatabaseService,
    private readonly claims: ClaimStore,
    private readonly orchestrator: PipelineOrchestrator
  ) {}

  /**
   * Replay one dead-letter entry
   */
  async replay(entryId: string, ctx: RunContext): Promise<ReplayOutcome> {
    const entry = this.orchestrator.deadLetters.get(entryId);
    if (!entry) {
      return { entry_id: entryId, source_id: null, status: 'not_found' };
    }
    const base: EntryBase = { entry_id: entry.id, source_id: entry.fingerprint.source_id };

    if (entry.replay_status === 'REPLAYED') {
      return { ...base, status: 'not_replayable', detail: 'entry was already replayed' };
    }
    if (await this.claims.isProcessed(entry.fingerprint)) {
      ctx.increment('skipped');
      return { ...base, status: 'already_processed' };
    }

    const document = this.db.getDocument(entry.document_id);
    if (!document) {
      return { ...base, status: 'not_found', detail: `document ${entry.document_id} is missing` };
    }
    const blocked = this.refuse(document, base, ctx);
    if (blocked) return blocked;

    const attempt = await this.claims.tryClaim(entry.fingerprint, `replay:${ctx.workerId}`);
    if (attempt.status === 'already_processed') {
      ctx.increment('skipped');
      return { ...base, status: 'already_processed' };
    }
    if (attempt.status === 'already_claimed') {
      ctx.increment('skipped');
      return {
        ...base,
        status: 'claim_conflict',
        detail: `claimed by ${attempt.owner.worker_id} since ${attempt.owner.claimed_at}`,
      };
    }

    try {
      return await this.resume(entry, attempt.claimId, base, ctx);
    } catch (error) {
      // No-op when the lifecycle already released it
      await this.claims.release(attempt.claimId, 'ABANDONED');
      throw error;
    }
  }

  /**
   * Outcome for a document that must not be replayed, or null if it is still
   * dead-lettered
   */
  private refuse(document: PipelineDocument, base: EntryBase, ctx: RunContext): ReplayOutcome | null {
    if (document.state === 'DEAD_LETTER') return null;
    ctx.increment('skipped');
    if (document.state === 'STORED') {
      return { ...base, status: 'already_processed' };
    }
    return { ...base, status: 'not_replayable', detail: `document is ${document.state}` };
  }

  /**
   * Everything after the claim: re-check the document, mark the entry, and
   * run the lifecycle from the recorded resume point
   */
  private async resume(
    entry: DeadLetterEntry,
    claimId: string,
    base: EntryBase,
    ctx: RunContext
  ): Promise<ReplayOutcome> {
    const { deadLetters, recorder } = this.orchestrator;

    const current = this.db.getDocument(entry.document_id);
    if (!current) {
      await this.claims.release(claimId, 'ABANDONED');
      return { ...base, status: 'not_found', detail: `document ${entry.document_id} is missing` };
    }
    const blocked = this.refuse(current, base, ctx);
    if (blocked) {
      await this.claims.release(claimId, terminalOutcome(current.state) ?? 'ABANDONED');
      return blocked;
    }

    const unfetched = isUnfetched(entry.fingerprint);
    const resumed = this.db.transaction(() => {
      if (!deadLetters.markReplayed(entry.id)) return null;
      if (unfetched) {
        // The placeholder stays dead-lettered; the source is discovered again
        this.db.appendAudit({
          document: current,
          action: 'REPLAY',
          previous_state: current.state,
          new_state: current.state,
          actor: 'replay',
          details: { entry_id: entry.id, failure_kind: entry.failure_kind, claim_id: claimId },
        });
        return current;
      }
      return recorder.force(
        current,
        entry.context.resume_at,
        'REPLAY',
        'replay',
        { last_error: null },
        { entry_id: entry.id, failure_kind: entry.failure_kind, claim_id: claimId }
      );
    });

    if (!resumed) {
      await this.claims.release(claimId, 'ABANDONED');
      return { ...base, status: 'not_replayable', detail: 'entry was replayed concurrently' };
    }

    if (unfetched) {
      await this.claims.release(claimId, 'DEAD_LETTER');
      console.error(`[Replay] ${entry.id}: discovering ${entry.fingerprint.source_id} again`);
      try {
        const outcome = await this.orchestrator.handleCandidate(entry.context.file_ref, ctx);
        return { ...base, status: CANDIDATE_STATUS[outcome] };
      } catch (error) {
        if (!(error instanceof PipelineCancelledError)) throw error;
        return { ...base, status: 'abandoned', detail: 'cancelled before the source was fetched' };
      }
    }

    console.error(
      `[Replay] ${entry.id}: ${entry.fingerprint.source_id} re-entering at ${entry.context.resume_at}`
    );
    const outcome = await this.orchestrator.runLifecycle(resumed, claimId, ctx, {
      resumeAt: entry.context.resume_at,
      bytes: null,
      payload: entry.context.payload,
      provider: entry.context.provider,
    });
    return { ...base, status: CANDIDATE_STATUS[outcome] };
  }

  /**
   * Replay every entry that has `status` when the run starts, oldest first.
   * Entries written by these replays wait for the next run. Cancellation is
   * checked between entries; an entry whose replay throws is reported as
   * failed and the rest still run.
   */
  async replayByStatus(status: ReplayStatus, ctx: RunContext): Promise<ReplayReport> {
    const entryIds = this.snapshot(status);
    const outcomes: ReplayOutcome[] = [];

    console.error(`[Replay] Run ${ctx.runId}: ${entryIds.length} ${status} entries`);
    for (const entryId of entryIds) {
      if (ctx.cancelled) break;
      try {
        outcomes.push(await this.replay(entryId, ctx));
      } catch (error) {
        if (error instanceof PipelineCancelledError) break;
        console.error(`[Replay] ${entryId} failed: ${errorMessage(error)}`);
        ctx.increment('failed');
        outcomes.push({
          entry_id: entryId,
          source_id: this.orchestrator.deadLetters.get(entryId)?.fingerprint.source_id ?? null,
          status: 'failed',
          detail: errorMessage(error),
        });
      }
    }

    const summary = ctx.summary();
    logSummary('Replay', summary);
    return { outcomes, summary };
  }

  private snapshot(status: ReplayStatus): string[] {
    const ids: string[] = [];
    for (let offset = 0; ; offset += BATCH_SIZE) {
      const page = this.orchestrator.deadLetters.query({ status, limit: BATCH_SIZE, offset });
      ids.push(...page.map((entry) => entry.id));
      if (page.length < BATCH_SIZE) return ids;
    }
  }
}
