/**
 * Review Router
 *
 * A document whose validation did not pass goes to manual review. That is a
 * terminal outcome, not a failure, and is never retried automatically.
 *
 * Order: decide the transition, ask storage to relocate the artifact once,
 * then commit the review record, the NEEDS_REVIEW state and its audit entry
 * in one transaction. A failed relocation is logged and recorded as
 * relocated=false; the review still stands.
 *
 * @module pipeline/review-router
 */

import type { DatabaseService } from '../storage/database/index.js';
import type { StorageAdapter } from '../adapters/types.js';
import type { PipelineDocument } from '../../models/document.js';
import type { ReviewRecord } from '../../models/review.js';
import type { RuleCode, ValidationResult } from '../../models/validation.js';
import type { RunContext } from './context.js';
import type { TransitionRecorder } from './transitions.js';
import { transition } from './state-machine.js';
import { withTimeout } from './timeout.js';
import { PipelineCancelledError, errorMessage } from './errors.js';

export interface ReviewRouting {
  document: PipelineDocument;
  record: ReviewRecord;
}

export class ReviewRouter {
  constructor(
    private readonly db: DatabaseService,
    private readonly recorder: TransitionRecorder,
    private readonly storage: StorageAdapter,
    private readonly relocateTimeoutMs: number
  ) {}

  async routeToReview(
    document: PipelineDocument,
    validation: ValidationResult,
    reasonCode: RuleCode,
    ctx: RunContext
  ): Promise<ReviewRouting> {
    // Fails with InvalidTransitionError before any side effect
    transition(document, 'ROUTE_TO_REVIEW');

    const relocated = await this.relocate(document, reasonCode, ctx);

    return this.db.transaction(() => {
      const record = this.db.insertReviewRecord({
        document,
        reason_code: reasonCode,
        score: validation.confidence,
        relocated,
      });
      const next = this.recorder.apply(
        document,
        'ROUTE_TO_REVIEW',
        ctx.actor,
        { validation },
        { review_id: record.id, reason_code: reasonCode, relocated }
      );
      console.error(
        `[ReviewRouter] ${document.fingerprint.source_id} routed to review (${reasonCode}, score ${validation.confidence})`
      );
      return { document: next, record };
    });
  }

  private async relocate(document: PipelineDocument, reasonCode: RuleCode, ctx: RunContext): Promise<boolean> {
    try {
      await withTimeout(
        'relocate',
        this.relocateTimeoutMs,
        (signal) => this.storage.relocateForReview(document.file_ref, reasonCode, signal),
        ctx.signal
      );
      return true;
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      console.error(
        `[ReviewRouter] Relocation of ${document.file_ref.source_id} failed: ${errorMessage(error)}`
      );
      return false;
    }
  }
}
