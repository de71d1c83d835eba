/**
 * Dead-Letter Store
 *
 * Append-only record of documents that failed terminally. Entries never
 * change except for their replay status, and only along
 * PENDING -> REPLAYED, PENDING -> ABANDONED, ABANDONED -> REPLAYED.
 *
 * @module pipeline/dead-letter
 */

import type { DatabaseService } from '../storage/database/index.js';
import type { PipelineDocument, PipelineState } from '../../models/document.js';
import type {
  DeadLetterContext,
  DeadLetterEntry,
  DeadLetterFilter,
  FailureKind,
  ReplayStatus,
} from '../../models/dead-letter.js';
import type { AuditActor } from '../../models/audit.js';

export class DeadLetterStore {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Append an entry. Call inside the transaction that moves the document to
   * DEAD_LETTER so both land together.
   */
  record(
    document: PipelineDocument,
    stage: PipelineState,
    failureKind: FailureKind,
    context: DeadLetterContext,
    errorMessage: string,
    retryCount: number
  ): DeadLetterEntry {
    const entry = this.db.insertDeadLetter({
      document,
      stage,
      failure_kind: failureKind,
      error_message: errorMessage,
      context,
      retry_count: retryCount,
    });
    console.error(
      `[DeadLetter] ${entry.id} recorded for ${document.fingerprint.source_id} at ${stage}: ${failureKind}`
    );
    return entry;
  }

  get(entryId: string): DeadLetterEntry | null {
    return this.db.getDeadLetter(entryId);
  }

  query(filter: DeadLetterFilter = {}): DeadLetterEntry[] {
    return this.db.listDeadLetters(filter);
  }

  count(status?: ReplayStatus): number {
    return this.db.countDeadLetters(status);
  }

  hasPending(documentId: string): boolean {
    return this.db.hasPendingDeadLetter(documentId);
  }

  /**
   * Conditionally mark an entry REPLAYED. False if it was already replayed
   * (or does not exist), so two replayers cannot both win.
   */
  markReplayed(entryId: string): boolean {
    return this.db.updateReplayStatus(entryId, 'REPLAYED', ['PENDING', 'ABANDONED']);
  }

  /**
   * Operator decision to give up on an entry. Only PENDING entries can be
   * abandoned; the change is audited against the document.
   */
  abandon(entryId: string, actor: AuditActor = 'manual'): boolean {
    return this.db.transaction(() => {
      const entry = this.db.getDeadLetter(entryId);
      if (!entry) return false;
      if (!this.db.updateReplayStatus(entryId, 'ABANDONED', ['PENDING'])) return false;

      const document = this.db.getDocument(entry.document_id);
      if (document) {
        this.db.appendAudit({
          document,
          action: 'ABANDON',
          previous_state: document.state,
          new_state: document.state,
          actor,
          details: { entry_id: entryId },
        });
      }
      return true;
    });
  }
}
