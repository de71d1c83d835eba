/**
 * Transition recorder
 *
 * Applies accepted state changes to the document store. Every change writes
 * the new snapshot guarded by the previous state and appends exactly one
 * audit entry, inside one SQLite transaction.
 *
 * @module pipeline/transitions
 */

import type { DatabaseService } from '../storage/database/index.js';
import type { PipelineDocument, PipelineState } from '../../models/document.js';
import type { AuditAction, AuditActor } from '../../models/audit.js';
import { transition, type TransitionEvent } from './state-machine.js';
import { InvalidTransitionError } from './errors.js';

export type DocumentChanges = Partial<
  Pick<PipelineDocument, 'payload' | 'validation' | 'retry_counts' | 'last_error'>
>;

export class TransitionRecorder {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Apply one table transition without opening a transaction.
   * Callers that group several writes wrap this in `db.transaction`.
   *
   * @throws InvalidTransitionError if the event is not allowed, or if the
   *   stored state no longer matches `doc.state`
   */
  apply(
    doc: PipelineDocument,
    event: TransitionEvent,
    actor: AuditActor,
    changes: DocumentChanges = {},
    details: Record<string, unknown> = {}
  ): PipelineDocument {
    const to = transition(doc, event);
    return this.write(doc, to, event, actor, changes, details);
  }

  /**
   * Apply one table transition in its own transaction
   */
  commit(
    doc: PipelineDocument,
    event: TransitionEvent,
    actor: AuditActor,
    changes: DocumentChanges = {},
    details: Record<string, unknown> = {}
  ): PipelineDocument {
    return this.db.transaction(() => this.apply(doc, event, actor, changes, details));
  }

  /**
   * Move a document outside the transition table (replay, crash recovery or
   * re-discovery re-entry, forced dead-lettering). Still guarded and audited.
   */
  force(
    doc: PipelineDocument,
    to: PipelineState,
    action: Extract<AuditAction, 'REPLAY' | 'RECOVER' | 'REDISCOVER' | 'INTEGRITY_FAULT'>,
    actor: AuditActor,
    changes: DocumentChanges = {},
    details: Record<string, unknown> = {}
  ): PipelineDocument {
    return this.write(doc, to, action, actor, changes, details);
  }

  /**
   * Persist counters or other fields without a state change and without audit
   */
  update(doc: PipelineDocument, changes: DocumentChanges): PipelineDocument {
    const next: PipelineDocument = { ...doc, ...changes, updated_at: new Date().toISOString() };
    if (!this.db.saveDocument(next, doc.state)) {
      throw this.conflict(doc, 'UPDATE');
    }
    return next;
  }

  private write(
    doc: PipelineDocument,
    to: PipelineState,
    action: AuditAction,
    actor: AuditActor,
    changes: DocumentChanges,
    details: Record<string, unknown>
  ): PipelineDocument {
    const now = new Date().toISOString();
    const next: PipelineDocument = {
      ...doc,
      ...changes,
      state: to,
      stage_history: [...doc.stage_history, { state: to, at: now }],
      updated_at: now,
    };

    if (!this.db.saveDocument(next, doc.state)) {
      throw this.conflict(doc, action);
    }
    this.db.appendAudit({
      document: next,
      action,
      previous_state: doc.state,
      new_state: to,
      actor,
      details,
    });
    return next;
  }

  /**
   * The stored state moved under us: report it as an invalid transition from
   * the state actually stored.
   */
  private conflict(doc: PipelineDocument, action: string): InvalidTransitionError {
    const stored = this.db.getDocument(doc.id);
    return new InvalidTransitionError(stored?.state ?? doc.state, action);
  }
}
