/**
 * Audit Log Operations
 *
 * Appends and reads the per-fingerprint audit trail. Sequence numbers are
 * allocated inside the caller's transaction as MAX(sequence) + 1.
 *
 * @module database/audit-operations
 */

import type Database from 'better-sqlite3';
import type { PipelineDocument, PipelineState } from '../../../models/document.js';
import type { AuditAction, AuditActor, AuditEntry } from '../../../models/audit.js';
import { AuditRow } from './types.js';
import { rowToAuditEntry } from './converters.js';
import { nowIso } from './helpers.js';

export interface AppendAuditParams {
  document: PipelineDocument;
  action: AuditAction;
  previous_state: PipelineState | null;
  new_state: PipelineState | null;
  actor: AuditActor;
  details?: Record<string, unknown>;
}

/**
 * Append one audit entry
 *
 * @returns The sequence number assigned to the entry
 */
export function appendAudit(conn: Database.Database, params: AppendAuditParams): number {
  const { source_id, content_hash } = params.document.fingerprint;
  const next = conn
    .prepare<[string, string], { next: number }>(
      `SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM audit_log
       WHERE source_id = ? AND content_hash = ?`
    )
    .get(source_id, content_hash);
  const sequence = next?.next ?? 1;

  conn
    .prepare(
      `
    INSERT INTO audit_log (
      document_id, source_id, content_hash, sequence, action,
      previous_state, new_state, actor, details_json, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `
    )
    .run(
      params.document.id,
      source_id,
      content_hash,
      sequence,
      params.action,
      params.previous_state,
      params.new_state,
      params.actor,
      JSON.stringify(params.details ?? {}),
      nowIso()
    );

  return sequence;
}

/**
 * Audit trail for a document, in sequence order
 */
export function getAuditTrail(conn: Database.Database, documentId: string): AuditEntry[] {
  return conn
    .prepare<[string], AuditRow>('SELECT * FROM audit_log WHERE document_id = ? ORDER BY sequence')
    .all(documentId)
    .map(rowToAuditEntry);
}
