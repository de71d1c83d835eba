/**
 * Dead-Letter Operations
 *
 * Append-only log of documents that failed terminally. Only replay_status
 * may change after insert; a trigger rejects any other update.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module database/dead-letter-operations
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { PipelineDocument, PipelineState } from '../../../models/document.js';
import type {
  DeadLetterContext,
  DeadLetterEntry,
  DeadLetterFilter,
  FailureKind,
  ReplayStatus,
} from '../../../models/dead-letter.js';
import { DeadLetterRow } from './types.js';
import { rowToDeadLetter } from './converters.js';
import { nowIso, runWithConstraintCheck } from './helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecordDeadLetterParams {
  document: PipelineDocument;
  stage: PipelineState;
  failure_kind: FailureKind;
  error_message: string;
  context: DeadLetterContext;
  retry_count: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEAD-LETTER OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Append a dead-letter entry
 *
 * @param conn - Database connection
 * @param params - Failed document, stage, kind and resume context
 * @returns The stored entry
 */
export function insertDeadLetter(
  conn: Database.Database,
  params: RecordDeadLetterParams
): DeadLetterEntry {
  const entry: DeadLetterEntry = {
    id: uuidv4(),
    document_id: params.document.id,
    fingerprint: params.document.fingerprint,
    stage: params.stage,
    failure_kind: params.failure_kind,
    error_message: params.error_message,
    context: params.context,
    retry_count: params.retry_count,
    created_at: nowIso(),
    replay_status: 'PENDING',
  };

  runWithConstraintCheck(
    conn.prepare(`
      INSERT INTO dead_letters (
        id, document_id, source_id, content_hash, stage, failure_kind,
        error_message, context_json, retry_count, created_at, replay_status
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    [
      entry.id,
      entry.document_id,
      entry.fingerprint.source_id,
      entry.fingerprint.content_hash,
      entry.stage,
      entry.failure_kind,
      entry.error_message,
      JSON.stringify(entry.context),
      entry.retry_count,
      entry.created_at,
      entry.replay_status,
    ],
    `inserting dead letter for document ${entry.document_id}`
  );

  return entry;
}

/**
 * Get a dead-letter entry by id
 */
export function getDeadLetter(conn: Database.Database, id: string): DeadLetterEntry | null {
  const row = conn
    .prepare<[string], DeadLetterRow>('SELECT * FROM dead_letters WHERE id = ?')
    .get(id);
  return row ? rowToDeadLetter(row) : null;
}

/**
 * List dead-letter entries, oldest first, optionally filtered by replay status
 */
export function listDeadLetters(
  conn: Database.Database,
  filter?: DeadLetterFilter
): DeadLetterEntry[] {
  const limit = filter?.limit ?? 50;
  const offset = filter?.offset ?? 0;

  const rows = filter?.status
    ? conn
        .prepare<[string, number, number], DeadLetterRow>(
          `SELECT * FROM dead_letters WHERE replay_status = ?
           ORDER BY created_at, rowid LIMIT ? OFFSET ?`
        )
        .all(filter.status, limit, offset)
    : conn
        .prepare<[number, number], DeadLetterRow>(
          'SELECT * FROM dead_letters ORDER BY created_at, rowid LIMIT ? OFFSET ?'
        )
        .all(limit, offset);

  return rows.map(rowToDeadLetter);
}

/**
 * Count dead-letter entries, optionally filtered by replay status
 */
export function countDeadLetters(conn: Database.Database, status?: ReplayStatus): number {
  const row = status
    ? conn
        .prepare<[string], { count: number }>(
          'SELECT COUNT(*) AS count FROM dead_letters WHERE replay_status = ?'
        )
        .get(status)
    : conn.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM dead_letters').get();
  return row?.count ?? 0;
}

/**
 * True if the document has an entry still waiting for replay
 */
export function hasPendingDeadLetter(conn: Database.Database, documentId: string): boolean {
  const row = conn
    .prepare<[string], { found: number }>(
      `SELECT 1 AS found FROM dead_letters
       WHERE document_id = ? AND replay_status = 'PENDING'
       LIMIT 1`
    )
    .get(documentId);
  return row !== undefined;
}

/**
 * Move an entry to a new replay status, but only from one of the allowed
 * current statuses. Returns false if the entry was not in an allowed status.
 */
export function updateReplayStatus(
  conn: Database.Database,
  id: string,
  next: ReplayStatus,
  allowedFrom: readonly ReplayStatus[]
): boolean {
  if (allowedFrom.length === 0) return false;
  const placeholders = allowedFrom.map(() => '?').join(', ');
  const result = conn
    .prepare(
      `UPDATE dead_letters SET replay_status = ?
       WHERE id = ? AND replay_status IN (${placeholders})`
    )
    .run(next, id, ...allowedFrom);
  return result.changes === 1;
}
