/**
 * Document operations for DatabaseService
 *
 * Handles insert, lookup, listing and guarded state updates for documents.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import {
  emptyRetryCounts,
  type FileRef,
  type Fingerprint,
  type PipelineDocument,
  type PipelineState,
} from '../../../models/document.js';
import { DocumentRow } from './types.js';
import { nowIso, runWithConstraintCheck } from './helpers.js';
import { rowToDocument } from './converters.js';

/**
 * Insert a newly discovered document in state DISCOVERED
 *
 * @param conn - Database connection
 * @param fileRef - Candidate as listed by the ingestion adapter
 * @param fingerprint - Source id plus content hash of the downloaded bytes
 * @returns The inserted document
 */
export function insertDocument(
  conn: Database.Database,
  fileRef: FileRef,
  fingerprint: Fingerprint
): PipelineDocument {
  const now = nowIso();
  const doc: PipelineDocument = {
    id: uuidv4(),
    fingerprint,
    file_ref: fileRef,
    state: 'DISCOVERED',
    stage_history: [{ state: 'DISCOVERED', at: now }],
    payload: null,
    validation: null,
    retry_counts: emptyRetryCounts(),
    last_error: null,
    created_at: now,
    updated_at: now,
  };

  const stmt = conn.prepare(`
    INSERT INTO documents (
      id, source_id, content_hash, file_name, mime_type, state, stage_history_json,
      payload_json, validation_json, retry_downloading, retry_extracting, retry_storing,
      last_error, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, NULL, NULL, 0, 0, 0, NULL, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      doc.id,
      fingerprint.source_id,
      fingerprint.content_hash,
      fileRef.name,
      fileRef.mime_type,
      doc.state,
      JSON.stringify(doc.stage_history),
      now,
      now,
    ],
    `inserting document ${fingerprint.source_id}`
  );

  return doc;
}

/**
 * Get a document by id
 */
export function getDocument(conn: Database.Database, id: string): PipelineDocument | null {
  const row = conn.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(id);
  return row ? rowToDocument(row) : null;
}

/**
 * Get a document by fingerprint
 */
export function getDocumentByFingerprint(
  conn: Database.Database,
  fingerprint: Fingerprint
): PipelineDocument | null {
  const row = conn
    .prepare<[string, string], DocumentRow>(
      'SELECT * FROM documents WHERE source_id = ? AND content_hash = ?'
    )
    .get(fingerprint.source_id, fingerprint.content_hash);
  return row ? rowToDocument(row) : null;
}

/**
 * Persist a document snapshot, but only if its stored state still equals
 * `expectedState`. Returns false when another writer moved the document first.
 *
 * @param conn - Database connection
 * @param doc - Full document snapshot to write
 * @param expectedState - State the caller read before deciding the change
 */
export function saveDocument(
  conn: Database.Database,
  doc: PipelineDocument,
  expectedState: PipelineState
): boolean {
  const result = conn
    .prepare(
      `
    UPDATE documents SET
      state = ?, stage_history_json = ?, payload_json = ?, validation_json = ?,
      retry_downloading = ?, retry_extracting = ?, retry_storing = ?,
      last_error = ?, updated_at = ?
    WHERE id = ? AND state = ?
  `
    )
    .run(
      doc.state,
      JSON.stringify(doc.stage_history),
      doc.payload === null ? null : JSON.stringify(doc.payload),
      doc.validation === null ? null : JSON.stringify(doc.validation),
      doc.retry_counts.DOWNLOADING,
      doc.retry_counts.EXTRACTING,
      doc.retry_counts.STORING,
      doc.last_error,
      doc.updated_at,
      doc.id,
      expectedState
    );
  return result.changes === 1;
}

/**
 * Count documents in a given state
 */
export function countDocumentsInState(conn: Database.Database, state: PipelineState): number {
  const row = conn
    .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM documents WHERE state = ?')
    .get(state);
  return row?.count ?? 0;
}
