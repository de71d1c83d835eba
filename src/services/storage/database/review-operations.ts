/**
 * Review Record Operations
 *
 * @module database/review-operations
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { PipelineDocument } from '../../../models/document.js';
import type { ReviewRecord } from '../../../models/review.js';
import type { RuleCode } from '../../../models/validation.js';
import { ReviewRecordRow } from './types.js';
import { rowToReviewRecord } from './converters.js';
import { nowIso, runWithConstraintCheck } from './helpers.js';

export interface InsertReviewParams {
  document: PipelineDocument;
  reason_code: RuleCode;
  score: number;
  relocated: boolean;
}

/**
 * Insert one review record
 */
export function insertReviewRecord(
  conn: Database.Database,
  params: InsertReviewParams
): ReviewRecord {
  const record: ReviewRecord = {
    id: uuidv4(),
    document_id: params.document.id,
    fingerprint: params.document.fingerprint,
    reason_code: params.reason_code,
    score: params.score,
    relocated: params.relocated,
    created_at: nowIso(),
  };

  runWithConstraintCheck(
    conn.prepare(`
      INSERT INTO review_records (
        id, document_id, source_id, content_hash, reason_code, score, relocated, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `),
    [
      record.id,
      record.document_id,
      record.fingerprint.source_id,
      record.fingerprint.content_hash,
      record.reason_code,
      record.score,
      record.relocated ? 1 : 0,
      record.created_at,
    ],
    `inserting review record for document ${record.document_id}`
  );

  return record;
}

/**
 * List review records, newest first
 */
export function listReviewRecords(
  conn: Database.Database,
  options?: { limit?: number; offset?: number }
): ReviewRecord[] {
  return conn
    .prepare<[number, number], ReviewRecordRow>(
      'SELECT * FROM review_records ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?'
    )
    .all(options?.limit ?? 50, options?.offset ?? 0)
    .map(rowToReviewRecord);
}

/**
 * List review records for one document
 */
export function getReviewRecordsForDocument(
  conn: Database.Database,
  documentId: string
): ReviewRecord[] {
  return conn
    .prepare<[string], ReviewRecordRow>(
      'SELECT * FROM review_records WHERE document_id = ? ORDER BY created_at, rowid'
    )
    .all(documentId)
    .map(rowToReviewRecord);
}
