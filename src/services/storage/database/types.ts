/**
 * Type definitions for DatabaseService
 *
 * Contains the error class, option types and raw row types used by the
 * database service.
 */

import type { PipelineState } from '../../../models/document.js';

/**
 * Counts of documents per lifecycle state plus related table totals
 */
export interface PipelineStats {
  total_documents: number;
  documents_by_state: Record<PipelineState, number>;
  claims: {
    active: number;
    released: number;
  };
  dead_letters_by_status: {
    PENDING: number;
    REPLAYED: number;
    ABANDONED: number;
  };
  total_review_records: number;
  total_audit_entries: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  DEAD_LETTER_NOT_FOUND = 'DEAD_LETTER_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  CORRUPT_ROW = 'CORRUPT_ROW',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for documents
 */
export interface DocumentRow {
  id: string;
  source_id: string;
  content_hash: string;
  file_name: string;
  mime_type: string;
  state: string;
  stage_history_json: string;
  payload_json: string | null;
  validation_json: string | null;
  retry_downloading: number;
  retry_extracting: number;
  retry_storing: number;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Database row type for claims
 */
export interface ClaimRow {
  claim_id: string;
  source_id: string;
  content_hash: string;
  worker_id: string;
  claimed_at: string;
  released_at: string | null;
  outcome: string | null;
}

/**
 * Database row type for dead letters
 */
export interface DeadLetterRow {
  id: string;
  document_id: string;
  source_id: string;
  content_hash: string;
  stage: string;
  failure_kind: string;
  error_message: string;
  context_json: string;
  retry_count: number;
  created_at: string;
  replay_status: string;
}

/**
 * Database row type for review records
 */
export interface ReviewRecordRow {
  id: string;
  document_id: string;
  source_id: string;
  content_hash: string;
  reason_code: string;
  score: number;
  relocated: number;
  created_at: string;
}

/**
 * Database row type for audit entries
 */
export interface AuditRow {
  id: number;
  document_id: string;
  source_id: string;
  content_hash: string;
  sequence: number;
  action: string;
  previous_state: string | null;
  new_state: string | null;
  actor: string;
  details_json: string;
  created_at: string;
}
