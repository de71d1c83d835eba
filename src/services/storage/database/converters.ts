/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces. JSON columns are
 * re-validated on the way out; a row that fails validation is reported as
 * corrupt instead of being passed on half-typed.
 */

import { z } from 'zod';
import { PIPELINE_STATES, type PipelineDocument, type PipelineState } from '../../../models/document.js';
import { StructuredPayloadSchema } from '../../../models/invoice.js';
import { RULE_CODES, ValidationResultSchema, type RuleCode } from '../../../models/validation.js';
import { CLAIM_OUTCOMES, type Claim, type ClaimOutcome } from '../../../models/claim.js';
import {
  DeadLetterContextSchema,
  FAILURE_KINDS,
  REPLAY_STATUSES,
  type DeadLetterEntry,
} from '../../../models/dead-letter.js';
import type { ReviewRecord } from '../../../models/review.js';
import { AUDIT_ACTIONS, AUDIT_ACTORS, type AuditEntry } from '../../../models/audit.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type AuditRow,
  type ClaimRow,
  type DeadLetterRow,
  type DocumentRow,
  type ReviewRecordRow,
} from './types.js';

const StageHistorySchema = z.array(
  z.object({
    state: z.enum(PIPELINE_STATES),
    at: z.string(),
  })
);

const DetailsSchema = z.record(z.unknown());

/**
 * Validate that a string value is a member of a closed set at runtime.
 * Throws a descriptive error if the value is invalid, preventing silent data corruption.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string | number
): T {
  const match = validValues.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" in record ${String(id)}. Valid values: ${validValues.join(', ')}`,
      DatabaseErrorCode.CORRUPT_ROW
    );
  }
  return match;
}

/**
 * Parse a JSON column and validate it against a schema
 */
function parseJsonColumn<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: string,
  column: string,
  id: string | number
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DatabaseError(
      `Corrupt ${column} in record ${String(id)}: not valid JSON`,
      DatabaseErrorCode.CORRUPT_ROW,
      error
    );
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DatabaseError(
      `Corrupt ${column} in record ${String(id)}: ${result.error.errors.map((e) => e.message).join('; ')}`,
      DatabaseErrorCode.CORRUPT_ROW,
      result.error
    );
  }
  return result.data;
}

function toState(value: string, id: string | number): PipelineState {
  return validateEnum(value, PIPELINE_STATES, 'PipelineState', id);
}

function toNullableState(value: string | null, id: string | number): PipelineState | null {
  return value === null ? null : toState(value, id);
}

/**
 * Convert document row to PipelineDocument interface
 */
export function rowToDocument(row: DocumentRow): PipelineDocument {
  return {
    id: row.id,
    fingerprint: { source_id: row.source_id, content_hash: row.content_hash },
    file_ref: { source_id: row.source_id, name: row.file_name, mime_type: row.mime_type },
    state: toState(row.state, row.id),
    stage_history: parseJsonColumn(StageHistorySchema, row.stage_history_json, 'stage_history_json', row.id),
    payload:
      row.payload_json === null
        ? null
        : parseJsonColumn(StructuredPayloadSchema, row.payload_json, 'payload_json', row.id),
    validation:
      row.validation_json === null
        ? null
        : parseJsonColumn(ValidationResultSchema, row.validation_json, 'validation_json', row.id),
    retry_counts: {
      DOWNLOADING: row.retry_downloading,
      EXTRACTING: row.retry_extracting,
      STORING: row.retry_storing,
    },
    last_error: row.last_error,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Convert claim row to Claim interface
 */
export function rowToClaim(row: ClaimRow): Claim {
  const outcome: ClaimOutcome | null =
    row.outcome === null ? null : validateEnum(row.outcome, CLAIM_OUTCOMES, 'ClaimOutcome', row.claim_id);
  return {
    claim_id: row.claim_id,
    fingerprint: { source_id: row.source_id, content_hash: row.content_hash },
    worker_id: row.worker_id,
    claimed_at: row.claimed_at,
    released_at: row.released_at,
    outcome,
  };
}

/**
 * Convert dead-letter row to DeadLetterEntry interface
 */
export function rowToDeadLetter(row: DeadLetterRow): DeadLetterEntry {
  return {
    id: row.id,
    document_id: row.document_id,
    fingerprint: { source_id: row.source_id, content_hash: row.content_hash },
    stage: toState(row.stage, row.id),
    failure_kind: validateEnum(row.failure_kind, FAILURE_KINDS, 'FailureKind', row.id),
    error_message: row.error_message,
    context: parseJsonColumn(DeadLetterContextSchema, row.context_json, 'context_json', row.id),
    retry_count: row.retry_count,
    created_at: row.created_at,
    replay_status: validateEnum(row.replay_status, REPLAY_STATUSES, 'ReplayStatus', row.id),
  };
}

/**
 * Convert review row to ReviewRecord interface
 */
export function rowToReviewRecord(row: ReviewRecordRow): ReviewRecord {
  const reasonCode: RuleCode = validateEnum(row.reason_code, RULE_CODES, 'RuleCode', row.id);
  return {
    id: row.id,
    document_id: row.document_id,
    fingerprint: { source_id: row.source_id, content_hash: row.content_hash },
    reason_code: reasonCode,
    score: row.score,
    relocated: row.relocated === 1,
    created_at: row.created_at,
  };
}

/**
 * Convert audit row to AuditEntry interface
 */
export function rowToAuditEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    document_id: row.document_id,
    fingerprint: { source_id: row.source_id, content_hash: row.content_hash },
    sequence: row.sequence,
    action: validateEnum(row.action, AUDIT_ACTIONS, 'AuditAction', row.id),
    previous_state: toNullableState(row.previous_state, row.id),
    new_state: toNullableState(row.new_state, row.id),
    actor: validateEnum(row.actor, AUDIT_ACTORS, 'AuditActor', row.id),
    details: parseJsonColumn(DetailsSchema, row.details_json, 'details_json', row.id),
    created_at: row.created_at,
  };
}
