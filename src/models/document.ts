/**
 * Document interfaces for the intake pipeline
 *
 * A document is identified by its fingerprint: the ingestion source id plus
 * the hash of the downloaded bytes. The same file edited in place therefore
 * becomes a new document.
 */

import type { StructuredPayload } from './invoice.js';
import type { ValidationResult } from './validation.js';

/**
 * Lifecycle states, in the order a successful document visits them
 */
export const PIPELINE_STATES = [
  'DISCOVERED',
  'CLAIMED',
  'DOWNLOADING',
  'EXTRACTING',
  'VALIDATING',
  'STORED',
  'NEEDS_REVIEW',
  'FAILED',
  'DEAD_LETTER',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>([
  'STORED',
  'NEEDS_REVIEW',
  'DEAD_LETTER',
]);

/** Stages that carry their own retry counter */
export type RetryStage = 'DOWNLOADING' | 'EXTRACTING' | 'STORING';

export type RetryCounts = Record<RetryStage, number>;

export interface Fingerprint {
  /** Identifier assigned by the ingestion source (path, object key, drive id) */
  source_id: string;

  /** SHA-256 of the downloaded bytes (format: 'sha256:...') */
  content_hash: string;
}

/**
 * Reference to a candidate file as listed by an ingestion adapter
 */
export interface FileRef {
  source_id: string;
  name: string;
  mime_type: string;
}

export interface StageHistoryEntry {
  state: PipelineState;
  at: string;
}

/**
 * A document moving through the pipeline
 */
export interface PipelineDocument {
  /** UUID v4 identifier */
  id: string;

  fingerprint: Fingerprint;

  file_ref: FileRef;

  /** Current lifecycle state */
  state: PipelineState;

  /** Every state entered, oldest first */
  stage_history: StageHistoryEntry[];

  /** Populated once extraction succeeds */
  payload: StructuredPayload | null;

  /** Populated once validation runs */
  validation: ValidationResult | null;

  retry_counts: RetryCounts;

  /** Message of the most recent stage failure */
  last_error: string | null;

  /** ISO 8601 timestamp */
  created_at: string;

  /** ISO 8601 timestamp */
  updated_at: string;
}

export function emptyRetryCounts(): RetryCounts {
  return { DOWNLOADING: 0, EXTRACTING: 0, STORING: 0 };
}

/**
 * Content hash of the placeholder document that records fetch failures for a
 * source whose bytes were never read. One per source id.
 */
export const UNFETCHED_CONTENT_HASH = '';

export function unfetchedFingerprint(sourceId: string): Fingerprint {
  return { source_id: sourceId, content_hash: UNFETCHED_CONTENT_HASH };
}

export function isUnfetched(fingerprint: Fingerprint): boolean {
  return fingerprint.content_hash === UNFETCHED_CONTENT_HASH;
}

/**
 * Stable string form of a fingerprint, used as a map key and in log lines
 */
export function fingerprintKey(fingerprint: Fingerprint): string {
  return `${fingerprint.source_id}@${fingerprint.content_hash}`;
}
