/**
 * Adapter interfaces
 *
 * The pipeline core depends only on these. Concrete backends are chosen by
 * configuration in the registry.
 *
 * Every call receives an AbortSignal that fires on timeout or run
 * cancellation; adapters pass it to their in-flight I/O.
 *
 * @module adapters/types
 */

import type { FileRef, Fingerprint } from '../../models/document.js';
import type { StructuredPayload } from '../../models/invoice.js';
import type { RuleCode, ValidationResult } from '../../models/validation.js';

export interface IngestionAdapter {
  readonly name: string;
  /** Candidate files currently available at the source */
  listCandidates(signal?: AbortSignal): AsyncIterable<FileRef>;
  download(ref: FileRef, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface ExtractionResult {
  payload: StructuredPayload;
  /** Provider that produced the payload */
  provider: string;
}

export interface ExtractionAdapter {
  readonly name: string;
  extract(bytes: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<ExtractionResult>;
}

export interface LedgerRecord {
  document_id: string;
  fingerprint: Fingerprint;
  file_ref: FileRef;
  payload: StructuredPayload;
  validation: ValidationResult;
  provider: string | null;
}

export interface RowRef {
  backend: string;
  row_id: string;
  /** False when the fingerprint was already in the ledger */
  created: boolean;
}

export interface StorageAdapter {
  readonly name: string;
  /** Idempotent on fingerprint: a second append returns the existing row */
  append(record: LedgerRecord, signal?: AbortSignal): Promise<RowRef>;
  /** Move the source artifact into the review location for `reasonCode` */
  relocateForReview(ref: FileRef, reasonCode: RuleCode, signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}
