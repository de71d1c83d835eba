/**
 * Audit trail interfaces
 *
 * Audit entries are append-only. Sequence numbers are per fingerprint and
 * start at 1.
 */

import type { Fingerprint, PipelineState } from './document.js';

export const AUDIT_ACTORS = ['system', 'replay', 'manual'] as const;
export type AuditActor = (typeof AUDIT_ACTORS)[number];

/**
 * Transition events plus the out-of-table actions that move a document:
 * replay and crash recovery re-entry, re-discovery of a source that could
 * not be fetched, and forced dead-lettering after an integrity fault.
 */
export const AUDIT_ACTIONS = [
  'CLAIM',
  'START_DOWNLOAD',
  'DOWNLOADED',
  'EXTRACTED',
  'ACCEPT',
  'ROUTE_TO_REVIEW',
  'FAIL',
  'RETRY',
  'EXHAUST',
  'REPLAY',
  'RECOVER',
  'REDISCOVER',
  'INTEGRITY_FAULT',
  'ABANDON',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface AuditEntry {
  id: number;
  document_id: string;
  fingerprint: Fingerprint;
  sequence: number;
  action: AuditAction;
  previous_state: PipelineState | null;
  new_state: PipelineState | null;
  actor: AuditActor;
  details: Record<string, unknown>;
  /** ISO 8601 timestamp */
  created_at: string;
}
