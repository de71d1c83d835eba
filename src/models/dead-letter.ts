/**
 * Dead-letter interfaces
 *
 * A dead-letter entry is written once and never changes afterwards, apart
 * from its replay status. The context carries what replay needs to resume.
 */

import { z } from 'zod';
import { StructuredPayloadSchema } from './invoice.js';
import type { Fingerprint, PipelineState } from './document.js';

export const REPLAY_STATUSES = ['PENDING', 'REPLAYED', 'ABANDONED'] as const;
export type ReplayStatus = (typeof REPLAY_STATUSES)[number];

export const FAILURE_KINDS = [
  'TRANSIENT_IO_EXHAUSTED',
  'EXTRACTION_PARSE',
  'EXTRACTION_FAILED',
  'STORAGE_WRITE',
  'CONTENT_MISMATCH',
  'INVALID_STATE_TRANSITION',
  'UNCLASSIFIED',
] as const;
export type FailureKind = (typeof FAILURE_KINDS)[number];

/** States a replay may re-enter the lifecycle at */
export const RESUME_POINTS = ['DISCOVERED', 'EXTRACTING'] as const;
export type ResumePoint = (typeof RESUME_POINTS)[number];

export const DeadLetterContextSchema = z.object({
  resume_at: z.enum(RESUME_POINTS),
  file_ref: z.object({
    source_id: z.string(),
    name: z.string(),
    mime_type: z.string(),
  }),
  /** Output of the last successful stage: the extracted payload, when there is one */
  payload: StructuredPayloadSchema.nullable(),
  /** Extraction provider that produced the payload, or that failed */
  provider: z.string().nullable(),
  /** Error class name of the failure */
  error_name: z.string(),
});

export type DeadLetterContext = z.infer<typeof DeadLetterContextSchema>;

export interface DeadLetterEntry {
  /** UUID v4 identifier */
  id: string;
  document_id: string;
  fingerprint: Fingerprint;
  /** State the document was in when the failure escalated */
  stage: PipelineState;
  failure_kind: FailureKind;
  error_message: string;
  context: DeadLetterContext;
  retry_count: number;
  /** ISO 8601 timestamp */
  created_at: string;
  replay_status: ReplayStatus;
}

export interface DeadLetterFilter {
  status?: ReplayStatus;
  limit?: number;
  offset?: number;
}
