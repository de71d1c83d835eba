/**
 * Pipeline Error Classes
 *
 * FAIL-FAST: Errors carry a category so the retry executor and the
 * orchestrator can decide between retry, dead letter and integrity fault
 * without parsing messages.
 *
 * @module pipeline/errors
 */

import type { FailureKind } from '../../models/dead-letter.js';
import type { PipelineState } from '../../models/document.js';

export type PipelineErrorCategory =
  | 'TRANSIENT_IO'
  | 'EXTRACTION_PARSE'
  | 'EXTRACTION_FAILED'
  | 'STORAGE_WRITE'
  | 'CONTENT_MISMATCH'
  | 'INVALID_STATE_TRANSITION'
  | 'CANCELLED';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Network failure, 5xx, rate limit, filesystem hiccup. Retryable.
 */
export class TransientIOError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_IO', details);
    this.name = 'TransientIOError';
  }
}

/**
 * An adapter call exceeded its timeout
 */
export class AdapterTimeoutError extends TransientIOError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, { operation, timeout_ms: timeoutMs });
    this.name = 'AdapterTimeoutError';
  }
}

/**
 * The extractor could not produce a payload. Terminal.
 */
export class ExtractionError extends PipelineError {
  constructor(
    message: string,
    public readonly provider: string | null = null,
    category: 'EXTRACTION_FAILED' | 'EXTRACTION_PARSE' = 'EXTRACTION_FAILED'
  ) {
    super(message, category, provider === null ? undefined : { provider });
    this.name = 'ExtractionError';
  }
}

/**
 * Model output stayed malformed after the corrective re-prompt. Terminal.
 */
export class ExtractionParseError extends ExtractionError {
  constructor(
    message: string,
    provider: string | null,
    public readonly rawOutput: string
  ) {
    super(message, provider, 'EXTRACTION_PARSE');
    this.name = 'ExtractionParseError';
  }
}

/**
 * The ledger write failed. Retryable, then dead-lettered.
 */
export class StorageWriteError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_WRITE', details);
    this.name = 'StorageWriteError';
  }
}

/**
 * Bytes re-downloaded on replay or recovery no longer match the fingerprint. Terminal.
 */
export class ContentMismatchError extends PipelineError {
  constructor(sourceId: string, expected: string, actual: string) {
    super(`Content of ${sourceId} changed: expected ${expected}, got ${actual}`, 'CONTENT_MISMATCH', {
      source_id: sourceId,
      expected,
      actual,
    });
    this.name = 'ContentMismatchError';
  }
}

/**
 * A (state, event) pair outside the transition table. Indicates a defect.
 */
export class InvalidTransitionError extends PipelineError {
  constructor(
    public readonly from: PipelineState,
    public readonly event: string
  ) {
    super(`Invalid transition: ${event} is not allowed from ${from}`, 'INVALID_STATE_TRANSITION', {
      from,
      event,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * The run was cancelled while a document was in flight
 */
export class PipelineCancelledError extends PipelineError {
  constructor(message = 'Pipeline run cancelled') {
    super(message, 'CANCELLED');
    this.name = 'PipelineCancelledError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Detect errors that look like a server or network failure rather than
 * a client mistake: HTTP 429/5xx, rate-limit text, socket-level codes.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const cause: unknown = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const causeCode =
    typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : '';
  const combined = `${error.message} ${causeMsg} ${causeCode}`;

  if (/\b(429|500|502|503|504)\b/.test(combined)) {
    return true;
  }
  if (/rate.?limit/i.test(combined)) {
    return true;
  }
  return /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|EBUSY|socket hang up|fetch failed/i.test(
    combined
  );
}

/**
 * Map an escalated error to the dead-letter failure kind
 */
export function failureKindOf(error: unknown): FailureKind {
  if (error instanceof InvalidTransitionError) return 'INVALID_STATE_TRANSITION';
  if (error instanceof ContentMismatchError) return 'CONTENT_MISMATCH';
  if (error instanceof ExtractionParseError) return 'EXTRACTION_PARSE';
  if (error instanceof ExtractionError) return 'EXTRACTION_FAILED';
  if (error instanceof StorageWriteError) return 'STORAGE_WRITE';
  if (error instanceof TransientIOError || isServerError(error)) return 'TRANSIENT_IO_EXHAUSTED';
  return 'UNCLASSIFIED';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
