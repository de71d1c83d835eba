/**
 * Claim interfaces
 *
 * A claim is the durable, exclusive right of one worker to process one
 * fingerprint. At most one unreleased claim exists per fingerprint.
 */

import type { Fingerprint } from './document.js';

export const CLAIM_OUTCOMES = [
  'STORED',
  'NEEDS_REVIEW',
  'DEAD_LETTER',
  'ABANDONED',
  'STALE',
] as const;

export type ClaimOutcome = (typeof CLAIM_OUTCOMES)[number];

export interface Claim {
  /** UUID v4 identifier */
  claim_id: string;
  fingerprint: Fingerprint;
  worker_id: string;
  /** ISO 8601 timestamp */
  claimed_at: string;
  /** ISO 8601 timestamp, null while the claim is active */
  released_at: string | null;
  outcome: ClaimOutcome | null;
}

export interface ClaimOwner {
  claim_id: string;
  worker_id: string;
  claimed_at: string;
}

/**
 * Result of a claim attempt.
 * `already_processed` is reported instead of a claim when a prior claim
 * on the fingerprint finished with outcome STORED.
 */
export type ClaimAttempt =
  | { status: 'claimed'; claimId: string }
  | { status: 'already_claimed'; owner: ClaimOwner }
  | { status: 'already_processed' };
