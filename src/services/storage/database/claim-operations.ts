/**
 * Claim Operations
 *
 * Durable idempotency ledger. A claim grants one worker exclusive processing
 * of one fingerprint. Exclusivity rests on two things: the claim is taken
 * inside a BEGIN IMMEDIATE transaction, and a partial unique index allows a
 * single unreleased claim per fingerprint. Claims older than the stale
 * threshold are released as STALE and taken over.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module database/claim-operations
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { Fingerprint } from '../../../models/document.js';
import type { Claim, ClaimAttempt, ClaimOutcome } from '../../../models/claim.js';
import { ClaimRow } from './types.js';
import { rowToClaim } from './converters.js';
import { nowIso } from './helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TryClaimParams {
  fingerprint: Fingerprint;
  worker_id: string;
  /** Active claims older than this are treated as abandoned (0 disables takeover) */
  stale_after_ms: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get the unreleased claim for a fingerprint, if any
 */
export function getActiveClaim(conn: Database.Database, fingerprint: Fingerprint): Claim | null {
  const row = conn
    .prepare<[string, string], ClaimRow>(
      'SELECT * FROM claims WHERE source_id = ? AND content_hash = ? AND released_at IS NULL'
    )
    .get(fingerprint.source_id, fingerprint.content_hash);
  return row ? rowToClaim(row) : null;
}

/**
 * Get a claim by id
 */
export function getClaim(conn: Database.Database, claimId: string): Claim | null {
  const row = conn
    .prepare<[string], ClaimRow>('SELECT * FROM claims WHERE claim_id = ?')
    .get(claimId);
  return row ? rowToClaim(row) : null;
}

/**
 * List every claim ever taken on a fingerprint, oldest first
 */
export function listClaims(conn: Database.Database, fingerprint: Fingerprint): Claim[] {
  return conn
    .prepare<[string, string], ClaimRow>(
      'SELECT * FROM claims WHERE source_id = ? AND content_hash = ? ORDER BY claimed_at, rowid'
    )
    .all(fingerprint.source_id, fingerprint.content_hash)
    .map(rowToClaim);
}

/**
 * True if a prior claim on the fingerprint finished with outcome STORED
 */
export function isProcessed(conn: Database.Database, fingerprint: Fingerprint): boolean {
  const row = conn
    .prepare<[string, string], { found: number }>(
      `SELECT 1 AS found FROM claims
       WHERE source_id = ? AND content_hash = ? AND outcome = 'STORED'
       LIMIT 1`
    )
    .get(fingerprint.source_id, fingerprint.content_hash);
  return row !== undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLAIM LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && /UNIQUE constraint failed/.test(error.message);
}

/**
 * Attempt to claim a fingerprint.
 *
 * Runs as BEGIN IMMEDIATE so that the check-then-insert sequence holds the
 * write lock across processes sharing the database file.
 *
 * @param conn - Database connection
 * @param params - Fingerprint, worker id and stale threshold
 * @returns claimed, already_claimed (with the owner) or already_processed
 */
export function tryClaim(conn: Database.Database, params: TryClaimParams): ClaimAttempt {
  const { fingerprint, worker_id, stale_after_ms } = params;

  const attempt = conn.transaction((): ClaimAttempt => {
    if (isProcessed(conn, fingerprint)) {
      return { status: 'already_processed' };
    }

    const now = nowIso();
    const active = getActiveClaim(conn, fingerprint);
    if (active) {
      const age = Date.parse(now) - Date.parse(active.claimed_at);
      if (stale_after_ms > 0 && age >= stale_after_ms) {
        conn
          .prepare(
            `UPDATE claims SET released_at = ?, outcome = 'STALE'
             WHERE claim_id = ? AND released_at IS NULL`
          )
          .run(now, active.claim_id);
        console.error(
          `[ClaimStore] Released stale claim ${active.claim_id} held by ${active.worker_id} for ${age}ms`
        );
      } else {
        return {
          status: 'already_claimed',
          owner: {
            claim_id: active.claim_id,
            worker_id: active.worker_id,
            claimed_at: active.claimed_at,
          },
        };
      }
    }

    const claimId = uuidv4();
    try {
      conn
        .prepare(
          `INSERT INTO claims (claim_id, source_id, content_hash, worker_id, claimed_at, released_at, outcome)
           VALUES (?, ?, ?, ?, ?, NULL, NULL)`
        )
        .run(claimId, fingerprint.source_id, fingerprint.content_hash, worker_id, now);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      const winner = getActiveClaim(conn, fingerprint);
      if (!winner) throw error;
      return {
        status: 'already_claimed',
        owner: { claim_id: winner.claim_id, worker_id: winner.worker_id, claimed_at: winner.claimed_at },
      };
    }

    return { status: 'claimed', claimId };
  });

  return attempt.immediate();
}

/**
 * Release a claim and record its terminal outcome.
 * Releasing an already released claim is a no-op.
 *
 * @returns true if this call released the claim
 */
export function releaseClaim(
  conn: Database.Database,
  claimId: string,
  outcome: ClaimOutcome
): boolean {
  const result = conn
    .prepare(
      `UPDATE claims SET released_at = ?, outcome = ?
       WHERE claim_id = ? AND released_at IS NULL`
    )
    .run(nowIso(), outcome, claimId);

  if (result.changes === 0 && getClaim(conn, claimId) === null) {
    console.error(`[ClaimStore] Release ignored for unknown claim ${claimId}`);
  }
  return result.changes === 1;
}

/**
 * Count unreleased claims
 */
export function countActiveClaims(conn: Database.Database): number {
  const row = conn
    .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM claims WHERE released_at IS NULL')
    .get();
  return row?.count ?? 0;
}

/**
 * Count unreleased claims taken before `cutoffIso`: candidates for takeover
 */
export function countStaleClaims(conn: Database.Database, cutoffIso: string): number {
  const row = conn
    .prepare<[string], { count: number }>(
      'SELECT COUNT(*) AS count FROM claims WHERE released_at IS NULL AND claimed_at < ?'
    )
    .get(cutoffIso);
  return row?.count ?? 0;
}
