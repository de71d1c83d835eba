/**
 * Statistics operations for DatabaseService
 *
 * Read-only aggregates used by the monitoring tools.
 */

import type Database from 'better-sqlite3';
import { PIPELINE_STATES, type PipelineState } from '../../../models/document.js';
import { PipelineStats } from './types.js';

function count(conn: Database.Database, sql: string): number {
  const row = conn.prepare<[], { count: number }>(sql).get();
  return row?.count ?? 0;
}

/**
 * Get counts per lifecycle state and related totals
 */
export function getStats(conn: Database.Database): PipelineStats {
  const byState: Record<PipelineState, number> = {
    DISCOVERED: 0,
    CLAIMED: 0,
    DOWNLOADING: 0,
    EXTRACTING: 0,
    VALIDATING: 0,
    STORED: 0,
    NEEDS_REVIEW: 0,
    FAILED: 0,
    DEAD_LETTER: 0,
  };
  const stateRows = conn
    .prepare<[], { state: string; count: number }>(
      'SELECT state, COUNT(*) AS count FROM documents GROUP BY state'
    )
    .all();
  let total = 0;
  for (const row of stateRows) {
    const state = PIPELINE_STATES.find((s) => s === row.state);
    if (state) byState[state] = row.count;
    total += row.count;
  }

  const dlRows = conn
    .prepare<[], { replay_status: string; count: number }>(
      'SELECT replay_status, COUNT(*) AS count FROM dead_letters GROUP BY replay_status'
    )
    .all();
  const deadLetters = { PENDING: 0, REPLAYED: 0, ABANDONED: 0 };
  for (const row of dlRows) {
    if (row.replay_status === 'PENDING') deadLetters.PENDING = row.count;
    else if (row.replay_status === 'REPLAYED') deadLetters.REPLAYED = row.count;
    else if (row.replay_status === 'ABANDONED') deadLetters.ABANDONED = row.count;
  }

  return {
    total_documents: total,
    documents_by_state: byState,
    claims: {
      active: count(conn, 'SELECT COUNT(*) AS count FROM claims WHERE released_at IS NULL'),
      released: count(conn, 'SELECT COUNT(*) AS count FROM claims WHERE released_at IS NOT NULL'),
    },
    dead_letters_by_status: deadLetters,
    total_review_records: count(conn, 'SELECT COUNT(*) AS count FROM review_records'),
    total_audit_entries: count(conn, 'SELECT COUNT(*) AS count FROM audit_log'),
  };
}

/**
 * Count DISCOVERED documents that no worker currently holds a claim on
 */
export function getBacklogCount(conn: Database.Database): number {
  return count(
    conn,
    `SELECT COUNT(*) AS count FROM documents d
     WHERE d.state = 'DISCOVERED'
       AND NOT EXISTS (
         SELECT 1 FROM claims c
         WHERE c.source_id = d.source_id
           AND c.content_hash = d.content_hash
           AND c.released_at IS NULL
       )`
  );
}
