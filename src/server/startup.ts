/**
 * Shared Startup Validation
 *
 * Checks run before any document is touched. Used by the poll, replay and
 * abandon commands.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import type { ClaimStore } from '../services/pipeline/claim-store.js';
import type { PipelineConfig } from './config.js';
import { claimStoreUnreachableError } from './errors.js';

/**
 * Fail fast when the claim store does not answer: no work happens without it.
 *
 * @throws MCPError CLAIM_STORE_UNREACHABLE
 */
export async function validateStartup(claims: ClaimStore, config: PipelineConfig): Promise<void> {
  if (!(await claims.isReachable())) {
    throw claimStoreUnreachableError(config.dbPath);
  }

  console.error(
    `[Startup] worker=${config.workerId} db=${config.dbPath} inbox=${config.ingestion.inboxDir} ` +
      `providers=${config.extraction.providers.join('>')} ledger=${config.ledger.backend}:${config.ledger.path}`
  );
}
