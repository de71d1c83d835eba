/**
 * Claim Store
 *
 * Durable exclusive claims keyed by fingerprint. The SQLite implementation
 * is the source of truth; the cached wrapper only remembers positive
 * "already processed" answers within one run.
 *
 * @module pipeline/claim-store
 */

import type { DatabaseService } from '../storage/database/index.js';
import type { ClaimAttempt, ClaimOutcome } from '../../models/claim.js';
import { fingerprintKey, type Fingerprint } from '../../models/document.js';

export interface ClaimStore {
  tryClaim(fingerprint: Fingerprint, workerId: string): Promise<ClaimAttempt>;
  /** Idempotent; returns true if this call released the claim */
  release(claimId: string, outcome: ClaimOutcome): Promise<boolean>;
  isProcessed(fingerprint: Fingerprint): Promise<boolean>;
  isReachable(): Promise<boolean>;
}

export class SqliteClaimStore implements ClaimStore {
  constructor(
    private readonly db: DatabaseService,
    private readonly staleAfterMs: number
  ) {}

  async tryClaim(fingerprint: Fingerprint, workerId: string): Promise<ClaimAttempt> {
    return this.db.tryClaim({
      fingerprint,
      worker_id: workerId,
      stale_after_ms: this.staleAfterMs,
    });
  }

  async release(claimId: string, outcome: ClaimOutcome): Promise<boolean> {
    return this.db.releaseClaim(claimId, outcome);
  }

  async isProcessed(fingerprint: Fingerprint): Promise<boolean> {
    return this.db.isProcessed(fingerprint);
  }

  async isReachable(): Promise<boolean> {
    return this.db.isReachable();
  }
}

/**
 * Run-scoped cache in front of a ClaimStore.
 *
 * Only positive isProcessed answers are cached: a fingerprint that is not
 * processed yet may become processed by another worker at any moment.
 */
export class CachedClaimStore implements ClaimStore {
  private readonly processed = new Set<string>();

  constructor(private readonly inner: ClaimStore) {}

  async tryClaim(fingerprint: Fingerprint, workerId: string): Promise<ClaimAttempt> {
    const attempt = await this.inner.tryClaim(fingerprint, workerId);
    if (attempt.status === 'already_processed') {
      this.processed.add(fingerprintKey(fingerprint));
    }
    return attempt;
  }

  async release(claimId: string, outcome: ClaimOutcome): Promise<boolean> {
    return this.inner.release(claimId, outcome);
  }

  async isProcessed(fingerprint: Fingerprint): Promise<boolean> {
    const key = fingerprintKey(fingerprint);
    if (this.processed.has(key)) return true;
    const processed = await this.inner.isProcessed(fingerprint);
    if (processed) this.processed.add(key);
    return processed;
  }

  async isReachable(): Promise<boolean> {
    return this.inner.isReachable();
  }

  invalidate(fingerprint: Fingerprint): void {
    this.processed.delete(fingerprintKey(fingerprint));
  }

  clear(): void {
    this.processed.clear();
  }

  get size(): number {
    return this.processed.size;
  }
}
