/**
 * DatabaseService class for all pipeline persistence
 *
 * Owns one better-sqlite3 connection and delegates to the *-operations
 * modules. Uses prepared statements throughout.
 */

import Database from 'better-sqlite3';
import type { FileRef, Fingerprint, PipelineDocument, PipelineState } from '../../../models/document.js';
import type { Claim, ClaimAttempt, ClaimOutcome } from '../../../models/claim.js';
import type { DeadLetterEntry, DeadLetterFilter, ReplayStatus } from '../../../models/dead-letter.js';
import type { ReviewRecord } from '../../../models/review.js';
import type { AuditEntry } from '../../../models/audit.js';
import { PipelineStats } from './types.js';
import { openDatabase, openExistingDatabase } from './static-operations.js';
import { checkSchemaVersion, verifySchema } from '../migrations/index.js';
import { getStats, getBacklogCount } from './stats-operations.js';
import * as docOps from './document-operations.js';
import * as claimOps from './claim-operations.js';
import type { TryClaimParams } from './claim-operations.js';
import * as dlOps from './dead-letter-operations.js';
import type { RecordDeadLetterParams } from './dead-letter-operations.js';
import * as reviewOps from './review-operations.js';
import type { InsertReviewParams } from './review-operations.js';
import * as auditOps from './audit-operations.js';
import type { AppendAuditParams } from './audit-operations.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly path: string;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /** Open the database at `path`, creating and initializing it if needed */
  static open(path: string): DatabaseService {
    const result = openDatabase(path);
    return new DatabaseService(result.db, result.path);
  }

  /** Open an existing database; fails if the file is missing */
  static openExisting(path: string): DatabaseService {
    const result = openExistingDatabase(path);
    return new DatabaseService(result.db, result.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  /** True if the connection is open and answers a trivial query */
  isReachable(): boolean {
    if (!this.db.open) return false;
    try {
      return this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get()?.ok === 1;
    } catch (error) {
      console.error(
        '[DatabaseService] Reachability check failed:',
        error instanceof Error ? error.message : String(error)
      );
      return false;
    }
  }

  getStats(): PipelineStats {
    return getStats(this.db);
  }

  getBacklogCount(): number {
    return getBacklogCount(this.db);
  }

  getSchemaVersion(): number {
    return checkSchemaVersion(this.db);
  }

  verifySchema(): ReturnType<typeof verifySchema> {
    return verifySchema(this.db);
  }

  // ==================== DOCUMENT OPERATIONS ====================

  insertDocument(fileRef: FileRef, fingerprint: Fingerprint): PipelineDocument {
    return docOps.insertDocument(this.db, fileRef, fingerprint);
  }

  getDocument(id: string): PipelineDocument | null {
    return docOps.getDocument(this.db, id);
  }

  getDocumentByFingerprint(fingerprint: Fingerprint): PipelineDocument | null {
    return docOps.getDocumentByFingerprint(this.db, fingerprint);
  }

  countDocumentsInState(state: PipelineState): number {
    return docOps.countDocumentsInState(this.db, state);
  }

  saveDocument(doc: PipelineDocument, expectedState: PipelineState): boolean {
    return docOps.saveDocument(this.db, doc, expectedState);
  }

  // ==================== CLAIM OPERATIONS ====================

  tryClaim(params: TryClaimParams): ClaimAttempt {
    return claimOps.tryClaim(this.db, params);
  }

  releaseClaim(claimId: string, outcome: ClaimOutcome): boolean {
    return claimOps.releaseClaim(this.db, claimId, outcome);
  }

  isProcessed(fingerprint: Fingerprint): boolean {
    return claimOps.isProcessed(this.db, fingerprint);
  }

  getClaim(claimId: string): Claim | null {
    return claimOps.getClaim(this.db, claimId);
  }

  getActiveClaim(fingerprint: Fingerprint): Claim | null {
    return claimOps.getActiveClaim(this.db, fingerprint);
  }

  listClaims(fingerprint: Fingerprint): Claim[] {
    return claimOps.listClaims(this.db, fingerprint);
  }

  countActiveClaims(): number {
    return claimOps.countActiveClaims(this.db);
  }

  /** Unreleased claims older than `staleAfterMs` */
  countStaleClaims(staleAfterMs: number): number {
    return claimOps.countStaleClaims(this.db, new Date(Date.now() - staleAfterMs).toISOString());
  }

  // ==================== DEAD-LETTER OPERATIONS ====================

  insertDeadLetter(params: RecordDeadLetterParams): DeadLetterEntry {
    return dlOps.insertDeadLetter(this.db, params);
  }

  getDeadLetter(id: string): DeadLetterEntry | null {
    return dlOps.getDeadLetter(this.db, id);
  }

  listDeadLetters(filter?: DeadLetterFilter): DeadLetterEntry[] {
    return dlOps.listDeadLetters(this.db, filter);
  }

  countDeadLetters(status?: ReplayStatus): number {
    return dlOps.countDeadLetters(this.db, status);
  }

  hasPendingDeadLetter(documentId: string): boolean {
    return dlOps.hasPendingDeadLetter(this.db, documentId);
  }

  updateReplayStatus(id: string, next: ReplayStatus, allowedFrom: readonly ReplayStatus[]): boolean {
    return dlOps.updateReplayStatus(this.db, id, next, allowedFrom);
  }

  // ==================== REVIEW OPERATIONS ====================

  insertReviewRecord(params: InsertReviewParams): ReviewRecord {
    return reviewOps.insertReviewRecord(this.db, params);
  }

  listReviewRecords(options?: { limit?: number; offset?: number }): ReviewRecord[] {
    return reviewOps.listReviewRecords(this.db, options);
  }

  getReviewRecordsForDocument(documentId: string): ReviewRecord[] {
    return reviewOps.getReviewRecordsForDocument(this.db, documentId);
  }

  // ==================== AUDIT OPERATIONS ====================

  appendAudit(params: AppendAuditParams): number {
    return auditOps.appendAudit(this.db, params);
  }

  getAuditTrail(documentId: string): AuditEntry[] {
    return auditOps.getAuditTrail(this.db, documentId);
  }
}
