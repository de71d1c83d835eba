/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export { MigrationError } from '../migrations/index.js';

export type { PipelineStats } from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';
export { DEFAULT_DATABASE_PATH } from './helpers.js';

export type { TryClaimParams } from './claim-operations.js';
export type { RecordDeadLetterParams } from './dead-letter-operations.js';
export type { InsertReviewParams } from './review-operations.js';
export type { AppendAuditParams } from './audit-operations.js';
