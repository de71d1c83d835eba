/**
 * Database Schema Migrations for the intake pipeline store
 *
 * Handles SQLite schema initialization and version checks.
 *
 * Security: All SQL uses parameterized queries via db.prepare()
 * Performance: WAL mode, partial unique index for active claims
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema } from './verification.js';
