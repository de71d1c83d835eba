/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest
 * and checkSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  initializeSchemaVersion,
  createTables,
  createIndexes,
  createTriggers,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database
 * @param db - Database instance from better-sqlite3
 * @returns Schema version, 0 when the database was never initialized
 * @throws MigrationError if the query fails
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Initialize the database with all tables, indexes, and triggers
 *
 * This function is idempotent - safe to call multiple times.
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas cannot run inside a transaction
  configurePragmas(db);

  // Schema version is stamped LAST so a crash before completion leaves
  // version=0 and the next start re-initializes cleanly.
  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    createTriggers(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Bring an existing database up to the current schema version
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if the database is newer than this build
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    configurePragmas(db);
    return;
  }

  throw new MigrationError(
    `Database schema version (${String(currentVersion)}) does not match supported version (${String(SCHEMA_VERSION)}). ` +
      'Please update the application.',
    'version_check',
    undefined
  );
}
