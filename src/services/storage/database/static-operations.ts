/**
 * Static operations for DatabaseService - database lifecycle: open (creating if needed), exists.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { migrateToLatest } from '../migrations/index.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Open the pipeline database at the given path, creating and initializing it if needed.
 *
 * @throws DatabaseError if the file cannot be opened
 * @throws MigrationError if the schema cannot be brought up to date
 */
export function openDatabase(dbPath: string): { db: Database.Database; path: string } {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database at ${dbPath}: ${String(error)}`,
      DatabaseErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  return { db, path: dbPath };
}

/**
 * Open an existing database without creating it
 *
 * @throws DatabaseError if the file does not exist
 */
export function openExistingDatabase(dbPath: string): { db: Database.Database; path: string } {
  if (!existsSync(dbPath)) {
    throw new DatabaseError(
      `Database not found at ${dbPath}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }
  return openDatabase(dbPath);
}

/**
 * Check whether a database file exists
 */
export function databaseExists(dbPath: string): boolean {
  return existsSync(dbPath);
}
