/**
 * Schema Verification Functions
 *
 * Contains functions to verify database schema integrity.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES, REQUIRED_TRIGGERS } from './schema-definitions.js';

function objectExists(db: Database.Database, type: string, name: string): boolean {
  const row = db
    .prepare<[string, string], { name: string }>(
      'SELECT name FROM sqlite_master WHERE type = ? AND name = ?'
    )
    .get(type, name);
  return row !== undefined;
}

/**
 * Verify all required tables, indexes, and triggers exist
 * @param db - Database instance
 * @returns Object with verification results
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingTriggers: string[];
} {
  const missingTables = REQUIRED_TABLES.filter((name) => !objectExists(db, 'table', name));
  const missingIndexes = REQUIRED_INDEXES.filter((name) => !objectExists(db, 'index', name));
  const missingTriggers = REQUIRED_TRIGGERS.filter((name) => !objectExists(db, 'trigger', name));

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingTriggers.length === 0,
    missingTables,
    missingIndexes,
    missingTriggers,
  };
}
