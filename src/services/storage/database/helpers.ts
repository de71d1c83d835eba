/**
 * Helper functions for DatabaseService
 *
 * Contains path defaults, timestamps and constraint error translation.
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default location of the pipeline database
 */
export const DEFAULT_DATABASE_PATH = join(homedir(), '.doc-intake', 'pipeline.db');

/**
 * Current time as an ISO 8601 string
 */
export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Run a statement and convert SQLite constraint errors to DatabaseError.
 *
 * @param stmt - Prepared statement to run
 * @param params - Parameters to bind
 * @param context - Error context message (e.g., "inserting dead letter for doc-1")
 */
export function runWithConstraintCheck(
  stmt: Database.Statement<unknown[]>,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && /constraint failed|RAISE|immutable|append-only/i.test(error.message)) {
      throw new DatabaseError(
        `Constraint violation ${context}: ${error.message}`,
        DatabaseErrorCode.CONSTRAINT_VIOLATION,
        error
      );
    }
    throw error;
  }
}
