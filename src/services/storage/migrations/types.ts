/**
 * Type definitions and error classes for database migrations
 *
 * @module migrations/types
 */

export type MigrationOperation =
  | 'pragma'
  | 'create_table'
  | 'create_index'
  | 'create_trigger'
  | 'query'
  | 'version_check';

/**
 * Error class for database migration failures
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: MigrationOperation,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}
