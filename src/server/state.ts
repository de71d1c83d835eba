/**
 * Monitoring server state
 *
 * Holds the configuration and a lazily opened database connection.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { DatabaseError, DatabaseErrorCode, DatabaseService } from '../services/storage/database/index.js';
import { configurationError, databaseNotFoundError } from './errors.js';
import type { PipelineConfig } from './config.js';
import type { MonitorState } from './types.js';

export const state: MonitorState = {
  config: null,
  database: null,
};

/**
 * Install the configuration. Closes any connection opened under a previous one.
 */
export function initMonitorState(config: PipelineConfig): void {
  clearState();
  state.config = config;
}

export function requireConfig(): PipelineConfig {
  if (!state.config) {
    throw configurationError('Monitoring state is not initialised');
  }
  return state.config;
}

/**
 * Open the pipeline database on first use. The monitor never creates it.
 *
 * @throws MCPError DATABASE_NOT_FOUND if no run has created the database yet
 */
export function requireDatabase(): DatabaseService {
  if (state.database) return state.database;

  const config = requireConfig();
  try {
    state.database = DatabaseService.openExisting(config.dbPath);
  } catch (error) {
    if (error instanceof DatabaseError && error.code === DatabaseErrorCode.DATABASE_NOT_FOUND) {
      throw databaseNotFoundError(config.dbPath);
    }
    throw error;
  }
  console.error(`[Monitor] Opened ${config.dbPath}`);
  return state.database;
}

/**
 * Close the connection and forget the configuration
 */
export function clearState(): void {
  if (state.database) {
    state.database.close();
  }
  state.database = null;
  state.config = null;
}
