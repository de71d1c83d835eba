/**
 * Monitoring Server Type Definitions
 *
 * @module server/types
 */

import type { DatabaseService } from '../services/storage/database/index.js';
import type { PipelineConfig } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface MonitorState {
  /** Set once at startup */
  config: PipelineConfig | null;

  /** Opened on first tool call */
  database: DatabaseService | null;
}
