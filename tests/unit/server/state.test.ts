/**
 * Unit tests for monitoring server state
 *
 * Uses real DatabaseService instances in temp directories.
 *
 * @module tests/unit/server/state
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import { clearState, initMonitorState, requireConfig, requireDatabase, state } from '../../../src/server/state.js';
import { loadPipelineConfig } from '../../../src/server/config.js';
import { MCPError } from '../../../src/server/errors.js';
import { cleanupTempDir, createTempDir, openTestDatabase } from '../pipeline/helpers.js';

describe('monitor state', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('test-state-');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    clearState();
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  it('requires a configuration first', () => {
    expect(() => requireConfig()).toThrow('Monitoring state is not initialised');
    expect(() => requireDatabase()).toThrow(MCPError);
  });

  it('reports a missing database without creating it', () => {
    const dbPath = join(dir, 'pipeline.db');
    initMonitorState(loadPipelineConfig({ DOC_INTAKE_DB_PATH: dbPath }));

    let caught: unknown;
    try {
      requireDatabase();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MCPError);
    expect(caught).toMatchObject({
      category: 'DATABASE_NOT_FOUND',
      message: `Pipeline database not found at ${dbPath}`,
    });
    expect(existsSync(dbPath)).toBe(false);
  });

  it('opens an existing database once and reuses it', () => {
    const dbPath = join(dir, 'pipeline.db');
    openTestDatabase(dir).close();
    initMonitorState(loadPipelineConfig({ DOC_INTAKE_DB_PATH: dbPath }));

    const first = requireDatabase();

    expect(requireDatabase()).toBe(first);
    expect(first.getPath()).toBe(dbPath);
  });

  it('clearState closes the connection and forgets the configuration', () => {
    openTestDatabase(dir).close();
    initMonitorState(loadPipelineConfig({ DOC_INTAKE_DB_PATH: join(dir, 'pipeline.db') }));
    requireDatabase();

    clearState();

    expect(state).toEqual({ config: null, database: null });
    expect(() => requireConfig()).toThrow(MCPError);
  });

  it('initMonitorState replaces a previous configuration', () => {
    openTestDatabase(dir).close();
    initMonitorState(loadPipelineConfig({ DOC_INTAKE_DB_PATH: join(dir, 'pipeline.db') }));
    requireDatabase();

    initMonitorState(loadPipelineConfig({ DOC_INTAKE_DB_PATH: join(dir, 'other.db') }));

    expect(state.database).toBeNull();
    expect(requireConfig().dbPath).toBe(join(dir, 'other.db'));
  });
});
