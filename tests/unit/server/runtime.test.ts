/**
 * Runtime wiring, startup checks, tool registration and .env discovery
 *
 * @module tests/unit/server/runtime
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { buildAdapters, createRuntime } from '../../../src/server/runtime.js';
import { validateStartup } from '../../../src/server/startup.js';
import { loadPipelineConfig, type PipelineConfig } from '../../../src/server/config.js';
import { getToolNames, registerAllTools } from '../../../src/server/register-tools.js';
import { createMonitorServer, SERVER_NAME } from '../../../src/server/monitor.js';
import { clearState, requireConfig } from '../../../src/server/state.js';
import { envFileCandidates, loadEnvFile } from '../../../src/server/env.js';
import { MCPError } from '../../../src/server/errors.js';
import { CachedClaimStore, SqliteClaimStore } from '../../../src/services/pipeline/claim-store.js';
import { OllamaExtractor } from '../../../src/services/adapters/extraction/ollama.js';
import { OpenAICompatibleExtractor } from '../../../src/services/adapters/extraction/openai-compatible.js';
import { LocalFolderIngestion } from '../../../src/services/adapters/ingestion/local-folder.js';
import { JsonlLedger } from '../../../src/services/adapters/storage/jsonl-ledger.js';
import { SqliteLedger } from '../../../src/services/adapters/storage/sqlite-ledger.js';
import { FakeStorage, cleanupTempDir, createTempDir } from '../pipeline/helpers.js';

const MONITORING_TOOLS = [
  'pipeline_health',
  'pipeline_stats',
  'pipeline_failures',
  'pipeline_backlog',
  'pipeline_reviews',
  'pipeline_audit_trail',
];

describe('server wiring', () => {
  let dir: string;

  function configFor(extra: Record<string, string> = {}): PipelineConfig {
    return loadPipelineConfig({
      DOC_INTAKE_DB_PATH: join(dir, 'pipeline.db'),
      INBOX_DIR: join(dir, 'inbox'),
      REVIEW_DIR: join(dir, 'review'),
      LEDGER_PATH: join(dir, 'ledger.db'),
      ...extra,
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = createTempDir('test-runtime-');
  });

  afterEach(() => {
    clearState();
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  describe('buildAdapters', () => {
    it('builds providers in the configured fallback order', async () => {
      const adapters = buildAdapters(
        configFor({ EXTRACTION_PROVIDERS: 'openai,ollama', OPENAI_API_KEY: 'test-key' })
      );

      expect(adapters.ingestion).toBeInstanceOf(LocalFolderIngestion);
      expect(adapters.providers[0]).toBeInstanceOf(OpenAICompatibleExtractor);
      expect(adapters.providers[1]).toBeInstanceOf(OllamaExtractor);
      expect(adapters.extraction.name).toBe('openai>ollama');
      expect(adapters.storage).toBeInstanceOf(SqliteLedger);
      await adapters.storage.close();
    });

    it('picks the JSON Lines ledger', async () => {
      const adapters = buildAdapters(configFor({ LEDGER_BACKEND: 'jsonl', LEDGER_PATH: join(dir, 'ledger.jsonl') }));

      expect(adapters.storage).toBeInstanceOf(JsonlLedger);
      await adapters.storage.close();
    });
  });

  describe('createRuntime', () => {
    it('puts the run cache in front of the claim store by default', async () => {
      const runtime = createRuntime(configFor());

      expect(runtime.claims).toBeInstanceOf(CachedClaimStore);
      expect(runtime.circuitStatus()).toEqual({
        ollama: { state: 'CLOSED', failureCount: 0, lastFailureTime: null, timeToRecovery: null },
      });
      await runtime.close();
    });

    it('uses the claim store directly when the cache is off', async () => {
      const runtime = createRuntime(configFor({ DOC_INTAKE_PROCESSED_CACHE: 'false' }));

      expect(runtime.claims).toBeInstanceOf(SqliteClaimStore);
      await runtime.close();
    });

    it('closes an override storage adapter along with the built one', async () => {
      const storage = new FakeStorage();
      const runtime = createRuntime(configFor(), { adapters: { storage } });

      await runtime.close();

      expect(storage.closed).toBe(true);
      expect(runtime.db.isReachable()).toBe(false);
    });
  });

  describe('validateStartup', () => {
    it('passes when the claim store answers', async () => {
      const runtime = createRuntime(configFor());
      try {
        await expect(validateStartup(runtime.claims, runtime.config)).resolves.toBeUndefined();
      } finally {
        await runtime.close();
      }
    });

    it('fails fast when the claim store does not answer', async () => {
      const runtime = createRuntime(configFor());
      await runtime.close();

      const error = await validateStartup(runtime.claims, runtime.config).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MCPError);
      expect(error).toMatchObject({
        category: 'CLAIM_STORE_UNREACHABLE',
        message: `Claim store at ${join(dir, 'pipeline.db')} is not reachable`,
      });
    });
  });

  describe('tool registration', () => {
    it('lists the monitoring tools', () => {
      expect(getToolNames()).toEqual(MONITORING_TOOLS);
    });

    it('registers every tool on a server', () => {
      const server = new McpServer({ name: 'test', version: '0.0.0' });
      expect(registerAllTools(server)).toBe(MONITORING_TOOLS.length);
    });

    it('createMonitorServer installs the configuration', () => {
      const config = configFor();
      const { toolCount } = createMonitorServer(config);

      expect(SERVER_NAME).toBe('doc-intake-monitor');
      expect(toolCount).toBe(6);
      expect(requireConfig()).toBe(config);
    });
  });

  describe('.env discovery', () => {
    afterEach(() => {
      delete process.env.DOC_INTAKE_TEST_MARKER;
    });

    it('puts an explicit file first, then the working directory', () => {
      const candidates = envFileCandidates({ DOC_INTAKE_ENV_FILE: '/etc/doc-intake.env' }, '/work');

      expect(candidates.slice(0, 2)).toEqual(['/etc/doc-intake.env', resolve('/work', '.env')]);
      expect(candidates).toHaveLength(4);
    });

    it('loads the first file that exists', () => {
      const envPath = join(dir, 'custom.env');
      writeFileSync(envPath, 'DOC_INTAKE_TEST_MARKER=loaded\n');

      expect(loadEnvFile({ DOC_INTAKE_ENV_FILE: envPath })).toBe(envPath);
      expect(process.env.DOC_INTAKE_TEST_MARKER).toBe('loaded');
    });
  });
});
