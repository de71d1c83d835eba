/**
 * Pipeline runtime: wires the database, claim store, adapters, orchestrator
 * and replay controller from a PipelineConfig.
 *
 * Adapters are chosen by name from the configuration; nothing else in the
 * pipeline knows which concrete adapter it talks to.
 *
 * @module server/runtime
 */

import { DatabaseService } from '../services/storage/database/index.js';
import { CachedClaimStore, SqliteClaimStore, type ClaimStore } from '../services/pipeline/claim-store.js';
import { PipelineOrchestrator } from '../services/pipeline/orchestrator.js';
import { ReplayController } from '../services/pipeline/replay.js';
import type { StageRunnerHooks } from '../services/pipeline/stage-runner.js';
import type { ExtractionAdapter, IngestionAdapter, StorageAdapter } from '../services/adapters/types.js';
import { LocalFolderIngestion } from '../services/adapters/ingestion/local-folder.js';
import { PayloadNormalizer } from '../services/adapters/extraction/normalizer.js';
import type { ModelExtractor } from '../services/adapters/extraction/base.js';
import { OllamaExtractor } from '../services/adapters/extraction/ollama.js';
import { OpenAICompatibleExtractor } from '../services/adapters/extraction/openai-compatible.js';
import { FallbackExtractor } from '../services/adapters/extraction/fallback.js';
import { LocalReviewRelocator } from '../services/adapters/storage/review-relocator.js';
import { SqliteLedger } from '../services/adapters/storage/sqlite-ledger.js';
import { JsonlLedger } from '../services/adapters/storage/jsonl-ledger.js';
import type { CircuitBreakerStatus } from '../services/adapters/extraction/circuit-breaker.js';
import { toPipelineSettings, type ExtractionProviderName, type PipelineConfig } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ADAPTER REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export interface AdapterSet {
  ingestion: IngestionAdapter;
  /** Configured providers in fallback order */
  providers: ModelExtractor[];
  extraction: FallbackExtractor;
  storage: StorageAdapter;
}

function buildProvider(
  name: ExtractionProviderName,
  config: PipelineConfig,
  normalizer: PayloadNormalizer
): ModelExtractor {
  switch (name) {
    case 'ollama':
      return new OllamaExtractor(config.extraction.ollama, normalizer);
    case 'openai':
      return new OpenAICompatibleExtractor(config.extraction.openai, normalizer);
  }
}

function buildStorage(config: PipelineConfig): StorageAdapter {
  const relocator = new LocalReviewRelocator(config.ingestion.inboxDir, config.review.dir);
  switch (config.ledger.backend) {
    case 'sqlite':
      return new SqliteLedger(config.ledger.path, relocator);
    case 'jsonl':
      return new JsonlLedger(config.ledger.path, relocator);
  }
}

export function buildAdapters(config: PipelineConfig): AdapterSet {
  const normalizer = PayloadNormalizer.fromFile(config.extraction.normalizationRulesPath);
  const providers = config.extraction.providers.map((name) => buildProvider(name, config, normalizer));

  return {
    ingestion: new LocalFolderIngestion({
      inboxDir: config.ingestion.inboxDir,
      allowedMimeTypes: config.ingestion.allowedMimeTypes,
    }),
    providers,
    extraction: new FallbackExtractor(providers),
    storage: buildStorage(config),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineRuntime {
  config: PipelineConfig;
  db: DatabaseService;
  claims: ClaimStore;
  orchestrator: PipelineOrchestrator;
  replay: ReplayController;
  circuitStatus(): Record<string, CircuitBreakerStatus>;
  close(): Promise<void>;
}

/** Replacement adapters and timing hooks, for tests and embedding */
export interface RuntimeOverrides {
  adapters?: {
    ingestion?: IngestionAdapter;
    extraction?: ExtractionAdapter;
    storage?: StorageAdapter;
  };
  hooks?: StageRunnerHooks;
}

/**
 * Open the database and build every component.
 *
 * @throws DatabaseError or MigrationError if the database cannot be opened
 */
export function createRuntime(config: PipelineConfig, overrides: RuntimeOverrides = {}): PipelineRuntime {
  const db = DatabaseService.open(config.dbPath);
  const sqliteClaims = new SqliteClaimStore(db, config.claimStaleAfterMs);
  const claims: ClaimStore = config.processedCache ? new CachedClaimStore(sqliteClaims) : sqliteClaims;

  let adapters: AdapterSet;
  try {
    adapters = buildAdapters(config);
  } catch (error) {
    db.close();
    throw error;
  }

  const storage = overrides.adapters?.storage ?? adapters.storage;
  const orchestrator = new PipelineOrchestrator({
    db,
    claims,
    ingestion: overrides.adapters?.ingestion ?? adapters.ingestion,
    extraction: overrides.adapters?.extraction ?? adapters.extraction,
    storage,
    settings: toPipelineSettings(config),
    hooks: overrides.hooks,
  });

  return {
    config,
    db,
    claims,
    orchestrator,
    replay: new ReplayController(db, claims, orchestrator),
    circuitStatus: () =>
      Object.fromEntries(adapters.providers.map((provider) => [provider.name, provider.circuitStatus()])),
    close: async () => {
      await storage.close();
      if (storage !== adapters.storage) await adapters.storage.close();
      db.close();
    },
  };
}
