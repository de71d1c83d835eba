/**
 * Pipeline configuration from environment variables
 *
 * Environment values are parsed into a plain structure, then validated with
 * zod, which also fills in defaults. A malformed number or flag fails fast
 * with CONFIGURATION_ERROR instead of silently falling back.
 *
 * Environment variables:
 *   DOC_INTAKE_DB_PATH              SQLite file (default: ~/.doc-intake/pipeline.db)
 *   DOC_INTAKE_WORKER_ID            Worker identity on claims (default: <hostname>-<pid>)
 *   DOC_INTAKE_CONCURRENCY          Documents in flight per run (default: 4)
 *   DOC_INTAKE_CLAIM_STALE_AFTER_MS Age after which an unreleased claim may be taken over (default: 900000)
 *   DOC_INTAKE_PROCESSED_CACHE      Cache positive "already processed" answers per run (default: true)
 *   RETRY_*                         Backoff policy, see utils/backoff
 *   DOWNLOAD_TIMEOUT_MS, EXTRACT_TIMEOUT_MS, STORE_TIMEOUT_MS
 *   VALIDATION_*                    Scorer tolerances and threshold
 *   INGESTION_BACKEND, INBOX_DIR, REVIEW_DIR, ALLOWED_MIME_TYPES
 *   EXTRACTION_PROVIDERS            Ordered, comma separated (default: ollama)
 *   OLLAMA_*, OPENAI_*              Provider endpoints and models
 *   NORMALIZATION_RULES_PATH        Override for config/normalization-rules.json
 *   LEDGER_BACKEND, LEDGER_PATH     sqlite | jsonl
 *
 * @module server/config
 */

import { hostname, homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_DATABASE_PATH } from '../services/storage/database/helpers.js';
import { DEFAULT_RETRY_POLICY } from '../utils/backoff.js';
import { DEFAULT_VALIDATION_CONFIG } from '../services/pipeline/validation-scorer.js';
import { DEFAULT_ALLOWED_MIME_TYPES } from '../services/adapters/ingestion/local-folder.js';
import type { PipelineSettings } from '../services/pipeline/orchestrator.js';
import { configurationError } from './errors.js';

export type Env = Readonly<Record<string, string | undefined>>;

const DATA_DIR = join(homedir(), '.doc-intake');

export const EXTRACTION_PROVIDERS = ['ollama', 'openai'] as const;
export type ExtractionProviderName = (typeof EXTRACTION_PROVIDERS)[number];

export const LEDGER_BACKENDS = ['sqlite', 'jsonl'] as const;
export type LedgerBackend = (typeof LEDGER_BACKENDS)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

export const PipelineConfigSchema = z.object({
  dbPath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  workerId: z
    .string()
    .min(1)
    .default(() => `${hostname()}-${process.pid}`),
  concurrency: z.number().int().min(1).max(64).default(4),
  claimStaleAfterMs: z.number().int().min(1000).default(15 * 60 * 1000),
  processedCache: z.boolean().default(true),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(20).default(DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
      multiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.multiplier),
      maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
      jitterFraction: z.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitterFraction),
      timeoutIsTerminal: z.boolean().default(false),
    })
    .default({}),

  timeouts: z
    .object({
      downloadMs: z.number().int().positive().default(30000),
      extractMs: z.number().int().positive().default(120000),
      storeMs: z.number().int().positive().default(15000),
    })
    .default({}),

  validation: z
    .object({
      relativeEpsilon: z.number().min(0).default(DEFAULT_VALIDATION_CONFIG.relativeEpsilon),
      absoluteEpsilon: z.number().min(0).default(DEFAULT_VALIDATION_CONFIG.absoluteEpsilon),
      acceptThreshold: z.number().min(0).max(1).default(DEFAULT_VALIDATION_CONFIG.acceptThreshold),
      extractorWeight: z.number().min(0).max(1).default(DEFAULT_VALIDATION_CONFIG.extractorWeight),
    })
    .default({}),

  ingestion: z
    .object({
      backend: z.enum(['local']).default('local'),
      inboxDir: z.string().min(1).default(join(DATA_DIR, 'inbox')),
      allowedMimeTypes: z.array(z.string().min(1)).min(1).default(DEFAULT_ALLOWED_MIME_TYPES),
    })
    .default({}),

  review: z
    .object({
      dir: z.string().min(1).default(join(DATA_DIR, 'review')),
    })
    .default({}),

  extraction: z
    .object({
      providers: z.array(z.enum(EXTRACTION_PROVIDERS)).min(1).default(['ollama']),
      ollama: z
        .object({
          baseUrl: z.string().url().default('http://localhost:11434'),
          model: z.string().min(1).default('llava'),
          temperature: z.number().min(0).max(2).default(0.1),
          maxOutputTokens: z.number().int().positive().default(4096),
        })
        .default({}),
      openai: z
        .object({
          baseUrl: z.string().url().default('https://api.openai.com'),
          model: z.string().min(1).default('gpt-4o-mini'),
          apiKey: z.string().min(1).nullable().default(null),
          temperature: z.number().min(0).max(2).default(0),
          maxOutputTokens: z.number().int().positive().default(4096),
        })
        .default({}),
      normalizationRulesPath: z.string().min(1).nullable().default(null),
    })
    .default({}),

  ledger: z
    .object({
      backend: z.enum(LEDGER_BACKENDS).default('sqlite'),
      path: z.string().min(1).default(join(DATA_DIR, 'ledger.db')),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// ENV PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function readEnv(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseIntEnv(env: Env, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw configurationError(`Invalid integer env var ${name}: "${raw}"`, { variable: name });
  }
  return parseInt(raw, 10);
}

function parseFloatEnv(env: Env, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw configurationError(`Invalid numeric env var ${name}: "${raw}"`, { variable: name });
  }
  return parsed;
}

function parseBoolEnv(env: Env, name: string): boolean | undefined {
  const raw = readEnv(env, name)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw configurationError(`Invalid boolean env var ${name}: "${raw}"`, { variable: name });
}

function parseListEnv(env: Env, name: string): string[] | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Build and validate the pipeline configuration.
 *
 * @throws MCPError CONFIGURATION_ERROR on malformed or out-of-range values
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const raw = {
    dbPath: readEnv(env, 'DOC_INTAKE_DB_PATH'),
    workerId: readEnv(env, 'DOC_INTAKE_WORKER_ID'),
    concurrency: parseIntEnv(env, 'DOC_INTAKE_CONCURRENCY'),
    claimStaleAfterMs: parseIntEnv(env, 'DOC_INTAKE_CLAIM_STALE_AFTER_MS'),
    processedCache: parseBoolEnv(env, 'DOC_INTAKE_PROCESSED_CACHE'),
    retry: {
      maxAttempts: parseIntEnv(env, 'RETRY_MAX_ATTEMPTS'),
      baseDelayMs: parseIntEnv(env, 'RETRY_BASE_DELAY_MS'),
      multiplier: parseFloatEnv(env, 'RETRY_MULTIPLIER'),
      maxDelayMs: parseIntEnv(env, 'RETRY_MAX_DELAY_MS'),
      jitterFraction: parseFloatEnv(env, 'RETRY_JITTER_FRACTION'),
      timeoutIsTerminal: parseBoolEnv(env, 'RETRY_TIMEOUT_IS_TERMINAL'),
    },
    timeouts: {
      downloadMs: parseIntEnv(env, 'DOWNLOAD_TIMEOUT_MS'),
      extractMs: parseIntEnv(env, 'EXTRACT_TIMEOUT_MS'),
      storeMs: parseIntEnv(env, 'STORE_TIMEOUT_MS'),
    },
    validation: {
      relativeEpsilon: parseFloatEnv(env, 'VALIDATION_RELATIVE_EPSILON'),
      absoluteEpsilon: parseFloatEnv(env, 'VALIDATION_ABSOLUTE_EPSILON'),
      acceptThreshold: parseFloatEnv(env, 'VALIDATION_ACCEPT_THRESHOLD'),
      extractorWeight: parseFloatEnv(env, 'VALIDATION_EXTRACTOR_WEIGHT'),
    },
    ingestion: {
      backend: readEnv(env, 'INGESTION_BACKEND'),
      inboxDir: readEnv(env, 'INBOX_DIR'),
      allowedMimeTypes: parseListEnv(env, 'ALLOWED_MIME_TYPES'),
    },
    review: {
      dir: readEnv(env, 'REVIEW_DIR'),
    },
    extraction: {
      providers: parseListEnv(env, 'EXTRACTION_PROVIDERS'),
      ollama: {
        baseUrl: readEnv(env, 'OLLAMA_BASE_URL'),
        model: readEnv(env, 'OLLAMA_MODEL'),
        temperature: parseFloatEnv(env, 'OLLAMA_TEMPERATURE'),
        maxOutputTokens: parseIntEnv(env, 'OLLAMA_MAX_OUTPUT_TOKENS'),
      },
      openai: {
        baseUrl: readEnv(env, 'OPENAI_BASE_URL'),
        model: readEnv(env, 'OPENAI_MODEL'),
        apiKey: readEnv(env, 'OPENAI_API_KEY'),
        temperature: parseFloatEnv(env, 'OPENAI_TEMPERATURE'),
        maxOutputTokens: parseIntEnv(env, 'OPENAI_MAX_OUTPUT_TOKENS'),
      },
      normalizationRulesPath: readEnv(env, 'NORMALIZATION_RULES_PATH'),
    },
    ledger: {
      backend: readEnv(env, 'LEDGER_BACKEND'),
      path: readEnv(env, 'LEDGER_PATH'),
    },
  };

  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid pipeline configuration: ${problems.join('; ')}`, { problems });
  }

  const config = result.data;
  if (config.extraction.providers.includes('openai') && config.extraction.openai.apiKey === null) {
    console.error('[Config] EXTRACTION_PROVIDERS includes openai but OPENAI_API_KEY is not set');
  }
  return config;
}

/**
 * The orchestrator's view of the configuration
 */
export function toPipelineSettings(config: PipelineConfig): PipelineSettings {
  return {
    workerId: config.workerId,
    concurrency: config.concurrency,
    retry: config.retry,
    timeouts: config.timeouts,
    validation: config.validation,
  };
}
