/**
 * SQL Schema Definitions for the intake pipeline store
 *
 * Contains all table creation SQL, indexes, triggers and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

const STATE_CHECK = `('DISCOVERED', 'CLAIMED', 'DOWNLOADING', 'EXTRACTING', 'VALIDATING', 'STORED', 'NEEDS_REVIEW', 'FAILED', 'DEAD_LETTER')`;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Documents table - one row per fingerprint, mutated only through transitions
 */
export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  file_name TEXT NOT NULL,
  mime_type TEXT NOT NULL,
  state TEXT NOT NULL CHECK (state IN ${STATE_CHECK}),
  stage_history_json TEXT NOT NULL,
  payload_json TEXT,
  validation_json TEXT,
  retry_downloading INTEGER NOT NULL DEFAULT 0,
  retry_extracting INTEGER NOT NULL DEFAULT 0,
  retry_storing INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (source_id, content_hash)
)
`;

/**
 * Claims table - idempotency ledger. Released claims are kept as history.
 */
export const CREATE_CLAIMS_TABLE = `
CREATE TABLE IF NOT EXISTS claims (
  claim_id TEXT PRIMARY KEY,
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  worker_id TEXT NOT NULL,
  claimed_at TEXT NOT NULL,
  released_at TEXT,
  outcome TEXT CHECK (outcome IS NULL OR outcome IN ('STORED', 'NEEDS_REVIEW', 'DEAD_LETTER', 'ABANDONED', 'STALE')),
  CHECK ((released_at IS NULL) = (outcome IS NULL))
)
`;

/**
 * Dead letters table - append-only except replay_status
 */
export const CREATE_DEAD_LETTERS_TABLE = `
CREATE TABLE IF NOT EXISTS dead_letters (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id),
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  stage TEXT NOT NULL CHECK (stage IN ${STATE_CHECK}),
  failure_kind TEXT NOT NULL CHECK (failure_kind IN ('TRANSIENT_IO_EXHAUSTED', 'EXTRACTION_PARSE', 'EXTRACTION_FAILED', 'STORAGE_WRITE', 'CONTENT_MISMATCH', 'INVALID_STATE_TRANSITION', 'UNCLASSIFIED')),
  error_message TEXT NOT NULL,
  context_json TEXT NOT NULL,
  retry_count INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  replay_status TEXT NOT NULL DEFAULT 'PENDING' CHECK (replay_status IN ('PENDING', 'REPLAYED', 'ABANDONED'))
)
`;

/**
 * Review records table - one row per review episode
 */
export const CREATE_REVIEW_RECORDS_TABLE = `
CREATE TABLE IF NOT EXISTS review_records (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id),
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  reason_code TEXT NOT NULL CHECK (reason_code IN ('MISSING_LINE_ITEMS', 'TOTAL_MISMATCH', 'NEGATIVE_QUANTITY', 'LOW_CONFIDENCE')),
  score REAL NOT NULL,
  relocated INTEGER NOT NULL CHECK (relocated IN (0, 1)),
  created_at TEXT NOT NULL
)
`;

/**
 * Audit log table - append-only, sequence per fingerprint
 */
export const CREATE_AUDIT_LOG_TABLE = `
CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id TEXT NOT NULL REFERENCES documents(id),
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  sequence INTEGER NOT NULL,
  action TEXT NOT NULL,
  previous_state TEXT CHECK (previous_state IS NULL OR previous_state IN ${STATE_CHECK}),
  new_state TEXT CHECK (new_state IS NULL OR new_state IN ${STATE_CHECK}),
  actor TEXT NOT NULL CHECK (actor IN ('system', 'replay', 'manual')),
  details_json TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  UNIQUE (source_id, content_hash, sequence)
)
`;

/**
 * Immutability triggers. Dead letters may only change replay_status;
 * audit rows may never change.
 */
export const CREATE_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS dead_letters_immutable
   BEFORE UPDATE ON dead_letters
   WHEN NEW.id IS NOT OLD.id
     OR NEW.document_id IS NOT OLD.document_id
     OR NEW.source_id IS NOT OLD.source_id
     OR NEW.content_hash IS NOT OLD.content_hash
     OR NEW.stage IS NOT OLD.stage
     OR NEW.failure_kind IS NOT OLD.failure_kind
     OR NEW.error_message IS NOT OLD.error_message
     OR NEW.context_json IS NOT OLD.context_json
     OR NEW.retry_count IS NOT OLD.retry_count
     OR NEW.created_at IS NOT OLD.created_at
   BEGIN
     SELECT RAISE(ABORT, 'dead_letters rows are immutable except replay_status');
   END`,
  `CREATE TRIGGER IF NOT EXISTS dead_letters_no_delete
   BEFORE DELETE ON dead_letters
   BEGIN
     SELECT RAISE(ABORT, 'dead_letters rows cannot be deleted');
   END`,
  `CREATE TRIGGER IF NOT EXISTS audit_log_no_update
   BEFORE UPDATE ON audit_log
   BEGIN
     SELECT RAISE(ABORT, 'audit_log is append-only');
   END`,
  `CREATE TRIGGER IF NOT EXISTS audit_log_no_delete
   BEFORE DELETE ON audit_log
   BEGIN
     SELECT RAISE(ABORT, 'audit_log is append-only');
   END`,
] as const;

/**
 * Index definitions
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_state ON documents(state)',
  // At most one active claim per fingerprint
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_claims_active ON claims(source_id, content_hash) WHERE released_at IS NULL',
  'CREATE INDEX IF NOT EXISTS idx_claims_fingerprint_outcome ON claims(source_id, content_hash, outcome)',
  'CREATE INDEX IF NOT EXISTS idx_dead_letters_fingerprint ON dead_letters(source_id, content_hash)',
  'CREATE INDEX IF NOT EXISTS idx_dead_letters_status ON dead_letters(replay_status, created_at)',
  'CREATE INDEX IF NOT EXISTS idx_review_records_fingerprint ON review_records(source_id, content_hash)',
  'CREATE INDEX IF NOT EXISTS idx_audit_log_document ON audit_log(document_id)',
] as const;

/**
 * Table definitions for creation order
 */
export const TABLE_DEFINITIONS = [
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
  { name: 'claims', sql: CREATE_CLAIMS_TABLE },
  { name: 'dead_letters', sql: CREATE_DEAD_LETTERS_TABLE },
  { name: 'review_records', sql: CREATE_REVIEW_RECORDS_TABLE },
  { name: 'audit_log', sql: CREATE_AUDIT_LOG_TABLE },
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'documents',
  'claims',
  'dead_letters',
  'review_records',
  'audit_log',
] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'idx_documents_state',
  'idx_claims_active',
  'idx_claims_fingerprint_outcome',
  'idx_dead_letters_fingerprint',
  'idx_dead_letters_status',
  'idx_review_records_fingerprint',
  'idx_audit_log_document',
] as const;

/**
 * Required triggers for schema verification
 */
export const REQUIRED_TRIGGERS = [
  'dead_letters_immutable',
  'dead_letters_no_delete',
  'audit_log_no_update',
  'audit_log_no_delete',
] as const;
