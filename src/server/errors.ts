/**
 * Error handling for the monitoring tools and the CLI
 *
 * Maps internal error classes to a small set of categories and attaches a
 * recovery hint that names the tool or command to run next.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/errors
 */

import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/types.js';
import { PipelineError, type PipelineErrorCategory } from '../services/pipeline/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Input / setup
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  // Persistence
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_ERROR'
  | 'CLAIM_STORE_UNREACHABLE'
  | 'DOCUMENT_NOT_FOUND'
  | 'DEAD_LETTER_NOT_FOUND'
  // Pipeline
  | 'TRANSIENT_IO'
  | 'EXTRACTION_FAILED'
  | 'STORAGE_WRITE_FAILED'
  | 'CONTENT_MISMATCH'
  | 'INVALID_STATE_TRANSITION'
  | 'CANCELLED'
  // Fallback
  | 'INTERNAL_ERROR';

const VALID_CATEGORIES: ReadonlySet<string> = new Set<ErrorCategory>([
  'VALIDATION_ERROR',
  'CONFIGURATION_ERROR',
  'DATABASE_NOT_FOUND',
  'DATABASE_ERROR',
  'CLAIM_STORE_UNREACHABLE',
  'DOCUMENT_NOT_FOUND',
  'DEAD_LETTER_NOT_FOUND',
  'TRANSIENT_IO',
  'EXTRACTION_FAILED',
  'STORAGE_WRITE_FAILED',
  'CONTENT_MISMATCH',
  'INVALID_STATE_TRANSITION',
  'CANCELLED',
  'INTERNAL_ERROR',
]);

export function isValidCategory(value: string): value is ErrorCategory {
  return VALID_CATEGORIES.has(value);
}

/**
 * Error class names without a category of their own
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  MigrationError: 'DATABASE_ERROR',
  SqliteError: 'DATABASE_ERROR',
};

const PIPELINE_CATEGORY: Record<PipelineErrorCategory, ErrorCategory> = {
  TRANSIENT_IO: 'TRANSIENT_IO',
  EXTRACTION_PARSE: 'EXTRACTION_FAILED',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
  STORAGE_WRITE: 'STORAGE_WRITE_FAILED',
  CONTENT_MISMATCH: 'CONTENT_MISMATCH',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  CANCELLED: 'CANCELLED',
};

function databaseCategory(code: DatabaseErrorCode): ErrorCategory {
  switch (code) {
    case DatabaseErrorCode.DATABASE_NOT_FOUND:
      return 'DATABASE_NOT_FOUND';
    case DatabaseErrorCode.DOCUMENT_NOT_FOUND:
      return 'DOCUMENT_NOT_FOUND';
    case DatabaseErrorCode.DEAD_LETTER_NOT_FOUND:
      return 'DEAD_LETTER_NOT_FOUND';
    default:
      return 'DATABASE_ERROR';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error for tool and CLI failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof PipelineError) {
      return new MCPError(PIPELINE_CATEGORY[error.category], error.message, {
        originalName: error.name,
        ...(error.details && { errorDetails: error.details }),
      });
    }

    if (error instanceof DatabaseError) {
      return new MCPError(databaseCategory(error.code), error.message, {
        originalName: error.name,
        errorCode: error.code,
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Which tool or command to reach for next
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'pipeline_health', hint: 'Check parameter types and required fields' },
  CONFIGURATION_ERROR: {
    tool: 'pipeline_health',
    hint: 'Check DOC_INTAKE_*, RETRY_*, *_TIMEOUT_MS and adapter environment variables',
  },
  DATABASE_NOT_FOUND: {
    tool: 'doc-intake poll-once',
    hint: 'No pipeline database yet. Run a poll once or point DOC_INTAKE_DB_PATH at an existing file',
  },
  DATABASE_ERROR: { tool: 'pipeline_health', hint: 'Check the database file, its permissions and free disk space' },
  CLAIM_STORE_UNREACHABLE: {
    tool: 'pipeline_health',
    hint: 'The claim store did not answer; no document is processed without it',
  },
  DOCUMENT_NOT_FOUND: { tool: 'pipeline_backlog', hint: 'Use pipeline_backlog or pipeline_stats to find documents' },
  DEAD_LETTER_NOT_FOUND: { tool: 'pipeline_failures', hint: 'Use pipeline_failures to list dead-letter entries' },
  TRANSIENT_IO: { tool: 'pipeline_health', hint: 'Wait and retry; check adapter endpoints and circuit state' },
  EXTRACTION_FAILED: {
    tool: 'pipeline_failures',
    hint: 'Inspect the dead-letter entry, then replay it with doc-intake replay --id',
  },
  STORAGE_WRITE_FAILED: {
    tool: 'pipeline_failures',
    hint: 'Check the ledger backend, then replay with doc-intake replay --status PENDING',
  },
  CONTENT_MISMATCH: {
    tool: 'pipeline_audit_trail',
    hint: 'The source file changed after fingerprinting; the new content is picked up as a new document',
  },
  INVALID_STATE_TRANSITION: {
    tool: 'pipeline_audit_trail',
    hint: 'Integrity fault: inspect the audit trail of the document before replaying it',
  },
  CANCELLED: { tool: 'doc-intake poll-once', hint: 'Run again; abandoned claims are taken over' },
  INTERNAL_ERROR: { tool: 'pipeline_health', hint: 'Run pipeline_health for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for a tool response: category, message, recovery hint, details
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Missing or invalid environment-driven setting
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function databaseNotFoundError(path: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Pipeline database not found at ${path}`, { path });
}

export function claimStoreUnreachableError(path: string): MCPError {
  return new MCPError('CLAIM_STORE_UNREACHABLE', `Claim store at ${path} is not reachable`, { path });
}

export function documentNotFoundError(documentId: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Document not found: ${documentId}. Use pipeline_backlog to browse documents.`,
    { documentId }
  );
}

export function deadLetterNotFoundError(entryId: string): MCPError {
  return new MCPError('DEAD_LETTER_NOT_FOUND', `Dead-letter entry not found: ${entryId}`, { entryId });
}
