/**
 * Pipeline Monitoring MCP Tools
 *
 * Tools: pipeline_health, pipeline_stats, pipeline_failures, pipeline_backlog,
 * pipeline_reviews, pipeline_audit_trail
 *
 * Read-only: no tool here changes pipeline state.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/monitoring
 */

import { z } from 'zod';
import { requireConfig, requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { documentNotFoundError } from '../server/errors.js';
import { LimitSchema, OffsetSchema, ReplayStatusSchema, validateInput } from '../utils/validation.js';
import type { PipelineState } from '../models/document.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const EmptyInput = z.object({});

const FailuresInput = z.object({
  status: ReplayStatusSchema.optional(),
  limit: LimitSchema,
  offset: OffsetSchema,
});

const ReviewsInput = z.object({
  limit: LimitSchema,
  offset: OffsetSchema,
});

const AuditTrailInput = z.object({
  document_id: z.string().min(1),
});

/** States a claimed document passes through before it settles */
const IN_FLIGHT_STATES: PipelineState[] = ['CLAIMED', 'DOWNLOADING', 'EXTRACTING', 'VALIDATING', 'FAILED'];

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle pipeline_health - claim store reachability plus the numbers an
 * operator checks first
 */
export async function handleHealth(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(EmptyInput, params);
    const config = requireConfig();
    const db = requireDatabase();

    const reachable = db.isReachable();
    if (!reachable) {
      return formatResponse(
        successResult({
          status: 'unavailable',
          database: { path: db.getPath(), reachable: false },
        })
      );
    }

    const schema = db.verifySchema();
    const staleClaims = db.countStaleClaims(config.claimStaleAfterMs);
    const pendingDeadLetters = db.countDeadLetters('PENDING');

    const warnings: string[] = [];
    if (!schema.valid) {
      warnings.push(
        `Schema incomplete: missing ${[...schema.missingTables, ...schema.missingIndexes, ...schema.missingTriggers].join(', ')}`
      );
    }
    if (staleClaims > 0) {
      warnings.push(`${staleClaims} claim(s) older than ${config.claimStaleAfterMs}ms are still held`);
    }
    if (pendingDeadLetters > 0) {
      warnings.push(`${pendingDeadLetters} dead-letter entr${pendingDeadLetters === 1 ? 'y is' : 'ies are'} pending replay`);
    }

    return formatResponse(
      successResult({
        status: warnings.length === 0 ? 'ok' : 'degraded',
        database: {
          path: db.getPath(),
          reachable: true,
          schema_version: db.getSchemaVersion(),
          schema_valid: schema.valid,
        },
        claim_store: {
          reachable: true,
          active_claims: db.countActiveClaims(),
          stale_claims: staleClaims,
        },
        backlog: db.getBacklogCount(),
        pending_dead_letters: pendingDeadLetters,
        extraction_providers: config.extraction.providers,
        ledger_backend: config.ledger.backend,
        warnings,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pipeline_stats - counts per state and table totals
 */
export async function handleStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(EmptyInput, params);
    return formatResponse(successResult(requireDatabase().getStats()));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pipeline_failures - paged dead-letter entries, oldest first
 */
export async function handleFailures(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FailuresInput, params);
    const db = requireDatabase();
    const entries = db.listDeadLetters({ status: input.status, limit: input.limit, offset: input.offset });

    return formatResponse(
      successResult({
        status: input.status ?? null,
        total: db.countDeadLetters(input.status),
        limit: input.limit,
        offset: input.offset,
        entries,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pipeline_backlog - unclaimed DISCOVERED documents and work in flight
 */
export async function handleBacklog(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(EmptyInput, params);
    const db = requireDatabase();
    const inFlight: Partial<Record<PipelineState, number>> = {};
    for (const inFlightState of IN_FLIGHT_STATES) {
      inFlight[inFlightState] = db.countDocumentsInState(inFlightState);
    }

    return formatResponse(
      successResult({
        backlog: db.getBacklogCount(),
        discovered: db.countDocumentsInState('DISCOVERED'),
        in_flight: inFlight,
        active_claims: db.countActiveClaims(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pipeline_reviews - review records, newest first
 */
export async function handleReviews(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReviewsInput, params);
    const db = requireDatabase();

    return formatResponse(
      successResult({
        total: db.getStats().total_review_records,
        limit: input.limit,
        offset: input.offset,
        records: db.listReviewRecords({ limit: input.limit, offset: input.offset }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pipeline_audit_trail - one document and every audit entry for its fingerprint
 */
export async function handleAuditTrail(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AuditTrailInput, params);
    const db = requireDatabase();
    const document = db.getDocument(input.document_id);
    if (!document) {
      throw documentNotFoundError(input.document_id);
    }

    return formatResponse(
      successResult({
        document: {
          id: document.id,
          fingerprint: document.fingerprint,
          state: document.state,
          retry_counts: document.retry_counts,
          last_error: document.last_error,
          stage_history: document.stage_history,
        },
        trail: db.getAuditTrail(document.id),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const monitoringTools: Record<string, ToolDefinition> = {
  pipeline_health: {
    description:
      '[STATUS] Is the claim store reachable? Reports schema version, active and stale claims, backlog and pending dead letters.',
    inputSchema: {},
    handler: handleHealth,
  },
  pipeline_stats: {
    description: '[STATUS] Document counts per lifecycle state, claims, dead letters by replay status, review and audit totals.',
    inputSchema: {},
    handler: handleStats,
  },
  pipeline_failures: {
    description: '[ANALYSIS] Paged dead-letter entries, oldest first. Filter by replay status (PENDING, REPLAYED, ABANDONED).',
    inputSchema: {
      status: ReplayStatusSchema.optional().describe('Only entries with this replay status'),
      limit: LimitSchema.describe('Maximum entries to return (1-500)'),
      offset: OffsetSchema.describe('Entries to skip'),
    },
    handler: handleFailures,
  },
  pipeline_backlog: {
    description: '[STATUS] Count of DISCOVERED documents no worker holds a claim on, plus documents in flight per state.',
    inputSchema: {},
    handler: handleBacklog,
  },
  pipeline_reviews: {
    description: '[ANALYSIS] Review records with reason code, score and relocation result, newest first.',
    inputSchema: {
      limit: LimitSchema.describe('Maximum records to return (1-500)'),
      offset: OffsetSchema.describe('Records to skip'),
    },
    handler: handleReviews,
  },
  pipeline_audit_trail: {
    description: '[ANALYSIS] Audit entries for one document in sequence order, with its current state and retry counters.',
    inputSchema: {
      document_id: z.string().min(1).describe('Document id'),
    },
    handler: handleAuditTrail,
  },
};
