/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used by the monitoring tools.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import type { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before list fields are cut down */
const MAX_RESPONSE_BYTES = 700 * 1024;

/** Items kept per list when a response is too large */
const TRUNCATED_LIST_SIZE = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response.
 * Oversized responses keep the first items of each list under `data` and
 * gain a `_response_truncated` note so the caller knows to page.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES) {
    return { content: [{ type: 'text', text: json }] };
  }
  return { content: [{ type: 'text', text: JSON.stringify(truncateResult(result), null, 2) }] };
}

function truncateResult(result: unknown): unknown {
  if (!isRecord(result) || !isRecord(result.data)) {
    return {
      _response_truncated: {
        reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
        suggestion: 'Use limit/offset parameters to reduce response size',
      },
    };
  }

  const truncatedFields: string[] = [];
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(result.data)) {
    if (Array.isArray(value) && value.length > TRUNCATED_LIST_SIZE) {
      data[key] = value.slice(0, TRUNCATED_LIST_SIZE);
      data[`_${key}_total`] = value.length;
      truncatedFields.push(`${key} (${value.length} → ${TRUNCATED_LIST_SIZE})`);
    } else {
      data[key] = value;
    }
  }

  return {
    ...result,
    data,
    _response_truncated: {
      reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
      truncated_fields: truncatedFields,
      suggestion: 'Use limit/offset parameters to reduce response size',
    },
  };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
