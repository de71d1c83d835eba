/**
 * Validation Scorer
 *
 * Rule-based consistency check of an extracted payload. Produces a
 * confidence-scored result and an accept/review verdict. A rule violation
 * is not an error: it routes the document to review.
 *
 * @module pipeline/validation-scorer
 */

import type { LineItem, StructuredPayload } from '../../models/invoice.js';
import {
  RULE_CODES,
  type RuleCode,
  type ValidationResult,
  type ValidationVerdict,
} from '../../models/validation.js';

export interface ValidationConfig {
  /** Relative tolerance on totals (default: 0.01 = 1%) */
  relativeEpsilon: number;
  /** Absolute tolerance on totals in currency units (default: 0.01) */
  absoluteEpsilon: number;
  /** Minimum confidence to accept without review (default: 0.85) */
  acceptThreshold: number;
  /** Weight of extractor-reported confidence vs. structural score (default: 0.5) */
  extractorWeight: number;
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  relativeEpsilon: 0.01,
  absoluteEpsilon: 0.01,
  acceptThreshold: 0.85,
  extractorWeight: 0.5,
};

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Tolerance for comparing against `reference`
 */
export function tolerance(reference: number, config: ValidationConfig): number {
  return Math.max(config.absoluteEpsilon, config.relativeEpsilon * Math.abs(reference));
}

function lineAmount(item: LineItem): number {
  if (item.amount !== null) return item.amount;
  if (item.quantity !== null && item.unit_price !== null) return item.quantity * item.unit_price;
  return 0;
}

/**
 * Per-item structural check: amount present, quantity not negative, and
 * quantity x unit price agrees with the amount when both are given.
 */
function lineItemPasses(item: LineItem, config: ValidationConfig): boolean {
  if (item.amount === null) return false;
  if (item.quantity !== null && item.quantity < 0) return false;
  if (item.quantity !== null && item.unit_price !== null) {
    const computed = item.quantity * item.unit_price;
    return Math.abs(computed - item.amount) <= tolerance(item.amount, config);
  }
  return true;
}

/**
 * Pre-tax total the line items should add up to: the subtotal when given,
 * otherwise total minus tax.
 */
export function declaredTotalOf(payload: StructuredPayload): number | null {
  if (payload.subtotal !== null) return payload.subtotal;
  if (payload.total_amount !== null) return roundCents(payload.total_amount - (payload.tax_amount ?? 0));
  return null;
}

/**
 * Score a payload
 */
export function scorePayload(
  payload: StructuredPayload,
  config: ValidationConfig = DEFAULT_VALIDATION_CONFIG
): ValidationResult {
  const items = payload.line_items;
  const violations = new Set<RuleCode>();

  const sumLineItems = roundCents(items.reduce((acc, item) => acc + lineAmount(item), 0));
  const declaredTotal = declaredTotalOf(payload);

  const totalsMatch =
    items.length > 0 &&
    declaredTotal !== null &&
    Math.abs(declaredTotal - sumLineItems) <= tolerance(declaredTotal, config);

  if (items.length === 0) {
    violations.add('MISSING_LINE_ITEMS');
  } else if (!totalsMatch) {
    violations.add('TOTAL_MISMATCH');
  }

  // Header arithmetic: subtotal + tax must equal total when all three are given
  if (payload.subtotal !== null && payload.tax_amount !== null && payload.total_amount !== null) {
    const headerSum = payload.subtotal + payload.tax_amount;
    if (Math.abs(headerSum - payload.total_amount) > tolerance(payload.total_amount, config)) {
      violations.add('TOTAL_MISMATCH');
    }
  }

  if (items.some((item) => item.quantity !== null && item.quantity < 0)) {
    violations.add('NEGATIVE_QUANTITY');
  }

  const passing = items.filter((item) => lineItemPasses(item, config)).length;
  const lineItemConsistency = items.length === 0 ? 0 : passing / items.length;

  const structural = ((totalsMatch ? 1 : 0) + lineItemConsistency) / 2;
  const weight = clamp01(config.extractorWeight);
  const raw =
    payload.model_confidence === null
      ? structural
      : weight * payload.model_confidence + (1 - weight) * structural;
  const confidence = Math.round(clamp01(raw) * 10000) / 10000;

  if (confidence < config.acceptThreshold) {
    violations.add('LOW_CONFIDENCE');
  }

  return {
    totals_match: totalsMatch,
    line_item_consistency: Math.round(lineItemConsistency * 10000) / 10000,
    confidence,
    violations: RULE_CODES.filter((code) => violations.has(code)),
    declared_total: declaredTotal,
    sum_line_items: sumLineItems,
  };
}

/**
 * Accept when confident and clean; otherwise review with the most severe code
 */
export function decide(result: ValidationResult, config: ValidationConfig = DEFAULT_VALIDATION_CONFIG): ValidationVerdict {
  const reasonCode = result.violations[0];
  if (reasonCode === undefined && result.confidence >= config.acceptThreshold) {
    return { decision: 'accept', result };
  }
  return { decision: 'review', result, reasonCode: reasonCode ?? 'LOW_CONFIDENCE' };
}

/**
 * Score and decide in one step
 */
export function validatePayload(
  payload: StructuredPayload,
  config: ValidationConfig = DEFAULT_VALIDATION_CONFIG
): ValidationVerdict {
  return decide(scorePayload(payload, config), config);
}
