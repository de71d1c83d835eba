/**
 * Validation verdict types
 *
 * @module models/validation
 */

import { z } from 'zod';

/**
 * Closed set of business-rule codes, most severe first.
 * A review record carries the first code of this list that was violated.
 */
export const RULE_CODES = [
  'MISSING_LINE_ITEMS',
  'TOTAL_MISMATCH',
  'NEGATIVE_QUANTITY',
  'LOW_CONFIDENCE',
] as const;

export type RuleCode = (typeof RULE_CODES)[number];

export const ValidationResultSchema = z.object({
  totals_match: z.boolean(),
  line_item_consistency: z.number().min(0).max(1),
  confidence: z.number().min(0).max(1),
  violations: z.array(z.enum(RULE_CODES)),
  declared_total: z.number().nullable(),
  sum_line_items: z.number(),
});

/**
 * Outcome of scoring one extracted payload
 */
export type ValidationResult = z.infer<typeof ValidationResultSchema>;

export type ValidationVerdict =
  | { decision: 'accept'; result: ValidationResult }
  | { decision: 'review'; result: ValidationResult; reasonCode: RuleCode };
