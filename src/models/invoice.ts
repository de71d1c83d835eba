/**
 * Structured payload extracted from an invoice or receipt
 *
 * The schema is the contract between extraction adapters and the rest of
 * the pipeline. Amounts stay nullable: a field the model could not read is
 * null, never a guessed zero, so the validation scorer can see the gap.
 *
 * @module models/invoice
 */

import { z } from 'zod';

export const DOCUMENT_TYPES = ['invoice', 'receipt'] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const PAYMENT_METHODS = ['card', 'cash', 'bank', 'unknown'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const LineItemSchema = z.object({
  description: z.string().min(1),
  quantity: z.number().nullable(),
  unit_price: z.number().nullable(),
  /** Extended line amount (quantity x unit price when both are known) */
  amount: z.number().nullable(),
  category: z.string().nullable().default(null),
});

export const StructuredPayloadSchema = z.object({
  document_type: z.enum(DOCUMENT_TYPES),
  vendor_name: z.string().min(1),
  vendor_tax_id: z.string().nullable().default(null),
  invoice_number: z.string().nullable().default(null),
  invoice_date: z.string().regex(ISO_DATE, 'Expected YYYY-MM-DD').nullable(),
  due_date: z.string().regex(ISO_DATE, 'Expected YYYY-MM-DD').nullable().default(null),
  currency: z.string().length(3).nullable(),
  subtotal: z.number().nullable(),
  tax_amount: z.number().nullable(),
  total_amount: z.number().nullable(),
  payment_method: z.enum(PAYMENT_METHODS).default('unknown'),
  line_items: z.array(LineItemSchema),
  /** Confidence the extractor reports for its own output, if any */
  model_confidence: z.number().min(0).max(1).nullable(),
});

export type LineItem = z.infer<typeof LineItemSchema>;
export type StructuredPayload = z.infer<typeof StructuredPayloadSchema>;
