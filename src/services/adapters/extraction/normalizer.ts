/**
 * Payload normalizer
 *
 * Maps raw model output onto the StructuredPayload shape before schema
 * validation: field aliases (dotted paths allowed), number and date coercion,
 * payment-method mapping, canonical vendor names and keyword categories.
 *
 * Amounts the model did not give stay null and negative values are kept, so
 * the validation scorer sees the document as it was read.
 *
 * Rules live in config/normalization-rules.json; NORMALIZATION_RULES_PATH
 * points at a replacement file.
 *
 * @module adapters/extraction/normalizer
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DOCUMENT_TYPES, PAYMENT_METHODS, type DocumentType, type PaymentMethod } from '../../../models/invoice.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════════

export const NormalizationRulesSchema = z.object({
  field_aliases: z.record(z.array(z.string())).default({}),
  line_item_aliases: z.record(z.array(z.string())).default({}),
  payment_method_map: z.record(z.array(z.string())).default({}),
  vendor_rules: z.record(z.string()).default({}),
  category_keywords: z.record(z.array(z.string())).default({}),
  line_item_ignore_keywords: z.array(z.string()).default([]),
  default_currency: z.string().length(3).nullable().default(null),
  default_document_type: z.enum(DOCUMENT_TYPES).default('invoice'),
});

export type NormalizationRules = z.infer<typeof NormalizationRulesSchema>;

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Candidate rule files: source tree first, then the compiled dist/ layout */
const RULES_CANDIDATES = [
  resolve(__dirname, '../../../../config/normalization-rules.json'),
  resolve(__dirname, '../../../../../config/normalization-rules.json'),
];

/**
 * Load rules from `path`, or from the first bundled candidate that exists
 */
export function loadNormalizationRules(path?: string | null): NormalizationRules {
  const file = path ?? RULES_CANDIDATES.find((candidate) => existsSync(candidate));
  if (!file) {
    throw new Error(`Normalization rules not found. Looked in: ${RULES_CANDIDATES.join(', ')}`);
  }
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  return NormalizationRulesSchema.parse(parsed);
}

// ═══════════════════════════════════════════════════════════════════════════════
// COERCION
// ═══════════════════════════════════════════════════════════════════════════════

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function getPath(data: JsonObject, path: string): unknown {
  let current: unknown = data;
  for (const key of path.split('.')) {
    if (!isObject(current) || !(key in current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Parse a number from a model value: "1,234.50", "$12", "(3.00)" all count.
 * Parenthesised values are negative.
 */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const text = value.trim();
  const negative = /^\(.*\)$/.test(text);
  const cleaned = text.replace(/[^0-9.,-]/g, '').replace(/,/g, '');
  if (cleaned === '' || cleaned === '-' || cleaned === '.') return null;

  const parsed = Number(cleaned);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -Math.abs(parsed) : parsed;
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Normalise a date to YYYY-MM-DD. Accepts Y-M-D, D-M-Y, D/M/Y, then M/D/Y,
 * and "Month D, YYYY". Anything else is null.
 */
export function coerceDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();

  let match = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/.exec(text);
  if (match) return isoDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = /^(\d{1,2})-(\d{1,2})-(\d{4})$/.exec(text);
  if (match) return isoDate(Number(match[3]), Number(match[2]), Number(match[1]));

  match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (match) {
    const [first, second, year] = [Number(match[1]), Number(match[2]), Number(match[3])];
    return isoDate(year, second, first) ?? isoDate(year, first, second);
  }

  match = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(text);
  if (match) {
    const month = MONTHS[match[1].slice(0, 3).toLowerCase()];
    return month === undefined ? null : isoDate(Number(match[3]), month, Number(match[2]));
  }
  return null;
}

function coerceString(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZER
// ═══════════════════════════════════════════════════════════════════════════════

export class PayloadNormalizer {
  constructor(private readonly rules: NormalizationRules) {}

  static fromFile(path?: string | null): PayloadNormalizer {
    return new PayloadNormalizer(loadNormalizationRules(path));
  }

  /**
   * Map raw output to a candidate payload. The result still goes through
   * StructuredPayloadSchema; a non-object input is returned unchanged so the
   * schema reports it.
   */
  normalize(raw: unknown): unknown {
    if (!isObject(raw)) return raw;

    const total = coerceNumber(this.pick(raw, 'total_amount'));
    const confidence = coerceNumber(this.pick(raw, 'model_confidence'));
    const currency = coerceString(this.pick(raw, 'currency'))?.toUpperCase() ?? null;

    return {
      document_type: this.documentType(this.pick(raw, 'document_type')),
      vendor_name: this.vendorName(this.pick(raw, 'vendor_name')),
      vendor_tax_id: coerceString(this.pick(raw, 'vendor_tax_id')),
      invoice_number: coerceString(this.pick(raw, 'invoice_number')),
      invoice_date: coerceDate(this.pick(raw, 'invoice_date')),
      due_date: coerceDate(this.pick(raw, 'due_date')),
      currency: currency !== null && /^[A-Z]{3}$/.test(currency) ? currency : this.rules.default_currency,
      subtotal: coerceNumber(this.pick(raw, 'subtotal')),
      tax_amount: coerceNumber(this.pick(raw, 'tax_amount')),
      total_amount: total,
      payment_method: this.paymentMethod(this.pick(raw, 'payment_method')),
      line_items: this.lineItems(this.pick(raw, 'line_items')),
      model_confidence: confidence === null ? null : Math.min(1, Math.max(0, confidence)),
    };
  }

  /** Canonical vendor name from the vendor rules, else the trimmed input */
  canonicalVendor(name: string): string {
    const key = name.toLowerCase().replace(/[^a-z0-9\s-]/g, '').trim();
    for (const [pattern, canonical] of Object.entries(this.rules.vendor_rules)) {
      if (key.includes(pattern)) return canonical;
    }
    return name.trim();
  }

  /** First category whose keyword occurs in the text */
  suggestCategory(text: string): string | null {
    const lowered = text.toLowerCase();
    for (const [category, keywords] of Object.entries(this.rules.category_keywords)) {
      if (keywords.some((keyword) => lowered.includes(keyword))) return category;
    }
    return null;
  }

  private pick(data: JsonObject, field: string): unknown {
    for (const alias of this.rules.field_aliases[field] ?? [field]) {
      const value = alias.includes('.') ? getPath(data, alias) : data[alias];
      if (!isBlank(value)) return value;
    }
    return undefined;
  }

  private pickItem(item: JsonObject, field: string): unknown {
    for (const alias of this.rules.line_item_aliases[field] ?? [field]) {
      if (!isBlank(item[alias])) return item[alias];
    }
    return undefined;
  }

  private documentType(value: unknown): DocumentType {
    const text = coerceString(value)?.toLowerCase();
    return DOCUMENT_TYPES.find((type) => type === text) ?? this.rules.default_document_type;
  }

  private vendorName(value: unknown): unknown {
    const name = isObject(value) ? coerceString(value.name) : coerceString(value);
    return name === null ? value : this.canonicalVendor(name);
  }

  private paymentMethod(value: unknown): PaymentMethod {
    const text = (coerceString(value) ?? '').toLowerCase();
    for (const [method, keywords] of Object.entries(this.rules.payment_method_map)) {
      const known = PAYMENT_METHODS.find((candidate) => candidate === method);
      if (known && keywords.some((keyword) => text.includes(keyword.toLowerCase()))) return known;
    }
    return 'unknown';
  }

  private isSummaryLine(description: string): boolean {
    const key = description.toLowerCase().replace(/[^a-z\s]/g, '').replace(/\s+/g, ' ').trim();
    return this.rules.line_item_ignore_keywords.some((keyword) => keyword.toLowerCase() === key);
  }

  private lineItems(value: unknown): unknown {
    if (!Array.isArray(value)) return value === undefined ? [] : value;

    const items: unknown[] = [];
    for (const entry of value) {
      if (!isObject(entry)) {
        items.push(entry);
        continue;
      }
      const description = coerceString(this.pickItem(entry, 'description'));
      if (description !== null && this.isSummaryLine(description)) continue;

      const category = coerceString(this.pickItem(entry, 'category'));
      items.push({
        description: description ?? '',
        quantity: coerceNumber(this.pickItem(entry, 'quantity')),
        unit_price: coerceNumber(this.pickItem(entry, 'unit_price')),
        amount: coerceNumber(this.pickItem(entry, 'amount')),
        category: category ?? (description === null ? null : this.suggestCategory(description)),
      });
    }
    return items;
  }
}
