/**
 * Prompts for invoice and receipt extraction
 *
 * @module adapters/extraction/prompts
 */

/**
 * Main extraction prompt. Returns one JSON object.
 */
export const EXTRACTION_PROMPT = `You are reading a scanned invoice or receipt. Extract the fields below exactly as printed.

Rules:
- Copy numbers as printed. Do not compute or guess missing amounts; use null.
- Dates as YYYY-MM-DD when you can read them, otherwise null.
- Currency as a 3-letter ISO code, or null if none is shown.
- One line item per printed product or service line. Do not include subtotal, tax or total lines as items.
- Quantities may be negative on refund lines; keep the sign.
- confidence is your own estimate (0.0-1.0) that the extraction is correct.

Return ONLY a JSON object, no explanation and no markdown fences:
{
  "document_type": "invoice|receipt",
  "vendor_name": "string",
  "vendor_tax_id": "string|null",
  "invoice_number": "string|null",
  "invoice_date": "YYYY-MM-DD|null",
  "due_date": "YYYY-MM-DD|null",
  "currency": "XXX|null",
  "subtotal": 0.0,
  "tax_amount": 0.0,
  "total_amount": 0.0,
  "payment_method": "card|cash|bank|unknown",
  "line_items": [
    { "description": "string", "quantity": 1, "unit_price": 0.0, "amount": 0.0, "category": "string|null" }
  ],
  "confidence": 0.0
}`;

/**
 * Corrective re-prompt after unusable output. Sent once.
 *
 * @param previousOutput - What the model returned last time
 * @param problem - Why it could not be used
 */
export function buildCorrectivePrompt(previousOutput: string, problem: string): string {
  const truncated = previousOutput.slice(0, 2000);
  return `Your previous answer could not be used: ${problem}

PREVIOUS ANSWER:
"""
${truncated}
"""

Answer again. Follow the instructions exactly and return only the JSON object.

${EXTRACTION_PROMPT}`;
}
