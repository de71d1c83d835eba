/**
 * Base class for model-backed extractors
 *
 * Owns the adapter-local retry scope: output that cannot be parsed or does
 * not fit the payload schema gets exactly one corrective re-prompt, then an
 * ExtractionParseError. Backoff across attempts belongs to the orchestrator.
 *
 * @module adapters/extraction/base
 */

import { StructuredPayloadSchema, type StructuredPayload } from '../../../models/invoice.js';
import type { ExtractionAdapter, ExtractionResult } from '../types.js';
import { ExtractionError, ExtractionParseError, TransientIOError, errorMessage } from '../../pipeline/errors.js';
import { CircuitBreaker, type CircuitBreakerStatus } from './circuit-breaker.js';
import type { PayloadNormalizer } from './normalizer.js';
import { EXTRACTION_PROMPT, buildCorrectivePrompt } from './prompts.js';

export type ParseOutcome =
  | { ok: true; payload: StructuredPayload }
  | { ok: false; problem: string };

type JsonParse = { ok: true; value: unknown } | { ok: false; problem: string };

function tryJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, problem: `invalid JSON: ${errorMessage(error)}` };
  }
}

/**
 * Pull a JSON value out of model text: strip markdown fences, try the whole
 * text, then the outermost {...} block.
 */
export function parseModelJson(text: string): JsonParse {
  if (text.trim().length === 0) {
    return { ok: false, problem: 'empty response' };
  }

  const clean = text.replace(/```(?:json)?\n?|\n?```/g, '').trim();
  const whole = tryJson(clean);
  if (whole.ok) return whole;

  const first = clean.indexOf('{');
  const last = clean.lastIndexOf('}');
  if (first !== -1 && last > first) {
    return tryJson(clean.slice(first, last + 1));
  }
  return { ok: false, problem: 'no JSON object found' };
}

export abstract class ModelExtractor implements ExtractionAdapter {
  private readonly breaker: CircuitBreaker;

  protected constructor(
    readonly name: string,
    private readonly normalizer: PayloadNormalizer
  ) {
    this.breaker = new CircuitBreaker(name);
  }

  /**
   * Send one prompt plus the document to the model and return its raw text
   */
  protected abstract complete(
    prompt: string,
    bytes: Uint8Array,
    mimeType: string,
    signal?: AbortSignal
  ): Promise<string>;

  async extract(bytes: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<ExtractionResult> {
    const first = await this.breaker.execute(() => this.complete(EXTRACTION_PROMPT, bytes, mimeType, signal));
    const parsed = this.interpret(first);
    if (parsed.ok) return { payload: parsed.payload, provider: this.name };

    console.error(`[Extraction] ${this.name} output unusable (${parsed.problem}); re-prompting once`);
    const second = await this.breaker.execute(() =>
      this.complete(buildCorrectivePrompt(first, parsed.problem), bytes, mimeType, signal)
    );
    const reparsed = this.interpret(second);
    if (reparsed.ok) return { payload: reparsed.payload, provider: this.name };

    throw new ExtractionParseError(
      `${this.name} output unusable after corrective re-prompt: ${reparsed.problem}`,
      this.name,
      second
    );
  }

  /**
   * Parse, normalise and schema-check model text
   */
  interpret(text: string): ParseOutcome {
    const json = parseModelJson(text);
    if (!json.ok) return json;

    const result = StructuredPayloadSchema.safeParse(this.normalizer.normalize(json.value));
    if (!result.success) {
      const problem = result.error.errors
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return { ok: false, problem: `schema mismatch: ${problem}` };
    }
    return { ok: true, payload: result.data };
  }

  circuitStatus(): CircuitBreakerStatus {
    return this.breaker.getStatus();
  }

  /**
   * POST JSON and return the parsed body. 429 and 5xx are transient; other
   * non-2xx statuses are terminal for this provider.
   */
  protected async postJson(url: string, body: unknown, headers: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new TransientIOError(`${this.name} request failed: ${errorMessage(error)}`, { provider: this.name });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      const message = `${this.name} API error ${response.status}: ${response.statusText}. ${text.slice(0, 200)}`;
      if (response.status === 429 || response.status >= 500) {
        throw new TransientIOError(message, { provider: this.name, status: response.status });
      }
      throw new ExtractionError(message, this.name);
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new ExtractionParseError(`${this.name} returned a non-JSON body: ${errorMessage(error)}`, this.name, '');
    }
  }
}

/**
 * Base64 for JSON request bodies
 */
export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}
