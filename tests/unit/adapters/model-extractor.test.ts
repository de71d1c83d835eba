/**
 * Model-backed extractors: JSON recovery, the corrective re-prompt and the
 * HTTP request shapes of the Ollama and OpenAI-compatible providers.
 *
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ModelExtractor, parseModelJson, toBase64 } from '../../../src/services/adapters/extraction/base.js';
import { OllamaExtractor } from '../../../src/services/adapters/extraction/ollama.js';
import { OpenAICompatibleExtractor } from '../../../src/services/adapters/extraction/openai-compatible.js';
import { PayloadNormalizer } from '../../../src/services/adapters/extraction/normalizer.js';
import { CircuitOpenError } from '../../../src/services/adapters/extraction/circuit-breaker.js';
import {
  ExtractionError,
  ExtractionParseError,
  TransientIOError,
} from '../../../src/services/pipeline/errors.js';
import { bytesOf } from '../pipeline/helpers.js';

const normalizer = PayloadNormalizer.fromFile();

const MODEL_OUTPUT = JSON.stringify({
  document_type: 'invoice',
  vendor_name: 'Acme Supplies',
  invoice_number: 'INV-1001',
  invoice_date: '2026-03-14',
  currency: 'EUR',
  subtotal: 100,
  tax_amount: 10,
  total_amount: 110,
  payment_method: 'bank transfer',
  line_items: [{ description: 'Printer paper', quantity: 4, unit_price: 25, amount: 100 }],
  confidence: 0.9,
});

/** Extractor whose model answers come from a list */
class ListExtractor extends ModelExtractor {
  readonly prompts: string[] = [];

  constructor(private readonly answers: Array<string | Error>) {
    super('stub', normalizer);
  }

  protected async complete(prompt: string): Promise<string> {
    const answer = this.answers[Math.min(this.prompts.length, this.answers.length - 1)];
    this.prompts.push(prompt);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// JSON RECOVERY
// ═══════════════════════════════════════════════════════════════════════════════

describe('parseModelJson', () => {
  it('parses plain JSON', () => {
    expect(parseModelJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('strips markdown fences', () => {
    expect(parseModelJson('```json\n{"a":1}\n```')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('extracts the outermost object from surrounding prose', () => {
    expect(parseModelJson('Here it is: {"a":{"b":2}} hope that helps')).toEqual({
      ok: true,
      value: { a: { b: 2 } },
    });
  });

  it('names the problem when nothing can be parsed', () => {
    expect(parseModelJson('   ')).toEqual({ ok: false, problem: 'empty response' });
    expect(parseModelJson('I cannot read this document')).toEqual({ ok: false, problem: 'no JSON object found' });
    expect(parseModelJson('{"a":')).toEqual({ ok: false, problem: 'no JSON object found' });

    const broken = parseModelJson('{vendor: Acme}');
    expect(broken.ok).toBe(false);
    if (!broken.ok) expect(broken.problem).toMatch(/^invalid JSON: /);
  });
});

describe('toBase64', () => {
  it('encodes raw bytes', () => {
    expect(toBase64(bytesOf('img'))).toBe('aW1n');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CORRECTIVE RE-PROMPT
// ═══════════════════════════════════════════════════════════════════════════════

describe('ModelExtractor', () => {
  it('returns a normalised payload from the first usable answer', async () => {
    const extractor = new ListExtractor([MODEL_OUTPUT]);

    const result = await extractor.extract(bytesOf('img'), 'image/png');

    expect(result.provider).toBe('stub');
    expect(result.payload).toMatchObject({
      vendor_name: 'Acme Supplies',
      payment_method: 'bank',
      model_confidence: 0.9,
      line_items: [{ description: 'Printer paper', amount: 100, category: 'office_supplies' }],
    });
    expect(extractor.prompts).toHaveLength(1);
  });

  it('re-prompts once with the problem and the previous answer', async () => {
    const extractor = new ListExtractor(['Sorry, here is the invoice.', MODEL_OUTPUT]);

    const result = await extractor.extract(bytesOf('img'), 'image/png');

    expect(result.payload.vendor_name).toBe('Acme Supplies');
    expect(extractor.prompts).toHaveLength(2);
    expect(extractor.prompts[1].startsWith('Your previous answer could not be used: no JSON object found')).toBe(true);
    expect(extractor.prompts[1]).toContain('Sorry, here is the invoice.');
  });

  it('gives up with ExtractionParseError after the corrective attempt', async () => {
    const extractor = new ListExtractor(['not json', '{}']);

    const error = await extractor.extract(bytesOf('img'), 'image/png').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionParseError);
    if (error instanceof ExtractionParseError) {
      expect(error.message).toBe('stub output unusable after corrective re-prompt: schema mismatch: vendor_name: Required');
      expect(error.rawOutput).toBe('{}');
      expect(error.provider).toBe('stub');
      expect(error.category).toBe('EXTRACTION_PARSE');
    }
  });

  it('reports schema problems with their paths', () => {
    const extractor = new ListExtractor([]);
    expect(extractor.interpret('{}')).toEqual({ ok: false, problem: 'schema mismatch: vendor_name: Required' });
  });

  it('opens the provider circuit after repeated transient failures', async () => {
    const extractor = new ListExtractor([new TransientIOError('stub API error 503')]);

    for (let i = 0; i < 5; i++) {
      await expect(extractor.extract(bytesOf('img'), 'image/png')).rejects.toBeInstanceOf(TransientIOError);
    }

    expect(extractor.circuitStatus().state).toBe('OPEN');
    await expect(extractor.extract(bytesOf('img'), 'image/png')).rejects.toBeInstanceOf(CircuitOpenError);
    expect(extractor.prompts).toHaveLength(5);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn<FetchFn>();
  for (const response of responses) {
    if (response instanceof Error) fetchMock.mockRejectedValueOnce(response);
    else fetchMock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function requestBody(init: RequestInit): unknown {
  return JSON.parse(String(init.body));
}

describe('OllamaExtractor', () => {
  const config = { baseUrl: 'http://localhost:11434/', model: 'llava', temperature: 0, maxOutputTokens: 2048 };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the prompt and the document image to /api/chat', async () => {
    const fetchMock = stubFetch(jsonResponse({ model: 'llava', message: { role: 'assistant', content: MODEL_OUTPUT } }));

    const result = await new OllamaExtractor(config, normalizer).extract(bytesOf('img'), 'image/png');

    expect(result.provider).toBe('ollama');
    expect(result.payload.total_amount).toBe(110);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(init.method).toBe('POST');
    expect(new Headers(init.headers).get('content-type')).toBe('application/json');
    expect(requestBody(init)).toMatchObject({
      model: 'llava',
      stream: false,
      format: 'json',
      options: { temperature: 0, num_predict: 2048 },
      messages: [{ role: 'user', images: ['aW1n'] }],
    });
  });

  it('treats 5xx as transient', async () => {
    stubFetch(new Response('model loading', { status: 503, statusText: 'Service Unavailable' }));

    const error = await new OllamaExtractor(config, normalizer).extract(bytesOf('img'), 'image/png').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientIOError);
    expect(error).toHaveProperty('message', 'ollama API error 503: Service Unavailable. model loading');
  });

  it('treats other error statuses as terminal', async () => {
    stubFetch(new Response('model "llava" not found', { status: 404, statusText: 'Not Found' }));

    const error = await new OllamaExtractor(config, normalizer).extract(bytesOf('img'), 'image/png').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).not.toBeInstanceOf(TransientIOError);
    expect(error).toHaveProperty('message', 'ollama API error 404: Not Found. model "llava" not found');
  });

  it('wraps a network failure as transient', async () => {
    stubFetch(new TypeError('fetch failed'));

    await expect(new OllamaExtractor(config, normalizer).extract(bytesOf('img'), 'image/png')).rejects.toThrow(
      'ollama request failed: fetch failed'
    );
  });

  it('rejects an unexpected response shape', async () => {
    stubFetch(jsonResponse({ error: 'nope' }));

    await expect(new OllamaExtractor(config, normalizer).extract(bytesOf('img'), 'image/png')).rejects.toThrow(
      /^ollama returned an unexpected response shape/
    );
  });
});

describe('OpenAICompatibleExtractor', () => {
  const config = {
    baseUrl: 'https://llm.example.test',
    model: 'vision-small',
    apiKey: 'test-key',
    temperature: 0,
    maxOutputTokens: 4096,
  };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function completion(content: string | null): Response {
    return jsonResponse({ choices: [{ message: { content }, finish_reason: 'stop' }] });
  }

  it('sends a PDF as a file part with bearer auth', async () => {
    const fetchMock = stubFetch(completion(MODEL_OUTPUT));

    const result = await new OpenAICompatibleExtractor(config, normalizer).extract(bytesOf('img'), 'application/pdf');

    expect(result.provider).toBe('openai');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.example.test/v1/chat/completions');
    expect(new Headers(init.headers).get('authorization')).toBe('Bearer test-key');
    expect(requestBody(init)).toMatchObject({
      model: 'vision-small',
      temperature: 0,
      max_tokens: 4096,
      response_format: { type: 'json_object' },
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text' },
            { type: 'file', file: { filename: 'document.pdf', file_data: 'data:application/pdf;base64,aW1n' } },
          ],
        },
      ],
    });
  });

  it('sends an image as a data URL and omits auth without a key', async () => {
    const fetchMock = stubFetch(completion(MODEL_OUTPUT));

    await new OpenAICompatibleExtractor({ ...config, apiKey: null }, normalizer).extract(bytesOf('img'), 'image/png');

    const [, init] = fetchMock.mock.calls[0];
    expect(new Headers(init.headers).get('authorization')).toBeNull();
    expect(requestBody(init)).toMatchObject({
      messages: [{ content: [{ type: 'text' }, { type: 'image_url', image_url: { url: 'data:image/png;base64,aW1n' } }] }],
    });
  });

  it('treats a rate limit as transient', async () => {
    stubFetch(new Response('slow down', { status: 429, statusText: 'Too Many Requests' }));

    await expect(
      new OpenAICompatibleExtractor(config, normalizer).extract(bytesOf('img'), 'image/png')
    ).rejects.toBeInstanceOf(TransientIOError);
  });

  it('re-prompts after empty content, then gives up', async () => {
    const fetchMock = stubFetch(completion(null), completion(null));

    await expect(
      new OpenAICompatibleExtractor(config, normalizer).extract(bytesOf('img'), 'image/png')
    ).rejects.toThrow('openai output unusable after corrective re-prompt: empty response');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
