/**
 * Unit tests for the ordered extraction fallback chain
 */

import { describe, it, expect } from 'vitest';
import { FallbackExtractor } from '../../../src/services/adapters/extraction/fallback.js';
import { CircuitOpenError } from '../../../src/services/adapters/extraction/circuit-breaker.js';
import {
  ExtractionError,
  ExtractionParseError,
  PipelineCancelledError,
  TransientIOError,
} from '../../../src/services/pipeline/errors.js';
import { ScriptedExtractor, bytesOf, createPayload } from '../pipeline/helpers.js';

const BYTES = bytesOf('img');

describe('FallbackExtractor', () => {
  it('is named after its providers in order', () => {
    const chain = new FallbackExtractor([new ScriptedExtractor([createPayload()], 'ollama'), new ScriptedExtractor([createPayload()], 'openai')]);
    expect(chain.name).toBe('ollama>openai');
  });

  it('needs at least one provider', () => {
    expect(() => new FallbackExtractor([])).toThrow('FallbackExtractor needs at least one provider');
  });

  it('returns the first provider that succeeds', async () => {
    const first = new ScriptedExtractor([createPayload()], 'ollama');
    const second = new ScriptedExtractor([createPayload()], 'openai');

    const result = await new FallbackExtractor([first, second]).extract(BYTES, 'image/png');

    expect(result.provider).toBe('ollama');
    expect(second.calls).toBe(0);
  });

  it('moves on after a terminal failure', async () => {
    const first = new ScriptedExtractor([new ExtractionError('ollama API error 400: Bad Request', 'ollama')], 'ollama');
    const second = new ScriptedExtractor([createPayload()], 'openai');

    const result = await new FallbackExtractor([first, second]).extract(BYTES, 'image/png');

    expect(result.provider).toBe('openai');
    expect(first.calls).toBe(1);
  });

  it('skips a provider whose circuit is open', async () => {
    const first = new ScriptedExtractor([new CircuitOpenError('ollama', 30_000)], 'ollama');
    const second = new ScriptedExtractor([createPayload()], 'openai');

    const result = await new FallbackExtractor([first, second]).extract(BYTES, 'image/png');

    expect(result.provider).toBe('openai');
  });

  it('propagates an open circuit on the last provider so the run backs off', async () => {
    const first = new ScriptedExtractor([new ExtractionError('bad request', 'ollama')], 'ollama');
    const open = new CircuitOpenError('openai', 30_000);
    const second = new ScriptedExtractor([open], 'openai');

    await expect(new FallbackExtractor([first, second]).extract(BYTES, 'image/png')).rejects.toBe(open);
  });

  it('propagates a transient failure without trying the next provider', async () => {
    const busy = new TransientIOError('ollama API error 503: Service Unavailable. ');
    const first = new ScriptedExtractor([busy], 'ollama');
    const second = new ScriptedExtractor([createPayload()], 'openai');

    await expect(new FallbackExtractor([first, second]).extract(BYTES, 'image/png')).rejects.toBe(busy);
    expect(second.calls).toBe(0);
  });

  it('propagates cancellation', async () => {
    const first = new ScriptedExtractor([new PipelineCancelledError()], 'ollama');
    const second = new ScriptedExtractor([createPayload()], 'openai');

    await expect(new FallbackExtractor([first, second]).extract(BYTES, 'image/png')).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
    expect(second.calls).toBe(0);
  });

  it('rethrows the only failure of a single-provider chain', async () => {
    const failure = new ExtractionError('unsupported layout', 'ollama');
    const chain = new FallbackExtractor([new ScriptedExtractor([failure], 'ollama')]);

    await expect(chain.extract(BYTES, 'image/png')).rejects.toBe(failure);
  });

  it('reports unusable output from every provider as a parse error', async () => {
    const chain = new FallbackExtractor([
      new ScriptedExtractor([new ExtractionParseError('no JSON object found', 'ollama', 'a')], 'ollama'),
      new ScriptedExtractor([new ExtractionParseError('empty response', 'openai', 'b')], 'openai'),
    ]);

    const error = await chain.extract(BYTES, 'image/png').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionParseError);
    if (error instanceof ExtractionParseError) {
      expect(error.message).toBe(
        'All providers returned unusable output: ollama: no JSON object found | openai: empty response'
      );
      expect(error.provider).toBe('openai');
      expect(error.rawOutput).toBe('b');
    }
  });

  it('reports mixed failures as an extraction failure', async () => {
    const chain = new FallbackExtractor([
      new ScriptedExtractor([new ExtractionParseError('no JSON object found', 'ollama', '')], 'ollama'),
      new ScriptedExtractor([new ExtractionError('openai API error 401: Unauthorized', 'openai')], 'openai'),
    ]);

    const error = await chain.extract(BYTES, 'image/png').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).not.toBeInstanceOf(ExtractionParseError);
    expect(error).toHaveProperty(
      'message',
      'All providers failed: ollama: no JSON object found | openai: openai API error 401: Unauthorized'
    );
  });
});
