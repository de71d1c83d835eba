/**
 * Ordered extraction fallback chain
 *
 * Providers are tried in configured order. A terminal failure (or an open
 * circuit) moves on to the next provider; a transient failure propagates so
 * the orchestrator's backoff applies to the whole chain.
 *
 * @module adapters/extraction/fallback
 */

import type { ExtractionAdapter, ExtractionResult } from '../types.js';
import {
  ExtractionError,
  ExtractionParseError,
  PipelineCancelledError,
  TransientIOError,
  errorMessage,
  isServerError,
} from '../../pipeline/errors.js';
import { CircuitOpenError } from './circuit-breaker.js';

export class FallbackExtractor implements ExtractionAdapter {
  readonly name: string;

  constructor(private readonly providers: readonly ExtractionAdapter[]) {
    if (providers.length === 0) {
      throw new Error('FallbackExtractor needs at least one provider');
    }
    this.name = providers.map((provider) => provider.name).join('>');
  }

  async extract(bytes: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<ExtractionResult> {
    const failures: Array<{ provider: string; error: unknown }> = [];

    for (const [index, provider] of this.providers.entries()) {
      const isLast = index === this.providers.length - 1;
      try {
        return await provider.extract(bytes, mimeType, signal);
      } catch (error) {
        if (signal?.aborted || error instanceof PipelineCancelledError) throw error;
        const skippable = error instanceof CircuitOpenError;
        const transient = !skippable && (error instanceof TransientIOError || isServerError(error));
        if (transient || (skippable && isLast)) throw error;

        console.error(
          `[Extraction] ${provider.name} failed: ${errorMessage(error)}${isLast ? '' : '; trying next provider'}`
        );
        failures.push({ provider: provider.name, error });
      }
    }

    return this.giveUp(failures);
  }

  private giveUp(failures: Array<{ provider: string; error: unknown }>): never {
    const last = failures[failures.length - 1];
    if (failures.length === 1) throw last.error;

    const summary = failures.map((f) => `${f.provider}: ${errorMessage(f.error)}`).join(' | ');
    if (failures.every((f) => f.error instanceof ExtractionParseError)) {
      const rawOutput = last.error instanceof ExtractionParseError ? last.error.rawOutput : '';
      throw new ExtractionParseError(`All providers returned unusable output: ${summary}`, last.provider, rawOutput);
    }
    throw new ExtractionError(`All providers failed: ${summary}`, last.provider);
  }
}
