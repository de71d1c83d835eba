/**
 * Ollama extraction adapter
 *
 * Talks to a local Ollama server over /api/chat with the document attached
 * as a base64 image. No API key.
 *
 * Start Ollama and pull a vision model before use:
 *   ollama serve
 *   ollama pull llava
 *
 * @module adapters/extraction/ollama
 */

import { z } from 'zod';
import { ExtractionError } from '../../pipeline/errors.js';
import { ModelExtractor, toBase64 } from './base.js';
import type { PayloadNormalizer } from './normalizer.js';

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
});

export class OllamaExtractor extends ModelExtractor {
  constructor(
    private readonly config: OllamaConfig,
    normalizer: PayloadNormalizer
  ) {
    super('ollama', normalizer);
  }

  protected async complete(
    prompt: string,
    bytes: Uint8Array,
    _mimeType: string,
    signal?: AbortSignal
  ): Promise<string> {
    const data = await this.postJson(
      `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`,
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt, images: [toBase64(bytes)] }],
        stream: false,
        format: 'json',
        options: {
          temperature: this.config.temperature,
          num_predict: this.config.maxOutputTokens,
        },
      },
      {},
      signal
    );

    const parsed = OllamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExtractionError(`ollama returned an unexpected response shape: ${parsed.error.message}`, this.name);
    }
    return parsed.data.message.content;
  }
}
