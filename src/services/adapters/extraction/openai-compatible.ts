/**
 * OpenAI-compatible extraction adapter
 *
 * Any server that speaks POST /v1/chat/completions with image content parts
 * (OpenAI, vLLM, LM Studio, llama.cpp server). Images go as data URLs; PDFs
 * as a file content part.
 *
 * @module adapters/extraction/openai-compatible
 */

import { z } from 'zod';
import { ExtractionError } from '../../pipeline/errors.js';
import { ModelExtractor, toBase64 } from './base.js';
import type { PayloadNormalizer } from './normalizer.js';

export interface OpenAICompatibleConfig {
  baseUrl: string;
  model: string;
  apiKey: string | null;
  temperature: number;
  maxOutputTokens: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
});

function documentPart(bytes: Uint8Array, mimeType: string): Record<string, unknown> {
  const dataUrl = `data:${mimeType};base64,${toBase64(bytes)}`;
  if (mimeType === 'application/pdf') {
    return { type: 'file', file: { filename: 'document.pdf', file_data: dataUrl } };
  }
  return { type: 'image_url', image_url: { url: dataUrl } };
}

export class OpenAICompatibleExtractor extends ModelExtractor {
  constructor(
    private readonly config: OpenAICompatibleConfig,
    normalizer: PayloadNormalizer
  ) {
    super('openai', normalizer);
  }

  protected async complete(
    prompt: string,
    bytes: Uint8Array,
    mimeType: string,
    signal?: AbortSignal
  ): Promise<string> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const data = await this.postJson(
      `${this.config.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`,
      {
        model: this.config.model,
        temperature: this.config.temperature,
        max_tokens: this.config.maxOutputTokens,
        response_format: { type: 'json_object' },
        messages: [
          {
            role: 'user',
            content: [{ type: 'text', text: prompt }, documentPart(bytes, mimeType)],
          },
        ],
      },
      headers,
      signal
    );

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExtractionError(`openai returned an unexpected response shape: ${parsed.error.message}`, this.name);
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}
