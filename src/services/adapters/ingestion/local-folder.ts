/**
 * Local inbox ingestion
 *
 * Candidates are the regular files directly inside the inbox directory whose
 * extension maps to an allowed MIME type. The source id is the file name.
 *
 * @module adapters/ingestion/local-folder
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import type { FileRef } from '../../../models/document.js';
import type { IngestionAdapter } from '../types.js';
import { TransientIOError } from '../../pipeline/errors.js';

export const EXTENSION_MIME_TYPES: Readonly<Record<string, string>> = {
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
};

export const DEFAULT_ALLOWED_MIME_TYPES = ['application/pdf', 'image/png', 'image/jpeg', 'image/webp'];

/** Filesystem error codes worth another attempt */
const TRANSIENT_FS_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'EIO']);

export function mimeTypeOf(fileName: string): string | null {
  const ext = path.extname(fileName).toLowerCase().slice(1);
  return EXTENSION_MIME_TYPES[ext] ?? null;
}

function errorCode(error: unknown): string | null {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : null;
}

export interface LocalFolderConfig {
  inboxDir: string;
  allowedMimeTypes: readonly string[];
}

export class LocalFolderIngestion implements IngestionAdapter {
  readonly name = 'local';
  private readonly allowed: ReadonlySet<string>;

  constructor(private readonly config: LocalFolderConfig) {
    this.allowed = new Set(config.allowedMimeTypes);
  }

  async *listCandidates(signal?: AbortSignal): AsyncGenerator<FileRef> {
    const entries = await readdir(this.config.inboxDir, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    for (const name of names) {
      if (signal?.aborted) return;
      const mimeType = mimeTypeOf(name);
      if (mimeType === null || !this.allowed.has(mimeType)) continue;
      yield { source_id: name, name, mime_type: mimeType };
    }
  }

  async download(ref: FileRef, signal?: AbortSignal): Promise<Uint8Array> {
    const filePath = path.join(this.config.inboxDir, ref.source_id);
    try {
      return new Uint8Array(await readFile(filePath, { signal }));
    } catch (error) {
      if (signal?.aborted) throw error;
      const code = errorCode(error);
      if (code !== null && TRANSIENT_FS_CODES.has(code)) {
        throw new TransientIOError(`Reading ${ref.source_id} failed (${code})`, { path: filePath });
      }
      // Missing or unreadable file: terminal
      throw error;
    }
  }
}
