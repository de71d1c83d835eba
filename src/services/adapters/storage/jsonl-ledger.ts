/**
 * JSON Lines ledger
 *
 * One JSON object per accepted document, appended to a single file. The
 * fingerprint index is rebuilt from the file on open; appends are serialised
 * within the process.
 *
 * @module adapters/storage/jsonl-ledger
 */

import fs from 'fs';
import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { fingerprintKey, type FileRef } from '../../../models/document.js';
import type { RuleCode } from '../../../models/validation.js';
import type { LedgerRecord, RowRef, StorageAdapter } from '../types.js';
import { StorageWriteError, errorMessage } from '../../pipeline/errors.js';
import type { LocalReviewRelocator } from './review-relocator.js';

const LedgerLineSchema = z.object({
  line: z.number().int(),
  source_id: z.string(),
  content_hash: z.string(),
});

export class JsonlLedger implements StorageAdapter {
  readonly name = 'jsonl';
  /** fingerprint key -> line number (1-based) */
  private readonly index = new Map<string, number>();
  private lines = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly relocator: LocalReviewRelocator
  ) {
    this.loadIndex();
  }

  private loadIndex(): void {
    if (!fs.existsSync(this.filePath)) return;
    const content = fs.readFileSync(this.filePath, 'utf-8');
    for (const text of content.split('\n')) {
      if (text.trim() === '') continue;
      this.lines++;
      const parsed = LedgerLineSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        console.error(`[JsonlLedger] Line ${this.lines} of ${this.filePath} has no fingerprint; skipped in index`);
        continue;
      }
      this.index.set(fingerprintKey(parsed.data), parsed.data.line);
    }
  }

  append(record: LedgerRecord): Promise<RowRef> {
    const run = this.tail.then(() => this.write(record));
    this.tail = run.catch((error: unknown) => {
      console.error(`[JsonlLedger] append failed: ${errorMessage(error)}`);
    });
    return run;
  }

  private async write(record: LedgerRecord): Promise<RowRef> {
    const key = fingerprintKey(record.fingerprint);
    const existing = this.index.get(key);
    if (existing !== undefined) {
      return { backend: this.name, row_id: `line:${existing}`, created: false };
    }

    const line = this.lines + 1;
    const entry = {
      line,
      ...record.fingerprint,
      document_id: record.document_id,
      file_name: record.file_ref.name,
      provider: record.provider,
      payload: record.payload,
      validation: record.validation,
      stored_at: new Date().toISOString(),
    };

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      throw new StorageWriteError(`JSONL ledger write failed for ${record.fingerprint.source_id}: ${errorMessage(error)}`, {
        backend: this.name,
        path: this.filePath,
      });
    }

    this.lines = line;
    this.index.set(key, line);
    return { backend: this.name, row_id: `line:${line}`, created: true };
  }

  async relocateForReview(ref: FileRef, reasonCode: RuleCode): Promise<void> {
    await this.relocator.relocate(ref, reasonCode);
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
