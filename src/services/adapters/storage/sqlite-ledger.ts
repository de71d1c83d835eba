/**
 * SQLite ledger
 *
 * Accepted payloads land in their own database file, one row per
 * fingerprint. Appending a fingerprint that is already present returns the
 * existing row, so a replayed store is harmless.
 *
 * @module adapters/storage/sqlite-ledger
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { FileRef } from '../../../models/document.js';
import type { RuleCode } from '../../../models/validation.js';
import type { LedgerRecord, RowRef, StorageAdapter } from '../types.js';
import { StorageWriteError, errorMessage } from '../../pipeline/errors.js';
import type { LocalReviewRelocator } from './review-relocator.js';

const CREATE_LEDGER_TABLE = `
CREATE TABLE IF NOT EXISTS ledger_entries (
  row_id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id TEXT NOT NULL,
  source_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  file_name TEXT NOT NULL,
  document_type TEXT NOT NULL,
  vendor_name TEXT NOT NULL,
  invoice_number TEXT,
  invoice_date TEXT,
  currency TEXT,
  subtotal REAL,
  tax_amount REAL,
  total_amount REAL,
  confidence REAL NOT NULL,
  provider TEXT,
  payload_json TEXT NOT NULL,
  validation_json TEXT NOT NULL,
  stored_at TEXT NOT NULL,
  UNIQUE (source_id, content_hash)
)
`;

export class SqliteLedger implements StorageAdapter {
  readonly name = 'sqlite';
  private readonly db: Database.Database;

  constructor(
    ledgerPath: string,
    private readonly relocator: LocalReviewRelocator
  ) {
    fs.mkdirSync(path.dirname(ledgerPath), { recursive: true });
    this.db = new Database(ledgerPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(CREATE_LEDGER_TABLE);
  }

  async append(record: LedgerRecord): Promise<RowRef> {
    const { payload, validation, fingerprint } = record;
    try {
      const insert = this.db
        .prepare(
          `INSERT INTO ledger_entries (
            document_id, source_id, content_hash, file_name, document_type, vendor_name,
            invoice_number, invoice_date, currency, subtotal, tax_amount, total_amount,
            confidence, provider, payload_json, validation_json, stored_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT (source_id, content_hash) DO NOTHING`
        )
        .run(
          record.document_id,
          fingerprint.source_id,
          fingerprint.content_hash,
          record.file_ref.name,
          payload.document_type,
          payload.vendor_name,
          payload.invoice_number,
          payload.invoice_date,
          payload.currency,
          payload.subtotal,
          payload.tax_amount,
          payload.total_amount,
          validation.confidence,
          record.provider,
          JSON.stringify(payload),
          JSON.stringify(validation),
          new Date().toISOString()
        );

      const row = this.db
        .prepare<[string, string], { row_id: number }>(
          'SELECT row_id FROM ledger_entries WHERE source_id = ? AND content_hash = ?'
        )
        .get(fingerprint.source_id, fingerprint.content_hash);
      if (!row) {
        throw new Error(`ledger row for ${fingerprint.source_id} missing after insert`);
      }
      return { backend: this.name, row_id: `ledger_entries:${row.row_id}`, created: insert.changes === 1 };
    } catch (error) {
      throw new StorageWriteError(
        `SQLite ledger write failed for ${fingerprint.source_id}: ${errorMessage(error)}`,
        { backend: this.name }
      );
    }
  }

  async relocateForReview(ref: FileRef, reasonCode: RuleCode): Promise<void> {
    await this.relocator.relocate(ref, reasonCode);
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM ledger_entries').get();
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
