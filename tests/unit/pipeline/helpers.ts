/**
 * Shared test helpers for pipeline tests
 *
 * Temp databases, payload factories and in-process adapter fakes.
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { SqliteClaimStore } from '../../../src/services/pipeline/claim-store.js';
import { PipelineOrchestrator, type PipelineSettings } from '../../../src/services/pipeline/orchestrator.js';
import { ReplayController } from '../../../src/services/pipeline/replay.js';
import { DEFAULT_VALIDATION_CONFIG } from '../../../src/services/pipeline/validation-scorer.js';
import { DEFAULT_RETRY_POLICY } from '../../../src/utils/backoff.js';
import { computeHash } from '../../../src/utils/hash.js';
import type {
  ExtractionAdapter,
  ExtractionResult,
  IngestionAdapter,
  LedgerRecord,
  RowRef,
  StorageAdapter,
} from '../../../src/services/adapters/types.js';
import type { FileRef, Fingerprint } from '../../../src/models/document.js';
import type { ClaimAttempt } from '../../../src/models/claim.js';
import type { StructuredPayload } from '../../../src/models/invoice.js';
import type { RuleCode } from '../../../src/models/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES AND DATABASES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTempDir(prefix = 'test-pipeline-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function openTestDatabase(dir: string, name = 'pipeline.db'): DatabaseService {
  return DatabaseService.open(join(dir, name));
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Two lines of 2 x 25.00, subtotal 100, tax 10, total 110.
 * Scores 0.975 with the default scorer settings and is accepted.
 */
export function createPayload(overrides: Partial<StructuredPayload> = {}): StructuredPayload {
  return {
    document_type: 'invoice',
    vendor_name: 'Acme Supplies',
    vendor_tax_id: null,
    invoice_number: 'INV-1001',
    invoice_date: '2026-03-14',
    due_date: null,
    currency: 'EUR',
    subtotal: 100,
    tax_amount: 10,
    total_amount: 110,
    payment_method: 'bank',
    line_items: [
      { description: 'Printer paper', quantity: 2, unit_price: 25, amount: 50, category: null },
      { description: 'Toner', quantity: 2, unit_price: 25, amount: 50, category: null },
    ],
    model_confidence: 0.95,
    ...overrides,
  };
}

export function fileRef(sourceId: string, mimeType = 'application/pdf'): FileRef {
  return { source_id: sourceId, name: sourceId, mime_type: mimeType };
}

export function bytesOf(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function fingerprintOf(sourceId: string, content: string): Fingerprint {
  return { source_id: sourceId, content_hash: computeHash(bytesOf(content)) };
}

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    workerId: 'worker-1',
    concurrency: 1,
    retry: { ...DEFAULT_RETRY_POLICY, timeoutIsTerminal: false },
    timeouts: { downloadMs: 1000, extractMs: 1000, storeMs: 1000 },
    validation: DEFAULT_VALIDATION_CONFIG,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ADAPTER FAKES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * In-memory inbox. `failures` holds errors thrown by the next downloads of a
 * source id, in order, before the content is returned.
 */
export class FakeIngestion implements IngestionAdapter {
  readonly name = 'fake';
  readonly files = new Map<string, { content: string; mimeType: string }>();
  readonly failures = new Map<string, unknown[]>();
  downloads = 0;

  add(sourceId: string, content: string, mimeType = 'application/pdf'): this {
    this.files.set(sourceId, { content, mimeType });
    return this;
  }

  failNext(sourceId: string, ...errors: unknown[]): this {
    this.failures.set(sourceId, [...(this.failures.get(sourceId) ?? []), ...errors]);
    return this;
  }

  async *listCandidates(): AsyncGenerator<FileRef> {
    for (const [sourceId, file] of this.files) {
      yield fileRef(sourceId, file.mimeType);
    }
  }

  async download(ref: FileRef): Promise<Uint8Array> {
    this.downloads++;
    const pending = this.failures.get(ref.source_id);
    if (pending && pending.length > 0) {
      throw pending.shift();
    }
    const file = this.files.get(ref.source_id);
    if (!file) throw new Error(`ENOENT: no such file ${ref.source_id}`);
    return bytesOf(file.content);
  }
}

/**
 * Extraction fake driven by a list of steps: each call consumes the next
 * step, and the last step repeats once the list runs out.
 */
export class ScriptedExtractor implements ExtractionAdapter {
  calls = 0;

  constructor(
    private readonly steps: Array<StructuredPayload | Error>,
    readonly name = 'scripted'
  ) {}

  async extract(): Promise<ExtractionResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (step instanceof Error) throw step;
    return { payload: step, provider: this.name };
  }
}

export class FakeStorage implements StorageAdapter {
  readonly name = 'memory';
  readonly records: LedgerRecord[] = [];
  readonly relocations: Array<{ sourceId: string; reasonCode: RuleCode }> = [];
  /** Errors thrown by the next appends, in order */
  readonly appendFailures: unknown[] = [];
  relocationError: Error | null = null;
  closed = false;

  async append(record: LedgerRecord): Promise<RowRef> {
    if (this.appendFailures.length > 0) throw this.appendFailures.shift();
    this.records.push(record);
    return { backend: this.name, row_id: `row:${this.records.length}`, created: true };
  }

  async relocateForReview(ref: FileRef, reasonCode: RuleCode): Promise<void> {
    if (this.relocationError) throw this.relocationError;
    this.relocations.push({ sourceId: ref.source_id, reasonCode });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Claim store that runs `beforeNextClaim` once, just before its next claim,
 * to let another worker act between the state check and the claim
 */
export class InterleavingClaimStore extends SqliteClaimStore {
  beforeNextClaim: (() => Promise<unknown>) | null = null;

  override async tryClaim(fingerprint: Fingerprint, workerId: string): Promise<ClaimAttempt> {
    const step = this.beforeNextClaim;
    this.beforeNextClaim = null;
    if (step) await step();
    return super.tryClaim(fingerprint, workerId);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestPipeline {
  db: DatabaseService;
  claims: SqliteClaimStore;
  ingestion: FakeIngestion;
  extraction: ExtractionAdapter;
  storage: FakeStorage;
  orchestrator: PipelineOrchestrator;
  replay: ReplayController;
  /** Delays the retry executor waited for, in order */
  sleeps: number[];
}

/**
 * Orchestrator over fakes. Backoff waits are recorded instead of slept and
 * jitter is zero, so delays are exactly 500, 1000, 2000...
 */
export function createTestPipeline(
  db: DatabaseService,
  options: {
    ingestion?: FakeIngestion;
    extraction?: ExtractionAdapter;
    storage?: FakeStorage;
    settings?: Partial<PipelineSettings>;
    staleAfterMs?: number;
    claims?: SqliteClaimStore;
  } = {}
): TestPipeline {
  const ingestion = options.ingestion ?? new FakeIngestion();
  const extraction = options.extraction ?? new ScriptedExtractor([createPayload()]);
  const storage = options.storage ?? new FakeStorage();
  const claims = options.claims ?? new SqliteClaimStore(db, options.staleAfterMs ?? 60_000);
  const sleeps: number[] = [];

  const orchestrator = new PipelineOrchestrator({
    db,
    claims,
    ingestion,
    extraction,
    storage,
    settings: testSettings(options.settings),
    hooks: {
      sleep: async (delayMs) => {
        sleeps.push(delayMs);
      },
      random: () => 0.5,
    },
  });

  return {
    db,
    claims,
    ingestion,
    extraction,
    storage,
    orchestrator,
    replay: new ReplayController(db, claims, orchestrator),
    sleeps,
  };
}
