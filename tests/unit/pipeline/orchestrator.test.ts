/**
 * Orchestrator tests: full lifecycles over an on-disk SQLite database with
 * in-process adapter fakes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseService } from '../../../src/services/storage/database/index.js';
import { RunContext } from '../../../src/services/pipeline/context.js';
import {
  ExtractionError,
  StorageWriteError,
  TransientIOError,
} from '../../../src/services/pipeline/errors.js';
import type { ExtractionAdapter } from '../../../src/services/adapters/types.js';
import { unfetchedFingerprint, type PipelineDocument } from '../../../src/models/document.js';
import {
  FakeIngestion,
  FakeStorage,
  InterleavingClaimStore,
  ScriptedExtractor,
  bytesOf,
  cleanupTempDir,
  createPayload,
  createTempDir,
  createTestPipeline,
  fingerprintOf,
  openTestDatabase,
} from './helpers.js';

const ALPHA = fingerprintOf('a.pdf', 'alpha');
const UNFETCHED_A = unfetchedFingerprint('a.pdf');

function actions(db: DatabaseService, doc: PipelineDocument): string[] {
  return db.getAuditTrail(doc.id).map((entry) => entry.action);
}

function requireDoc(db: DatabaseService): PipelineDocument {
  const doc = db.getDocumentByFingerprint(ALPHA);
  if (!doc) throw new Error('document a.pdf was not created');
  return doc;
}

describe('PipelineOrchestrator', () => {
  let dir: string;
  let db: DatabaseService;
  let ingestion: FakeIngestion;

  beforeEach(() => {
    dir = createTempDir('test-orchestrator-');
    db = openTestDatabase(dir);
    ingestion = new FakeIngestion().add('a.pdf', 'alpha');
  });

  afterEach(() => {
    db.close();
    cleanupTempDir(dir);
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // SUCCESS PATH
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('success path', () => {
    it('stores a valid document with one audit entry per transition', async () => {
      const pipeline = createTestPipeline(db, { ingestion });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 1, skipped: 0, reviewed: 0, dead_lettered: 0, failed: 0 });
      expect(summary.cancelled).toBe(false);

      const doc = requireDoc(db);
      expect(doc.state).toBe('STORED');
      expect(doc.stage_history.map((entry) => entry.state)).toEqual([
        'DISCOVERED',
        'CLAIMED',
        'DOWNLOADING',
        'EXTRACTING',
        'VALIDATING',
        'STORED',
      ]);
      expect(doc.payload?.vendor_name).toBe('Acme Supplies');
      expect(doc.validation?.confidence).toBe(0.975);

      const trail = db.getAuditTrail(doc.id);
      expect(trail.map((entry) => entry.action)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'EXTRACTED', 'ACCEPT']);
      expect(trail.map((entry) => entry.sequence)).toEqual([1, 2, 3, 4, 5]);
      expect(trail[4]).toMatchObject({ previous_state: 'VALIDATING', new_state: 'STORED', actor: 'system' });
      expect(trail[4].details).toMatchObject({ backend: 'memory', row_id: 'row:1', created: true });

      expect(db.countDeadLetters()).toBe(0);
      expect(db.listClaims(ALPHA).map((claim) => claim.outcome)).toEqual(['STORED']);
      expect(pipeline.storage.records).toHaveLength(1);
      expect(pipeline.storage.records[0]).toMatchObject({ document_id: doc.id, fingerprint: ALPHA, provider: 'scripted' });
    });

    it('skips a fingerprint that is already processed', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const second = await pipeline.orchestrator.pollOnce(new RunContext('worker-2'));

      expect(second).toMatchObject({ processed: 0, skipped: 1 });
      expect(pipeline.storage.records).toHaveLength(1);
      expect(actions(db, requireDoc(db))).toHaveLength(5);
    });

    it('treats edited content as a new document', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      ingestion.add('a.pdf', 'alpha, corrected');
      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.processed).toBe(1);
      expect(db.getStats().total_documents).toBe(2);
    });

    it('processes several documents with concurrency above one', async () => {
      ingestion.add('b.pdf', 'bravo').add('c.pdf', 'charlie');
      const pipeline = createTestPipeline(db, { ingestion, settings: { concurrency: 2 } });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.processed).toBe(3);
      expect(db.getStats().documents_by_state.STORED).toBe(3);
      expect(db.countActiveClaims()).toBe(0);
    });

    it('records p95 latencies for every stage that ran', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.latency_p95_ms.download).not.toBeNull();
      expect(summary.latency_p95_ms.extract).not.toBeNull();
      expect(summary.latency_p95_ms.store).not.toBeNull();
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // RETRIES AND DEAD LETTERS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('extraction failures', () => {
    it('audits a retried extraction as FAIL then RETRY', async () => {
      const extraction = new ScriptedExtractor([new TransientIOError('model busy'), createPayload()]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.processed).toBe(1);
      const doc = requireDoc(db);
      expect(doc.state).toBe('STORED');
      expect(doc.retry_counts).toEqual({ DOWNLOADING: 0, EXTRACTING: 1, STORING: 0 });
      expect(actions(db, doc)).toEqual([
        'CLAIM',
        'START_DOWNLOAD',
        'DOWNLOADED',
        'FAIL',
        'RETRY',
        'EXTRACTED',
        'ACCEPT',
      ]);
      expect(pipeline.sleeps).toEqual([500]);
    });

    it('dead-letters after the retry budget is spent', async () => {
      const extraction = new ScriptedExtractor([new TransientIOError('model busy')]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 0, dead_lettered: 1 });
      expect(extraction.calls).toBe(3);
      expect(pipeline.sleeps).toEqual([500, 1000]);

      const doc = requireDoc(db);
      expect(doc.state).toBe('DEAD_LETTER');
      expect(doc.last_error).toBe('model busy');
      expect(actions(db, doc)).toEqual([
        'CLAIM',
        'START_DOWNLOAD',
        'DOWNLOADED',
        'FAIL',
        'RETRY',
        'FAIL',
        'RETRY',
        'FAIL',
        'EXHAUST',
      ]);

      const [entry] = db.listDeadLetters();
      expect(entry).toMatchObject({
        document_id: doc.id,
        fingerprint: ALPHA,
        stage: 'EXTRACTING',
        failure_kind: 'TRANSIENT_IO_EXHAUSTED',
        error_message: 'model busy',
        retry_count: 2,
        replay_status: 'PENDING',
      });
      expect(entry.context).toEqual({
        resume_at: 'EXTRACTING',
        file_ref: { source_id: 'a.pdf', name: 'a.pdf', mime_type: 'application/pdf' },
        payload: null,
        provider: null,
        error_name: 'TransientIOError',
      });
      expect(db.listClaims(ALPHA).map((claim) => claim.outcome)).toEqual(['DEAD_LETTER']);
    });

    it('dead-letters a terminal extraction error without retrying', async () => {
      const extraction = new ScriptedExtractor([new ExtractionError('unsupported layout', 'ollama')]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });

      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(extraction.calls).toBe(1);
      expect(pipeline.sleeps).toEqual([]);
      expect(actions(db, requireDoc(db))).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'FAIL', 'EXHAUST']);
      const [entry] = db.listDeadLetters();
      expect(entry.failure_kind).toBe('EXTRACTION_FAILED');
      expect(entry.retry_count).toBe(0);
      expect(entry.context.provider).toBe('ollama');
    });

    it('the FAIL entry of an escalation names the error and failure kind', async () => {
      const extraction = new ScriptedExtractor([new ExtractionError('unsupported layout', 'ollama')]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const trail = db.getAuditTrail(requireDoc(db).id);
      expect(trail[3]).toMatchObject({
        action: 'FAIL',
        previous_state: 'EXTRACTING',
        new_state: 'FAILED',
        details: { error: 'ExtractionError', failure_kind: 'EXTRACTION_FAILED' },
      });
      expect(trail[4].details).toEqual({ entry_id: db.listDeadLetters()[0].id });
    });
  });

  describe('storage failures', () => {
    it('retries a ledger write without extra audit entries', async () => {
      const storage = new FakeStorage();
      storage.appendFailures.push(new StorageWriteError('database is locked'));
      const pipeline = createTestPipeline(db, { ingestion, storage });

      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const doc = requireDoc(db);
      expect(doc.state).toBe('STORED');
      expect(doc.retry_counts.STORING).toBe(1);
      expect(actions(db, doc)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'EXTRACTED', 'ACCEPT']);
    });

    it('dead-letters from VALIDATING with the payload kept for replay', async () => {
      const storage = new FakeStorage();
      storage.appendFailures.push(
        new StorageWriteError('disk full'),
        new StorageWriteError('disk full'),
        new StorageWriteError('disk full')
      );
      const pipeline = createTestPipeline(db, { ingestion, storage });

      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const doc = requireDoc(db);
      expect(doc.state).toBe('DEAD_LETTER');
      expect(doc.validation?.confidence).toBe(0.975);
      expect(actions(db, doc)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'EXTRACTED', 'FAIL', 'EXHAUST']);

      const [entry] = db.listDeadLetters();
      expect(entry).toMatchObject({ stage: 'VALIDATING', failure_kind: 'STORAGE_WRITE', retry_count: 2 });
      expect(entry.context.resume_at).toBe('EXTRACTING');
      expect(entry.context.payload).toEqual(createPayload());
      expect(entry.context.provider).toBe('scripted');
    });
  });

  describe('download failures', () => {
    it('dead-letters a candidate that cannot be fetched on a placeholder document', async () => {
      ingestion.failNext('a.pdf', new Error('EACCES: permission denied'));
      const pipeline = createTestPipeline(db, { ingestion });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 0, dead_lettered: 1, failed: 0 });
      const placeholder = db.getDocumentByFingerprint(UNFETCHED_A);
      expect(placeholder).toMatchObject({
        state: 'DEAD_LETTER',
        fingerprint: { source_id: 'a.pdf', content_hash: '' },
        last_error: 'EACCES: permission denied',
      });
      if (!placeholder) return;
      expect(actions(db, placeholder)).toEqual(['CLAIM', 'START_DOWNLOAD', 'FAIL', 'EXHAUST']);

      const [entry] = db.listDeadLetters();
      expect(entry).toMatchObject({
        document_id: placeholder.id,
        stage: 'DOWNLOADING',
        failure_kind: 'UNCLASSIFIED',
        error_message: 'EACCES: permission denied',
        retry_count: 0,
        replay_status: 'PENDING',
      });
      expect(entry.context).toEqual({
        resume_at: 'DISCOVERED',
        file_ref: { source_id: 'a.pdf', name: 'a.pdf', mime_type: 'application/pdf' },
        payload: null,
        provider: null,
        error_name: 'Error',
      });
      expect(db.listClaims(UNFETCHED_A).map((claim) => claim.outcome)).toEqual(['DEAD_LETTER']);
      expect(db.countActiveClaims()).toBe(0);
    });

    it('counts the retries of an exhausted fetch on the entry', async () => {
      ingestion.failNext(
        'a.pdf',
        new TransientIOError('EBUSY'),
        new TransientIOError('EBUSY'),
        new TransientIOError('EBUSY')
      );
      const pipeline = createTestPipeline(db, { ingestion });

      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const [entry] = db.listDeadLetters();
      expect(entry).toMatchObject({ failure_kind: 'TRANSIENT_IO_EXHAUSTED', retry_count: 2 });
      expect(db.getDocumentByFingerprint(UNFETCHED_A)?.retry_counts.DOWNLOADING).toBe(2);
    });

    it('does not record a second entry while the first is pending', async () => {
      ingestion.failNext('a.pdf', new Error('EACCES: permission denied'), new Error('EACCES: permission denied'));
      const pipeline = createTestPipeline(db, { ingestion });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ dead_lettered: 0, failed: 1 });
      expect(db.countDeadLetters()).toBe(1);
      expect(db.listClaims(UNFETCHED_A).map((claim) => claim.outcome)).toEqual(['DEAD_LETTER', 'DEAD_LETTER']);
    });

    it('processes the real content once the source can be read again', async () => {
      ingestion.failNext('a.pdf', new Error('EACCES: permission denied'));
      const pipeline = createTestPipeline(db, { ingestion });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.processed).toBe(1);
      expect(requireDoc(db).state).toBe('STORED');
      expect(db.getDocumentByFingerprint(UNFETCHED_A)?.state).toBe('DEAD_LETTER');
    });

    it('retries a transient fetch before fingerprinting', async () => {
      ingestion.failNext('a.pdf', new TransientIOError('EBUSY'));
      const pipeline = createTestPipeline(db, { ingestion });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary.processed).toBe(1);
      expect(ingestion.downloads).toBe(2);
      expect(pipeline.sleeps).toEqual([500]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // REVIEW
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('review routing', () => {
    it('routes an inconsistent payload to review and relocates the file', async () => {
      const extraction = new ScriptedExtractor([createPayload({ line_items: [] })]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 0, reviewed: 1 });
      const doc = requireDoc(db);
      expect(doc.state).toBe('NEEDS_REVIEW');
      expect(doc.validation?.violations).toEqual(['MISSING_LINE_ITEMS', 'LOW_CONFIDENCE']);
      expect(actions(db, doc)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'EXTRACTED', 'ROUTE_TO_REVIEW']);

      const [record] = db.getReviewRecordsForDocument(doc.id);
      expect(record).toMatchObject({ reason_code: 'MISSING_LINE_ITEMS', score: 0.475, relocated: true });
      expect(pipeline.storage.relocations).toEqual([{ sourceId: 'a.pdf', reasonCode: 'MISSING_LINE_ITEMS' }]);
      expect(pipeline.storage.records).toEqual([]);
      expect(db.listClaims(ALPHA).map((claim) => claim.outcome)).toEqual(['NEEDS_REVIEW']);
      expect(db.countDeadLetters()).toBe(0);
    });

    it('keeps the review when relocation fails', async () => {
      const storage = new FakeStorage();
      storage.relocationError = new Error('EXDEV: cross-device link');
      const extraction = new ScriptedExtractor([createPayload({ total_amount: 120 })]);
      const pipeline = createTestPipeline(db, { ingestion, extraction, storage });

      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const doc = requireDoc(db);
      expect(doc.state).toBe('NEEDS_REVIEW');
      const [record] = db.getReviewRecordsForDocument(doc.id);
      expect(record).toMatchObject({ reason_code: 'TOTAL_MISMATCH', relocated: false });
    });

    it('never retries a reviewed document', async () => {
      const extraction = new ScriptedExtractor([createPayload({ line_items: [] })]);
      const pipeline = createTestPipeline(db, { ingestion, extraction });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      const second = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(second).toMatchObject({ skipped: 1, reviewed: 0 });
      expect(extraction.calls).toBe(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // CANCELLATION AND RECOVERY
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('cancellation', () => {
    it('releases the claim as ABANDONED and leaves the last committed state', async () => {
      const controller = new AbortController();
      const hanging: ExtractionAdapter = {
        name: 'hanging',
        extract: (_bytes, _mimeType, signal) =>
          new Promise((_, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')));
            controller.abort();
          }),
      };
      const pipeline = createTestPipeline(db, { ingestion, extraction: hanging });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1', controller.signal));

      expect(summary.cancelled).toBe(true);
      expect(summary.processed).toBe(0);
      const doc = requireDoc(db);
      expect(doc.state).toBe('EXTRACTING');
      expect(actions(db, doc)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED']);
      expect(db.listClaims(ALPHA).map((claim) => claim.outcome)).toEqual(['ABANDONED']);
      expect(db.countDeadLetters()).toBe(0);
    });

    it('recovers a document left mid-lifecycle on the next run', async () => {
      const controller = new AbortController();
      const hanging: ExtractionAdapter = {
        name: 'hanging',
        extract: (_bytes, _mimeType, signal) =>
          new Promise((_, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')));
            controller.abort();
          }),
      };
      await createTestPipeline(db, { ingestion, extraction: hanging }).orchestrator.pollOnce(
        new RunContext('worker-1', controller.signal)
      );

      const summary = await createTestPipeline(db, { ingestion }).orchestrator.pollOnce(new RunContext('worker-2'));

      expect(summary.processed).toBe(1);
      const doc = requireDoc(db);
      expect(doc.state).toBe('STORED');
      const trail = db.getAuditTrail(doc.id);
      expect(trail.map((entry) => entry.action)).toEqual([
        'CLAIM',
        'START_DOWNLOAD',
        'DOWNLOADED',
        'RECOVER',
        'CLAIM',
        'START_DOWNLOAD',
        'DOWNLOADED',
        'EXTRACTED',
        'ACCEPT',
      ]);
      expect(trail[3]).toMatchObject({
        previous_state: 'EXTRACTING',
        new_state: 'DISCOVERED',
        details: { recovered_from: 'EXTRACTING' },
      });
      expect(db.listClaims(ALPHA).map((claim) => claim.outcome)).toEqual(['ABANDONED', 'STORED']);
    });

    it('settles the claim of a document stored by a run that crashed before releasing it', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));
      db.getConnection().prepare('DELETE FROM claims').run();

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 0, skipped: 1 });
      expect(pipeline.storage.records).toHaveLength(1);
      expect(await pipeline.claims.isProcessed(ALPHA)).toBe(true);
    });

    it('skips a document another worker routed to review between the check and the claim', async () => {
      const claimsB = new InterleavingClaimStore(db, 60_000);
      const workerA = createTestPipeline(db, {
        ingestion,
        extraction: new ScriptedExtractor([createPayload({ line_items: [] })]),
      });
      const workerB = createTestPipeline(db, { ingestion, claims: claimsB });
      claimsB.beforeNextClaim = () => workerA.orchestrator.pollOnce(new RunContext('worker-a'));

      const summary = await workerB.orchestrator.pollOnce(new RunContext('worker-b'));

      expect(summary).toMatchObject({ processed: 0, skipped: 1, dead_lettered: 0 });
      const doc = requireDoc(db);
      expect(doc.state).toBe('NEEDS_REVIEW');
      expect(actions(db, doc)).toEqual(['CLAIM', 'START_DOWNLOAD', 'DOWNLOADED', 'EXTRACTED', 'ROUTE_TO_REVIEW']);
      expect(db.countDeadLetters()).toBe(0);
      expect(db.listClaims(ALPHA).map((claim) => [claim.worker_id, claim.outcome])).toEqual([
        ['worker-a', 'NEEDS_REVIEW'],
        ['worker-b', 'NEEDS_REVIEW'],
      ]);
    });

    it('skips a document another worker dead-lettered between the check and the claim', async () => {
      const claimsB = new InterleavingClaimStore(db, 60_000);
      const workerA = createTestPipeline(db, {
        ingestion,
        extraction: new ScriptedExtractor([new ExtractionError('unsupported layout', 'ollama')]),
      });
      const workerB = createTestPipeline(db, { ingestion, claims: claimsB });
      claimsB.beforeNextClaim = () => workerA.orchestrator.pollOnce(new RunContext('worker-a'));

      const summary = await workerB.orchestrator.pollOnce(new RunContext('worker-b'));

      expect(summary).toMatchObject({ skipped: 1, dead_lettered: 0 });
      expect(requireDoc(db).state).toBe('DEAD_LETTER');
      expect(db.countDeadLetters()).toBe(1);
      expect(workerB.storage.records).toEqual([]);
    });

    it('skips a fingerprint another worker holds', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      const doc = db.insertDocument({ source_id: 'a.pdf', name: 'a.pdf', mime_type: 'application/pdf' }, ALPHA);
      db.tryClaim({ fingerprint: ALPHA, worker_id: 'worker-9', stale_after_ms: 60_000 });

      const summary = await pipeline.orchestrator.pollOnce(new RunContext('worker-1'));

      expect(summary).toMatchObject({ processed: 0, skipped: 1 });
      expect(db.getDocument(doc.id)?.state).toBe('DISCOVERED');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTEGRITY
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('integrity faults', () => {
    it('dead-letters a document whose state does not allow the next event', async () => {
      const pipeline = createTestPipeline(db, { ingestion });
      const doc = db.insertDocument({ source_id: 'a.pdf', name: 'a.pdf', mime_type: 'application/pdf' }, ALPHA);
      const attempt = db.tryClaim({ fingerprint: ALPHA, worker_id: 'worker-1', stale_after_ms: 60_000 });
      if (attempt.status !== 'claimed') throw new Error('expected a claim');

      // A payload is present, so the lifecycle commits EXTRACTED straight from DISCOVERED
      const outcome = await pipeline.orchestrator.runLifecycle(doc, attempt.claimId, new RunContext('worker-1'), {
        resumeAt: 'EXTRACTING',
        bytes: bytesOf('alpha'),
        payload: createPayload(),
        provider: 'scripted',
      });

      expect(outcome).toBe('DEAD_LETTER');
      const stored = requireDoc(db);
      expect(stored.state).toBe('DEAD_LETTER');
      expect(stored.last_error).toBe('Invalid transition: EXTRACTED is not allowed from DISCOVERED');
      expect(actions(db, stored)).toEqual(['INTEGRITY_FAULT']);

      const [entry] = db.listDeadLetters();
      expect(entry).toMatchObject({ stage: 'DISCOVERED', failure_kind: 'INVALID_STATE_TRANSITION' });
      expect(entry.context.resume_at).toBe('DISCOVERED');
      expect(db.getClaim(attempt.claimId)?.outcome).toBe('DEAD_LETTER');
    });

    it.each([
      ['NEEDS_REVIEW', createPayload({ line_items: [] }), 0],
      ['DEAD_LETTER', new ExtractionError('unsupported layout', 'ollama'), 1],
    ] as const)('leaves a document another run finished as %s untouched', async (state, step, deadLetters) => {
      const snapshot = db.insertDocument({ source_id: 'a.pdf', name: 'a.pdf', mime_type: 'application/pdf' }, ALPHA);
      await createTestPipeline(db, { ingestion, extraction: new ScriptedExtractor([step]) }).orchestrator.pollOnce(
        new RunContext('worker-1')
      );
      const trailBefore = actions(db, snapshot);
      const attempt = db.tryClaim({ fingerprint: ALPHA, worker_id: 'worker-2', stale_after_ms: 60_000 });
      if (attempt.status !== 'claimed') throw new Error('expected a claim');
      const ctx = new RunContext('worker-2');

      // The snapshot still says DISCOVERED, so CLAIM fails the stored-state check
      const outcome = await createTestPipeline(db, { ingestion }).orchestrator.runLifecycle(
        snapshot,
        attempt.claimId,
        ctx,
        { resumeAt: 'DISCOVERED', bytes: bytesOf('alpha'), payload: null, provider: null }
      );

      expect(outcome).toBe(state);
      expect(requireDoc(db).state).toBe(state);
      expect(actions(db, snapshot)).toEqual(trailBefore);
      expect(db.countDeadLetters()).toBe(deadLetters);
      expect(db.getClaim(attempt.claimId)?.outcome).toBe(state);
      expect(ctx.count('dead_lettered')).toBe(0);
    });
  });
});
