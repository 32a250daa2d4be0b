import { JobRecord, RemoteInferenceError, ValidationError } from '../shared/src';
import { BatchOrchestrator, CancelOutcome, OrchestratorOptions } from '../worker/src/orchestrator';
import { InferenceRequest } from '../worker/src/providers/gateway';
import { MemoryJobStore } from './support/memoryStore';
import { FakeGateway, T0, TestClock, textLine } from './support/fakes';

const baseOptions: OrchestratorOptions = {
  maxLots: 1000,
  creationBudgetMs: 15_000,
  maxRecoveryAttempts: 5,
  requests: {
    visionModel: 'vision-model',
    reasoningEffort: 'low',
    translationModel: 'translate-model',
    maxOutputTokens: 256,
    systemPrompt: 'Describe visible damage.',
  },
};

function setup(options: Partial<OrchestratorOptions> = {}, clock = new TestClock()) {
  const store = new MemoryJobStore(clock);
  const gateway = new FakeGateway();
  const orchestrator = new BatchOrchestrator(store, gateway, { ...baseOptions, ...options }, clock);
  const completed: JobRecord[] = [];
  orchestrator.onCompleted(async (job) => {
    completed.push(job);
  });
  return { store, gateway, orchestrator, completed, clock };
}

async function load(store: MemoryJobStore, id: string): Promise<JobRecord> {
  const job = await store.getJob(id);
  if (!job) throw new Error(`job ${id} missing`);
  return job;
}

const images = ['https://img.test/1.jpg', 'https://img.test/2.jpg'];

test('vision then translation then completion for en+fr', async () => {
  const { store, gateway, orchestrator, completed } = setup();
  const id = await orchestrator.createJob(
    [
      { lotId: 'A', imageUrls: images },
      { lotId: 'B', imageUrls: [] },
    ],
    ['en', 'fr'],
    { webhookUrl: 'https://client.test/hook' }
  );

  let job = await load(store, id);
  expect(job.status).toBe('processing');
  expect(job.visionBatchRef).toBe('batch_1');
  expect(job.totalLots).toBe(2);
  expect(job.failedLots).toBe(1);
  expect(job.lots.map((l) => [l.lotId, l.status, l.errorMessage])).toEqual([
    ['A', 'processing', null],
    ['B', 'failed', 'no_images'],
  ]);
  expect(gateway.submissions[0].requests.map((r) => r.custom_id)).toEqual(['vision:A']);
  expect(job.statusHistory.map((h) => [h.from, h.to])).toEqual([['pending', 'processing']]);

  expect(await orchestrator.reconcileJob(id)).toBe('unchanged');

  gateway.complete('batch_1', [textLine('vision:A', 'Scratch on door.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('translating');
  job = await load(store, id);
  expect(job.status).toBe('translating');
  expect(job.translationBatchRef).toBe('batch_2');
  expect(job.lots[0].visionResult).toBe('Scratch on door.');
  expect(job.lots[0].status).toBe('processing');
  expect(gateway.submissions[1].requests.map((r) => r.custom_id)).toEqual(['translate:fr:A']);

  gateway.complete('batch_2', [textLine('translate:fr:A', 'Rayure sur la porte.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');
  job = await load(store, id);
  expect(job.status).toBe('completed');
  expect(job.completedAt).not.toBeNull();
  expect(job.processedLots).toBe(1);
  expect(job.failedLots).toBe(1);
  expect(job.lots[0].status).toBe('completed');
  expect(job.lots[0].translations).toEqual({ fr: 'Rayure sur la porte.' });
  expect(completed.map((j) => j.id)).toEqual([id]);

  const results = await orchestrator.getJobResults(id);
  expect(results).toEqual({
    ready: true,
    jobId: id,
    status: 'completed',
    completedAt: T0.toISOString(),
    languages: ['en', 'fr'],
    lots: [
      {
        lot_id: 'A',
        status: 'completed',
        descriptions: [
          { language: 'en', damages: '<p>Scratch on door.</p>' },
          { language: 'fr', damages: '<p>Rayure sur la porte.</p>' },
        ],
      },
      { lot_id: 'B', status: 'failed', descriptions: [], error: 'no_images' },
    ],
  });

  // completed jobs are left alone
  const polls = gateway.polled.length;
  expect(await orchestrator.reconcileJob(id)).toBe('skipped');
  expect(gateway.polled.length).toBe(polls);
  expect(completed).toHaveLength(1);
});

test('missing translations fall back to the English text', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['fr', 'de']);
  gateway.complete('batch_1', [textLine('vision:A', 'Dent.')]);
  await orchestrator.reconcileJob(id);
  gateway.complete('batch_2', [textLine('translate:de:A', 'Delle.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');
  const job = await load(store, id);
  expect(job.lots[0].translations).toEqual({ fr: 'Dent.', de: 'Delle.' });
});

test('lots without text fail with a diagnostic and progress reflects it', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob(
    [
      { lotId: 'A', imageUrls: images },
      { lotId: 'B', imageUrls: images },
      { lotId: 'C', imageUrls: images },
    ],
    ['en']
  );
  gateway.complete('batch_1', [
    textLine('vision:A', 'Hail damage.'),
    { custom_id: 'vision:B', response: { status_code: 200, body: { output: [], text: { format: { type: 'text' } } } }, error: null },
  ]);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');

  const job = await load(store, id);
  expect(job.lots.map((l) => l.status)).toEqual(['completed', 'failed', 'failed']);
  expect(JSON.parse(job.lots[1].errorMessage ?? '')).toEqual({
    reason: 'format_metadata_only',
    shape: { keys: ['output', 'text'], outputType: 'array' },
  });
  expect(JSON.parse(job.lots[2].errorMessage ?? '')).toEqual({ reason: 'no_result_line', shape: null });

  const snapshot = await orchestrator.checkBatchStatus(id);
  expect(snapshot?.progress).toEqual({ totalLots: 3, processedLots: 1, failedLots: 2, completionPercentage: 33.33 });
});

test('a job whose only lot has no text completes without translation', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en', 'fr']);
  gateway.complete('batch_1', []);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');
  expect(gateway.submissions).toHaveLength(1);
  expect((await load(store, id)).lots[0].status).toBe('failed');
});

test('remote batch failure is final', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  gateway.fail('batch_1');
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  const job = await load(store, id);
  expect(job.status).toBe('failed');
  expect(job.failureSource).toBe('remote');
  expect(job.errorMessage).toBe('vision batch failed');
  expect(await store.listReconcilableJobIds(5)).toEqual([]);
  expect(await orchestrator.reconcileJob(id)).toBe('skipped');
});

test('transient provider errors leave the job untouched', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  const before = await load(store, id);
  gateway.pollErrors.set('batch_1', new RemoteInferenceError('timeout', true));
  expect(await orchestrator.reconcileJob(id)).toBe('transient_error');
  const after = await load(store, id);
  expect(after.status).toBe('processing');
  expect(after.version).toBe(before.version);
});

test('a locally failed job recovers when the remote batch completes', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  gateway.pollErrors.set('batch_1', new Error('disk full'));
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  let job = await load(store, id);
  expect(job.status).toBe('failed');
  expect(job.failureSource).toBe('local');
  expect(job.retryCount).toBe(1);
  expect(job.errorMessage).toBe('Reconciliation error: disk full');
  expect(await store.listReconcilableJobIds(5)).toEqual([id]);

  gateway.pollErrors.clear();
  gateway.complete('batch_1', [textLine('vision:A', 'Clean.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');
  job = await load(store, id);
  expect(job.status).toBe('completed');
  expect(job.failureSource).toBeNull();
  expect(job.errorMessage).toBeNull();
  expect(job.statusHistory.map((h) => h.to)).toEqual(['processing', 'failed', 'processing', 'completed']);
});

test('recovery stops after the configured number of attempts', async () => {
  const { store, gateway, orchestrator } = setup({ maxRecoveryAttempts: 2 });
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  gateway.pollErrors.set('batch_1', new Error('bad state'));
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  expect((await load(store, id)).retryCount).toBe(2);
  expect(await orchestrator.reconcileJob(id)).toBe('skipped');
  expect(await store.listReconcilableJobIds(2)).toEqual([]);
});

test('translation submission failure keeps vision results and retries', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en', 'es']);
  gateway.complete('batch_1', [textLine('vision:A', 'Bent bumper.')]);
  gateway.submitError = new RemoteInferenceError('HTTP 400 bad file', false);
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  let job = await load(store, id);
  expect(job.failureSource).toBe('submission');
  expect(job.retryCount).toBe(1);
  expect(job.translationBatchRef).toBeNull();
  expect(job.lots[0].visionResult).toBe('Bent bumper.');

  gateway.submitError = null;
  expect(await orchestrator.reconcileJob(id)).toBe('translating');
  job = await load(store, id);
  expect(job.translationBatchRef).toBe('batch_2');
  expect(job.statusHistory.map((h) => h.to)).toEqual(['processing', 'failed', 'processing', 'translating']);
});

test('vision submission failure stores a failed job', async () => {
  const { store, gateway, orchestrator } = setup();
  gateway.submitError = new RemoteInferenceError('HTTP 401 unauthorized', false);
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  const job = await load(store, id);
  expect(job.status).toBe('failed');
  expect(job.failureSource).toBe('submission');
  expect(job.errorMessage).toBe('Batch submission failed: HTTP 401 unauthorized');
  expect(job.visionBatchRef).toBeNull();
});

test('a job with no images is failed without submitting', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: [] }], ['en']);
  const job = await load(store, id);
  expect(gateway.submissions).toHaveLength(0);
  expect(job.status).toBe('failed');
  expect(job.errorMessage).toBe('no lots with images');
  expect(job.failedLots).toBe(1);
});

test('lots past the creation budget are failed', async () => {
  // every clock read advances 200ms; the budget is checked at lots 100, 200, ...
  const { store, gateway, orchestrator } = setup({ creationBudgetMs: 300 }, new TestClock(T0, 200));
  const lots = Array.from({ length: 250 }, (_, i) => ({ lotId: `L${i}`, imageUrls: ['https://img.test/x.jpg'] }));
  const id = await orchestrator.createJob(lots, ['en']);
  const job = await load(store, id);
  expect(gateway.submissions[0].requests).toHaveLength(200);
  expect(job.lots[199].status).toBe('processing');
  expect(job.lots[200].status).toBe('failed');
  expect(job.lots[200].errorMessage).toBe('creation_budget_exceeded');
  expect(job.failedLots).toBe(50);
  expect(job.totalLots).toBe(250);
});

test('createJob validates its input', async () => {
  const { orchestrator, store } = setup({ maxLots: 2 });
  const lot = { lotId: 'A', imageUrls: images };
  await expect(orchestrator.createJob([], ['en'])).rejects.toBeInstanceOf(ValidationError);
  await expect(orchestrator.createJob([lot, { ...lot, lotId: 'B' }, { ...lot, lotId: 'C' }], ['en'])).rejects.toThrow('Too many lots');
  await expect(orchestrator.createJob([lot, lot], ['en'])).rejects.toThrow('Duplicate lot_id "A"');
  await expect(orchestrator.createJob([{ ...lot, lotId: ' ' }], ['en'])).rejects.toBeInstanceOf(ValidationError);
  await expect(orchestrator.createJob([lot], [])).rejects.toThrow('languages must not be empty');
  await expect(orchestrator.createJob([lot], ['english'])).rejects.toThrow('Invalid language code "english"');
  expect(store.jobs.size).toBe(0);

  const id = await orchestrator.createJob([lot], ['EN', 'fr', 'en', 'pt-BR']);
  expect((await load(store, id)).languages).toEqual(['en', 'fr', 'pt-br']);
});

test('cancelJob reports each outcome and stops reconciliation', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  expect(await orchestrator.cancelJob('nope')).toBe('not_found');
  expect(await orchestrator.cancelJob(id)).toBe('cancelled');
  const job = await load(store, id);
  expect(job.status).toBe('cancelled');
  expect(job.errorMessage).toBe('Job cancelled by user request');
  expect(job.statusHistory[job.statusHistory.length - 1]).toEqual({
    from: 'processing',
    to: 'cancelled',
    at: T0,
    reason: 'Job cancelled by user request',
  });
  expect(await orchestrator.cancelJob(id, 'again')).toBe('not_cancellable');

  gateway.complete('batch_1', [textLine('vision:A', 'Late result.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('skipped');
  expect((await load(store, id)).lots[0].visionResult).toBeNull();
});

test('reconcileActiveJobs isolates per-job errors', async () => {
  const { store, gateway, orchestrator } = setup();
  const broken = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  const healthy = await orchestrator.createJob([{ lotId: 'B', imageUrls: images }], ['en']);
  gateway.pollErrors.set('batch_1', new Error('corrupt'));
  gateway.complete('batch_2', [textLine('vision:B', 'Fine.')]);

  const report = await orchestrator.reconcileActiveJobs();
  expect(report.examined).toBe(2);
  expect(report.outcomes).toEqual({ failed: 1, completed: 1 });
  expect((await load(store, broken)).status).toBe('failed');
  expect((await load(store, healthy)).status).toBe('completed');
});

test('status queries are read-only', async () => {
  const { store, gateway, orchestrator } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  gateway.complete('batch_1', [textLine('vision:A', 'Done.')]);
  const snapshot = await orchestrator.checkBatchStatus(id);
  expect(snapshot?.status).toBe('processing');
  expect(await orchestrator.getJobResults(id)).toEqual({ ready: false, jobId: id, status: 'processing' });
  expect((await load(store, id)).status).toBe('processing');
  expect(await orchestrator.checkBatchStatus('missing')).toBeNull();
  expect(await orchestrator.getJobResults('missing')).toBeNull();
});

test('listJobs caps the page size', async () => {
  const { orchestrator } = setup();
  await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  await orchestrator.createJob([{ lotId: 'A', imageUrls: [] }], ['en']);
  expect(await orchestrator.listJobs({ limit: 500 })).toHaveLength(2);
  expect(await orchestrator.listJobs({ status: 'failed' })).toHaveLength(1);
  expect(await orchestrator.listJobs({ limit: 1, offset: 1 })).toHaveLength(1);
});

test('a failed translation phase recovers when its remote batch completes', async () => {
  const { store, gateway, orchestrator, completed } = setup();
  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en', 'fr']);
  gateway.complete('batch_1', [textLine('vision:A', 'Dent on hood.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('translating');

  gateway.pollErrors.set('batch_2', new Error('index mismatch'));
  expect(await orchestrator.reconcileJob(id)).toBe('failed');
  let job = await load(store, id);
  expect(job.failureSource).toBe('local');
  expect(job.retryCount).toBe(1);
  expect(job.translationBatchRef).toBe('batch_2');
  expect(await store.listReconcilableJobIds(5)).toEqual([id]);

  gateway.pollErrors.clear();
  gateway.complete('batch_2', [textLine('translate:fr:A', 'Bosse sur le capot.')]);
  expect(await orchestrator.reconcileJob(id)).toBe('completed');
  job = await load(store, id);
  expect(job.statusHistory.map((h) => h.to)).toEqual(['processing', 'translating', 'failed', 'translating', 'completed']);
  expect(job.lots[0].translations).toEqual({ fr: 'Bosse sur le capot.' });
  expect(job.lots[0].status).toBe('completed');
  expect(job.errorMessage).toBeNull();
  expect(completed.map((j) => j.id)).toEqual([id]);
  expect(gateway.submissions).toHaveLength(2);
});

test('a job cannot be seen or cancelled while its batch is being submitted', async () => {
  const clock = new TestClock();
  const store = new MemoryJobStore(clock);
  const outcomes: CancelOutcome[] = [];
  class CancellingGateway extends FakeGateway {
    async submit(requests: InferenceRequest[], description: string): Promise<string> {
      const [listed] = await orchestrator.listJobs();
      outcomes.push(listed ? await orchestrator.cancelJob(listed.id) : 'not_found');
      return super.submit(requests, description);
    }
  }
  const orchestrator = new BatchOrchestrator(store, new CancellingGateway(), baseOptions, clock);

  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  expect(outcomes).toEqual(['not_found']);
  const job = await load(store, id);
  expect(job.status).toBe('processing');
  expect(job.statusHistory.map((h) => [h.from, h.to])).toEqual([['pending', 'processing']]);

  expect(await orchestrator.cancelJob(id)).toBe('cancelled');
  expect(await store.listReconcilableJobIds(5)).toEqual([]);
});

test('a job is stored once with its batch reference', async () => {
  class ReadOnlyUpdatesStore extends MemoryJobStore {
    async updateJob(): Promise<JobRecord | null> {
      throw new Error('write concern timeout');
    }
  }
  const clock = new TestClock();
  const store = new ReadOnlyUpdatesStore(clock);
  const orchestrator = new BatchOrchestrator(store, new FakeGateway(), baseOptions, clock);

  const id = await orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en']);
  const job = await load(store, id);
  expect(job.status).toBe('processing');
  expect(job.visionBatchRef).toBe('batch_1');
  expect(await store.listReconcilableJobIds(5)).toEqual([id]);
});

test('a store failure after submission rejects without leaving a pending job', async () => {
  class FailingCreateStore extends MemoryJobStore {
    async createJob(): Promise<void> {
      throw new Error('write concern timeout');
    }
  }
  const clock = new TestClock();
  const store = new FailingCreateStore(clock);
  const gateway = new FakeGateway();
  const orchestrator = new BatchOrchestrator(store, gateway, baseOptions, clock);

  await expect(orchestrator.createJob([{ lotId: 'A', imageUrls: images }], ['en'])).rejects.toThrow('write concern timeout');
  expect(gateway.submissions).toHaveLength(1);
  expect(store.jobs.size).toBe(0);
});
