import { randomUUID } from 'crypto';
import {
  CANCELLABLE_STATUSES,
  Clock,
  ConcurrentUpdateError,
  FailureSource,
  JobMutator,
  JobRecord,
  JobStatus,
  JobStore,
  JobSummary,
  LotRecord,
  RemoteInferenceError,
  ValidationError,
  WebhookLot,
  config,
  elapsedMs,
  errorMessage,
  errorMeta,
  isTransientRemoteError,
  logger,
  systemClock,
  toIso,
} from '@lotbatch/shared';
import { InferenceGateway, InferenceRequest, RemoteBatchSnapshot } from './providers/gateway';
import { buildLotEntry } from './payload';
import {
  RequestOptions,
  buildTranslationRequest,
  buildVisionRequest,
  requestOptionsFromConfig,
  translationCustomId,
  translationLanguages,
  visionCustomId,
} from './requests';
import { ResponseEnvelope, diagnose, extractText, indexResults, parseResultFile } from './results';

const LANGUAGE_PATTERN = /^[a-z]{2,3}(-[a-z0-9]+)*$/;
const BUDGET_CHECK_EVERY = 100;
const MAX_LIST_LIMIT = 100;
export const DEFAULT_CANCEL_REASON = 'Job cancelled by user request';

export interface LotInput {
  lotId: string;
  imageUrls: string[];
  additionalInfo?: string | null;
  webhookUrl?: string | null;
  missingImages?: string[];
}

export interface CreateJobOptions {
  webhookUrl?: string | null;
}

export interface OrchestratorOptions {
  maxLots: number;
  creationBudgetMs: number;
  maxRecoveryAttempts: number;
  requests: RequestOptions;
}

export function orchestratorOptionsFromConfig(): OrchestratorOptions {
  return {
    maxLots: config.maxLots,
    creationBudgetMs: config.jobCreationBudgetMs,
    maxRecoveryAttempts: config.maxRecoveryAttempts,
    requests: requestOptionsFromConfig(),
  };
}

export interface JobSnapshot {
  jobId: string;
  status: JobStatus;
  languages: string[];
  createdAt: string | null;
  updatedAt: string | null;
  completedAt: string | null;
  progress: {
    totalLots: number;
    processedLots: number;
    failedLots: number;
    completionPercentage: number;
  };
  errorMessage: string | null;
  visionBatchRef: string | null;
  translationBatchRef: string | null;
  retryCount: number;
}

export type JobResults =
  | { ready: false; jobId: string; status: JobStatus }
  | { ready: true; jobId: string; status: JobStatus; completedAt: string | null; languages: string[]; lots: WebhookLot[] };

export type CancelOutcome = 'not_found' | 'not_cancellable' | 'cancelled';

export type ReconcileOutcome =
  | 'not_found'
  | 'skipped'
  | 'unchanged'
  | 'translating'
  | 'completed'
  | 'failed'
  | 'transient_error'
  | 'conflict';

export interface ReconcileReport {
  examined: number;
  outcomes: Partial<Record<ReconcileOutcome, number>>;
}

export type CompletionListener = (job: JobRecord) => Promise<void>;

type Phase = 'vision' | 'translation';

function transition(job: JobRecord, to: JobStatus, at: Date, reason?: string): void {
  if (job.status === to) return;
  job.statusHistory.push(reason ? { from: job.status, to, at, reason } : { from: job.status, to, at });
  job.status = to;
}

function recount(job: JobRecord): void {
  job.processedLots = job.lots.filter((l) => l.visionResult !== null).length;
  job.failedLots = job.lots.filter((l) => l.status === 'failed').length;
}

function fail(job: JobRecord, message: string, source: FailureSource, at: Date): void {
  transition(job, 'failed', at, message);
  job.errorMessage = message;
  job.failureSource = source;
}

function complete(job: JobRecord, at: Date): void {
  for (const lot of job.lots) {
    if (lot.status === 'processing' && lot.visionResult !== null) lot.status = 'completed';
  }
  recount(job);
  transition(job, 'completed', at);
  job.completedAt = at;
  job.errorMessage = null;
  job.failureSource = null;
}

/** Rejects the write when the job moved on since `expected` was read. */
function guarded(expected: JobRecord, mutate: (job: JobRecord) => JobRecord | null): JobMutator {
  return (current) => {
    if (current.version !== expected.version) throw new ConcurrentUpdateError(current.id, expected.version);
    return mutate(current);
  };
}

export function normalizeLanguages(languages: string[]): string[] {
  if (languages.length === 0) throw new ValidationError('languages must not be empty');
  const out: string[] = [];
  for (const raw of languages) {
    const code = raw.trim().toLowerCase();
    if (!LANGUAGE_PATTERN.test(code)) throw new ValidationError(`Invalid language code "${raw}"`);
    if (!out.includes(code)) out.push(code);
  }
  return out;
}

/**
 * Drives each job through vision, optional translation and completion.
 * Every state change goes through `JobStore.updateJob`; remote calls happen
 * outside the write and their outcome is applied under a version guard.
 */
export class BatchOrchestrator {
  private readonly listeners: CompletionListener[] = [];
  private readonly log = logger.child({ component: 'orchestrator' });

  constructor(
    private readonly store: JobStore,
    private readonly gateway: InferenceGateway,
    private readonly options: OrchestratorOptions = orchestratorOptionsFromConfig(),
    private readonly clock: Clock = systemClock
  ) {}

  onCompleted(listener: CompletionListener): void {
    this.listeners.push(listener);
  }

  async createJob(lots: LotInput[], languages: string[], options: CreateJobOptions = {}): Promise<string> {
    const langs = normalizeLanguages(languages);
    this.validateLots(lots);

    const started = this.clock.now();
    const jobId = randomUUID();
    const requests: InferenceRequest[] = [];
    const records: LotRecord[] = [];
    let overBudget = false;

    lots.forEach((input, position) => {
      if (!overBudget && position > 0 && position % BUDGET_CHECK_EVERY === 0) {
        const spent = elapsedMs(started, this.clock.now());
        if (spent > this.options.creationBudgetMs) {
          overBudget = true;
          this.log.warn('Job creation budget exceeded', { jobId, position, spentMs: spent, total: lots.length });
        }
      }
      const record: LotRecord = {
        lotId: input.lotId,
        position,
        additionalInfo: input.additionalInfo ?? null,
        imageUrls: [...input.imageUrls],
        webhookUrl: input.webhookUrl ?? null,
        status: 'pending',
        visionResult: null,
        translations: {},
        errorMessage: null,
        missingImages: input.missingImages ? [...input.missingImages] : [],
      };
      if (overBudget) {
        record.status = 'failed';
        record.errorMessage = 'creation_budget_exceeded';
      } else if (record.imageUrls.length === 0) {
        record.status = 'failed';
        record.errorMessage = 'no_images';
      } else {
        requests.push(buildVisionRequest(record, this.options.requests));
      }
      records.push(record);
    });

    const now = this.clock.now();
    const job: JobRecord = {
      id: jobId,
      status: 'pending',
      languages: langs,
      webhookUrl: options.webhookUrl ?? null,
      totalLots: lots.length,
      processedLots: 0,
      failedLots: 0,
      visionBatchRef: null,
      translationBatchRef: null,
      errorMessage: null,
      failureSource: null,
      retryCount: 0,
      statusHistory: [],
      webhooksQueuedAt: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      version: 0,
      lots: records,
    };
    recount(job);

    if (requests.length === 0) {
      fail(job, 'no lots with images', 'submission', now);
      await this.store.createJob(job);
      this.log.warn('Job has no submittable lots', { jobId, totalLots: job.totalLots });
      return jobId;
    }

    // Stored once, after the submission attempt, in its final state.
    try {
      const batchRef = await this.gateway.submit(requests, `Vision for job ${jobId}`);
      job.visionBatchRef = batchRef;
      for (const lot of job.lots) {
        if (lot.status === 'pending') lot.status = 'processing';
      }
      transition(job, 'processing', this.clock.now(), 'vision batch submitted');
    } catch (err) {
      this.log.error('Vision batch submission failed', { jobId, ...errorMeta(err) });
      fail(job, `Batch submission failed: ${errorMessage(err)}`, 'submission', this.clock.now());
    }

    try {
      await this.store.createJob(job);
    } catch (err) {
      this.log.error('Job could not be stored', { jobId, batchRef: job.visionBatchRef, ...errorMeta(err) });
      throw err;
    }
    if (job.visionBatchRef) {
      this.log.info('Job created', {
        jobId,
        batchRef: job.visionBatchRef,
        lots: lots.length,
        submitted: requests.length,
        languages: langs,
      });
    }
    return jobId;
  }

  async reconcileActiveJobs(): Promise<ReconcileReport> {
    const ids = await this.store.listReconcilableJobIds(this.options.maxRecoveryAttempts);
    const report: ReconcileReport = { examined: ids.length, outcomes: {} };
    for (const id of ids) {
      const outcome = await this.reconcileJob(id);
      report.outcomes[outcome] = (report.outcomes[outcome] ?? 0) + 1;
    }
    if (ids.length > 0) this.log.info('Reconciliation pass finished', { ...report });
    return report;
  }

  /** Never throws: per-job errors are recorded on the job or logged. */
  async reconcileJob(jobId: string): Promise<ReconcileOutcome> {
    let job: JobRecord | null;
    try {
      job = await this.store.getJob(jobId);
    } catch (err) {
      this.log.error('Could not load job for reconciliation', { jobId, ...errorMeta(err) });
      return 'transient_error';
    }
    if (!job) return 'not_found';
    const phase = this.phaseOf(job);
    if (!phase) return 'skipped';

    try {
      return phase === 'vision' ? await this.reconcileVision(job) : await this.reconcileTranslation(job);
    } catch (err) {
      if (isTransientRemoteError(err)) {
        this.log.warn('Transient provider error, retrying next tick', { jobId, phase, ...errorMeta(err) });
        return 'transient_error';
      }
      if (err instanceof ConcurrentUpdateError) {
        this.log.warn('Job changed during reconciliation', { jobId, phase });
        return 'conflict';
      }
      this.log.error('Reconciliation failed', { jobId, phase, ...errorMeta(err) });
      return this.recordLocalFailure(jobId, err);
    }
  }

  private phaseOf(job: JobRecord): Phase | null {
    switch (job.status) {
      case 'processing':
        return job.visionBatchRef ? 'vision' : null;
      case 'translating':
        return job.translationBatchRef ? 'translation' : null;
      case 'failed':
        if (job.failureSource === 'remote' || job.retryCount >= this.options.maxRecoveryAttempts) return null;
        if (job.translationBatchRef) return 'translation';
        return job.visionBatchRef ? 'vision' : null;
      default:
        return null;
    }
  }

  private async recordLocalFailure(jobId: string, err: unknown): Promise<ReconcileOutcome> {
    try {
      await this.store.updateJob(jobId, (current) => {
        if (current.status === 'completed' || current.status === 'cancelled') return null;
        fail(current, `Reconciliation error: ${errorMessage(err)}`, 'local', this.clock.now());
        current.retryCount += 1;
        return current;
      });
    } catch (writeErr) {
      this.log.error('Could not record reconciliation failure', { jobId, ...errorMeta(writeErr) });
    }
    return 'failed';
  }

  private async downloadResults(snapshot: RemoteBatchSnapshot): Promise<Map<string, ResponseEnvelope>> {
    this.log.info('Remote batch finished', {
      batchRef: snapshot.ref,
      rawStatus: snapshot.rawStatus,
      requestCounts: snapshot.requestCounts,
    });
    const output = snapshot.outputRef ? parseResultFile(await this.gateway.download(snapshot.outputRef)) : [];
    const errors = snapshot.errorRef ? parseResultFile(await this.gateway.download(snapshot.errorRef)) : [];
    return indexResults(output, errors);
  }

  private async failRemote(job: JobRecord, message: string, snapshot: RemoteBatchSnapshot): Promise<ReconcileOutcome> {
    await this.store.updateJob(
      job.id,
      guarded(job, (current) => {
        fail(current, message, 'remote', this.clock.now());
        return current;
      })
    );
    this.log.warn('Remote batch failed', { jobId: job.id, batchRef: snapshot.ref, rawStatus: snapshot.rawStatus });
    return 'failed';
  }

  private applyVision(job: JobRecord, results: Map<string, ResponseEnvelope>): void {
    const now = this.clock.now();
    if (job.status === 'failed') transition(job, 'processing', now, 'remote vision batch completed');
    let withText = 0;
    for (const lot of job.lots) {
      if (lot.status !== 'processing') continue;
      const envelope = results.get(visionCustomId(lot.lotId));
      const text = envelope ? extractText(envelope) : null;
      if (text) {
        lot.visionResult = text;
        withText += 1;
      } else {
        lot.status = 'failed';
        lot.errorMessage = diagnose(envelope);
      }
    }
    recount(job);
    if (results.size > 0 && withText === 0) {
      this.log.error('Vision results parsed but no lot yielded text', { jobId: job.id, resultLines: results.size });
    }
  }

  private async reconcileVision(job: JobRecord): Promise<ReconcileOutcome> {
    if (!job.visionBatchRef) return 'skipped';
    const snapshot = await this.gateway.poll(job.visionBatchRef);
    if (snapshot.status === 'queued' || snapshot.status === 'in_progress') return 'unchanged';
    if (snapshot.status === 'failed') return this.failRemote(job, 'vision batch failed', snapshot);

    const results = await this.downloadResults(snapshot);
    const preview: JobRecord = { ...job, statusHistory: [...job.statusHistory], lots: job.lots.map((l) => ({ ...l })) };
    this.applyVision(preview, results);

    const langs = translationLanguages(job.languages);
    const translatable = preview.lots.filter((l) => l.status === 'processing' && l.visionResult !== null);
    if (langs.length === 0 || translatable.length === 0) {
      const saved = await this.store.updateJob(
        job.id,
        guarded(job, (current) => {
          this.applyVision(current, results);
          complete(current, this.clock.now());
          return current;
        })
      );
      await this.notifyCompleted(saved);
      this.log.info('Job completed after vision', { jobId: job.id, processedLots: saved?.processedLots });
      return 'completed';
    }

    const requests: InferenceRequest[] = [];
    for (const lot of translatable) {
      for (const lang of langs) {
        requests.push(buildTranslationRequest(lot.lotId, lang, lot.visionResult ?? '', this.options.requests));
      }
    }

    let translationRef: string;
    try {
      translationRef = await this.gateway.submit(requests, `Translation for job ${job.id}`);
    } catch (err) {
      if (!(err instanceof RemoteInferenceError) || err.transient) throw err;
      const reason = `Translation batch submission failed: ${err.message}`;
      await this.store.updateJob(
        job.id,
        guarded(job, (current) => {
          this.applyVision(current, results);
          fail(current, reason, 'submission', this.clock.now());
          current.retryCount += 1;
          return current;
        })
      );
      this.log.error('Translation batch submission failed', { jobId: job.id, ...errorMeta(err) });
      return 'failed';
    }

    await this.store.updateJob(
      job.id,
      guarded(job, (current) => {
        this.applyVision(current, results);
        current.translationBatchRef = translationRef;
        transition(current, 'translating', this.clock.now(), 'translation batch submitted');
        return current;
      })
    );
    this.log.info('Translation batch submitted', {
      jobId: job.id,
      batchRef: translationRef,
      lots: translatable.length,
      languages: langs,
    });
    return 'translating';
  }

  private async reconcileTranslation(job: JobRecord): Promise<ReconcileOutcome> {
    if (!job.translationBatchRef) return 'skipped';
    const snapshot = await this.gateway.poll(job.translationBatchRef);
    if (snapshot.status === 'queued' || snapshot.status === 'in_progress') return 'unchanged';
    if (snapshot.status === 'failed') return this.failRemote(job, 'translation batch failed', snapshot);

    const results = await this.downloadResults(snapshot);
    const langs = translationLanguages(job.languages);
    let fallbacks = 0;
    const saved = await this.store.updateJob(
      job.id,
      guarded(job, (current) => {
        fallbacks = 0;
        if (current.status === 'failed') transition(current, 'translating', this.clock.now(), 'remote translation batch completed');
        for (const lot of current.lots) {
          if (lot.status !== 'processing' || lot.visionResult === null) continue;
          for (const lang of langs) {
            const envelope = results.get(translationCustomId(lang, lot.lotId));
            const text = envelope ? extractText(envelope) : null;
            if (!text) fallbacks += 1;
            lot.translations[lang] = text ?? lot.visionResult;
          }
        }
        complete(current, this.clock.now());
        return current;
      })
    );
    if (fallbacks > 0) {
      this.log.warn('Translations fell back to source text', { jobId: job.id, fallbacks });
    }
    await this.notifyCompleted(saved);
    this.log.info('Job completed after translation', { jobId: job.id, processedLots: saved?.processedLots });
    return 'completed';
  }

  private async notifyCompleted(job: JobRecord | null): Promise<void> {
    if (!job || job.status !== 'completed') return;
    for (const listener of this.listeners) {
      try {
        await listener(job);
      } catch (err) {
        // enqueueAwaiting picks the job up on a later tick
        this.log.error('Completion listener failed', { jobId: job.id, ...errorMeta(err) });
      }
    }
  }

  async checkBatchStatus(jobId: string): Promise<JobSnapshot | null> {
    const job = await this.store.getJob(jobId);
    if (!job) return null;
    const pct = job.totalLots > 0 ? (job.processedLots / job.totalLots) * 100 : 0;
    return {
      jobId: job.id,
      status: job.status,
      languages: [...job.languages],
      createdAt: toIso(job.createdAt),
      updatedAt: toIso(job.updatedAt),
      completedAt: toIso(job.completedAt),
      progress: {
        totalLots: job.totalLots,
        processedLots: job.processedLots,
        failedLots: job.failedLots,
        completionPercentage: Math.round(pct * 100) / 100,
      },
      errorMessage: job.errorMessage,
      visionBatchRef: job.visionBatchRef,
      translationBatchRef: job.translationBatchRef,
      retryCount: job.retryCount,
    };
  }

  async getJobResults(jobId: string): Promise<JobResults | null> {
    const job = await this.store.getJob(jobId);
    if (!job) return null;
    if (job.status !== 'completed') return { ready: false, jobId: job.id, status: job.status };
    return {
      ready: true,
      jobId: job.id,
      status: job.status,
      completedAt: toIso(job.completedAt),
      languages: [...job.languages],
      lots: job.lots.map((lot) => buildLotEntry(lot, job.languages)),
    };
  }

  async listJobs(query: { status?: JobStatus; limit?: number; offset?: number } = {}): Promise<JobSummary[]> {
    const limit = Math.min(MAX_LIST_LIMIT, Math.max(1, Math.floor(query.limit ?? 20)));
    const offset = Math.max(0, Math.floor(query.offset ?? 0));
    return this.store.listJobs({ status: query.status, limit, offset });
  }

  async cancelJob(jobId: string, reason: string = DEFAULT_CANCEL_REASON): Promise<CancelOutcome> {
    const result: { outcome: CancelOutcome } = { outcome: 'not_found' };
    await this.store.updateJob(jobId, (current) => {
      if (!CANCELLABLE_STATUSES.includes(current.status)) {
        result.outcome = 'not_cancellable';
        return null;
      }
      result.outcome = 'cancelled';
      transition(current, 'cancelled', this.clock.now(), reason);
      current.errorMessage = reason;
      return current;
    });
    if (result.outcome === 'cancelled') this.log.info('Job cancelled', { jobId, reason });
    return result.outcome;
  }

  private validateLots(lots: LotInput[]): void {
    if (lots.length === 0) throw new ValidationError('lots must not be empty');
    if (lots.length > this.options.maxLots) {
      throw new ValidationError(`Too many lots: ${lots.length} exceeds the limit of ${this.options.maxLots}`);
    }
    const seen = new Set<string>();
    lots.forEach((lot, i) => {
      if (!lot.lotId || lot.lotId.trim() === '') throw new ValidationError(`lots[${i}].lot_id must not be empty`);
      if (seen.has(lot.lotId)) throw new ValidationError(`Duplicate lot_id "${lot.lotId}"`);
      seen.add(lot.lotId);
    });
  }
}
