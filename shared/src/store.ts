import mongoose, { Connection, FilterQuery } from 'mongoose';
import { ConcurrentUpdateError } from './errors';
import { logger } from './logger';
import { BatchJobModel, BatchLotModel, DeliveryDoc, JobDoc, LotDoc, WebhookDeliveryModel } from './models';
import {
  Clock,
  DeliveryRecord,
  DeliveryStatus,
  DeliveryUpdate,
  JobRecord,
  JobStatus,
  JobSummary,
  LotRecord,
  TERMINAL_STATUSES,
  systemClock,
} from './types';

/**
 * Receives a private copy of the job (lots included) and returns the state to
 * persist, or null to leave the job untouched. Runs inside the write
 * transaction and may be re-run if the transaction is retried.
 */
export type JobMutator = (job: JobRecord) => JobRecord | null | Promise<JobRecord | null>;

export interface JobListQuery {
  status?: JobStatus;
  limit: number;
  offset: number;
}

export interface DeliveryQuery {
  jobId?: string;
  statuses?: DeliveryStatus[];
  createdSince?: Date;
  minAttempts?: number;
  sortBy?: 'createdAt' | 'lastAttemptAt';
  limit?: number;
}

export interface PurgeResult {
  jobs: number;
  lots: number;
  deliveries: number;
}

/**
 * Durable home of jobs, lots and webhook deliveries. Every write to a job and
 * its lots is atomic and conditional on the job's `version`.
 */
export interface JobStore {
  createJob(job: JobRecord): Promise<void>;
  getJob(jobId: string): Promise<JobRecord | null>;
  /** @throws ConcurrentUpdateError when the job changed underneath the mutator */
  updateJob(jobId: string, mutate: JobMutator): Promise<JobRecord | null>;
  listJobs(query: JobListQuery): Promise<JobSummary[]>;
  listReconcilableJobIds(maxRecoveryAttempts: number): Promise<string[]>;
  listJobIdsAwaitingWebhooks(limit: number): Promise<string[]>;
  markWebhooksQueued(jobId: string, at: Date): Promise<void>;
  purgeTerminalJobs(updatedBefore: Date): Promise<PurgeResult>;

  /** Inserts unless a delivery for the same (jobId, webhookUrl) exists; returns whether it inserted. */
  createDelivery(delivery: DeliveryRecord): Promise<boolean>;
  getDelivery(id: string): Promise<DeliveryRecord | null>;
  listDueDeliveries(now: Date, maxAttempts: number, limit: number): Promise<DeliveryRecord[]>;
  /** Applies the patch only if the attempt count is still `expectedAttemptCount`. */
  updateDelivery(id: string, expectedAttemptCount: number, patch: DeliveryUpdate): Promise<boolean>;
  listDeliveries(query: DeliveryQuery): Promise<DeliveryRecord[]>;
}

export function cloneLot(lot: LotRecord): LotRecord {
  return {
    ...lot,
    imageUrls: [...lot.imageUrls],
    translations: { ...lot.translations },
    missingImages: [...lot.missingImages],
  };
}

export function cloneJob(job: JobRecord): JobRecord {
  return {
    ...job,
    languages: [...job.languages],
    statusHistory: job.statusHistory.map((t) => ({ ...t })),
    lots: job.lots.map(cloneLot),
  };
}

export function toSummary(job: JobRecord): JobSummary {
  const { lots: _lots, ...rest } = job;
  return rest;
}

function lotChanged(a: LotRecord | undefined, b: LotRecord): boolean {
  return !a || JSON.stringify(a) !== JSON.stringify(b);
}

function jobFromDoc(doc: JobDoc, lots: LotDoc[]): JobRecord {
  const { _id, ...rest } = doc;
  return {
    ...rest,
    id: _id,
    statusHistory: (rest.statusHistory || []).map((t) => ({ from: t.from, to: t.to, at: t.at, reason: t.reason })),
    lots: lots.map(lotFromDoc),
  };
}

function summaryFromDoc(doc: JobDoc): JobSummary {
  const { lots: _lots, ...summary } = jobFromDoc(doc, []);
  return summary;
}

function lotFromDoc(doc: LotDoc): LotRecord {
  return {
    lotId: doc.lotId,
    position: doc.position,
    additionalInfo: doc.additionalInfo ?? null,
    imageUrls: doc.imageUrls || [],
    webhookUrl: doc.webhookUrl ?? null,
    status: doc.status,
    visionResult: doc.visionResult ?? null,
    translations: doc.translations || {},
    errorMessage: doc.errorMessage ?? null,
    missingImages: doc.missingImages || [],
  };
}

function jobToDoc(job: JobRecord): JobDoc {
  const { id, lots: _lots, ...rest } = job;
  return { ...rest, _id: id };
}

function lotToDoc(jobId: string, lot: LotRecord): LotDoc {
  return { ...lot, jobId };
}

function deliveryFromDoc(doc: DeliveryDoc): DeliveryRecord {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id };
}

/** MongoDB-backed store. Multi-document writes need a replica set for transactions. */
export class MongoJobStore implements JobStore {
  constructor(
    private readonly connection: Connection = mongoose.connection,
    private readonly clock: Clock = systemClock
  ) {}

  async createJob(job: JobRecord): Promise<void> {
    await this.connection.transaction(async (session) => {
      await BatchJobModel.create([jobToDoc(job)], { session });
      if (job.lots.length > 0) {
        await BatchLotModel.insertMany(
          job.lots.map((l) => lotToDoc(job.id, l)),
          { session }
        );
      }
    });
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    const doc = await BatchJobModel.findById(jobId).lean<JobDoc>();
    if (!doc) return null;
    const lots = await BatchLotModel.find({ jobId }).sort({ position: 1 }).lean<LotDoc[]>();
    return jobFromDoc(doc, lots);
  }

  async updateJob(jobId: string, mutate: JobMutator): Promise<JobRecord | null> {
    return this.connection.transaction(async (session) => {
      const doc = await BatchJobModel.findById(jobId).session(session).lean<JobDoc>();
      if (!doc) return null;
      const lots = await BatchLotModel.find({ jobId }).sort({ position: 1 }).session(session).lean<LotDoc[]>();
      const current = jobFromDoc(doc, lots);
      const next = await mutate(cloneJob(current));
      if (!next) return null;

      const saved: JobRecord = { ...next, id: jobId, version: current.version + 1, updatedAt: this.clock.now() };
      const { _id, ...fields } = jobToDoc(saved);
      const res = await BatchJobModel.updateOne({ _id, version: current.version }, { $set: fields }, { session });
      if (res.matchedCount === 0) throw new ConcurrentUpdateError(jobId, current.version);

      const before = new Map(current.lots.map((l) => [l.lotId, l]));
      const ops = saved.lots
        .filter((l) => lotChanged(before.get(l.lotId), l))
        .map((l) => ({
          updateOne: {
            filter: { jobId, lotId: l.lotId },
            update: { $set: lotToDoc(jobId, l) },
            upsert: true,
          },
        }));
      if (ops.length > 0) await BatchLotModel.bulkWrite(ops, { session });
      logger.debug('Job updated', { jobId, version: saved.version, lotsWritten: ops.length });
      return saved;
    });
  }

  async listJobs(query: JobListQuery): Promise<JobSummary[]> {
    const filter: FilterQuery<JobDoc> = query.status ? { status: query.status } : {};
    const docs = await BatchJobModel.find(filter)
      .sort({ createdAt: -1 })
      .skip(query.offset)
      .limit(query.limit)
      .lean<JobDoc[]>();
    return docs.map(summaryFromDoc);
  }

  async listReconcilableJobIds(maxRecoveryAttempts: number): Promise<string[]> {
    const docs = await BatchJobModel.find({
      $or: [
        { status: { $in: ['processing', 'translating'] } },
        {
          status: 'failed',
          failureSource: { $ne: 'remote' },
          retryCount: { $lt: maxRecoveryAttempts },
          $or: [{ visionBatchRef: { $ne: null } }, { translationBatchRef: { $ne: null } }],
        },
      ],
    })
      .sort({ updatedAt: 1 })
      .select({ _id: 1 })
      .lean<{ _id: string }[]>();
    return docs.map((d) => d._id);
  }

  async listJobIdsAwaitingWebhooks(limit: number): Promise<string[]> {
    const docs = await BatchJobModel.find({ status: 'completed', webhooksQueuedAt: null })
      .sort({ completedAt: 1 })
      .limit(limit)
      .select({ _id: 1 })
      .lean<{ _id: string }[]>();
    return docs.map((d) => d._id);
  }

  async markWebhooksQueued(jobId: string, at: Date): Promise<void> {
    await BatchJobModel.updateOne(
      { _id: jobId },
      { $set: { webhooksQueuedAt: at, updatedAt: this.clock.now() }, $inc: { version: 1 } }
    );
  }

  async purgeTerminalJobs(updatedBefore: Date): Promise<PurgeResult> {
    return this.connection.transaction(async (session) => {
      const docs = await BatchJobModel.find({ status: { $in: [...TERMINAL_STATUSES] }, updatedAt: { $lt: updatedBefore } })
        .select({ _id: 1 })
        .session(session)
        .lean<{ _id: string }[]>();
      const ids = docs.map((d) => d._id);
      if (ids.length === 0) return { jobs: 0, lots: 0, deliveries: 0 };
      const lots = await BatchLotModel.deleteMany({ jobId: { $in: ids } }, { session });
      const deliveries = await WebhookDeliveryModel.deleteMany({ jobId: { $in: ids } }, { session });
      const jobs = await BatchJobModel.deleteMany({ _id: { $in: ids } }, { session });
      return { jobs: jobs.deletedCount, lots: lots.deletedCount, deliveries: deliveries.deletedCount };
    });
  }

  async createDelivery(delivery: DeliveryRecord): Promise<boolean> {
    const { id, ...rest } = delivery;
    const res = await WebhookDeliveryModel.updateOne(
      { jobId: delivery.jobId, webhookUrl: delivery.webhookUrl },
      { $setOnInsert: { _id: id, ...rest } },
      { upsert: true }
    );
    return res.upsertedCount > 0;
  }

  async getDelivery(id: string): Promise<DeliveryRecord | null> {
    const doc = await WebhookDeliveryModel.findById(id).lean<DeliveryDoc>();
    return doc ? deliveryFromDoc(doc) : null;
  }

  async listDueDeliveries(now: Date, maxAttempts: number, limit: number): Promise<DeliveryRecord[]> {
    const docs = await WebhookDeliveryModel.find({
      status: { $in: ['pending', 'failed'] },
      attemptCount: { $lt: maxAttempts },
      $or: [{ nextAttemptAt: null }, { nextAttemptAt: { $lte: now } }],
    })
      .sort({ nextAttemptAt: 1, createdAt: 1 })
      .limit(limit)
      .lean<DeliveryDoc[]>();
    return docs.map(deliveryFromDoc);
  }

  async updateDelivery(id: string, expectedAttemptCount: number, patch: DeliveryUpdate): Promise<boolean> {
    const res = await WebhookDeliveryModel.updateOne({ _id: id, attemptCount: expectedAttemptCount }, { $set: patch });
    return res.matchedCount > 0;
  }

  async listDeliveries(query: DeliveryQuery): Promise<DeliveryRecord[]> {
    const filter: FilterQuery<DeliveryDoc> = {};
    if (query.jobId) filter.jobId = query.jobId;
    if (query.statuses) filter.status = { $in: query.statuses };
    if (query.createdSince) filter.createdAt = { $gte: query.createdSince };
    if (query.minAttempts != null) filter.attemptCount = { $gte: query.minAttempts };
    let q = WebhookDeliveryModel.find(filter).sort(query.sortBy === 'lastAttemptAt' ? { lastAttemptAt: -1 } : { createdAt: -1 });
    if (query.limit != null) q = q.limit(query.limit);
    const docs = await q.lean<DeliveryDoc[]>();
    return docs.map(deliveryFromDoc);
  }
}
