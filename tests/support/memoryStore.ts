import {
  Clock,
  ConcurrentUpdateError,
  DeliveryQuery,
  DeliveryRecord,
  DeliveryUpdate,
  JobListQuery,
  JobMutator,
  JobRecord,
  JobStore,
  JobSummary,
  PurgeResult,
  TERMINAL_STATUSES,
  cloneJob,
  systemClock,
  toSummary,
} from '../../shared/src';

/** In-process JobStore with the same contract as MongoJobStore. */
export class MemoryJobStore implements JobStore {
  readonly jobs = new Map<string, JobRecord>();
  readonly deliveries = new Map<string, DeliveryRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async createJob(job: JobRecord): Promise<void> {
    if (this.jobs.has(job.id)) throw new Error(`duplicate job ${job.id}`);
    this.jobs.set(job.id, cloneJob(job));
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async updateJob(jobId: string, mutate: JobMutator): Promise<JobRecord | null> {
    const current = this.jobs.get(jobId);
    if (!current) return null;
    const next = await mutate(cloneJob(current));
    if (!next) return null;
    const latest = this.jobs.get(jobId);
    if (!latest || latest.version !== current.version) throw new ConcurrentUpdateError(jobId, current.version);
    const saved: JobRecord = { ...cloneJob(next), id: jobId, version: current.version + 1, updatedAt: this.clock.now() };
    this.jobs.set(jobId, saved);
    return cloneJob(saved);
  }

  async listJobs(query: JobListQuery): Promise<JobSummary[]> {
    return [...this.jobs.values()]
      .filter((j) => !query.status || j.status === query.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(query.offset, query.offset + query.limit)
      .map((j) => toSummary(cloneJob(j)));
  }

  async listReconcilableJobIds(maxRecoveryAttempts: number): Promise<string[]> {
    return [...this.jobs.values()]
      .filter(
        (j) =>
          j.status === 'processing' ||
          j.status === 'translating' ||
          (j.status === 'failed' &&
            j.failureSource !== 'remote' &&
            j.retryCount < maxRecoveryAttempts &&
            (j.visionBatchRef !== null || j.translationBatchRef !== null))
      )
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .map((j) => j.id);
  }

  async listJobIdsAwaitingWebhooks(limit: number): Promise<string[]> {
    return [...this.jobs.values()]
      .filter((j) => j.status === 'completed' && j.webhooksQueuedAt === null)
      .slice(0, limit)
      .map((j) => j.id);
  }

  async markWebhooksQueued(jobId: string, at: Date): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) return;
    this.jobs.set(jobId, { ...job, webhooksQueuedAt: at, updatedAt: this.clock.now(), version: job.version + 1 });
  }

  async purgeTerminalJobs(updatedBefore: Date): Promise<PurgeResult> {
    const result: PurgeResult = { jobs: 0, lots: 0, deliveries: 0 };
    for (const job of [...this.jobs.values()]) {
      if (!TERMINAL_STATUSES.includes(job.status) || job.updatedAt >= updatedBefore) continue;
      this.jobs.delete(job.id);
      result.jobs += 1;
      result.lots += job.lots.length;
      for (const d of [...this.deliveries.values()]) {
        if (d.jobId !== job.id) continue;
        this.deliveries.delete(d.id);
        result.deliveries += 1;
      }
    }
    return result;
  }

  async createDelivery(delivery: DeliveryRecord): Promise<boolean> {
    for (const d of this.deliveries.values()) {
      if (d.jobId === delivery.jobId && d.webhookUrl === delivery.webhookUrl) return false;
    }
    this.deliveries.set(delivery.id, structuredClone(delivery));
    return true;
  }

  async getDelivery(id: string): Promise<DeliveryRecord | null> {
    const d = this.deliveries.get(id);
    return d ? structuredClone(d) : null;
  }

  async listDueDeliveries(now: Date, maxAttempts: number, limit: number): Promise<DeliveryRecord[]> {
    return [...this.deliveries.values()]
      .filter(
        (d) =>
          (d.status === 'pending' || d.status === 'failed') &&
          d.attemptCount < maxAttempts &&
          (d.nextAttemptAt === null || d.nextAttemptAt <= now)
      )
      .sort((a, b) => (a.nextAttemptAt?.getTime() ?? 0) - (b.nextAttemptAt?.getTime() ?? 0))
      .slice(0, limit)
      .map((d) => structuredClone(d));
  }

  async updateDelivery(id: string, expectedAttemptCount: number, patch: DeliveryUpdate): Promise<boolean> {
    const d = this.deliveries.get(id);
    if (!d || d.attemptCount !== expectedAttemptCount) return false;
    this.deliveries.set(id, { ...d, ...patch });
    return true;
  }

  async listDeliveries(query: DeliveryQuery): Promise<DeliveryRecord[]> {
    const { createdSince, minAttempts, statuses } = query;
    const rows = [...this.deliveries.values()]
      .filter((d) => !query.jobId || d.jobId === query.jobId)
      .filter((d) => !statuses || statuses.includes(d.status))
      .filter((d) => !createdSince || d.createdAt >= createdSince)
      .filter((d) => minAttempts == null || d.attemptCount >= minAttempts)
      .sort((a, b) =>
        query.sortBy === 'lastAttemptAt'
          ? (b.lastAttemptAt?.getTime() ?? 0) - (a.lastAttemptAt?.getTime() ?? 0)
          : b.createdAt.getTime() - a.createdAt.getTime()
      );
    return (query.limit != null ? rows.slice(0, query.limit) : rows).map((d) => structuredClone(d));
  }
}
