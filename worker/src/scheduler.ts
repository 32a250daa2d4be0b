import { CronJob } from 'cron';
import {
  Clock,
  JobStore,
  config,
  elapsedMs,
  errorMessage,
  errorMeta,
  logger,
  retentionCutoff,
  systemClock,
} from '@lotbatch/shared';
import { DeliveryDispatcher } from './dispatcher';
import { BatchOrchestrator } from './orchestrator';

export interface SchedulerOptions {
  cron: string;
  retentionDays: number;
  cleanupIntervalMinutes: number;
}

export function schedulerOptionsFromConfig(): SchedulerOptions {
  return {
    cron: config.schedulerCron,
    retentionDays: config.retentionDays,
    cleanupIntervalMinutes: config.cleanupIntervalMinutes,
  };
}

export interface TickReport {
  ran: boolean;
  jobsReconciled: number;
  deliveriesEnqueued: number;
  deliveriesAttempted: number;
  jobsPurged: number;
  errors: string[];
}

/**
 * The one periodic driver: reconcile, deliver, then occasionally purge.
 * Ticks never overlap within a process.
 */
export class SchedulerLoop {
  private running = false;
  private lastCleanupAt: Date | null = null;
  private cronJob: CronJob | null = null;
  private readonly log = logger.child({ component: 'scheduler' });

  constructor(
    private readonly store: JobStore,
    private readonly orchestrator: BatchOrchestrator,
    private readonly dispatcher: DeliveryDispatcher,
    private readonly options: SchedulerOptions = schedulerOptionsFromConfig(),
    private readonly clock: Clock = systemClock
  ) {}

  private async step(name: string, report: TickReport, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      report.errors.push(`${name}: ${errorMessage(err)}`);
      this.log.error('Scheduler step failed', { step: name, ...errorMeta(err) });
    }
  }

  private cleanupDue(now: Date): boolean {
    if (!this.lastCleanupAt) return true;
    return elapsedMs(this.lastCleanupAt, now) >= this.options.cleanupIntervalMinutes * 60_000;
  }

  async tick(): Promise<TickReport> {
    const report: TickReport = {
      ran: false,
      jobsReconciled: 0,
      deliveriesEnqueued: 0,
      deliveriesAttempted: 0,
      jobsPurged: 0,
      errors: [],
    };
    if (this.running) {
      this.log.debug('Previous tick still running, skipping');
      return report;
    }
    this.running = true;
    report.ran = true;
    try {
      await this.step('reconcile', report, async () => {
        const r = await this.orchestrator.reconcileActiveJobs();
        report.jobsReconciled = r.examined;
      });
      await this.step('enqueue', report, async () => {
        report.deliveriesEnqueued = await this.dispatcher.enqueueAwaiting();
      });
      await this.step('deliver', report, async () => {
        report.deliveriesAttempted = (await this.dispatcher.processDue()).attempted;
      });

      const now = this.clock.now();
      if (this.cleanupDue(now)) {
        await this.step('cleanup', report, async () => {
          const purged = await this.store.purgeTerminalJobs(retentionCutoff(now, this.options.retentionDays));
          report.jobsPurged = purged.jobs;
          if (purged.jobs > 0) this.log.info('Retention cleanup', { ...purged });
        });
        this.lastCleanupAt = now;
      }
    } finally {
      this.running = false;
    }
    return report;
  }

  start(): void {
    if (this.cronJob) return;
    this.cronJob = new CronJob(this.options.cron, () => {
      this.tick().catch((err: unknown) => this.log.error('Tick crashed', errorMeta(err)));
    });
    this.cronJob.start();
    this.log.info('Scheduler started', { cron: this.options.cron });
  }

  stop(): void {
    if (!this.cronJob) return;
    this.cronJob.stop();
    this.cronJob = null;
    this.log.info('Scheduler stopped');
  }
}
