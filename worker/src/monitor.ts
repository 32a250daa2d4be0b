import {
  Clock,
  DeliveryRecord,
  JobStore,
  config,
  elapsedMs,
  hoursAgo,
  systemClock,
  toIso,
} from '@lotbatch/shared';

export interface DeliveryMetrics {
  periodHours: number;
  total: number;
  delivered: number;
  failed: number;
  pending: number;
  successRate: number;
  averageAttempts: number;
  averageDeliverySeconds: number;
  generatedAt: string | null;
}

export interface FailedDeliveryView {
  id: string;
  jobId: string;
  webhookUrl: string;
  attemptCount: number;
  responseStatus: number | null;
  errorMessage: string | null;
  lastAttemptAt: string | null;
  createdAt: string | null;
}

export interface EndpointHealth {
  webhookUrl: string;
  total: number;
  delivered: number;
  failed: number;
  successRate: number;
}

export interface DeliveryAlert {
  level: 'warning' | 'error';
  metric: 'success_rate' | 'stuck_deliveries' | 'retry_rate' | 'endpoint_failure';
  message: string;
  value: number;
  webhookUrl?: string;
}

const round2 = (n: number) => Math.round(n * 100) / 100;
const average = (xs: number[]) => (xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length);

/** Read-only views over webhook deliveries for operators. */
export class DeliveryMonitor {
  constructor(
    private readonly store: JobStore,
    private readonly maxAttempts: number = config.webhookMaxAttempts,
    private readonly clock: Clock = systemClock
  ) {}

  private isPermanentFailure(d: DeliveryRecord): boolean {
    return d.status === 'failed' && d.attemptCount >= this.maxAttempts;
  }

  async getDeliveryMetrics(hours = 24): Promise<DeliveryMetrics> {
    const now = this.clock.now();
    const recent = await this.store.listDeliveries({ createdSince: hoursAgo(now, hours) });
    const open = await this.store.listDeliveries({ statuses: ['pending', 'failed'] });

    const delivered = recent.filter((d) => d.status === 'delivered');
    const deliverySeconds = delivered.flatMap((d) => (d.deliveredAt ? [elapsedMs(d.createdAt, d.deliveredAt) / 1000] : []));
    return {
      periodHours: hours,
      total: recent.length,
      delivered: delivered.length,
      failed: recent.filter((d) => this.isPermanentFailure(d)).length,
      pending: open.filter((d) => d.attemptCount < this.maxAttempts).length,
      successRate: recent.length > 0 ? round2((delivered.length / recent.length) * 100) : 0,
      averageAttempts: round2(average(delivered.map((d) => d.attemptCount))),
      averageDeliverySeconds: round2(average(deliverySeconds)),
      generatedAt: toIso(now),
    };
  }

  async getFailedDeliveries(limit = 10): Promise<FailedDeliveryView[]> {
    const rows = await this.store.listDeliveries({
      statuses: ['failed'],
      minAttempts: this.maxAttempts,
      sortBy: 'lastAttemptAt',
      limit,
    });
    return rows.map((d) => ({
      id: d.id,
      jobId: d.jobId,
      webhookUrl: d.webhookUrl,
      attemptCount: d.attemptCount,
      responseStatus: d.responseStatus,
      errorMessage: d.errorMessage,
      lastAttemptAt: toIso(d.lastAttemptAt),
      createdAt: toIso(d.createdAt),
    }));
  }

  /** Worst success rate first. */
  async getEndpointHealth(): Promise<EndpointHealth[]> {
    const rows = await this.store.listDeliveries({});
    const byUrl = new Map<string, EndpointHealth>();
    for (const d of rows) {
      const entry = byUrl.get(d.webhookUrl) ?? { webhookUrl: d.webhookUrl, total: 0, delivered: 0, failed: 0, successRate: 0 };
      entry.total += 1;
      if (d.status === 'delivered') entry.delivered += 1;
      if (this.isPermanentFailure(d)) entry.failed += 1;
      byUrl.set(d.webhookUrl, entry);
    }
    const out = [...byUrl.values()].map((e) => ({ ...e, successRate: round2((e.delivered / e.total) * 100) }));
    return out.sort((a, b) => a.successRate - b.successRate || a.webhookUrl.localeCompare(b.webhookUrl));
  }

  async checkAlerts(): Promise<DeliveryAlert[]> {
    const alerts: DeliveryAlert[] = [];
    const lastHour = await this.getDeliveryMetrics(1);
    if (lastHour.total > 10 && lastHour.successRate < 90) {
      alerts.push({
        level: 'warning',
        metric: 'success_rate',
        message: `Webhook success rate is ${lastHour.successRate}% in the last hour`,
        value: lastHour.successRate,
      });
    }

    const cutoff = hoursAgo(this.clock.now(), 1);
    const pending = await this.store.listDeliveries({ statuses: ['pending'] });
    const stuck = pending.filter((d) => d.createdAt < cutoff).length;
    if (stuck > 10) {
      alerts.push({
        level: 'error',
        metric: 'stuck_deliveries',
        message: `${stuck} webhooks have been pending for over 1 hour`,
        value: stuck,
      });
    }

    if (lastHour.averageAttempts > 2) {
      alerts.push({
        level: 'warning',
        metric: 'retry_rate',
        message: `Average attempt count is ${lastHour.averageAttempts} in the last hour`,
        value: lastHour.averageAttempts,
      });
    }

    for (const endpoint of (await this.getEndpointHealth()).slice(0, 3)) {
      if (endpoint.total > 5 && endpoint.successRate < 50) {
        alerts.push({
          level: 'error',
          metric: 'endpoint_failure',
          message: `Webhook endpoint ${endpoint.webhookUrl} has ${endpoint.successRate}% success rate`,
          value: endpoint.successRate,
          webhookUrl: endpoint.webhookUrl,
        });
      }
    }
    return alerts;
  }
}
