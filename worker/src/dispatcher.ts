import { randomUUID } from 'crypto';
import axios from 'axios';
import {
  Clock,
  DeliveryRecord,
  DeliveryUpdate,
  JobRecord,
  JobStore,
  SignatureMode,
  addSeconds,
  backoffSeconds,
  canonicalJson,
  config,
  errorMessage,
  errorMeta,
  logger,
  signPayload,
  systemClock,
} from '@lotbatch/shared';
import { buildPayloads } from './payload';

const RESPONSE_BODY_LIMIT = 1000;
const ERROR_MESSAGE_LIMIT = 500;
const AWAITING_BATCH = 100;

export interface WebhookResponse {
  status: number;
  body: string;
}

/** Performs one POST; resolves for any HTTP status and rejects on network errors. */
export interface WebhookTransport {
  post(url: string, body: string, headers: Record<string, string>): Promise<WebhookResponse>;
}

export function createAxiosTransport(timeoutMs: number): WebhookTransport {
  return {
    async post(url, body, headers) {
      const res = await axios.post<unknown>(url, body, {
        headers,
        timeout: timeoutMs,
        maxRedirects: 0,
        responseType: 'text',
        validateStatus: () => true,
      });
      const data = typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? '');
      return { status: res.status, body: data };
    },
  };
}

export interface DispatcherOptions {
  sharedKey: string;
  maxAttempts: number;
  baseDelaySeconds: number;
  maxDelaySeconds: number;
  signatureMode: SignatureMode;
  userAgent: string;
  batchLimit: number;
}

export function dispatcherOptionsFromConfig(): DispatcherOptions {
  return {
    sharedKey: config.sharedKey,
    maxAttempts: config.webhookMaxAttempts,
    baseDelaySeconds: config.webhookBaseDelaySeconds,
    maxDelaySeconds: config.webhookMaxDelaySeconds,
    signatureMode: config.webhookSignatureMode,
    userAgent: config.webhookUserAgent,
    batchLimit: 100,
  };
}

export type AttemptOutcome = 'skipped' | 'delivered' | 'retry_scheduled' | 'failed' | 'conflict';

export interface DispatchReport {
  attempted: number;
  delivered: number;
  retryScheduled: number;
  failed: number;
}

function truncate(s: string | null | undefined, max: number): string | null {
  if (s == null) return null;
  return s.length > max ? s.slice(0, max) : s;
}

/** Turns completed jobs into signed deliveries and works the retry schedule. */
export class DeliveryDispatcher {
  private readonly log = logger.child({ component: 'dispatcher' });

  constructor(
    private readonly store: JobStore,
    private readonly transport: WebhookTransport = createAxiosTransport(config.webhookTimeoutMs),
    private readonly options: DispatcherOptions = dispatcherOptionsFromConfig(),
    private readonly clock: Clock = systemClock
  ) {}

  /** Creates one delivery per target URL, then stamps the job. Safe to repeat. */
  async enqueueForJob(job: JobRecord): Promise<number> {
    if (job.status !== 'completed') return 0;
    const now = this.clock.now();
    let created = 0;
    for (const [url, payload] of buildPayloads(job)) {
      const inserted = await this.store.createDelivery({
        id: randomUUID(),
        jobId: job.id,
        webhookUrl: url,
        payload,
        signature: signPayload(payload, this.options.sharedKey),
        status: 'pending',
        attemptCount: 0,
        nextAttemptAt: now,
        lastAttemptAt: null,
        responseStatus: null,
        responseBody: null,
        errorMessage: null,
        createdAt: now,
        deliveredAt: null,
      });
      if (inserted) created += 1;
    }
    await this.store.markWebhooksQueued(job.id, now);
    this.log.info('Webhooks enqueued', { jobId: job.id, created });
    return created;
  }

  async enqueueAwaiting(): Promise<number> {
    const ids = await this.store.listJobIdsAwaitingWebhooks(AWAITING_BATCH);
    let created = 0;
    for (const id of ids) {
      try {
        const job = await this.store.getJob(id);
        if (job) created += await this.enqueueForJob(job);
      } catch (err) {
        this.log.error('Enqueue failed', { jobId: id, ...errorMeta(err) });
      }
    }
    return created;
  }

  buildRequest(delivery: DeliveryRecord): { body: string; headers: Record<string, string> } {
    const mode = this.options.signatureMode;
    const body =
      mode === 'header'
        ? canonicalJson(delivery.payload)
        : canonicalJson({ ...delivery.payload, signature: delivery.signature });
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.options.userAgent,
    };
    if (mode === 'header' || mode === 'both') headers['X-Signature'] = delivery.signature;
    return { body, headers };
  }

  async attempt(delivery: DeliveryRecord): Promise<AttemptOutcome> {
    if (delivery.status === 'delivered' || delivery.attemptCount >= this.options.maxAttempts) return 'skipped';

    const { body, headers } = this.buildRequest(delivery);
    let response: WebhookResponse | null = null;
    let failure: string | null = null;
    try {
      response = await this.transport.post(delivery.webhookUrl, body, headers);
    } catch (err) {
      failure = errorMessage(err);
    }

    const now = this.clock.now();
    const attemptCount = delivery.attemptCount + 1;
    const ok = response !== null && response.status >= 200 && response.status < 300;
    const patch: DeliveryUpdate = {
      attemptCount,
      lastAttemptAt: now,
      responseStatus: response ? response.status : null,
      responseBody: truncate(response ? response.body : null, RESPONSE_BODY_LIMIT),
      errorMessage: ok ? null : truncate(failure ?? `HTTP ${response ? response.status : 'error'}`, ERROR_MESSAGE_LIMIT),
    };

    let outcome: AttemptOutcome;
    if (ok) {
      patch.status = 'delivered';
      patch.deliveredAt = now;
      patch.nextAttemptAt = null;
      outcome = 'delivered';
    } else if (attemptCount >= this.options.maxAttempts) {
      patch.status = 'failed';
      patch.nextAttemptAt = null;
      outcome = 'failed';
    } else {
      patch.status = 'pending';
      patch.nextAttemptAt = addSeconds(
        now,
        backoffSeconds(attemptCount, this.options.baseDelaySeconds, this.options.maxDelaySeconds)
      );
      outcome = 'retry_scheduled';
    }

    const applied = await this.store.updateDelivery(delivery.id, delivery.attemptCount, patch);
    if (!applied) {
      this.log.warn('Delivery changed during attempt', { deliveryId: delivery.id, jobId: delivery.jobId });
      return 'conflict';
    }
    const meta = { deliveryId: delivery.id, jobId: delivery.jobId, url: delivery.webhookUrl, attemptCount };
    if (outcome === 'delivered') this.log.info('Webhook delivered', { ...meta, status: patch.responseStatus });
    else if (outcome === 'failed') this.log.error('Webhook permanently failed', { ...meta, err: patch.errorMessage });
    else this.log.warn('Webhook attempt failed', { ...meta, err: patch.errorMessage, nextAttemptAt: patch.nextAttemptAt });
    return outcome;
  }

  async processDue(): Promise<DispatchReport> {
    const due = await this.store.listDueDeliveries(this.clock.now(), this.options.maxAttempts, this.options.batchLimit);
    const report: DispatchReport = { attempted: 0, delivered: 0, retryScheduled: 0, failed: 0 };
    for (const delivery of due) {
      try {
        const outcome = await this.attempt(delivery);
        if (outcome === 'skipped' || outcome === 'conflict') continue;
        report.attempted += 1;
        if (outcome === 'delivered') report.delivered += 1;
        else if (outcome === 'failed') report.failed += 1;
        else report.retryScheduled += 1;
      } catch (err) {
        this.log.error('Delivery attempt crashed', { deliveryId: delivery.id, ...errorMeta(err) });
      }
    }
    return report;
  }
}
