import OpenAI, { APIConnectionError, APIError, toFile } from 'openai';
import pRetry from 'p-retry';
import { RemoteInferenceError, config, errorMessage, logger } from '@lotbatch/shared';
import { InferenceGateway, InferenceRequest, RemoteBatchSnapshot, RemoteBatchStatus } from './gateway';

export interface OpenAIGatewayOptions {
  apiKey: string;
  timeoutMs: number;
  retries: number;
  minBackoffMs: number;
  backoffFactor: number;
  maxRequestsPerBatch: number;
  maxBatchFileBytes: number;
}

export function gatewayOptionsFromConfig(apiKey: string): OpenAIGatewayOptions {
  return {
    apiKey,
    timeoutMs: config.openaiTimeoutMs,
    retries: config.providerMaxRetries,
    minBackoffMs: config.providerInitialBackoffMs,
    backoffFactor: config.providerBackoffFactor,
    maxRequestsPerBatch: config.maxRequestsPerBatch,
    maxBatchFileBytes: config.maxBatchFileBytes,
  };
}

export function toJsonl(requests: InferenceRequest[]): string {
  return requests.map((r) => JSON.stringify(r)).join('\n');
}

export function mapBatchStatus(raw: string): RemoteBatchStatus {
  switch (raw) {
    case 'validating':
      return 'queued';
    case 'in_progress':
    case 'finalizing':
    case 'cancelling':
      return 'in_progress';
    case 'completed':
      return 'completed';
    case 'failed':
    case 'expired':
    case 'cancelled':
      return 'failed';
    default:
      return 'in_progress';
  }
}

/** 408, 409, 429, 5xx and connection-level failures are worth another try. */
export function toRemoteError(err: unknown, op: string): RemoteInferenceError {
  if (err instanceof RemoteInferenceError) return err;
  if (err instanceof APIConnectionError) {
    return new RemoteInferenceError(`${op}: ${err.message}`, true, { cause: err });
  }
  if (err instanceof APIError) {
    const status = err.status;
    const transient = status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
    return new RemoteInferenceError(`${op}: HTTP ${status ?? '?'} ${err.message}`, transient, { cause: err });
  }
  return new RemoteInferenceError(`${op}: ${errorMessage(err)}`, false, { cause: err });
}

/** OpenAI Batch API: JSONL upload, batch creation on /v1/responses, status polling, file download. */
export class OpenAIBatchGateway implements InferenceGateway {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIGatewayOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async submit(requests: InferenceRequest[], description: string): Promise<string> {
    if (requests.length === 0) {
      throw new RemoteInferenceError('submit: no requests', false);
    }
    if (requests.length > this.options.maxRequestsPerBatch) {
      throw new RemoteInferenceError(
        `submit: ${requests.length} requests exceed the per-batch limit of ${this.options.maxRequestsPerBatch}`,
        false
      );
    }
    const jsonl = toJsonl(requests);
    const bytes = Buffer.byteLength(jsonl, 'utf8');
    if (bytes > this.options.maxBatchFileBytes) {
      throw new RemoteInferenceError(`submit: batch file of ${bytes} bytes exceeds ${this.options.maxBatchFileBytes}`, false);
    }

    const file = await this.call('files.create', async () =>
      this.client.files.create({
        file: await toFile(Buffer.from(jsonl, 'utf8'), `batch_${Date.now()}.jsonl`, { type: 'application/jsonl' }),
        purpose: 'batch',
      })
    );
    const batch = await this.call('batches.create', () =>
      this.client.batches.create({
        input_file_id: file.id,
        endpoint: '/v1/responses',
        completion_window: '24h',
        metadata: { description: description.slice(0, 512) },
      })
    );
    logger.info('Batch submitted', { batchRef: batch.id, fileId: file.id, requests: requests.length, bytes });
    return batch.id;
  }

  async poll(batchRef: string): Promise<RemoteBatchSnapshot> {
    const batch = await this.call('batches.retrieve', () => this.client.batches.retrieve(batchRef));
    const counts = batch.request_counts;
    return {
      ref: batch.id,
      status: mapBatchStatus(batch.status),
      rawStatus: batch.status,
      outputRef: batch.output_file_id ?? null,
      errorRef: batch.error_file_id ?? null,
      requestCounts: counts ? { total: counts.total, completed: counts.completed, failed: counts.failed } : null,
    };
  }

  async download(fileRef: string): Promise<string> {
    return this.call('files.content', async () => {
      const res = await this.client.files.content(fileRef);
      return res.text();
    });
  }

  private call<T>(op: string, fn: () => Promise<T>): Promise<T> {
    return pRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          const remote = toRemoteError(err, op);
          if (!remote.transient) throw new pRetry.AbortError(remote);
          throw remote;
        }
      },
      {
        retries: this.options.retries,
        factor: this.options.backoffFactor,
        minTimeout: this.options.minBackoffMs,
        onFailedAttempt: (e) => {
          logger.warn('Provider call failed', { op, attempt: e.attemptNumber, retriesLeft: e.retriesLeft, err: e.message });
        },
      }
    );
  }
}
