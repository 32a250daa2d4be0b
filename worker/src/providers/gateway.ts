export type RemoteBatchStatus = 'queued' | 'in_progress' | 'completed' | 'failed';

/** One line of a batch input file. */
export interface InferenceRequest {
  custom_id: string;
  method: 'POST';
  url: string;
  body: Record<string, unknown>;
}

export interface RemoteBatchSnapshot {
  ref: string;
  status: RemoteBatchStatus;
  /** Provider status before normalization, kept for logs. */
  rawStatus: string;
  outputRef: string | null;
  errorRef: string | null;
  requestCounts: { total: number; completed: number; failed: number } | null;
}

/**
 * Asynchronous batch inference provider. Implementations hold no job state;
 * failures surface as RemoteInferenceError with `transient` set for retryable ones.
 */
export interface InferenceGateway {
  submit(requests: InferenceRequest[], description: string): Promise<string>;
  poll(batchRef: string): Promise<RemoteBatchSnapshot>;
  download(fileRef: string): Promise<string>;
}
