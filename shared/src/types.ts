export const JOB_STATUSES = ['pending', 'processing', 'translating', 'completed', 'failed', 'cancelled'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const LOT_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export type LotStatus = (typeof LOT_STATUSES)[number];

export const DELIVERY_STATUSES = ['pending', 'delivered', 'failed'] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

/** Why a job sits in `failed`; only `remote` failures are final. */
export type FailureSource = 'submission' | 'remote' | 'local';

export const CANCELLABLE_STATUSES: readonly JobStatus[] = ['pending', 'processing', 'translating'];
export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export const SOURCE_LANGUAGE = 'en';

export function isJobStatus(v: string): v is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(v);
}

export interface StatusTransition {
  from: JobStatus;
  to: JobStatus;
  at: Date;
  reason?: string;
}

export interface LotRecord {
  lotId: string;
  position: number;
  additionalInfo: string | null;
  imageUrls: string[];
  webhookUrl: string | null;
  status: LotStatus;
  visionResult: string | null;
  translations: Record<string, string>;
  errorMessage: string | null;
  missingImages: string[];
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  languages: string[];
  webhookUrl: string | null;
  totalLots: number;
  processedLots: number;
  failedLots: number;
  visionBatchRef: string | null;
  translationBatchRef: string | null;
  errorMessage: string | null;
  failureSource: FailureSource | null;
  retryCount: number;
  statusHistory: StatusTransition[];
  webhooksQueuedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  version: number;
  lots: LotRecord[];
}

/** Job fields without the lot list, for listings. */
export type JobSummary = Omit<JobRecord, 'lots'>;

export type WebhookDescription = {
  language: string;
  damages: string;
};

export type WebhookLot = {
  lot_id: string;
  status: LotStatus;
  descriptions: WebhookDescription[];
  missing_images?: string[];
  error?: string;
};

export type WebhookPayload = {
  job_id: string;
  status: JobStatus;
  completed_at: string | null;
  lots: WebhookLot[];
};

export interface DeliveryRecord {
  id: string;
  jobId: string;
  webhookUrl: string;
  payload: WebhookPayload;
  signature: string;
  status: DeliveryStatus;
  attemptCount: number;
  nextAttemptAt: Date | null;
  lastAttemptAt: Date | null;
  responseStatus: number | null;
  responseBody: string | null;
  errorMessage: string | null;
  createdAt: Date;
  deliveredAt: Date | null;
}

export type DeliveryUpdate = Partial<
  Pick<
    DeliveryRecord,
    | 'status'
    | 'attemptCount'
    | 'nextAttemptAt'
    | 'lastAttemptAt'
    | 'responseStatus'
    | 'responseBody'
    | 'errorMessage'
    | 'deliveredAt'
  >
>;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };
