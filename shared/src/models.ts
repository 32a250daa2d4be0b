import mongoose, { Schema } from 'mongoose';
import {
  DELIVERY_STATUSES,
  DeliveryRecord,
  JOB_STATUSES,
  JobRecord,
  LOT_STATUSES,
  LotRecord,
  StatusTransition,
} from './types';

// Batch jobs; lots live in their own collection and are written in the same transaction
export type JobDoc = Omit<JobRecord, 'id' | 'lots'> & { _id: string };
export type LotDoc = LotRecord & { jobId: string };
export type DeliveryDoc = Omit<DeliveryRecord, 'id'> & { _id: string };

const TransitionSchema = new Schema<StatusTransition>(
  {
    from: { type: String, enum: [...JOB_STATUSES], required: true },
    to: { type: String, enum: [...JOB_STATUSES], required: true },
    at: { type: Date, required: true },
    reason: String,
  },
  { _id: false }
);

const JobSchema = new Schema<JobDoc>(
  {
    _id: { type: String, required: true },
    status: { type: String, enum: [...JOB_STATUSES], default: 'pending', index: true },
    languages: { type: [String], required: true },
    webhookUrl: { type: String, default: null },
    totalLots: { type: Number, default: 0 },
    processedLots: { type: Number, default: 0 },
    failedLots: { type: Number, default: 0 },
    visionBatchRef: { type: String, default: null, index: true },
    translationBatchRef: { type: String, default: null },
    errorMessage: { type: String, default: null },
    failureSource: { type: String, enum: ['submission', 'remote', 'local', null], default: null },
    retryCount: { type: Number, default: 0 },
    statusHistory: { type: [TransitionSchema], default: [] },
    webhooksQueuedAt: { type: Date, default: null },
    createdAt: { type: Date, required: true, index: true },
    updatedAt: { type: Date, required: true, index: true },
    completedAt: { type: Date, default: null },
    version: { type: Number, default: 0 },
  },
  { versionKey: false }
);
JobSchema.index({ status: 1, updatedAt: 1 });

const LotSchema = new Schema<LotDoc>(
  {
    jobId: { type: String, required: true, index: true },
    lotId: { type: String, required: true },
    position: { type: Number, required: true },
    additionalInfo: { type: String, default: null },
    imageUrls: { type: [String], default: [] },
    webhookUrl: { type: String, default: null },
    status: { type: String, enum: [...LOT_STATUSES], default: 'pending' },
    visionResult: { type: String, default: null },
    translations: { type: Schema.Types.Mixed, default: {} },
    errorMessage: { type: String, default: null },
    missingImages: { type: [String], default: [] },
  },
  { versionKey: false, minimize: false }
);
LotSchema.index({ jobId: 1, lotId: 1 }, { unique: true });
LotSchema.index({ jobId: 1, position: 1 });

const DeliverySchema = new Schema<DeliveryDoc>(
  {
    _id: { type: String, required: true },
    jobId: { type: String, required: true, index: true },
    webhookUrl: { type: String, required: true },
    payload: { type: Schema.Types.Mixed, required: true },
    signature: { type: String, required: true },
    status: { type: String, enum: [...DELIVERY_STATUSES], default: 'pending', index: true },
    attemptCount: { type: Number, default: 0 },
    nextAttemptAt: { type: Date, default: null, index: true },
    lastAttemptAt: { type: Date, default: null },
    responseStatus: { type: Number, default: null },
    responseBody: { type: String, default: null },
    errorMessage: { type: String, default: null },
    createdAt: { type: Date, required: true, index: true },
    deliveredAt: { type: Date, default: null },
  },
  { versionKey: false, minimize: false }
);
DeliverySchema.index({ jobId: 1, webhookUrl: 1 }, { unique: true });
DeliverySchema.index({ status: 1, attemptCount: 1, nextAttemptAt: 1 });

export const BatchJobModel = mongoose.model<JobDoc>('batch_jobs', JobSchema, 'batch_jobs');
export const BatchLotModel = mongoose.model<LotDoc>('batch_lots', LotSchema, 'batch_lots');
export const WebhookDeliveryModel = mongoose.model<DeliveryDoc>('webhook_deliveries', DeliverySchema, 'webhook_deliveries');
