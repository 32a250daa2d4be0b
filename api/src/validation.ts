import { JobStatus, JsonValue, ValidationError, isJobStatus } from '@lotbatch/shared';
import { LotInput } from '@lotbatch/worker';

export interface CreateJobBody {
  languages: string[];
  /** Exactly as received; the signature covers this value. */
  rawLots: JsonValue[];
  lots: LotInput[];
  webhookUrl: string | null;
  signature: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isJsonValue(v: unknown): v is JsonValue {
  if (v === null || typeof v === 'string' || typeof v === 'boolean') return true;
  if (typeof v === 'number') return Number.isFinite(v);
  if (Array.isArray(v)) return v.every(isJsonValue);
  if (isRecord(v)) return Object.values(v).every(isJsonValue);
  return false;
}

function optionalString(v: unknown, field: string): string | null {
  if (v === undefined || v === null || v === '') return null;
  if (typeof v !== 'string') throw new ValidationError(`${field} must be a string`);
  return v;
}

function webhookUrl(v: unknown, field: string): string | null {
  const url = optionalString(v, field);
  if (url === null) return null;
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`${field} must be an absolute URL`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`${field} must use http or https`);
  }
  return url;
}

/** Accepts `images: [{url}]` and/or `image_urls: [string]`, in that order. */
function imageUrls(lot: Record<string, unknown>, field: string): string[] {
  const urls: string[] = [];
  if (lot.images !== undefined) {
    if (!Array.isArray(lot.images)) throw new ValidationError(`${field}.images must be an array`);
    lot.images.forEach((img: unknown, i: number) => {
      if (!isRecord(img) || typeof img.url !== 'string' || img.url.trim() === '') {
        throw new ValidationError(`${field}.images[${i}].url must be a non-empty string`);
      }
      urls.push(img.url);
    });
  }
  if (lot.image_urls !== undefined) {
    if (!Array.isArray(lot.image_urls)) throw new ValidationError(`${field}.image_urls must be an array`);
    lot.image_urls.forEach((u: unknown, i: number) => {
      if (typeof u !== 'string' || u.trim() === '') throw new ValidationError(`${field}.image_urls[${i}] must be a non-empty string`);
      urls.push(u);
    });
  }
  return urls;
}

export function parseLot(raw: unknown, index: number): LotInput {
  const field = `lots[${index}]`;
  if (!isRecord(raw)) throw new ValidationError(`${field} must be an object`);
  const lotId = raw.lot_id;
  if (typeof lotId !== 'string' && typeof lotId !== 'number') throw new ValidationError(`${field}.lot_id is required`);
  const id = String(lotId).trim();
  if (id === '') throw new ValidationError(`${field}.lot_id is required`);
  return {
    lotId: id,
    imageUrls: imageUrls(raw, field),
    additionalInfo: optionalString(raw.additional_info, `${field}.additional_info`),
    webhookUrl: webhookUrl(raw.webhook ?? raw.webhook_url, `${field}.webhook`),
  };
}

export function parseCreateJobBody(body: unknown): CreateJobBody {
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');
  const { languages, lots, signature } = body;

  if (typeof signature !== 'string' || signature.trim() === '') throw new ValidationError('signature is required');
  if (!Array.isArray(languages) || languages.length === 0) throw new ValidationError('languages must be a non-empty array');
  const langs = languages.map((l: unknown, i: number) => {
    if (typeof l !== 'string') throw new ValidationError(`languages[${i}] must be a string`);
    return l;
  });
  if (!Array.isArray(lots) || lots.length === 0) throw new ValidationError('lots must be a non-empty array');
  const rawLots: JsonValue[] = [];
  for (const lot of lots) {
    if (!isJsonValue(lot)) throw new ValidationError('lots must contain only JSON values');
    rawLots.push(lot);
  }

  return {
    languages: langs,
    rawLots,
    lots: rawLots.map(parseLot),
    webhookUrl: webhookUrl(body.webhook_url, 'webhook_url'),
    signature,
  };
}

export interface ListQuery {
  status?: JobStatus;
  limit: number;
  offset: number;
}

function intParam(v: unknown, field: string, fallback: number, min: number, max: number): number {
  if (v === undefined || v === '') return fallback;
  const n = typeof v === 'string' ? Number(v) : NaN;
  if (!Number.isInteger(n) || n < min) throw new ValidationError(`${field} must be an integer >= ${min}`);
  return Math.min(n, max);
}

export function parseListQuery(query: Record<string, unknown>): ListQuery {
  let status: JobStatus | undefined;
  const raw = query.status;
  if (raw !== undefined && raw !== '') {
    if (typeof raw !== 'string' || !isJobStatus(raw)) throw new ValidationError('status is not a known job status');
    status = raw;
  }
  return {
    status,
    limit: intParam(query.limit, 'limit', 20, 1, 100),
    offset: intParam(query.offset, 'offset', 0, 0, Number.MAX_SAFE_INTEGER),
  };
}

export function parseHours(v: unknown): number {
  return intParam(v, 'hours', 24, 1, 24 * 30);
}

export function parseLimit(v: unknown): number {
  return intParam(v, 'limit', 10, 1, 100);
}
