import {
  JobRecord,
  LotRecord,
  SOURCE_LANGUAGE,
  WebhookDescription,
  WebhookLot,
  WebhookPayload,
  toIso,
} from '@lotbatch/shared';
import { translationLanguages } from './requests';

export function toHtml(text: string): string {
  return `<p>${text}</p>`;
}

/** English first, then translation languages in request order. */
export function buildDescriptions(lot: LotRecord, languages: string[]): WebhookDescription[] {
  if (lot.status !== 'completed' || lot.visionResult === null) return [];
  const source = lot.visionResult;
  return [
    { language: SOURCE_LANGUAGE, damages: toHtml(source) },
    ...translationLanguages(languages).map((language) => ({
      language,
      damages: toHtml(lot.translations[language] ?? source),
    })),
  ];
}

export function buildLotEntry(lot: LotRecord, languages: string[]): WebhookLot {
  const entry: WebhookLot = {
    lot_id: lot.lotId,
    status: lot.status,
    descriptions: buildDescriptions(lot, languages),
  };
  if (lot.missingImages.length > 0) entry.missing_images = [...lot.missingImages];
  if (lot.status === 'failed') entry.error = lot.errorMessage ?? 'unknown error';
  return entry;
}

/** One payload per distinct target URL; lots with no URL at either level are left out. */
export function buildPayloads(job: JobRecord): Map<string, WebhookPayload> {
  const byUrl = new Map<string, WebhookPayload>();
  for (const lot of job.lots) {
    const url = lot.webhookUrl ?? job.webhookUrl;
    if (!url) continue;
    let payload = byUrl.get(url);
    if (!payload) {
      payload = { job_id: job.id, status: job.status, completed_at: toIso(job.completedAt), lots: [] };
      byUrl.set(url, payload);
    }
    payload.lots.push(buildLotEntry(lot, job.languages));
  }
  return byUrl;
}
