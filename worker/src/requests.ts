import { SOURCE_LANGUAGE, config } from '@lotbatch/shared';
import { InferenceRequest } from './providers/gateway';

const VISION_PREFIX = 'vision:';
const TRANSLATE_PREFIX = 'translate:';
const RESPONSES_URL = '/v1/responses';

export type CustomId =
  | { kind: 'vision'; lotId: string }
  | { kind: 'translation'; language: string; lotId: string };

export function visionCustomId(lotId: string): string {
  return VISION_PREFIX + lotId;
}

export function translationCustomId(language: string, lotId: string): string {
  return `${TRANSLATE_PREFIX}${language}:${lotId}`;
}

/**
 * Inverse of the two builders above. Language codes never contain ':', so
 * everything after the first separator following the language is the lot id.
 */
export function parseCustomId(customId: string): CustomId | null {
  if (customId.startsWith(VISION_PREFIX)) {
    const lotId = customId.slice(VISION_PREFIX.length);
    return lotId ? { kind: 'vision', lotId } : null;
  }
  if (customId.startsWith(TRANSLATE_PREFIX)) {
    const rest = customId.slice(TRANSLATE_PREFIX.length);
    const sep = rest.indexOf(':');
    if (sep <= 0) return null;
    const lotId = rest.slice(sep + 1);
    return lotId ? { kind: 'translation', language: rest.slice(0, sep), lotId } : null;
  }
  return null;
}

/** Requested codes other than the source language, in request order. */
export function translationLanguages(languages: string[]): string[] {
  return languages.filter((l) => l !== SOURCE_LANGUAGE);
}

export interface RequestOptions {
  visionModel: string;
  reasoningEffort: string;
  translationModel: string;
  maxOutputTokens: number;
  systemPrompt: string;
}

export function requestOptionsFromConfig(): RequestOptions {
  return {
    visionModel: config.visionModel,
    reasoningEffort: config.visionReasoningEffort,
    translationModel: config.translationModel,
    maxOutputTokens: config.maxOutputTokens,
    systemPrompt: config.visionSystemPrompt,
  };
}

export interface VisionInput {
  lotId: string;
  imageUrls: string[];
  additionalInfo: string | null;
}

export function buildVisionRequest(lot: VisionInput, opts: RequestOptions): InferenceRequest {
  const intro = lot.additionalInfo
    ? `Describe this vehicle lot.\n\nAdditional context: ${lot.additionalInfo}`
    : 'Describe this vehicle lot.';
  return {
    custom_id: visionCustomId(lot.lotId),
    method: 'POST',
    url: RESPONSES_URL,
    body: {
      model: opts.visionModel,
      reasoning: { effort: opts.reasoningEffort },
      instructions: opts.systemPrompt,
      max_output_tokens: opts.maxOutputTokens,
      input: [
        {
          role: 'user',
          content: [
            { type: 'input_text', text: intro },
            ...lot.imageUrls.map((url) => ({ type: 'input_image', image_url: url })),
          ],
        },
      ],
    },
  };
}

export function buildTranslationRequest(
  lotId: string,
  language: string,
  text: string,
  opts: RequestOptions
): InferenceRequest {
  return {
    custom_id: translationCustomId(language, lotId),
    method: 'POST',
    url: RESPONSES_URL,
    body: {
      model: opts.translationModel,
      max_output_tokens: opts.maxOutputTokens,
      input: `Translate the following text into ${language} only. Maintain the original formatting and meaning:\n\n${text}`,
    },
  };
}
