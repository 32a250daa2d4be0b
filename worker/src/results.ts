import { logger } from '@lotbatch/shared';
import { parseCustomId } from './requests';

export interface BodyShape {
  keys: string[];
  outputType: string;
}

/** One classified line of a batch output or error file. */
export type ResponseEnvelope =
  | { kind: 'structured_output'; text: string }
  | { kind: 'chat_completion'; text: string }
  | { kind: 'plain_text'; field: 'output_text' | 'output' | 'content'; text: string }
  | { kind: 'format_metadata'; shape: BodyShape }
  | { kind: 'provider_error'; statusCode: number | null; message: string; shape: BodyShape }
  | { kind: 'unrecognized'; shape: BodyShape };

export interface ResultLine {
  customId: string;
  envelope: ResponseEnvelope;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function nonEmptyString(v: unknown): string | null {
  return typeof v === 'string' && v.trim() !== '' ? v : null;
}

function typeName(v: unknown): string {
  if (v === undefined) return 'missing';
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  return typeof v;
}

export function describeShape(body: unknown): BodyShape {
  return {
    keys: isRecord(body) ? Object.keys(body).sort() : [],
    outputType: typeName(isRecord(body) ? body.output : undefined),
  };
}

function structuredText(output: unknown): string | null {
  if (!Array.isArray(output)) return null;
  const message = output.find((item) => isRecord(item) && item.type === 'message');
  if (!isRecord(message) || !Array.isArray(message.content)) return null;
  const part = message.content.find((c) => isRecord(c) && c.type === 'output_text');
  return isRecord(part) ? nonEmptyString(part.text) : null;
}

function chatText(choices: unknown): string | null {
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  return nonEmptyString(first.message.content);
}

function providerErrorMessage(err: unknown): string {
  if (isRecord(err)) return nonEmptyString(err.message) ?? nonEmptyString(err.code) ?? JSON.stringify(err);
  return String(err);
}

export function classifyBody(body: unknown): ResponseEnvelope {
  if (isRecord(body)) {
    const structured = structuredText(body.output);
    if (structured) return { kind: 'structured_output', text: structured };

    const chat = chatText(body.choices);
    if (chat) return { kind: 'chat_completion', text: chat };

    for (const field of ['output_text', 'output', 'content'] as const) {
      const text = nonEmptyString(body[field]);
      if (text) return { kind: 'plain_text', field, text };
    }

    // `text` holds response-format settings, not content.
    if (body.text !== undefined) return { kind: 'format_metadata', shape: describeShape(body) };
  }
  return { kind: 'unrecognized', shape: describeShape(body) };
}

/** Classifies a parsed JSONL line: `{custom_id, response: {status_code, body}, error}`. */
export function classifyLine(line: Record<string, unknown>): ResponseEnvelope {
  const response = isRecord(line.response) ? line.response : null;
  const body = response ? response.body : undefined;
  const statusCode = response && typeof response.status_code === 'number' ? response.status_code : null;

  if (line.error !== undefined && line.error !== null) {
    return { kind: 'provider_error', statusCode, message: providerErrorMessage(line.error), shape: describeShape(body) };
  }
  if (statusCode !== null && (statusCode < 200 || statusCode >= 300)) {
    const bodyError = isRecord(body) ? body.error : undefined;
    return {
      kind: 'provider_error',
      statusCode,
      message: bodyError !== undefined ? providerErrorMessage(bodyError) : `HTTP ${statusCode}`,
      shape: describeShape(body),
    };
  }
  return classifyBody(body);
}

export function extractText(envelope: ResponseEnvelope): string | null {
  switch (envelope.kind) {
    case 'structured_output':
    case 'chat_completion':
    case 'plain_text':
      return envelope.text.trim();
    case 'format_metadata':
    case 'provider_error':
    case 'unrecognized':
      return null;
  }
}

/** JSON diagnostic stored on a lot whose result yielded no text. */
export function diagnose(envelope: ResponseEnvelope | undefined): string {
  if (!envelope) return JSON.stringify({ reason: 'no_result_line', shape: null });
  switch (envelope.kind) {
    case 'structured_output':
    case 'chat_completion':
    case 'plain_text':
      return JSON.stringify({ reason: 'empty_text', shape: null });
    case 'format_metadata':
      return JSON.stringify({ reason: 'format_metadata_only', shape: envelope.shape });
    case 'provider_error':
      return JSON.stringify({
        reason: 'provider_error',
        shape: envelope.shape,
        status_code: envelope.statusCode,
        error: envelope.message.slice(0, 300),
      });
    case 'unrecognized':
      return JSON.stringify({ reason: 'unrecognized_shape', shape: envelope.shape });
  }
}

/** Parses a JSONL result file; blank, malformed and id-less lines are skipped. */
export function parseResultFile(content: string): ResultLine[] {
  const out: ResultLine[] = [];
  const lines = content.split('\n');
  lines.forEach((raw, index) => {
    const text = raw.trim();
    if (!text) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      logger.warn('Skipping malformed result line', { line: index + 1, err: String(err) });
      return;
    }
    if (!isRecord(parsed) || typeof parsed.custom_id !== 'string') {
      logger.warn('Skipping result line without custom_id', { line: index + 1 });
      return;
    }
    if (!parseCustomId(parsed.custom_id)) {
      logger.warn('Skipping result line with unknown custom_id', { line: index + 1, customId: parsed.custom_id });
      return;
    }
    out.push({ customId: parsed.custom_id, envelope: classifyLine(parsed) });
  });
  return out;
}

/**
 * Indexes result lines by custom id. Output-file lines win over error-file
 * lines, and a line with text wins over one without.
 */
export function indexResults(output: ResultLine[], errors: ResultLine[] = []): Map<string, ResponseEnvelope> {
  const byId = new Map<string, ResponseEnvelope>();
  const put = (line: ResultLine) => {
    const existing = byId.get(line.customId);
    if (existing && extractText(existing) !== null) return;
    if (existing && extractText(line.envelope) === null) return;
    byId.set(line.customId, line.envelope);
  };
  output.forEach(put);
  errors.forEach(put);
  return byId;
}
