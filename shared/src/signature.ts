import crypto from 'crypto';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue | undefined };

function escapeNonAscii(s: string): string {
  return s.replace(/[\u007f-\uffff]/g, (ch) => '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0'));
}

/**
 * Canonical serialization used for every signature: object keys sorted
 * recursively, no whitespace, non-ASCII escaped as lower-case \uXXXX.
 * Clients reproduce it with `json.dumps(v, separators=(',', ':'), sort_keys=True)`.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return escapeNonAscii(JSON.stringify(value));
  }
  if (Array.isArray(value)) {
    return '[' + value.map((v) => canonicalJson(v)).join(',') + ']';
  }
  const parts: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const v = value[key];
    if (v === undefined) continue;
    parts.push(escapeNonAscii(JSON.stringify(key)) + ':' + canonicalJson(v));
  }
  return '{' + parts.join(',') + '}';
}

export function hmacHex(secret: string, data: string): string {
  return crypto.createHmac('sha256', secret).update(data, 'utf8').digest('hex');
}

export function signPayload(payload: JsonValue, secret: string): string {
  return hmacHex(secret, canonicalJson(payload));
}

/** Constant-time comparison of a provided hex signature against the expected one. */
export function signaturesMatch(expected: string, provided: string | undefined | null): boolean {
  if (!provided) return false;
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(provided.trim().toLowerCase(), 'utf8');
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

export function verifyPayload(payload: JsonValue, provided: string | undefined | null, secret: string): boolean {
  return signaturesMatch(signPayload(payload, secret), provided);
}

export function verifyRaw(data: string, provided: string | undefined | null, secret: string): boolean {
  return signaturesMatch(hmacHex(secret, data), provided);
}
