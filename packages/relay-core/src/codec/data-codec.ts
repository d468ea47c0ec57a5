/**
 * Body codec.
 *
 * Maps raw request/response bodies to JSON-safe tagged values and back:
 * - JSON text is stored as its parsed structure (`json`), unless it holds a
 *   number a double cannot represent exactly; such text stays `string`
 * - other UTF-8 text is stored verbatim (`string`)
 * - anything else is base64-encoded (`base64`)
 *
 * JSON bodies round-trip by structure, not byte-for-byte: whitespace and
 * key order may change when the body is re-serialized.
 *
 * @module codec/data-codec
 */

import type { EncodedBody, JsonValue, RawBody } from './types.js';

const EMPTY_BODY: EncodedBody = { type: 'string', payload: '' };

/**
 * Decode bytes as strict UTF-8.
 * Returns null when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return null;
  }
}

/** Structural check for values that `JSON.stringify` writes back unchanged */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

const STRING_LITERAL = /"(?:[^"\\]|\\.)*"/g;
const INTEGER_LITERAL = /(?<![\d.eE+-])-?\d+(?![.\deE])/g;

/**
 * Whether every integer literal in valid JSON text fits a double exactly.
 * String contents are blanked first so digits inside them are not counted.
 */
function hasExactIntegers(text: string): boolean {
  const literals = text.replace(STRING_LITERAL, '""').match(INTEGER_LITERAL) ?? [];
  return literals.every((literal) => Number.isSafeInteger(Number(literal)));
}

function tryParseJson(text: string): { ok: true; value: JsonValue } | { ok: false } {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { ok: false };
  }
  // Non-finite numbers and oversized integers would not survive re-serialization
  if (!isJsonValue(value) || !hasExactIntegers(text)) {
    return { ok: false };
  }
  return { ok: true, value };
}

function encodeText(text: string): EncodedBody {
  const parsed = tryParseJson(text);
  if (parsed.ok) {
    return { type: 'json', payload: parsed.value };
  }
  return { type: 'string', payload: text };
}

/**
 * Encode a raw body into its tagged form.
 *
 * @example
 * ```ts
 * encodeBody(Buffer.from('{"items":[]}')); // { type: 'json', payload: { items: [] } }
 * encodeBody(Buffer.from([0xff, 0x00]));   // { type: 'base64', payload: '/wA=' }
 * ```
 */
export function encodeBody(raw: RawBody | undefined | null): EncodedBody {
  if (raw === undefined || raw === null || raw.length === 0) {
    return { ...EMPTY_BODY };
  }

  if (typeof raw === 'string') {
    return encodeText(raw);
  }

  const text = decodeUtf8(raw);
  if (text === null) {
    return { type: 'base64', payload: raw.toString('base64') };
  }
  return encodeText(text);
}

/**
 * Turn a tagged body back into what goes on the wire.
 * `base64` yields bytes; `json` yields compact JSON text; `string` is unchanged.
 */
export function decodeBody(body: EncodedBody): RawBody {
  switch (body.type) {
    case 'base64':
      return Buffer.from(body.payload, 'base64');
    case 'json':
      return JSON.stringify(body.payload);
    case 'string':
      return body.payload;
  }
}

/** Whether a tagged body carries no content */
export function isEmptyBody(body: EncodedBody): boolean {
  return body.type === 'string' && body.payload === '';
}

/**
 * Text form of a raw body for tools that only take text: UTF-8 when the bytes
 * decode, base64 otherwise.
 */
export function toUtf8OrBase64(raw: RawBody): string {
  if (typeof raw === 'string') return raw;
  return decodeUtf8(raw) ?? raw.toString('base64');
}
