/**
 * Shape checks for transaction files read back from disk.
 *
 * Files in a shared folder may come from another version of the relay or be
 * edited by hand, so they are checked before use instead of being trusted.
 */

import { isJsonValue } from '../codec/data-codec.js';
import { BODY_TYPES } from '../codec/types.js';
import type { BodyType, EncodedBody, JsonValue } from '../codec/types.js';
import type {
  ErrorArtifact,
  HeaderMap,
  SentArtifact,
  TransactionRecord,
  TransactionResponse,
  TransactionStats,
} from './types.js';

/** Thrown when a transaction file does not have the expected shape */
export class MalformedArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedArtifactError';
  }
}

type UnknownRecord = Record<string, unknown>;

function isObject(value: unknown): value is UnknownRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isBodyType(value: unknown): value is BodyType {
  return typeof value === 'string' && BODY_TYPES.some((t) => t === value);
}

function readHeaders(value: unknown): HeaderMap {
  const headers: HeaderMap = {};
  if (!isObject(value)) return headers;
  for (const [name, v] of Object.entries(value)) {
    if (typeof v === 'string') headers[name] = v;
    else if (typeof v === 'number') headers[name] = String(v);
  }
  return headers;
}

/**
 * Read a tagged body from an object with `payload`/`type` fields.
 * A missing tag means `string`; a missing payload means empty.
 */
export function readEncodedBody(obj: UnknownRecord): EncodedBody {
  const type = obj['type'] ?? 'string';
  const payload = 'payload' in obj ? obj['payload'] : '';

  if (!isBodyType(type)) {
    // Unknown tags pass the payload through unchanged
    return { type: 'string', payload: typeof payload === 'string' ? payload : JSON.stringify(payload) };
  }

  if (type === 'json') {
    if (!isJsonValue(payload)) {
      throw new MalformedArtifactError('json payload is not a JSON value');
    }
    return { type, payload };
  }

  if (typeof payload !== 'string') {
    throw new MalformedArtifactError(`${type} payload must be a string`);
  }
  return { type, payload };
}

function readStats(value: unknown): TransactionStats {
  const stats: TransactionStats = {};
  if (!isObject(value)) return stats;
  for (const key of ['created_at', 'started_at', 'finished_at'] as const) {
    const v = value[key];
    if (typeof v === 'string') stats[key] = v;
  }
  for (const key of ['elapsed_request', 'elapsed_total'] as const) {
    const v = value[key];
    if (typeof v === 'number') stats[key] = v;
  }
  return stats;
}

function readResponse(value: unknown): TransactionResponse | undefined {
  if (!isObject(value)) return undefined;
  const statusCode = value['status_code'];
  if (typeof statusCode !== 'number' || !Number.isInteger(statusCode)) return undefined;
  const statusText = value['status_text'];
  return {
    status_code: statusCode,
    status_text: typeof statusText === 'string' ? statusText : '',
    headers: readHeaders(value['headers']),
    ...readEncodedBody(value),
  };
}

function requireString(obj: UnknownRecord, field: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    throw new MalformedArtifactError(`Field '${field}' must be a string`);
  }
  return value;
}

/**
 * Validate a parsed object as a transaction record.
 */
export function toTransactionRecord(value: unknown): TransactionRecord {
  if (!isObject(value)) {
    throw new MalformedArtifactError('Transaction record must be an object');
  }

  const headers = readHeaders(value['headers']);
  const queryString = value['query_string'];
  const folder = value['folder'];
  const record: TransactionRecord = {
    method: requireString(value, 'method'),
    path: requireString(value, 'path'),
    query_string: typeof queryString === 'string' ? queryString : '',
    folder: typeof folder === 'string' ? folder : '',
    headers,
    ...readEncodedBody(value),
    stats: readStats(value['stats']),
    original_headers: readHeaders(value['original_headers']),
    server_headers: isObject(value['server_headers'])
      ? readHeaders(value['server_headers'])
      : { ...headers },
  };

  const response = readResponse(value['response']);
  if (response) {
    record.response = response;
  }
  return record;
}

/**
 * Validate a parsed object as anything a sent store may hold.
 */
export function toSentArtifact(value: unknown): SentArtifact {
  if (isObject(value) && !('method' in value)) {
    const error = value['error'];
    if (typeof error === 'string') {
      return { error };
    }
  }
  return toTransactionRecord(value);
}

/** Parse the text of a sent artifact */
export function parseSentArtifact(text: string): SentArtifact {
  const parsed: unknown = JSON.parse(text);
  return toSentArtifact(parsed);
}

/** Parse the text of a draft or inbox record */
export function parseTransactionRecord(text: string): TransactionRecord {
  const parsed: unknown = JSON.parse(text);
  return toTransactionRecord(parsed);
}

/** Whether a sent artifact is an error sentinel */
export function isErrorArtifact(artifact: SentArtifact): artifact is ErrorArtifact {
  return !('method' in artifact);
}
