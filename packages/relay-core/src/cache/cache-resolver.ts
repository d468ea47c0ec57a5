/**
 * Replay policy over the sent store.
 *
 * - permissive: any completed record (one with a status code) is replayed,
 *   error responses included, so failures can be replayed offline too
 * - strict: only GET/POST records with a 2xx status are replayed
 */

import { decodeBody } from '../codec/data-codec.js';
import type { RawBody } from '../codec/types.js';
import { omitHeaders } from '../transaction/headers.js';
import { isErrorArtifact } from '../transaction/guards.js';
import type {
  CacheMode,
  HeaderMap,
  SentArtifact,
  TransactionRecord,
  TransactionResponse,
} from '../transaction/types.js';

/** Headers that describe the original transfer, not the stored body */
export const TRANSFER_HEADERS: readonly string[] = ['content-encoding', 'transfer-encoding'];

/** Status returned to callers whose transaction ended in an error sentinel */
export const DEFAULT_FAILURE_STATUS = 500;

const STRICT_METHODS: readonly string[] = ['GET', 'POST'];

/** Response handed back to the caller */
export interface ReplayResponse {
  statusCode: number;
  statusText: string;
  headers: HeaderMap;
  body: RawBody;
}

/** Outcome of a cache lookup */
export type CacheDecision =
  | { outcome: 'hit'; response: ReplayResponse }
  | { outcome: 'miss'; reason: 'absent' | 'not-reusable' };

/**
 * Whether a stored response may be replayed under `mode` for `method`.
 */
export function isReusable(
  response: TransactionResponse | undefined,
  method: string,
  mode: CacheMode
): boolean {
  if (!response) return false;
  if (mode === 'permissive') return true;
  return (
    STRICT_METHODS.includes(method.toUpperCase()) &&
    response.status_code >= 200 &&
    response.status_code <= 299
  );
}

/** Caller-facing form of a completed record's response */
export function toReplay(response: TransactionResponse): ReplayResponse {
  return {
    statusCode: response.status_code,
    statusText: response.status_text,
    headers: omitHeaders(response.headers, TRANSFER_HEADERS),
    body: decodeBody(response),
  };
}

/**
 * Caller-facing form of any sent artifact. Error sentinels and records
 * without a response yield the default failure status with an empty body.
 */
export function artifactToReplay(artifact: SentArtifact): ReplayResponse {
  const response: TransactionResponse | undefined = isErrorArtifact(artifact)
    ? undefined
    : artifact.response;
  if (!response) {
    return { statusCode: DEFAULT_FAILURE_STATUS, statusText: '', headers: {}, body: '' };
  }
  return toReplay(response);
}

/**
 * Decide whether a sent artifact answers the current request.
 *
 * @param artifact - What lookupSent returned for the request's identity name
 * @param method - Method of the current request
 * @param mode - Caching policy
 */
export function resolveCache(
  artifact: SentArtifact | undefined,
  method: string,
  mode: CacheMode
): CacheDecision {
  if (!artifact) {
    return { outcome: 'miss', reason: 'absent' };
  }

  const record: TransactionRecord | undefined = isErrorArtifact(artifact) ? undefined : artifact;
  const response = record?.response;
  if (response && isReusable(response, method, mode)) {
    return { outcome: 'hit', response: toReplay(response) };
  }
  return { outcome: 'miss', reason: 'not-reusable' };
}
