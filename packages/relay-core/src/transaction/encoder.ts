/**
 * Canonical request encoder.
 *
 * Turns an inbound request into a draft-ready transaction record and its
 * identity name.
 */

import { encodeBody } from '../codec/data-codec.js';
import { selectHeaders } from './headers.js';
import { computeIdentityName } from './identity.js';
import type {
  CacheMode,
  HeaderPolicy,
  InboundRequest,
  RequestCore,
  TransactionRecord,
} from './types.js';
import { DEFAULT_HEADER_POLICY } from './types.js';

export interface EncodeOptions {
  /** Cache mode; strict mode hashes credential headers too */
  cacheMode: CacheMode;
  /** Header allowlists (defaults to DEFAULT_HEADER_POLICY) */
  headerPolicy?: HeaderPolicy;
  /** Clock override (for testing) */
  now?: () => Date;
}

export interface EncodedRequest {
  /** Identity name, without file extension */
  name: string;
  record: TransactionRecord;
}

/**
 * Build the identity core of a request.
 */
export function buildRequestCore(
  request: InboundRequest,
  options: EncodeOptions
): { core: RequestCore; serverHeaders: Record<string, string> } {
  const policy = options.headerPolicy ?? DEFAULT_HEADER_POLICY;
  const { hashHeaders, serverHeaders } = selectHeaders(request.headers, policy, options.cacheMode);
  const body = encodeBody(request.body);

  const core: RequestCore = {
    method: request.method.toUpperCase(),
    path: request.path,
    query_string: request.queryString,
    folder: request.folder,
    headers: hashHeaders,
    ...body,
  };

  return { core, serverHeaders };
}

/**
 * Encode an inbound request into a transaction record.
 *
 * @example
 * ```ts
 * const { name, record } = encodeRequest(
 *   { method: 'GET', path: 'items', queryString: '', folder: 'dev', headers: {} },
 *   { cacheMode: 'permissive' },
 * );
 * ```
 */
export function encodeRequest(request: InboundRequest, options: EncodeOptions): EncodedRequest {
  const now = options.now ?? ((): Date => new Date());
  const { core, serverHeaders } = buildRequestCore(request, options);

  const record: TransactionRecord = {
    ...core,
    stats: { created_at: now().toISOString() },
    original_headers: { ...request.headers },
    server_headers: serverHeaders,
  };

  return { name: computeIdentityName(core), record };
}
