/**
 * Transaction record types.
 *
 * Field names are snake_case because they are the on-disk format shared by
 * every client and server watching the same folders.
 */

import type { EncodedBody } from '../codec/types.js';

/** Flat header map (one value per name) */
export type HeaderMap = Record<string, string>;

/** Caching policy */
export type CacheMode = 'permissive' | 'strict';

export const CACHE_MODES: readonly CacheMode[] = ['permissive', 'strict'] as const;

/** Fields that make up a transaction's identity */
export type RequestCore = {
  method: string;
  path: string;
  query_string: string;
  /** Logical route name, e.g. "dev" */
  folder: string;
  /** Hash-relevant header subset */
  headers: HeaderMap;
} & EncodedBody;

/** Timing information, filled in as the transaction moves along */
export interface TransactionStats {
  created_at?: string;
  started_at?: string;
  finished_at?: string;
  /** Seconds spent forwarding to the backend */
  elapsed_request?: number;
  /** Seconds from creation to completion */
  elapsed_total?: number;
}

/** Backend response as stored in a completed record */
export type TransactionResponse = {
  status_code: number;
  status_text: string;
  headers: HeaderMap;
} & EncodedBody;

/** A full transaction record */
export type TransactionRecord = RequestCore & {
  stats: TransactionStats;
  /** Every header the caller sent */
  original_headers: HeaderMap;
  /** Headers forwarded to the backend */
  server_headers: HeaderMap;
  response?: TransactionResponse;
};

/** Written to sent instead of a record when processing fails */
export interface ErrorArtifact {
  error: string;
}

/** Anything found in a sent store */
export type SentArtifact = TransactionRecord | ErrorArtifact;

/** Request as received by the local listener */
export interface InboundRequest {
  method: string;
  /** Path below the route prefix, without leading slash */
  path: string;
  queryString: string;
  folder: string;
  headers: HeaderMap;
  body?: Buffer | string;
}

/**
 * Header allowlists. These are configuration, not constants: the CLI can
 * override every list.
 */
export interface HeaderPolicy {
  /** Always part of the identity hash */
  hashHeaders: string[];
  /** Added to the hash set in strict cache mode */
  strictHashHeaders: string[];
  /** Forwarded to the backend */
  passHeaders: string[];
  /** Name prefixes that are always hashed and forwarded */
  reservedPrefixes: string[];
}

export const DEFAULT_HEADER_POLICY: Readonly<HeaderPolicy> = {
  hashHeaders: ['content-type'],
  strictHashHeaders: ['authorization', 'xproxy-api-key', 'api-key'],
  passHeaders: ['content-type', 'authorization'],
  reservedPrefixes: ['x-', 'xproxy-'],
};
