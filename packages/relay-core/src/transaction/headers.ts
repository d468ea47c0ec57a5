/**
 * Header selection for hashing and forwarding.
 */

import type { CacheMode, HeaderMap, HeaderPolicy } from './types.js';

/** Result of splitting caller headers */
export interface HeaderSelection {
  /** Headers that take part in the identity hash */
  hashHeaders: HeaderMap;
  /** Headers forwarded to the backend */
  serverHeaders: HeaderMap;
}

function hasReservedPrefix(lowerName: string, policy: HeaderPolicy): boolean {
  return policy.reservedPrefixes.some((prefix) => lowerName.startsWith(prefix.toLowerCase()));
}

function toLowerSet(names: string[]): Set<string> {
  return new Set(names.map((n) => n.toLowerCase()));
}

/**
 * Split caller headers into the hash-relevant and the forwarded subsets.
 * Matching is case-insensitive; header names keep the caller's casing.
 */
export function selectHeaders(
  headers: HeaderMap,
  policy: HeaderPolicy,
  mode: CacheMode
): HeaderSelection {
  const hashSet = toLowerSet(
    mode === 'strict' ? [...policy.hashHeaders, ...policy.strictHashHeaders] : policy.hashHeaders
  );
  const passSet = toLowerSet(policy.passHeaders);

  const hashHeaders: HeaderMap = {};
  const serverHeaders: HeaderMap = {};

  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    const reserved = hasReservedPrefix(lower, policy);
    if (reserved || hashSet.has(lower)) {
      hashHeaders[name] = value;
    }
    if (reserved || passSet.has(lower)) {
      serverHeaders[name] = value;
    }
  }

  return { hashHeaders, serverHeaders };
}

/** Copy of `headers` without the given names (case-insensitive) */
export function omitHeaders(headers: HeaderMap, names: readonly string[]): HeaderMap {
  const drop = new Set(names.map((n) => n.toLowerCase()));
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!drop.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Flatten a Node-style header object (values may be arrays or undefined)
 * into one value per name.
 */
export function flattenHeaderValues(
  headers: Record<string, string | string[] | number | undefined>
): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}
