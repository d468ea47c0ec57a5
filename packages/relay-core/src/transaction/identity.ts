/**
 * Content-addressed transaction names.
 *
 * A name is `<flattened path>_<sha256 of the canonical request core>`. Two
 * requests that differ only in timestamps or non-hash headers get the same
 * name, which is what makes replay from the sent store possible.
 */

import { createHash } from 'node:crypto';
import type { HeaderMap, RequestCore } from './types.js';

/** Maximum length of the path prefix in a name */
export const MAX_PATH_PREFIX_LENGTH = 100;

/** File extension of every queue artifact */
export const ARTIFACT_EXTENSION = '.json';

/**
 * Flatten a URL path into a filename-safe prefix.
 *
 * @example
 * ```ts
 * flattenPath('api/v1/items?x=1'); // 'api_v1_items_x_1'
 * flattenPath('/');                // 'root'
 * ```
 */
export function flattenPath(path: string): string {
  const flattened = path
    .replace(/[^a-zA-Z0-9-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[_-]+/, '')
    .slice(0, MAX_PATH_PREFIX_LENGTH);

  return flattened || 'root';
}

function sortHeaders(headers: HeaderMap): HeaderMap {
  const sorted: HeaderMap = {};
  // Plain code-unit order of the lower-cased names
  const keys = Object.keys(headers).sort((a, b) => {
    const x = a.toLowerCase();
    const y = b.toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
  });
  for (const key of keys) {
    sorted[key] = headers[key] ?? '';
  }
  return sorted;
}

/**
 * Serialize the identity fields in a fixed key order with sorted headers.
 */
export function canonicalJson(core: RequestCore): string {
  const ordered = {
    method: core.method,
    path: core.path,
    query_string: core.query_string,
    folder: core.folder,
    headers: sortHeaders(core.headers),
    payload: core.payload,
    type: core.type,
  };
  return JSON.stringify(ordered, null, 2);
}

/** SHA-256 hex digest of the canonical core */
export function hashRequestCore(core: RequestCore): string {
  return createHash('sha256').update(canonicalJson(core), 'utf-8').digest('hex');
}

/** Identity name of a request core (no file extension) */
export function computeIdentityName(core: RequestCore): string {
  return `${flattenPath(core.path)}_${hashRequestCore(core)}`;
}

/** File name of an artifact for a given identity name */
export function artifactFileName(name: string): string {
  return `${name}${ARTIFACT_EXTENSION}`;
}

/** Identity name from an artifact file name, or null for other files */
export function nameFromFileName(fileName: string): string | null {
  if (!fileName.endsWith(ARTIFACT_EXTENSION)) return null;
  const name = fileName.slice(0, -ARTIFACT_EXTENSION.length);
  return name.length > 0 ? name : null;
}
