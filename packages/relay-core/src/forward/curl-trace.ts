/**
 * Parser for `curl -v` output.
 *
 * The command strategy only gets text back, so the response has to be
 * recovered from curl's verbose trace:
 *
 * ```
 * * Connected to api.internal (10.0.0.4) port 443
 * > GET /items HTTP/1.1
 * < HTTP/1.1 200 OK
 * < Content-Type: application/json
 * {"items":[]}
 * ```
 *
 * - `< HTTP/...` starts a new response block; with redirects the last block wins
 * - `< name: value` is a response header of the current block
 * - `* ` (connection info) and `> ` (request) lines are dropped
 * - every other non-empty line is body, in order
 *
 * @module forward/curl-trace
 */

import type { HeaderMap } from '../transaction/types.js';

/** Status used when the trace contains no status line */
export const NO_STATUS_LINE_STATUS = 204;

const MARKER_ONLY_LINES = new Set(['*', '<', '>']);

export interface ParsedCurlTrace {
  statusCode: number;
  statusText: string;
  headers: HeaderMap;
  body: string;
  /** Connection/debug lines that were dropped */
  debugLines: string[];
}

/**
 * Parse a `< HTTP/1.1 302 Found` style line.
 * Returns a null code when the third field is not numeric.
 */
export function parseStatusLine(line: string): { statusCode: number | null; statusText: string } {
  // '<', 'HTTP/x', code, text (text keeps its spaces)
  const parts = line.split(' ');
  const code = parts[2];
  const statusCode = code !== undefined && /^\d+$/.test(code) ? parseInt(code, 10) : null;
  const statusText = parts.length > 3 ? parts.slice(3).join(' ') : '';
  return { statusCode, statusText };
}

/**
 * Parse a header line with its `< ` marker already removed.
 */
export function parseHeaderLine(line: string): { name: string; value: string } {
  const colon = line.indexOf(':');
  if (colon === -1) {
    return { name: line.trim().toLowerCase(), value: '' };
  }
  return {
    name: line.slice(0, colon).trim().toLowerCase(),
    value: line.slice(colon + 1).trim(),
  };
}

/**
 * Recover status, headers and body from verbose curl output.
 */
export function parseCurlTrace(output: string): ParsedCurlTrace {
  let statusCode: number | null = null;
  let statusText = '';
  let headers: HeaderMap = {};
  const bodyLines: string[] = [];
  const debugLines: string[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || MARKER_ONLY_LINES.has(line)) continue;

    if (line.startsWith('* ') || line.startsWith('> ')) {
      debugLines.push(line);
      continue;
    }

    if (line.startsWith('< HTTP/')) {
      const status = parseStatusLine(line);
      statusCode = status.statusCode;
      statusText = status.statusText;
      headers = {};
      continue;
    }

    if (line.startsWith('< ')) {
      const { name, value } = parseHeaderLine(line.slice(2));
      if (name) headers[name] = value;
      continue;
    }

    bodyLines.push(line);
  }

  if (statusCode === null) {
    return {
      statusCode: NO_STATUS_LINE_STATUS,
      statusText,
      headers: {},
      body: bodyLines.join('\n'),
      debugLines,
    };
  }

  return { statusCode, statusText, headers, body: bodyLines.join('\n'), debugLines };
}
