/**
 * Forwarding contract shared by the direct and command strategies.
 */

import type { RawBody } from '../codec/types.js';
import type { HeaderMap } from '../transaction/types.js';

/** A logical HTTP call to the backend */
export interface ForwardRequest {
  method: string;
  /** Full target URL including query string */
  url: string;
  headers: HeaderMap;
  body?: RawBody;
}

/** Normalized backend response */
export interface ForwardResponse {
  statusCode: number;
  statusText: string;
  headers: HeaderMap;
  body: RawBody;
}

/** Strategy names */
export type ForwarderKind = 'direct' | 'command';

/**
 * Turns a ForwardRequest into a ForwardResponse.
 *
 * Non-2xx responses are results, not errors. Implementations throw
 * ForwardError only when the call itself fails (unreachable backend,
 * command exited non-zero).
 */
export interface Forwarder {
  readonly kind: ForwarderKind;
  forward(request: ForwardRequest): Promise<ForwardResponse>;
}

/** Thrown when a request cannot be forwarded at all */
export class ForwardError extends Error {
  public readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ForwardError';
    this.url = url;
  }
}
