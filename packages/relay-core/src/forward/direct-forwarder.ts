/**
 * Direct strategy: forward with the runtime's fetch.
 *
 * Redirects are not followed; a 3xx goes back to the caller as-is.
 */

import type { Logger } from 'pino';
import { ForwardError } from './types.js';
import type { Forwarder, ForwardRequest, ForwardResponse } from './types.js';

/** Methods that must not carry a body */
const BODYLESS_METHODS: readonly string[] = ['GET', 'HEAD'];

export interface DirectForwarderOptions {
  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error && cause.message) {
    return `${err.message}: ${cause.message}`;
  }
  return err.message;
}

export class DirectForwarder implements Forwarder {
  readonly kind = 'direct' as const;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(logger: Logger, options?: DirectForwarderOptions) {
    this.logger = logger.child({ component: 'direct-forwarder' });
    this.fetchFn = options?.fetchFn ?? globalThis.fetch;
  }

  async forward(request: ForwardRequest): Promise<ForwardResponse> {
    const method = request.method.toUpperCase();
    let body = request.body;
    if (body !== undefined && BODYLESS_METHODS.includes(method)) {
      this.logger.debug({ method, url: request.url }, 'Dropping body on bodyless method');
      body = undefined;
    }

    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method,
        headers: request.headers,
        body,
        redirect: 'manual',
      });
    } catch (err) {
      throw new ForwardError(describeFetchError(err), request.url, { cause: err });
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      if (name !== 'set-cookie') headers[name] = value;
    });
    // Iteration yields each cookie separately; keep them all in one entry
    const cookies = response.headers.getSetCookie();
    if (cookies.length > 0) {
      headers['set-cookie'] = cookies.join(', ');
    }

    let content: Buffer;
    try {
      content = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new ForwardError(describeFetchError(err), request.url, { cause: err });
    }

    this.logger.debug(
      { method, url: request.url, status: response.status, bytes: content.length },
      'Backend responded'
    );

    return {
      statusCode: response.status,
      statusText: response.statusText,
      headers,
      body: content,
    };
  }
}
