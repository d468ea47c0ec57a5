/**
 * Local HTTP listener (client side).
 *
 * Accepts any request on `/<route>/<rest>`, relays it through the shared
 * folders and answers with the recorded response.
 */

import Fastify from 'fastify';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import { WaitTimeoutError, flattenHeaderValues, omitHeaders } from '@folder-relay/core';
import type { InboundRequest, RelayClient } from '@folder-relay/core';

/** Methods the listener accepts */
export const RELAY_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'] as const;

/** Response headers that the listener's own transport recomputes */
export const HOP_HEADERS: readonly string[] = [
  'content-encoding',
  'transfer-encoding',
  'content-length',
  'connection',
];

export interface BuildAppOptions {
  /** One client per route, keyed by route name */
  clients: ReadonlyMap<string, RelayClient>;
  logger: Logger;
}

/** Route name, path below it and query string of a request URL */
export interface RequestTarget {
  route: string;
  path: string;
  queryString: string;
}

/**
 * Split `/dev/api/items?x=1` into `{ route: 'dev', path: 'api/items', queryString: 'x=1' }`.
 * Returns null when the path cannot be decoded.
 */
export function parseRequestTarget(url: string): RequestTarget | null {
  const queryIndex = url.indexOf('?');
  const rawPath = queryIndex === -1 ? url : url.slice(0, queryIndex);
  const queryString = queryIndex === -1 ? '' : url.slice(queryIndex + 1);

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return null;
  }

  const trimmed = decoded.replace(/^\/+/, '');
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    return { route: trimmed, path: '', queryString };
  }
  return { route: trimmed.slice(0, slash), path: trimmed.slice(slash + 1), queryString };
}

function readBody(body: unknown): Buffer | undefined {
  return Buffer.isBuffer(body) && body.length > 0 ? body : undefined;
}

export function buildApp(options: BuildAppOptions) {
  const { clients, logger } = options;
  const app = Fastify({
    logger,
    disableRequestLogging: true,
    bodyLimit: 100 * 1024 * 1024, // 100MB
  });

  // Bodies are relayed as-is, whatever their type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof WaitTimeoutError) {
      request.log.warn({ name: error.transactionName, stage: error.stage }, 'Relay wait timed out');
      return reply.code(504).send({ error: error.message });
    }
    const statusCode = error.statusCode ?? 500;
    request.log.error({ error: error.message, url: request.url }, 'Relay request failed');
    return reply.code(statusCode).send({ error: error.message });
  });

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const target = parseRequestTarget(request.url);
    if (!target) {
      return reply.code(400).send({ error: 'Malformed request path' });
    }
    if (!target.route) {
      return reply.code(400).send({
        error: 'Missing route: use /<route>/<path>',
        routes: [...clients.keys()],
      });
    }

    const client = clients.get(target.route);
    if (!client) {
      return reply.code(404).send({
        error: `Unknown route: ${target.route}`,
        routes: [...clients.keys()],
      });
    }

    const inbound: InboundRequest = {
      method: request.method,
      path: target.path,
      queryString: target.queryString,
      folder: target.route,
      headers: flattenHeaderValues(request.headers),
      body: readBody(request.body),
    };

    const result = await client.send(inbound);
    const { statusCode, statusText, headers, body } = result.response;
    request.log.info(
      { route: target.route, method: inbound.method, path: target.path, status: statusCode, source: result.source },
      'Relayed request'
    );

    if (statusText) {
      reply.raw.statusMessage = statusText;
    }
    return reply
      .code(statusCode)
      .headers(omitHeaders(headers, HOP_HEADERS))
      .send(body);
  };

  app.route({ method: [...RELAY_METHODS], url: '/', handler });
  app.route({ method: [...RELAY_METHODS], url: '/*', handler });

  return app;
}

export type RelayApp = ReturnType<typeof buildApp>;
