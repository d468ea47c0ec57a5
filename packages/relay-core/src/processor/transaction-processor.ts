/**
 * TransactionProcessor - server side of one route.
 *
 * claim → read → forward → write sent → clear inbox
 *
 * Forwarding failures end in an error sentinel in sent, so a waiting client
 * always observes completion. The inbox copy is removed in every case.
 * Storage failures (cannot move, write or delete) propagate.
 */

import type { Logger } from 'pino';
import { decodeBody, encodeBody, isEmptyBody } from '../codec/data-codec.js';
import type { RawBody } from '../codec/types.js';
import type { FolderQueue } from '../queue/folder-queue.js';
import type { RelayRoute } from '../route.js';
import { omitHeaders } from '../transaction/headers.js';
import type { ErrorArtifact, HeaderMap, TransactionRecord } from '../transaction/types.js';
import type { Forwarder, ForwardRequest } from '../forward/types.js';

/** Headers computed by the transport, never forwarded from the record */
export const TRANSPORT_HEADERS: readonly string[] = ['host', 'content-length'];

/** Result of processing one draft */
export type ProcessOutcome =
  | { status: 'completed'; name: string; record: TransactionRecord }
  | { status: 'failed'; name: string; reason: string }
  | { status: 'skipped'; name: string };

export interface TransactionProcessorOptions {
  route: RelayRoute;
  queue: FolderQueue;
  forwarder: Forwarder;
  logger: Logger;
  /** Clock override (for testing) */
  now?: () => Date;
}

/** Join backend base, path and query string */
export function buildTargetUrl(backendUrl: string, path: string, queryString: string): string {
  const url = `${backendUrl}/${path}`;
  return queryString ? `${url}?${queryString}` : url;
}

function secondsBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}

export class TransactionProcessor {
  private readonly route: RelayRoute;
  private readonly queue: FolderQueue;
  private readonly forwarder: Forwarder;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TransactionProcessorOptions) {
    this.route = options.route;
    this.queue = options.queue;
    this.forwarder = options.forwarder;
    this.logger = options.logger.child({ component: 'processor', route: options.route.name });
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Process the draft named `name`.
   */
  async process(name: string): Promise<ProcessOutcome> {
    const startedAt = this.now();

    const claimed = await this.queue.claim(name);
    if (!claimed) {
      return { status: 'skipped', name };
    }
    this.logger.info({ name }, 'Claimed draft');

    let outcome: ProcessOutcome;
    let artifact: TransactionRecord | ErrorArtifact;
    try {
      const record = await this.queue.readClaimed(name);
      const completed = await this.forwardRecord(record, startedAt);
      outcome = { status: 'completed', name, record: completed };
      artifact = completed;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error({ name, error: reason }, 'Failed to process draft');
      outcome = { status: 'failed', name, reason };
      artifact = { error: reason };
    }

    const sentPath = await this.queue.complete(name, artifact);
    this.logger.info({ name, status: outcome.status, sentPath }, 'Transaction finished');
    return outcome;
  }

  /** Outgoing request for a stored record */
  buildForwardRequest(record: TransactionRecord): ForwardRequest {
    const headers: HeaderMap = omitHeaders(record.server_headers, TRANSPORT_HEADERS);
    const body: RawBody | undefined = isEmptyBody(record) ? undefined : decodeBody(record);
    return {
      method: record.method,
      url: buildTargetUrl(this.route.backendUrl, record.path, record.query_string),
      headers,
      body,
    };
  }

  private async forwardRecord(
    record: TransactionRecord,
    startedAt: Date
  ): Promise<TransactionRecord> {
    const request = this.buildForwardRequest(record);
    this.logger.info(
      { method: request.method, url: request.url, strategy: this.forwarder.kind },
      'Forwarding request'
    );

    const response = await this.forwarder.forward(request);
    const finishedAt = this.now();

    const completed: TransactionRecord = {
      ...record,
      response: {
        status_code: response.statusCode,
        status_text: response.statusText,
        headers: response.headers,
        ...encodeBody(response.body),
      },
      stats: {
        ...record.stats,
        started_at: startedAt.toISOString(),
        finished_at: finishedAt.toISOString(),
      },
    };

    const createdAt = record.stats.created_at ? new Date(record.stats.created_at) : null;
    if (createdAt && !Number.isNaN(createdAt.getTime())) {
      completed.stats.elapsed_total = secondsBetween(createdAt, finishedAt);
    }
    completed.stats.elapsed_request = secondsBetween(startedAt, finishedAt);

    return completed;
  }
}
