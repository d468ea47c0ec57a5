/**
 * RelayClient - caller side of one route.
 *
 * encode → cache lookup → submit (or join) → wait → replay
 */

import type { Logger } from 'pino';
import { artifactToReplay, resolveCache } from '../cache/cache-resolver.js';
import type { ReplayResponse } from '../cache/cache-resolver.js';
import { CompletionWaiter } from '../loops/completion-waiter.js';
import type { WaitOptions } from '../loops/completion-waiter.js';
import type { FolderQueue } from '../queue/folder-queue.js';
import type { RelayRoute } from '../route.js';
import { encodeRequest } from '../transaction/encoder.js';
import type { CacheMode, HeaderPolicy, InboundRequest } from '../transaction/types.js';

export interface RelayClientOptions {
  route: RelayRoute;
  queue: FolderQueue;
  logger: Logger;
  cacheMode: CacheMode;
  headerPolicy?: HeaderPolicy;
  /** Poll interval and optional deadline for the completion wait */
  wait?: Omit<WaitOptions, 'signal'>;
  /** Clock override (for testing) */
  now?: () => Date;
}

/** How a response was obtained */
export type RelaySource = 'cache' | 'submitted' | 'joined';

export interface RelayResult {
  name: string;
  source: RelaySource;
  response: ReplayResponse;
}

export class RelayClient {
  readonly route: RelayRoute;
  private readonly queue: FolderQueue;
  private readonly logger: Logger;
  private readonly cacheMode: CacheMode;
  private readonly headerPolicy: HeaderPolicy | undefined;
  private readonly waitOptions: Omit<WaitOptions, 'signal'>;
  private readonly waiter: CompletionWaiter;
  private readonly now: () => Date;

  constructor(options: RelayClientOptions) {
    this.route = options.route;
    this.queue = options.queue;
    this.logger = options.logger.child({ component: 'relay-client', route: options.route.name });
    this.cacheMode = options.cacheMode;
    this.headerPolicy = options.headerPolicy;
    this.waitOptions = options.wait ?? {};
    this.waiter = new CompletionWaiter(options.queue, options.logger);
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Relay one request and return the response to hand back to the caller.
   * Encode and storage errors propagate; a forwarding failure comes back
   * as the default failure status.
   */
  async send(request: InboundRequest, signal?: AbortSignal): Promise<RelayResult> {
    const { name, record } = encodeRequest(request, {
      cacheMode: this.cacheMode,
      headerPolicy: this.headerPolicy,
      now: this.now,
    });

    const decision = resolveCache(await this.queue.lookupSent(name), record.method, this.cacheMode);
    if (decision.outcome === 'hit') {
      this.logger.info({ name, status: decision.response.statusCode }, 'Cache hit');
      return { name, source: 'cache', response: decision.response };
    }

    if (decision.reason === 'not-reusable') {
      await this.queue.supersedeSent(name, this.now());
    }

    let source: RelaySource;
    if ((await this.queue.draftExists(name)) || (await this.queue.inboxExists(name))) {
      source = 'joined';
      this.logger.info({ name }, 'Joining in-flight transaction');
    } else {
      await this.queue.submit(name, record);
      source = 'submitted';
      this.logger.info({ name, method: record.method, path: record.path }, 'Submitted draft');
    }

    const artifact = await this.waiter.waitForCompletion(name, { ...this.waitOptions, signal });
    const response = artifactToReplay(artifact);
    this.logger.info({ name, status: response.statusCode, source }, 'Transaction completed');
    return { name, source, response };
  }
}
