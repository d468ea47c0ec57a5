/**
 * Client-side wait for a submitted transaction.
 *
 * Polls until the draft disappears (claimed by a server) and then until the
 * sent artifact appears. There is no deadline unless `timeoutMs` is given.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { FolderQueue } from '../queue/folder-queue.js';
import type { SentArtifact } from '../transaction/types.js';

/** Default delay between presence checks */
export const DEFAULT_WAIT_INTERVAL_MS = 500;

export interface WaitOptions {
  /** Delay between checks (default: 500ms) */
  pollIntervalMs?: number;
  /** Give up after this many ms; 0 or undefined waits forever */
  timeoutMs?: number;
  /** Abort the wait early */
  signal?: AbortSignal;
}

/** Thrown when a bounded wait runs out */
export class WaitTimeoutError extends Error {
  public readonly transactionName: string;
  public readonly stage: 'drafts' | 'sent';

  constructor(transactionName: string, stage: 'drafts' | 'sent', timeoutMs: number) {
    super(
      stage === 'drafts'
        ? `Draft ${transactionName} was not claimed within ${timeoutMs}ms`
        : `No sent artifact for ${transactionName} within ${timeoutMs}ms`
    );
    this.name = 'WaitTimeoutError';
    this.transactionName = transactionName;
    this.stage = stage;
  }
}

export class CompletionWaiter {
  private readonly queue: FolderQueue;
  private readonly logger: Logger;

  constructor(queue: FolderQueue, logger: Logger) {
    this.queue = queue;
    this.logger = logger.child({ component: 'completion-waiter' });
  }

  /**
   * Wait for `name` to be processed and return its sent artifact.
   */
  async waitForCompletion(name: string, options?: WaitOptions): Promise<SentArtifact> {
    const interval = options?.pollIntervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
    const timeoutMs = options?.timeoutMs ?? 0;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : null;
    const signal = options?.signal;

    const expired = (): boolean => deadline !== null && Date.now() >= deadline;

    while (await this.queue.draftExists(name)) {
      if (expired()) throw new WaitTimeoutError(name, 'drafts', timeoutMs);
      await sleep(interval, undefined, { signal });
    }
    this.logger.debug({ name }, 'Draft picked up');

    for (;;) {
      const artifact = await this.queue.lookupSent(name);
      if (artifact) {
        this.logger.debug({ name }, 'Sent artifact found');
        return artifact;
      }
      if (expired()) throw new WaitTimeoutError(name, 'sent', timeoutMs);
      await sleep(interval, undefined, { signal });
    }
  }
}
