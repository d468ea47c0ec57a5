/**
 * DraftPoller - server-side scan loop.
 *
 * Lifecycle: idle -> running -> stopping -> stopped
 *
 * Each cycle scans the drafts store of every route, processes each draft it
 * finds, then sleeps `pollIntervalMs` before the next scan. `wake()` ends the
 * sleep early (used by DraftWatcher). A forwarding failure is recorded in the
 * sent store by the processor and never stops the loop; a storage failure
 * rejects `run()`.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { FolderQueue } from '../queue/folder-queue.js';
import type { ProcessOutcome, TransactionProcessor } from '../processor/transaction-processor.js';
import type { RelayRoute } from '../route.js';

/** Default delay between scans */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

/** Poller lifecycle states */
export type PollerState = 'idle' | 'running' | 'stopping' | 'stopped';

/** Everything the poller needs for one route */
export interface PollTarget {
  route: RelayRoute;
  queue: FolderQueue;
  processor: TransactionProcessor;
}

export interface DraftPollerOptions {
  /** Delay between scans (default: 1000ms) */
  pollIntervalMs?: number;
}

/** Stats exposed by the poller */
export interface DraftPollerStats {
  state: PollerState;
  cyclesCompleted: number;
  completed: number;
  failed: number;
  skipped: number;
  lastCycleAt: number | null;
}

/** Events emitted by the DraftPoller */
export interface DraftPollerEvents {
  stateChange: (newState: PollerState, oldState: PollerState) => void;
  processed: (route: string, outcome: ProcessOutcome) => void;
  cycleComplete: (outcomes: ProcessOutcome[]) => void;
  stopped: () => void;
}

/**
 * Typed event emitter interface for the poller.
 */
export interface TypedDraftPollerEmitter {
  on<K extends keyof DraftPollerEvents>(event: K, listener: DraftPollerEvents[K]): this;
  off<K extends keyof DraftPollerEvents>(event: K, listener: DraftPollerEvents[K]): this;
  emit<K extends keyof DraftPollerEvents>(
    event: K,
    ...args: Parameters<DraftPollerEvents[K]>
  ): boolean;
}

export class DraftPoller extends EventEmitter implements TypedDraftPollerEmitter {
  private _state: PollerState = 'idle';
  private readonly targets: PollTarget[];
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private sleepController: AbortController | null = null;
  private wakeRequested = false;

  // Stats
  private _cyclesCompleted = 0;
  private _completed = 0;
  private _failed = 0;
  private _skipped = 0;
  private _lastCycleAt: number | null = null;

  constructor(targets: PollTarget[], logger: Logger, options?: DraftPollerOptions) {
    super();
    this.targets = targets;
    this.pollIntervalMs = options?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = logger.child({ component: 'draft-poller' });
  }

  /** Current poller state */
  get state(): PollerState {
    return this._state;
  }

  /**
   * Scan every route once and process the drafts found.
   */
  async runCycle(): Promise<ProcessOutcome[]> {
    const outcomes: ProcessOutcome[] = [];

    for (const target of this.targets) {
      const names = await target.queue.listDrafts();
      for (const name of names) {
        const outcome = await target.processor.process(name);
        this.recordOutcome(outcome);
        outcomes.push(outcome);
        this.emit('processed', target.route.name, outcome);
      }
    }

    this._cyclesCompleted++;
    this._lastCycleAt = Date.now();
    this.emit('cycleComplete', outcomes);
    return outcomes;
  }

  /**
   * Run scan cycles until `stop()` is called.
   * Rejects on storage errors.
   */
  async run(): Promise<void> {
    if (this._state !== 'idle' && this._state !== 'stopped') {
      throw new Error(`Cannot start poller from state: ${this._state}`);
    }

    for (const target of this.targets) {
      await target.queue.ensureDirectories();
    }

    this.setState('running');
    this.logger.info(
      { routes: this.targets.map((t) => t.route.name), pollIntervalMs: this.pollIntervalMs },
      'Draft poller running'
    );

    try {
      while (this.state === 'running') {
        await this.runCycle();
        if (this.state !== 'running') break;
        await this.pause();
      }
    } finally {
      this.setState('stopped');
      this.emit('stopped');
    }
  }

  /** Cut the current sleep short and scan again */
  wake(): void {
    this.wakeRequested = true;
    this.sleepController?.abort();
  }

  /** Ask the loop to finish after the current cycle */
  stop(): void {
    if (this._state !== 'running') return;
    this.setState('stopping');
    this.sleepController?.abort();
  }

  getStats(): DraftPollerStats {
    return {
      state: this._state,
      cyclesCompleted: this._cyclesCompleted,
      completed: this._completed,
      failed: this._failed,
      skipped: this._skipped,
      lastCycleAt: this._lastCycleAt,
    };
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private async pause(): Promise<void> {
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return;
    }
    const controller = new AbortController();
    this.sleepController = controller;
    try {
      await sleep(this.pollIntervalMs, undefined, { signal: controller.signal });
    } catch (err) {
      if (!controller.signal.aborted) throw err;
    } finally {
      this.sleepController = null;
      this.wakeRequested = false;
    }
  }

  private recordOutcome(outcome: ProcessOutcome): void {
    switch (outcome.status) {
      case 'completed':
        this._completed++;
        break;
      case 'failed':
        this._failed++;
        break;
      case 'skipped':
        this._skipped++;
        break;
    }
  }

  private setState(newState: PollerState): void {
    const oldState = this._state;
    this._state = newState;
    this.emit('stateChange', newState, oldState);
  }
}
