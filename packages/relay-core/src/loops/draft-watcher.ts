/**
 * Draft watcher - wakes the poller when a draft lands.
 *
 * Polling keeps running underneath; the watcher only shortens the delay
 * between a client's submit and the next scan.
 */

import * as path from 'node:path';
import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { Logger } from 'pino';
import { ARTIFACT_EXTENSION } from '../transaction/identity.js';

/** Anything that can be nudged into an early scan */
export interface Wakeable {
  wake(): void;
}

export class DraftWatcher {
  private watcher: FSWatcher | null = null;
  private readonly draftDirs: string[];
  private readonly target: Wakeable;
  private readonly logger: Logger;

  constructor(draftDirs: string[], target: Wakeable, logger: Logger) {
    this.draftDirs = draftDirs;
    this.target = target;
    this.logger = logger.child({ component: 'draft-watcher' });
  }

  get isWatching(): boolean {
    return this.watcher !== null;
  }

  /** Start watching; resolves once the initial scan is done */
  start(): Promise<void> {
    if (this.watcher) return Promise.resolve();

    const watcher = watch(this.draftDirs, {
      // temp files are dot-prefixed until renamed into place
      ignored: (filePath: string) => path.basename(filePath).startsWith('.'),
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });

    this.watcher = watcher;

    watcher
      .on('add', (p) => this.onAdd(p))
      .on('error', (err) => this.logger.warn({ error: String(err) }, 'Watcher error'));

    return new Promise((resolve) => {
      watcher.once('ready', () => {
        this.logger.debug({ dirs: this.draftDirs }, 'Watching draft directories');
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
  }

  private onAdd(filePath: string): void {
    if (!filePath.endsWith(ARTIFACT_EXTENSION)) return;
    this.logger.debug({ file: path.basename(filePath) }, 'Draft added');
    this.target.wake();
  }
}
