/**
 * FolderQueue - the draft → inbox → sent state machine of one route.
 *
 * Every transition is a whole-file operation:
 * - submit:   write drafts/<name>.json
 * - claim:    move drafts/<name>.json to inbox/<name>.json
 * - complete: write sent/<name>.json, then delete inbox/<name>.json
 *
 * Files are written to a temporary sibling and renamed into place, so a
 * reader polling a store never sees a half-written artifact.
 */

import { randomBytes } from 'node:crypto';
import { access, mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { artifactFileName, nameFromFileName } from '../transaction/identity.js';
import { parseSentArtifact, parseTransactionRecord } from '../transaction/guards.js';
import type { SentArtifact, TransactionRecord } from '../transaction/types.js';
import { RenameClaimStrategy, isNotFoundError } from './claim-strategy.js';
import type { ClaimStrategy, QueuePaths, QueueStage } from './types.js';
import { QUEUE_STAGES } from './types.js';

export interface FolderQueueOptions {
  /** Claim implementation (default: atomic rename) */
  claimStrategy?: ClaimStrategy;
}

/** Paths of the three stores of `route` under `baseDir` */
export function buildQueuePaths(baseDir: string, route: string): QueuePaths {
  const routeDir = path.join(baseDir, route);
  return {
    drafts: path.join(routeDir, 'drafts'),
    inbox: path.join(routeDir, 'inbox'),
    sent: path.join(routeDir, 'sent'),
  };
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class FolderQueue {
  readonly paths: QueuePaths;
  private readonly logger: Logger;
  private readonly claimStrategy: ClaimStrategy;

  constructor(paths: QueuePaths, logger: Logger, options?: FolderQueueOptions) {
    this.paths = paths;
    this.logger = logger.child({ component: 'folder-queue' });
    this.claimStrategy = options?.claimStrategy ?? new RenameClaimStrategy();
  }

  /** Absolute path of `name` in a store */
  artifactPath(stage: QueueStage, name: string): string {
    return path.join(this.paths[stage], artifactFileName(name));
  }

  /** Create the drafts, inbox and sent directories */
  async ensureDirectories(): Promise<void> {
    for (const stage of QUEUE_STAGES) {
      await mkdir(this.paths[stage], { recursive: true });
    }
  }

  /**
   * Submit a record as a draft.
   * Storage errors propagate to the caller.
   */
  async submit(name: string, record: TransactionRecord): Promise<string> {
    const target = this.artifactPath('drafts', name);
    await this.writeArtifact(target, record);
    this.logger.debug({ name }, 'Draft submitted');
    return target;
  }

  /**
   * Claim a draft for processing by moving it to the inbox.
   * Returns false if the draft vanished (taken by another worker).
   */
  async claim(name: string): Promise<boolean> {
    await mkdir(this.paths.inbox, { recursive: true });
    const claimed = await this.claimStrategy.claim(
      this.artifactPath('drafts', name),
      this.artifactPath('inbox', name)
    );
    if (claimed) {
      this.logger.debug({ name }, 'Draft claimed');
    } else {
      this.logger.debug({ name }, 'Draft already claimed elsewhere');
    }
    return claimed;
  }

  /** Read a claimed record from the inbox */
  async readClaimed(name: string): Promise<TransactionRecord> {
    const content = await readFile(this.artifactPath('inbox', name), 'utf-8');
    return parseTransactionRecord(content);
  }

  /**
   * Finish a transaction: write the artifact to sent, then remove the
   * inbox copy. The inbox copy is removed even when writing sent fails.
   */
  async complete(name: string, artifact: SentArtifact): Promise<string> {
    const target = this.artifactPath('sent', name);
    try {
      await this.writeArtifact(target, artifact);
      this.logger.debug({ name }, 'Wrote sent artifact');
    } finally {
      await rm(this.artifactPath('inbox', name), { force: true });
    }
    return target;
  }

  /**
   * Read a sent artifact without waiting.
   * Resolves undefined when nothing has been sent under `name`.
   */
  async lookupSent(name: string): Promise<SentArtifact | undefined> {
    let content: string;
    try {
      content = await readFile(this.artifactPath('sent', name), 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) return undefined;
      throw err;
    }
    return parseSentArtifact(content);
  }

  /**
   * Move a sent artifact aside so a fresh attempt can reuse its name.
   * The old artifact is kept as `<name>.<epoch-ms>.superseded`.
   */
  async supersedeSent(name: string, now: Date = new Date()): Promise<string | null> {
    const source = this.artifactPath('sent', name);
    const target = path.join(this.paths.sent, `${name}.${now.getTime()}.superseded`);
    try {
      await rename(source, target);
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    this.logger.info({ name, supersededBy: path.basename(target) }, 'Superseded sent artifact');
    return target;
  }

  /** Identity names of all drafts, oldest file name first */
  async listDrafts(): Promise<string[]> {
    return this.listNames('drafts');
  }

  /** Identity names of all sent artifacts */
  async listSent(): Promise<string[]> {
    return this.listNames('sent');
  }

  async draftExists(name: string): Promise<boolean> {
    return pathExists(this.artifactPath('drafts', name));
  }

  async inboxExists(name: string): Promise<boolean> {
    return pathExists(this.artifactPath('inbox', name));
  }

  async sentExists(name: string): Promise<boolean> {
    return pathExists(this.artifactPath('sent', name));
  }

  /** Stores in which `name` is currently present */
  async locate(name: string): Promise<QueueStage[]> {
    const found: QueueStage[] = [];
    for (const stage of QUEUE_STAGES) {
      if (await pathExists(this.artifactPath(stage, name))) {
        found.push(stage);
      }
    }
    return found;
  }

  // ─── Private methods ───────────────────────────────────────────

  private async listNames(stage: QueueStage): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.paths[stage]);
    } catch (err) {
      // Missing directory = empty store
      if (isNotFoundError(err)) return [];
      throw err;
    }

    const names: string[] = [];
    for (const file of files.sort()) {
      const name = nameFromFileName(file);
      if (name !== null && !file.startsWith('.')) {
        names.push(name);
      }
    }
    return names;
  }

  private async writeArtifact(target: string, content: unknown): Promise<void> {
    const dir = path.dirname(target);
    await mkdir(dir, { recursive: true });
    const tmp = path.join(
      dir,
      `.${path.basename(target)}.${process.pid}-${randomBytes(4).toString('hex')}.tmp`
    );
    try {
      await writeFile(tmp, JSON.stringify(content, null, 2), 'utf-8');
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}
