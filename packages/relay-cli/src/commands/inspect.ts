/**
 * folder-relay inspect - look at a route's stores without touching them
 */

import type { Command } from 'commander';
import { FolderQueue, isErrorArtifact } from '@folder-relay/core';
import type { QueueStage, SentArtifact } from '@folder-relay/core';
import { buildRoutes } from '../runtime.js';
import { loadCommandContext } from './context.js';

/** One-line summary of a sent artifact */
export function summarizeArtifact(name: string, artifact: SentArtifact): string {
  if (isErrorArtifact(artifact)) {
    return `${name}  ERROR  ${artifact.error}`;
  }
  const query = artifact.query_string ? `?${artifact.query_string}` : '';
  const status = artifact.response
    ? `${artifact.response.status_code} ${artifact.response.status_text}`.trim()
    : 'no response';
  return `${name}  ${artifact.method} /${artifact.path}${query}  ${status}`;
}

/** Lines printed for `inspect <route>` */
export async function listRoute(queue: FolderQueue): Promise<string[]> {
  const drafts = await queue.listDrafts();
  const sent = await queue.listSent();
  const lines = [`drafts: ${drafts.length}`, `sent: ${sent.length}`];
  for (const name of sent) {
    const artifact = await queue.lookupSent(name);
    if (artifact) lines.push(`  ${summarizeArtifact(name, artifact)}`);
  }
  return lines;
}

/** Lines printed for `inspect <route> <name>` */
export async function showTransaction(queue: FolderQueue, name: string): Promise<string[]> {
  const stages: QueueStage[] = await queue.locate(name);
  if (stages.length === 0) {
    return [`${name}: not found`];
  }
  const lines = [`${name}: ${stages.join(', ')}`];
  const artifact = await queue.lookupSent(name);
  if (artifact) {
    lines.push(JSON.stringify(artifact, null, 2));
  }
  return lines;
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <route> [name]')
    .description('List the sent transactions of a route, or show one transaction')
    .action(async (routeName: string, name: string | undefined, _options: unknown, command: Command) => {
      const { config, logger } = loadCommandContext(command);
      const route = buildRoutes(config).find((r) => r.name === routeName);
      if (!route) {
        console.error(`Unknown route: ${routeName}`);
        console.error(`Configured routes: ${config.routes.map((r) => r.name).join(', ')}`);
        process.exit(1);
      }

      try {
        const queue = new FolderQueue(route.paths, logger);
        const lines = name ? await showTransaction(queue, name) : await listRoute(queue);
        for (const line of lines) {
          console.log(line);
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
