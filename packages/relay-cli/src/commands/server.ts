/**
 * folder-relay server - process drafts against the backends
 */

import type { Command } from 'commander';
import { DraftWatcher } from '@folder-relay/core';
import { buildRoutes, createPoller, ensureRouteDirectories } from '../runtime.js';
import { loadCommandContext } from './context.js';

interface ServerOptions {
  watch?: boolean;
}

export function registerServerCommand(program: Command): void {
  program
    .command('server')
    .description('Scan the draft folders and forward each request to its backend')
    .option('--watch', 'Also watch the draft folders and scan as soon as a draft lands')
    .action(async (options: ServerOptions, command: Command) => {
      const { config, logger } = loadCommandContext(command);

      try {
        const routes = buildRoutes(config);
        await ensureRouteDirectories(routes, logger);
        const poller = await createPoller(config, logger);
        const watcher = options.watch
          ? new DraftWatcher(
              routes.map((r) => r.paths.drafts),
              poller,
              logger
            )
          : null;

        poller.on('processed', (route, outcome) => {
          if (outcome.status === 'failed') {
            logger.warn({ route, name: outcome.name, reason: outcome.reason }, 'Transaction failed');
          }
        });

        const shutdown = (): void => {
          logger.info('Stopping server');
          poller.stop();
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        if (watcher) {
          await watcher.start();
        }

        try {
          await poller.run();
        } finally {
          await watcher?.stop();
        }
        logger.info(poller.getStats(), 'Server stopped');
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
