/**
 * folder-relay client - local HTTP listener that relays through the folders
 */

import type { Command } from 'commander';
import { buildApp } from '../listener/app.js';
import { createClients, buildRoutes, ensureRouteDirectories } from '../runtime.js';
import { loadCommandContext } from './context.js';

interface ClientOptions {
  port?: string;
  host?: string;
  strictCache?: boolean;
}

export function registerClientCommand(program: Command): void {
  program
    .command('client')
    .description('Accept HTTP requests locally and relay them through the shared folders')
    .option('-p, --port <port>', 'Port for the local listener (default: RELAY_PORT or 19790)')
    .option('--host <host>', 'Interface to bind (default: RELAY_HOST or 0.0.0.0)')
    .option('--strict-cache', 'Only replay GET/POST responses with a 2xx status')
    .action(async (options: ClientOptions, command: Command) => {
      const { config, logger } = loadCommandContext(command);

      const port = options.port !== undefined ? parseInt(options.port, 10) : config.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.error(`Error: invalid port '${options.port ?? ''}'`);
        process.exit(1);
      }
      const host = options.host ?? config.host;
      const cacheMode = options.strictCache ? 'strict' : config.cacheMode;

      try {
        await ensureRouteDirectories(buildRoutes(config), logger);
        const app = buildApp({ clients: createClients(config, logger, cacheMode), logger });

        const shutdown = (): void => {
          logger.info('Shutting down listener');
          app.close().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Close failed');
              process.exit(1);
            }
          );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        const address = await app.listen({ port, host });
        logger.info(
          {
            address,
            cacheMode,
            routes: config.routes.map((r) => `/${r.name}/...`),
          },
          'Relay client listening'
        );
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
