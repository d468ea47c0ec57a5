/**
 * Wiring from configuration to core objects.
 */

import type { Logger } from 'pino';
import {
  DraftPoller,
  FolderQueue,
  RelayClient,
  TransactionProcessor,
  buildQueuePaths,
  createForwarder,
} from '@folder-relay/core';
import type { CacheMode, CreateForwarderOptions, PollTarget, RelayRoute } from '@folder-relay/core';
import type { RelayConfig } from './config.js';

export function buildRoutes(config: RelayConfig): RelayRoute[] {
  return config.routes.map((route) => ({
    name: route.name,
    backendUrl: route.backendUrl,
    paths: buildQueuePaths(config.baseDir, route.name),
    curlTemplatePath: route.curlTemplatePath,
  }));
}

/** Create the stores of every route */
export async function ensureRouteDirectories(routes: RelayRoute[], logger: Logger): Promise<void> {
  for (const route of routes) {
    await new FolderQueue(route.paths, logger).ensureDirectories();
  }
}

export function createClients(
  config: RelayConfig,
  logger: Logger,
  cacheMode: CacheMode = config.cacheMode
): Map<string, RelayClient> {
  const clients = new Map<string, RelayClient>();
  for (const route of buildRoutes(config)) {
    clients.set(
      route.name,
      new RelayClient({
        route,
        queue: new FolderQueue(route.paths, logger),
        logger,
        cacheMode,
        headerPolicy: config.headerPolicy,
        wait: { pollIntervalMs: config.waitIntervalMs, timeoutMs: config.waitTimeoutMs },
      })
    );
  }
  return clients;
}

export async function createPoller(
  config: RelayConfig,
  logger: Logger,
  forwarderOptions?: CreateForwarderOptions
): Promise<DraftPoller> {
  const targets: PollTarget[] = [];
  for (const route of buildRoutes(config)) {
    const queue = new FolderQueue(route.paths, logger);
    const forwarder = await createForwarder(route, logger, forwarderOptions);
    const processor = new TransactionProcessor({ route, queue, forwarder, logger });
    targets.push({ route, queue, processor });
    logger.info(
      {
        route: route.name,
        backend: route.backendUrl,
        drafts: route.paths.drafts,
        strategy: forwarder.kind,
        template: route.curlTemplatePath,
      },
      'Route configured'
    );
  }
  return new DraftPoller(targets, logger, { pollIntervalMs: config.pollIntervalMs });
}
