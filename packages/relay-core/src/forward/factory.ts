import type { Logger } from 'pino';
import type { RelayRoute } from '../route.js';
import { CommandForwarder } from './command-forwarder.js';
import type { CommandForwarderOptions } from './command-forwarder.js';
import { DirectForwarder } from './direct-forwarder.js';
import type { DirectForwarderOptions } from './direct-forwarder.js';
import type { Forwarder } from './types.js';

export type CreateForwarderOptions = DirectForwarderOptions & CommandForwarderOptions;

/**
 * Pick the forwarding strategy for a route: the command strategy when the
 * route has a template, the direct client otherwise.
 */
export async function createForwarder(
  route: RelayRoute,
  logger: Logger,
  options?: CreateForwarderOptions
): Promise<Forwarder> {
  const routeLogger = logger.child({ route: route.name });
  if (route.curlTemplatePath) {
    return CommandForwarder.fromTemplateFile(route.curlTemplatePath, routeLogger, options);
  }
  return new DirectForwarder(routeLogger, options);
}
