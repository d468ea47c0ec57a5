/**
 * A logical route: one backend and one draft/inbox/sent triple.
 */

import type { QueuePaths } from './queue/types.js';

export interface RelayRoute {
  /** Route name, the first path segment on the local listener (e.g. "dev") */
  name: string;
  /** Backend base URL, without trailing slash */
  backendUrl: string;
  /** Store directories for this route */
  paths: QueuePaths;
  /** Shell template for the command strategy; direct forwarding when absent */
  curlTemplatePath?: string;
}
