export {
  resolveCache,
  isReusable,
  toReplay,
  artifactToReplay,
  TRANSFER_HEADERS,
  DEFAULT_FAILURE_STATUS,
} from './cache-resolver.js';
export type { ReplayResponse, CacheDecision } from './cache-resolver.js';
