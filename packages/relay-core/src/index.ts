/**
 * @folder-relay/core
 *
 * File-based HTTP relay: canonical request encoding, the draft → inbox → sent
 * folder queue, cache replay, forwarding strategies and the loops that drive
 * them.
 */

export * from './codec/index.js';
export * from './transaction/index.js';
export * from './queue/index.js';
export * from './cache/index.js';
export * from './forward/index.js';
export * from './processor/index.js';
export * from './loops/index.js';
export * from './client/index.js';
export type { RelayRoute } from './route.js';
