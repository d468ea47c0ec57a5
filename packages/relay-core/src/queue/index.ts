export { FolderQueue, buildQueuePaths } from './folder-queue.js';
export type { FolderQueueOptions } from './folder-queue.js';
export { RenameClaimStrategy, isNotFoundError } from './claim-strategy.js';
export { QUEUE_STAGES } from './types.js';
export type { QueuePaths, QueueStage, ClaimStrategy } from './types.js';
