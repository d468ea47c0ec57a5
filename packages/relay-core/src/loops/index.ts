export * from './completion-waiter.js';
export * from './draft-poller.js';
export * from './draft-watcher.js';
