export type { Predicate, PredicateLock, WaitUntilOptions } from './poller.js';
export { waitUntil, DEFAULT_POLL_INTERVAL_MS, DEFAULT_WAIT_TIMEOUT_MS } from './poller.js';

export type { SyncOptions } from './convergence.js';
export { syncBlocks, syncChain, syncMempools, syncAll } from './convergence.js';
