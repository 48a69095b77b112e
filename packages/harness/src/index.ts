/**
 * Ledger test harness
 *
 * Drives several node processes through their RPC interface:
 * - port allocation per test process
 * - convergence checks (tip, best hash, mempool)
 * - peer links
 * - contract publish/call with uniform results
 */

export * from './errors/index.js';
export * from './rpc/index.js';
export * from './ports/index.js';
export * from './sync/index.js';
export * from './peers/index.js';
export * from './contracts/index.js';

export type { HarnessConfig, EndpointFactory } from './app.js';
export { TestNetwork, loadConfigFromEnv } from './app.js';

export type { Logger, LogLevel, LoggerOptions } from './utils/logger.js';
export { createLogger } from './utils/logger.js';

export {
  metricsRegistry,
  startMetricsServer,
} from './metrics/index.js';
