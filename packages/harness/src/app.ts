/**
 * Test Network
 *
 * One harness run against N already-running nodes.
 *
 * Lifecycle:
 * - initializeDatadirs(): pin each node to its allocated ports (before the
 *   external launcher starts the nodes)
 * - attach(): build one RPC endpoint per node from its data directory and
 *   start the metrics server
 * - drive: connectChain(), newContract(), syncAll()
 * - stop(): close the metrics server
 */

import type { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';

import { Contract } from './contracts/contract.js';
import { writeContractArtifact } from './contracts/artifact.js';
import { describeError, InvalidConfigError, InvalidNodeIndexError } from './errors/index.js';
import { startMetricsServer } from './metrics/index.js';
import { connectChain } from './peers/links.js';
import { MAX_NODES, PortAllocator } from './ports/allocator.js';
import { getAuthCookie, getDatadirPath, initializeDatadir, rpcUrl } from './ports/datadir.js';
import { JsonRpcEndpoint } from './rpc/json-rpc-endpoint.js';
import type { NodeEndpoint } from './rpc/types.js';
import { syncAll } from './sync/convergence.js';
import { createLogger, parseLogLevel, type Logger, type LogLevel } from './utils/logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface HarnessConfig {
  // Ports: null derives the seed from the process id
  portSeed: number | null;

  // Nodes
  numNodes: number;
  datadirRoot: string;
  rpcHost?: string;

  // Timeouts
  rpcTimeoutMs: number;
  syncTimeoutMs: number;

  // Metrics (disabled when unset)
  metricsPort?: number;

  // Logging
  logLevel: LogLevel;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  return {
    portSeed: env.PORT_SEED ? parseInt(env.PORT_SEED, 10) : null,
    numNodes: parseInt(env.NUM_NODES ?? '2', 10),
    datadirRoot: env.DATADIR_ROOT ?? './.harness',
    rpcHost: env.RPC_HOST || undefined,
    rpcTimeoutMs: parseInt(env.RPC_TIMEOUT_MS ?? '30000', 10),
    syncTimeoutMs: parseInt(env.SYNC_TIMEOUT_MS ?? '60000', 10),
    metricsPort: env.METRICS_PORT ? parseInt(env.METRICS_PORT, 10) : undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

export type EndpointFactory = (nodeIndex: number, network: TestNetwork) => NodeEndpoint;

// =============================================================================
// TEST NETWORK
// =============================================================================

export class TestNetwork {
  readonly runId: string;
  readonly ports: PortAllocator;
  readonly logger: Logger;
  private config: HarnessConfig;
  private createEndpoint: EndpointFactory;
  private endpoints: NodeEndpoint[] = [];
  private metricsServer?: Server;

  constructor(config: HarnessConfig, createEndpoint?: EndpointFactory) {
    if (!Number.isInteger(config.numNodes) || config.numNodes < 1 || config.numNodes > MAX_NODES) {
      throw new InvalidConfigError('numNodes', config.numNodes, `an integer in [1, ${MAX_NODES}]`);
    }
    this.config = config;
    this.runId = uuidv4();
    this.ports =
      config.portSeed === null ? PortAllocator.forProcess() : new PortAllocator(config.portSeed);
    this.logger = createLogger({ level: config.logLevel, service: 'ledger-harness' }).child({
      runId: this.runId,
    });
    this.createEndpoint = createEndpoint ?? defaultEndpointFactory;
  }

  get nodes(): readonly NodeEndpoint[] {
    return this.endpoints;
  }

  node(index: number): NodeEndpoint {
    const endpoint = this.endpoints[index];
    if (endpoint === undefined) {
      throw new InvalidNodeIndexError(index, this.endpoints.length);
    }
    return endpoint;
  }

  datadir(nodeIndex: number): string {
    return getDatadirPath(this.config.datadirRoot, nodeIndex);
  }

  rpcUrl(nodeIndex: number): string {
    return rpcUrl(nodeIndex, this.ports, this.config.rpcHost);
  }

  get rpcTimeoutMs(): number {
    return this.config.rpcTimeoutMs;
  }

  /**
   * Write every node's config file. Returns the data directories.
   */
  initializeDatadirs(): string[] {
    const dirs: string[] = [];
    for (let i = 0; i < this.config.numNodes; i++) {
      dirs.push(initializeDatadir(this.config.datadirRoot, i, this.ports));
    }
    this.logger.info({ root: this.config.datadirRoot, seed: this.ports.seed }, 'Data directories initialized');
    return dirs;
  }

  /**
   * Build the endpoints and start the metrics server (when configured).
   * Idempotent; a failed attach leaves nothing half-built and can be retried.
   */
  async attach(): Promise<readonly NodeEndpoint[]> {
    if (this.endpoints.length === 0) {
      const endpoints: NodeEndpoint[] = [];
      for (let i = 0; i < this.config.numNodes; i++) {
        endpoints.push(this.createEndpoint(i, this));
      }
      this.endpoints = endpoints;
      this.logger.info(
        { nodes: endpoints.length, seed: this.ports.seed, p2pBase: this.ports.p2pPort(0), rpcBase: this.ports.rpcPort(0) },
        'Attached to nodes'
      );
    }

    const metricsPort = this.config.metricsPort;
    if (metricsPort !== undefined && !this.metricsServer) {
      try {
        this.metricsServer = await startMetricsServer(metricsPort);
      } catch (err) {
        this.logger.error({ port: metricsPort, error: describeError(err) }, 'Metrics server failed to start');
        throw err;
      }
      this.logger.info({ port: metricsPort }, 'Metrics server started');
    }
    return this.endpoints;
  }

  async connectChain(): Promise<void> {
    await connectChain(this.endpoints, this.ports, { logger: this.logger });
  }

  async syncAll(): Promise<void> {
    await syncAll(this.endpoints, { timeoutMs: this.config.syncTimeoutMs, logger: this.logger });
  }

  /**
   * Unpublished contract bound to `nodeIndex`; writes a fresh artifact when
   * no path is given.
   */
  newContract(nodeIndex = 0, artifactPath?: string): Contract {
    return new Contract({
      endpoint: this.node(nodeIndex),
      artifactPath: artifactPath ?? writeContractArtifact(),
      logger: this.logger,
    });
  }

  async stop(): Promise<void> {
    const server = this.metricsServer;
    this.metricsServer = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    this.logger.info({}, 'Test network stopped');
  }
}

const defaultEndpointFactory: EndpointFactory = (nodeIndex, network) =>
  new JsonRpcEndpoint({
    index: nodeIndex,
    url: network.rpcUrl(nodeIndex),
    credentials: getAuthCookie(network.datadir(nodeIndex)),
    timeoutMs: network.rpcTimeoutMs,
  });
