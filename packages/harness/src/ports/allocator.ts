/**
 * Port Allocator
 *
 * Every test process gets its own p2p/RPC port window, shifted by a seed, so
 * that several harness runs can share one host.
 *
 *   p2pPort(i) = PORT_MIN + i + (MAX_NODES * seed) mod (PORT_RANGE - 1 - MAX_NODES)
 *   rpcPort(i) = p2pPort(i) + PORT_RANGE
 *
 * Within [0, PORT_SEED_LIMIT) distinct seeds always give distinct ports for
 * the same node index, because MAX_NODES is invertible modulo 4991. Windows of
 * two seeds can still overlap (seed 0 and seed 624 start one port apart), so
 * collision avoidance across processes is probabilistic, not guaranteed.
 */

import { InvalidNodeIndexError, InvalidPortSeedError } from '../errors/index.js';

/** Most nodes a single test may run. */
export const MAX_NODES = 8;
/** No p2p or RPC port is assigned below this. */
export const PORT_MIN = 11000;
/** Ports reserved for each class (p2p, RPC). */
export const PORT_RANGE = 5000;
/** Seeds must lie in [0, PORT_SEED_LIMIT); `forProcess` reduces the pid modulo this. */
export const PORT_SEED_LIMIT = PORT_RANGE - 1 - MAX_NODES;

export class PortAllocator {
  readonly seed: number;
  private readonly offset: number;

  constructor(seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed >= PORT_SEED_LIMIT) {
      throw new InvalidPortSeedError(seed, PORT_SEED_LIMIT);
    }
    this.seed = seed;
    this.offset = (MAX_NODES * seed) % PORT_SEED_LIMIT;
  }

  /**
   * Seed from the process id, so concurrent test processes spread out.
   */
  static forProcess(pid: number = process.pid): PortAllocator {
    return new PortAllocator(pid % PORT_SEED_LIMIT);
  }

  p2pPort(nodeIndex: number): number {
    assertNodeIndex(nodeIndex);
    return PORT_MIN + nodeIndex + this.offset;
  }

  rpcPort(nodeIndex: number): number {
    assertNodeIndex(nodeIndex);
    return PORT_MIN + PORT_RANGE + nodeIndex + this.offset;
  }

  /** Loopback address other nodes use to reach `nodeIndex` over p2p. */
  peerAddress(nodeIndex: number): string {
    return `127.0.0.1:${this.p2pPort(nodeIndex)}`;
  }
}

export function assertNodeIndex(nodeIndex: number): void {
  if (!Number.isInteger(nodeIndex) || nodeIndex < 0 || nodeIndex >= MAX_NODES) {
    throw new InvalidNodeIndexError(nodeIndex, MAX_NODES);
  }
}
