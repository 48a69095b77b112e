/**
 * Peer Link Manager
 *
 * Connects and disconnects test nodes over p2p, then waits until each node's
 * own peer list reflects the change.
 */

import {
  ConvergenceTimeoutError,
  DisconnectTimeoutError,
  HalfLinkedError,
  InvalidNodeIndexError,
} from '../errors/index.js';
import { trackConvergenceFailure } from '../metrics/index.js';
import type { PortAllocator } from '../ports/allocator.js';
import type { NodeEndpoint, PeerInfo } from '../rpc/types.js';
import { waitUntil } from '../sync/poller.js';
import { defaultLogger, type Logger } from '../utils/logger.js';

const LINK_POLL_INTERVAL_MS = 100;
const DISCONNECT_ATTEMPTS = 50;

const PEER_IDENTITY = /testnode(\d+)/;

/** User-agent tag a test node advertises (nodes are started with -uacomment=testnode<N>). */
export function peerIdentity(nodeIndex: number): string {
  return `testnode${nodeIndex}`;
}

export function matchesPeer(peer: PeerInfo, nodeIndex: number): boolean {
  const match = PEER_IDENTITY.exec(peer.subver);
  return match !== null && parseInt(match[1], 10) === nodeIndex;
}

export interface LinkOptions {
  logger?: Logger;
}

/**
 * Ask `from` to connect to node `toIndex`, then wait for every peer of
 * `from` to finish the version handshake, so that relay tests do not race it.
 */
export async function connectNodes(
  from: NodeEndpoint,
  toIndex: number,
  ports: PortAllocator,
  options: LinkOptions = {}
): Promise<void> {
  const logger = options.logger ?? defaultLogger;
  const address = ports.peerAddress(toIndex);
  logger.debug({ from: from.index, to: toIndex, address }, 'Connecting nodes');

  await from.addNode(address, 'onetry');

  await waitUntil(
    async () => (await from.getPeerInfo()).every((peer) => peer.version !== 0),
    { intervalMs: LINK_POLL_INTERVAL_MS, check: 'peer_handshake' }
  );
}

/**
 * Drop every connection `from` has to node `nodeIndex` and wait until they
 * are gone (50 × 100ms).
 */
export async function disconnectNodes(
  from: NodeEndpoint,
  nodeIndex: number,
  options: LinkOptions = {}
): Promise<void> {
  const logger = options.logger ?? defaultLogger;
  const peerIds = (await from.getPeerInfo())
    .filter((peer) => matchesPeer(peer, nodeIndex))
    .map((peer) => peer.id);
  logger.debug({ from: from.index, to: nodeIndex, peerIds }, 'Disconnecting nodes');

  for (const peerId of peerIds) {
    await from.disconnectNode(peerId);
  }

  let remaining: number[] = [];
  try {
    await waitUntil(
      async () => {
        remaining = (await from.getPeerInfo())
          .filter((peer) => matchesPeer(peer, nodeIndex))
          .map((peer) => peer.id);
        return remaining.length === 0;
      },
      { attempts: DISCONNECT_ATTEMPTS, intervalMs: LINK_POLL_INTERVAL_MS, check: 'peer_disconnect' }
    );
  } catch (err) {
    if (err instanceof ConvergenceTimeoutError) {
      trackConvergenceFailure('peer_disconnect', 'disconnect');
      throw new DisconnectTimeoutError(nodeIndex, remaining, { cause: err });
    }
    throw err;
  }
}

/**
 * Connect `a` and `b` in both directions. When the second direction fails the
 * error names the direction that is already up.
 */
export async function connectNodesBi(
  nodes: readonly NodeEndpoint[],
  a: number,
  b: number,
  ports: PortAllocator,
  options: LinkOptions = {}
): Promise<void> {
  const nodeA = nodeAt(nodes, a);
  const nodeB = nodeAt(nodes, b);
  await connectNodes(nodeA, b, ports, options);
  try {
    await connectNodes(nodeB, a, ports, options);
  } catch (err) {
    (options.logger ?? defaultLogger).warn({ a, b, error: err }, 'Bidirectional connect left half-linked');
    throw new HalfLinkedError([a, b], [b, a], err);
  }
}

/**
 * Link every neighbour pair (0↔1, 1↔2, …): the default test topology.
 */
export async function connectChain(
  nodes: readonly NodeEndpoint[],
  ports: PortAllocator,
  options: LinkOptions = {}
): Promise<void> {
  for (let i = 0; i + 1 < nodes.length; i++) {
    await connectNodesBi(nodes, i, i + 1, ports, options);
  }
}

function nodeAt(nodes: readonly NodeEndpoint[], index: number): NodeEndpoint {
  const node = nodes[index];
  if (node === undefined) {
    throw new InvalidNodeIndexError(index, nodes.length);
  }
  return node;
}
