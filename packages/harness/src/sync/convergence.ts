/**
 * Convergence checks.
 *
 * Each check polls every endpoint in the order given, completes the round,
 * and only then decides. A round that shows "not yet equal" is retried; a
 * fork or an RPC failure ends the check at once.
 */

import {
  ConvergenceTimeoutError,
  DivergentChainStateError,
  type ObservedTip,
} from '../errors/index.js';
import { trackConvergenceFailure } from '../metrics/index.js';
import type { NodeEndpoint } from '../rpc/types.js';
import { allEqual, sameMembers } from '../utils/compare.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_WAIT_TIMEOUT_MS, waitUntil } from './poller.js';

export interface SyncOptions {
  /**
   * Per-round budget: how long each node may block in waitforblockheight
   * (syncBlocks), or the sleep between rounds (syncChain, syncMempools).
   */
  waitMs?: number;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_ROUND_WAIT_MS = 1000;

/**
 * Wait until every node has the same tip.
 *
 * The target height is read with getblockcount rather than a blocking wait:
 * a node still catching up reports its active chain height sooner that way.
 * Call this with at least one node already on the stable tip, otherwise it can
 * return before the others settle.
 */
export async function syncBlocks(
  endpoints: readonly NodeEndpoint[],
  options: SyncOptions = {}
): Promise<void> {
  if (endpoints.length === 0) return;
  const waitMs = options.waitMs ?? DEFAULT_ROUND_WAIT_MS;
  const logger = options.logger ?? defaultLogger;

  const heights: number[] = [];
  for (const endpoint of endpoints) {
    heights.push(await endpoint.getBlockCount());
  }
  const maxHeight = Math.max(...heights);
  logger.info({ maxHeight, nodes: endpoints.length }, 'Syncing blocks');

  let tips: ObservedTip[] = [];
  await tracked('sync_blocks', () =>
    waitUntil(
      async () => {
        const round: ObservedTip[] = [];
        for (const endpoint of endpoints) {
          const tip = await endpoint.waitForBlockHeight(maxHeight, waitMs);
          round.push({ node: endpoint.index, height: tip.height, hash: tip.hash });
        }
        tips = round;

        if (!round.every((t) => t.height === maxHeight)) {
          return false;
        }
        if (allEqual(round.map((t) => t.hash))) {
          return true;
        }
        throw new DivergentChainStateError(round);
      },
      {
        timeoutMs: options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS,
        check: 'sync_blocks',
        observe: () => ({ targetHeight: maxHeight, tips }),
      }
    )
  );
}

/**
 * Wait until every node reports the same best block hash.
 */
export async function syncChain(
  endpoints: readonly NodeEndpoint[],
  options: SyncOptions = {}
): Promise<void> {
  let hashes: Array<{ node: number; hash: string }> = [];
  await tracked('sync_chain', () =>
    waitUntil(
      async () => {
        const round: Array<{ node: number; hash: string }> = [];
        for (const endpoint of endpoints) {
          round.push({ node: endpoint.index, hash: await endpoint.getBestBlockHash() });
        }
        hashes = round;
        return allEqual(round.map((h) => h.hash));
      },
      {
        timeoutMs: options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS,
        intervalMs: options.waitMs ?? DEFAULT_ROUND_WAIT_MS,
        check: 'sync_chain',
        observe: () => hashes,
      }
    )
  );
}

/**
 * Wait until every node holds the same set of mempool transaction ids.
 */
export async function syncMempools(
  endpoints: readonly NodeEndpoint[],
  options: SyncOptions = {}
): Promise<void> {
  let pools: Array<{ node: number; txids: string[] }> = [];
  await tracked('sync_mempools', () =>
    waitUntil(
      async () => {
        const round: Array<{ node: number; txids: string[] }> = [];
        for (const endpoint of endpoints) {
          round.push({ node: endpoint.index, txids: await endpoint.getRawMempool() });
        }
        pools = round;
        return round.every((p) => sameMembers(p.txids, round[0].txids));
      },
      {
        timeoutMs: options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS,
        intervalMs: options.waitMs ?? DEFAULT_ROUND_WAIT_MS,
        check: 'sync_mempools',
        observe: () => pools,
      }
    )
  );
}

/**
 * Tips first, then mempools.
 */
export async function syncAll(
  endpoints: readonly NodeEndpoint[],
  options: SyncOptions = {}
): Promise<void> {
  await syncBlocks(endpoints, options);
  await syncMempools(endpoints, options);
}

async function tracked(check: string, wait: () => Promise<void>): Promise<void> {
  try {
    await wait();
  } catch (err) {
    if (err instanceof DivergentChainStateError) {
      trackConvergenceFailure(check, 'divergent');
    } else if (err instanceof ConvergenceTimeoutError) {
      trackConvergenceFailure(check, 'timeout');
    }
    throw err;
  }
}
