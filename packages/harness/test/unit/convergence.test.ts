/**
 * Convergence Checks — Unit Tests
 *
 * Tests for:
 *   - syncBlocks: common tip, lagging node, fork, timeout, RPC failure
 *   - syncChain: best hash agreement
 *   - syncMempools: set equality regardless of order
 *   - syncAll
 */

import { describe, it, expect } from 'vitest';
import { syncAll, syncBlocks, syncChain, syncMempools } from '../../src/sync/convergence.js';
import {
  ConvergenceTimeoutError,
  DivergentChainStateError,
  RpcError,
} from '../../src/errors/index.js';
import { FakeNode, fakeNetwork } from '../helpers/fake-node.js';

const FAST = { waitMs: 1, timeoutMs: 2_000 };

// =============================================================================
// syncBlocks
// =============================================================================

describe('syncBlocks', () => {
  it('returns after one round when every node is on the same tip', async () => {
    const nodes = fakeNetwork([
      { height: 5, hash: 'h5' },
      { height: 5, hash: 'h5' },
      { height: 5, hash: 'h5' },
    ]);

    await syncBlocks(nodes, FAST);

    for (const node of nodes) {
      expect(node.count('getblockcount')).toBe(1);
      expect(node.count('waitforblockheight')).toBe(1);
      expect(node.waitTargets).toEqual([5]);
    }
  });

  it('waits for lagging nodes to reach the highest reported height', async () => {
    const nodes = fakeNetwork([
      { height: 5, hash: 'h5' },
      { height: 5, hash: 'h5' },
      { height: 6, hash: 'h6' },
    ]);
    for (const node of nodes.slice(0, 2)) {
      node.onQuery = (method, count, self) => {
        if (method === 'waitforblockheight' && count === 2) {
          self.tip = { height: 6, hash: 'h6' };
        }
      };
    }

    await syncBlocks(nodes, FAST);

    expect(nodes[0].count('waitforblockheight')).toBe(2);
    expect(nodes[0].waitTargets).toEqual([6, 6]);
    expect(nodes[2].count('waitforblockheight')).toBe(2);
  });

  it('fails immediately on a fork at the same height', async () => {
    const nodes = fakeNetwork([
      { height: 5, hash: 'aaa' },
      { height: 5, hash: 'bbb' },
    ]);

    const err = await syncBlocks(nodes, FAST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DivergentChainStateError);
    if (err instanceof DivergentChainStateError) {
      expect(err.tips).toEqual([
        { node: 0, height: 5, hash: 'aaa' },
        { node: 1, height: 5, hash: 'bbb' },
      ]);
      expect(err.message).toBe(
        'Block sync failed, mismatched block hashes:\n  node0: height=5 hash=aaa\n  node1: height=5 hash=bbb'
      );
    }
    expect(nodes[0].count('waitforblockheight')).toBe(1);
    expect(nodes[1].count('waitforblockheight')).toBe(1);
  });

  it('times out with the target height and last tips when a node never catches up', async () => {
    const nodes = fakeNetwork([
      { height: 5, hash: 'h5' },
      { height: 4, hash: 'h4' },
    ]);

    const err = await syncBlocks(nodes, { waitMs: 1, timeoutMs: 200 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConvergenceTimeoutError);
    if (err instanceof ConvergenceTimeoutError) {
      expect(err.check).toBe('sync_blocks');
      expect(err.bound).toBe('timeout');
      expect(err.observed).toEqual({
        targetHeight: 5,
        tips: [
          { node: 0, height: 5, hash: 'h5' },
          { node: 1, height: 4, hash: 'h4' },
        ],
      });
    }
  });

  it('propagates an RPC failure without retrying', async () => {
    const nodes = fakeNetwork([
      { height: 5, hash: 'h5' },
      { height: 5, hash: 'h5' },
    ]);
    const failure = new RpcError('waitforblockheight', { code: -28, message: 'Loading block index' });
    nodes[1].failures.set('waitforblockheight', failure);

    await expect(syncBlocks(nodes, FAST)).rejects.toBe(failure);
    expect(nodes[0].count('waitforblockheight')).toBe(1);
    expect(nodes[1].count('waitforblockheight')).toBe(1);
  });

  it('does nothing for an empty node list', async () => {
    await expect(syncBlocks([], FAST)).resolves.toBeUndefined();
  });
});

// =============================================================================
// syncChain
// =============================================================================

describe('syncChain', () => {
  it('polls until best block hashes agree', async () => {
    const nodes = fakeNetwork([
      { height: 3, hash: 'h3' },
      { height: 2, hash: 'h2' },
    ]);
    nodes[1].onQuery = (method, count, self) => {
      if (method === 'getbestblockhash' && count === 2) {
        self.tip = { height: 3, hash: 'h3' };
      }
    };

    await syncChain(nodes, FAST);

    expect(nodes[0].count('getbestblockhash')).toBe(2);
    expect(nodes[1].count('getbestblockhash')).toBe(2);
  });

  it('times out when hashes never agree', async () => {
    const nodes = fakeNetwork([
      { height: 3, hash: 'h3' },
      { height: 3, hash: 'other' },
    ]);

    const err = await syncChain(nodes, { waitMs: 5, timeoutMs: 50 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConvergenceTimeoutError);
    if (err instanceof ConvergenceTimeoutError) {
      expect(err.check).toBe('sync_chain');
      expect(err.observed).toEqual([
        { node: 0, hash: 'h3' },
        { node: 1, hash: 'other' },
      ]);
    }
  });
});

// =============================================================================
// syncMempools
// =============================================================================

describe('syncMempools', () => {
  it('waits until every pool holds the same transactions', async () => {
    const [a, b] = [new FakeNode(0), new FakeNode(1)];
    a.mempool = ['tx-a', 'tx-b'];
    b.mempool = ['tx-a', 'tx-b', 'tx-c'];
    a.onQuery = (method, count, self) => {
      if (method === 'getrawmempool' && count === 3) {
        self.mempool.push('tx-c');
      }
    };

    await syncMempools([a, b], FAST);

    expect(a.count('getrawmempool')).toBe(3);
    expect(b.count('getrawmempool')).toBe(3);
  });

  it('ignores transaction order', async () => {
    const [a, b] = [new FakeNode(0), new FakeNode(1)];
    a.mempool = ['tx-1', 'tx-2'];
    b.mempool = ['tx-2', 'tx-1'];

    await syncMempools([a, b], FAST);

    expect(a.count('getrawmempool')).toBe(1);
  });

  it('times out while pools differ', async () => {
    const [a, b] = [new FakeNode(0), new FakeNode(1)];
    a.mempool = ['tx-1'];

    await expect(syncMempools([a, b], { waitMs: 5, timeoutMs: 50 })).rejects.toBeInstanceOf(
      ConvergenceTimeoutError
    );
  });
});

describe('syncAll', () => {
  it('syncs tips and then mempools', async () => {
    const nodes = fakeNetwork([
      { height: 7, hash: 'h7' },
      { height: 7, hash: 'h7' },
    ]);
    const order: string[] = [];
    nodes[0].onQuery = (method) => order.push(method);
    for (const node of nodes) node.mempool = ['tx-1'];

    await syncAll(nodes, FAST);

    expect(order).toEqual(['getblockcount', 'waitforblockheight', 'getrawmempool']);
    expect(nodes[1].count('getrawmempool')).toBe(1);
  });
});
