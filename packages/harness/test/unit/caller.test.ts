/**
 * Call Dispatcher — Unit Tests
 *
 * Tests for:
 *   - argument forwarding and defaults
 *   - sender resolution (override, exec endpoint, publisher)
 *   - error capture vs. rethrow
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { Contract } from '../../src/contracts/contract.js';
import { MAX_RANDOM_AMOUNT, MIN_RANDOM_AMOUNT, randomAmount, type Caller } from '../../src/contracts/caller.js';
import { RpcError } from '../../src/errors/index.js';
import { FakeNode } from '../helpers/fake-node.js';

let node: FakeNode;
let caller: Caller;

beforeEach(async () => {
  node = new FakeNode(0);
  const contract = new Contract({ endpoint: node, artifactPath: '/tmp/contract.lua' });
  await contract.publish();
  caller = contract.caller('updateContract');
});

// =============================================================================
// REQUEST
// =============================================================================

describe('Caller.call request', () => {
  it('forwards arguments in order with broadcast on and a random amount', async () => {
    await caller.call(['key', 5, true, null]);

    expect(node.calls).toHaveLength(1);
    const call = node.calls[0];
    expect(call.broadcast).toBe(true);
    expect(call.contractAddress).toBe('contract-0-1');
    expect(call.functionName).toBe('updateContract');
    expect(call.args).toEqual(['key', 5, true, null]);
    expect(call.amount).toBeGreaterThanOrEqual(MIN_RANDOM_AMOUNT);
    expect(call.amount).toBeLessThanOrEqual(MAX_RANDOM_AMOUNT);
    expect(Number.isInteger(call.amount)).toBe(true);
  });

  it('uses an explicit amount and broadcast flag', async () => {
    await caller.call([], { amount: 10, broadcast: false });

    expect(node.calls[0].amount).toBe(10);
    expect(node.calls[0].broadcast).toBe(false);
  });

  it('draws random amounts inside [1, 10000]', () => {
    for (let i = 0; i < 200; i++) {
      const amount = randomAmount();
      expect(amount).toBeGreaterThanOrEqual(1);
      expect(amount).toBeLessThanOrEqual(10_000);
    }
  });
});

// =============================================================================
// SENDER
// =============================================================================

describe('Caller.call sender', () => {
  it('defaults to the publisher', async () => {
    expect(caller.lastSender).toBeNull();

    await caller.call();

    expect(node.calls[0].sender).toBe('publisher-0');
    expect(caller.lastSender).toBe('publisher-0');
  });

  it('does not keep an override for later calls', async () => {
    await caller.call([], { sender: 'alice' });
    await caller.call();

    expect(node.calls.map((c) => c.sender)).toEqual(['alice', 'publisher-0']);
    expect(caller.lastSender).toBe('publisher-0');
  });

  it('runs on the exec endpoint with a fresh address from it', async () => {
    const other = new FakeNode(1);

    await caller.call(['x'], { execEndpoint: other });

    expect(node.calls).toHaveLength(0);
    expect(other.calls).toHaveLength(1);
    expect(other.calls[0].sender).toBe('addr-1-1');
    expect(other.calls[0].contractAddress).toBe('contract-0-1');
    expect(caller.lastSender).toBe('addr-1-1');
  });

  it('prefers an explicit sender over a fresh exec endpoint address', async () => {
    const other = new FakeNode(1);

    await caller.call([], { execEndpoint: other, sender: 'bob' });

    expect(other.calls[0].sender).toBe('bob');
    expect(other.count('getnewaddress')).toBe(0);
  });
});

// =============================================================================
// RESULT
// =============================================================================

describe('Caller.call result', () => {
  it('wraps the node response as a success', async () => {
    const result = await caller.call();

    expect(result.ok).toBe(true);
    expect(result.reason()).toBeUndefined();
    expect(result.get('txid')).toBe('call-updateContract');
    expect(result.has('ret')).toBe(true);
  });

  it('rethrows node errors by default', async () => {
    const failure = new RpcError('callcontract', { code: -1, message: 'Contract run fail' });
    node.callHandler = async () => {
      throw failure;
    };

    await expect(caller.call()).rejects.toBe(failure);
  });

  it('captures the error as a failure when throwOnError is false', async () => {
    node.callHandler = async () => {
      throw new RpcError('callcontract', { code: -1, message: 'Contract run fail' });
    };

    const result = await caller.call(['bad'], { throwOnError: false });

    expect(result.ok).toBe(false);
    expect(result.reason()).toBe('RpcError: Contract run fail (-1)');
    expect(result.payload).toEqual({});
    expect(result.has('txid')).toBe(false);
  });
});
