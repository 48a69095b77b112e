/**
 * CallResult — Property Tests
 *
 * A result carries a payload or a reason, never both.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CallResult } from '../../src/contracts/call-result.js';
import { Contract } from '../../src/contracts/contract.js';
import { RpcError } from '../../src/errors/index.js';
import { FakeNode } from '../helpers/fake-node.js';

const payloadArb = fc.dictionary(
  fc.string().filter((key) => key !== '__proto__'),
  fc.jsonValue()
);

type NodeReply =
  | { kind: 'payload'; payload: Record<string, unknown> }
  | { kind: 'error'; code: number; message: string };

const replyArb: fc.Arbitrary<NodeReply> = fc.oneof(
  fc.record({
    kind: fc.constant('payload' as const),
    payload: fc.dictionary(
      fc.string().filter((key) => key !== '__proto__'),
      fc.jsonValue(),
      { minKeys: 1 }
    ),
  }),
  fc.record({
    kind: fc.constant('error' as const),
    code: fc.integer({ min: -32768, max: -1 }),
    message: fc.string(),
  })
);

describe('CallResult properties', () => {
  it('a success exposes exactly the node payload and no reason', () => {
    fc.assert(
      fc.property(payloadArb, (payload) => {
        const result = CallResult.success(payload);

        expect(result.ok).toBe(true);
        expect(result.reason()).toBeUndefined();
        expect(result.payload).toEqual(payload);
        expect(Object.isFrozen(result.payload)).toBe(true);
        for (const key of Object.keys(payload)) {
          expect(result.has(key)).toBe(true);
          expect(result.get(key)).toEqual(payload[key]);
        }
      }),
      { numRuns: 50 }
    );
  });

  it('a failure exposes exactly the reason and an empty payload', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (reason, field) => {
        const result = CallResult.failure(reason);

        expect(result.ok).toBe(false);
        expect(result.reason()).toBe(reason);
        expect(result.payload).toEqual({});
        expect(result.get(field)).toBeUndefined();
      }),
      { numRuns: 50 }
    );
  });

  it('Caller.call yields exactly one of a payload or a reason', async () => {
    await fc.assert(
      fc.asyncProperty(replyArb, async (reply) => {
        const node = new FakeNode(0);
        const contract = new Contract({ endpoint: node, artifactPath: '/tmp/contract.lua' });
        await contract.publish();
        node.callHandler = async () => {
          if (reply.kind === 'error') {
            throw new RpcError('callcontract', { code: reply.code, message: reply.message });
          }
          return reply.payload;
        };

        const result = await contract.caller('get').call([], { throwOnError: false });

        const hasPayload = result.ok && Object.keys(result.payload).length > 0;
        const hasReason = result.reason() !== undefined;
        expect(hasPayload).not.toBe(hasReason);

        if (reply.kind === 'payload') {
          expect(result.payload).toEqual(reply.payload);
          expect(result.reason()).toBeUndefined();
        } else {
          expect(result.ok).toBe(false);
          expect(result.payload).toEqual({});
          expect(result.reason()).toBe(`RpcError: ${reply.message} (${reply.code})`);
        }
      }),
      { numRuns: 50 }
    );
  });

  it('copies the payload so later changes to the source do not leak in', () => {
    const source: Record<string, unknown> = { txid: 'call-1' };
    const result = CallResult.success(source);

    source.txid = 'changed';

    expect(result.get('txid')).toBe('call-1');
  });
});
