/**
 * Response shape checks for the JSON-RPC client.
 *
 * Nodes return loosely typed JSON; each helper narrows one shape or throws
 * RpcResponseError naming the method that produced it.
 */

import { RpcResponseError } from '../errors/index.js';
import type { ChainTip, PeerInfo, PublishContractResult } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRpcErrorObject(value: unknown): value is { code: number; message: string } {
  return isRecord(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

export function expectNumber(method: string, value: unknown): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RpcResponseError(method, `expected a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

export function expectString(method: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new RpcResponseError(method, `expected a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

export function expectStringArray(method: string, value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new RpcResponseError(method, 'expected an array');
  }
  return value.map((item) => expectString(method, item));
}

export function expectRecord(method: string, value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new RpcResponseError(method, `expected an object, got ${JSON.stringify(value)}`);
  }
  return value;
}

export function parseChainTip(method: string, value: unknown): ChainTip {
  const tip = expectRecord(method, value);
  return {
    height: expectNumber(method, tip.height),
    hash: expectString(method, tip.hash),
  };
}

export function parsePeerInfo(method: string, value: unknown): PeerInfo[] {
  if (!Array.isArray(value)) {
    throw new RpcResponseError(method, 'expected an array of peers');
  }
  return value.map((entry) => {
    const peer = expectRecord(method, entry);
    return {
      id: expectNumber(method, peer.id),
      addr: typeof peer.addr === 'string' ? peer.addr : '',
      version: expectNumber(method, peer.version),
      subver: typeof peer.subver === 'string' ? peer.subver : '',
    };
  });
}

export function parsePublishResult(method: string, value: unknown): PublishContractResult {
  const result = expectRecord(method, value);
  return {
    contractaddress: expectString(method, result.contractaddress),
    senderaddress: expectString(method, result.senderaddress),
    txid: expectString(method, result.txid),
  };
}
