/**
 * JSON-RPC Endpoint
 *
 * Talks JSON-RPC 1.0 over HTTP (basic auth) to one node, using ethers'
 * FetchRequest as the transport. Node-side errors surface as RpcError with
 * the node's own code and message; anything unparseable is RpcResponseError.
 */

import { FetchRequest, type FetchGetUrlFunc } from 'ethers';
import { RpcError, RpcResponseError } from '../errors/index.js';
import {
  expectNumber,
  expectRecord,
  expectString,
  expectStringArray,
  isRecord,
  isRpcErrorObject,
  parseChainTip,
  parsePeerInfo,
  parsePublishResult,
} from './guards.js';
import type {
  AddNodeCommand,
  CallContractPayload,
  ChainTip,
  ContractArg,
  NodeEndpoint,
  PeerInfo,
  PublishContractResult,
} from './types.js';

export interface RpcCredentials {
  user: string;
  password: string;
}

export interface JsonRpcEndpointConfig {
  index: number;
  /** Base URL without credentials, e.g. http://127.0.0.1:16001 */
  url: string;
  credentials?: RpcCredentials;
  /** Per-request timeout owned by the transport (default: 30s). */
  timeoutMs?: number;
  /** Replaces the HTTP layer; used to run the client against an in-process stub. */
  getUrl?: FetchGetUrlFunc;
}

const DEFAULT_RPC_TIMEOUT_MS = 30_000;

export class JsonRpcEndpoint implements NodeEndpoint {
  readonly index: number;
  readonly url: string;
  private credentials?: RpcCredentials;
  private timeoutMs: number;
  private getUrl?: FetchGetUrlFunc;
  private nextId = 1;

  constructor(config: JsonRpcEndpointConfig) {
    this.index = config.index;
    this.url = config.url;
    this.credentials = config.credentials;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.getUrl = config.getUrl;
  }

  /**
   * Send one request and return the raw `result` field.
   */
  async request(method: string, params: readonly unknown[] = []): Promise<unknown> {
    const req = new FetchRequest(this.url);
    req.method = 'POST';
    req.body = { jsonrpc: '1.0', id: this.nextId++, method, params };
    req.timeout = this.timeoutMs;
    if (this.credentials) {
      // Test nodes listen on loopback over plain HTTP
      req.allowInsecureAuthentication = true;
      req.setCredentials(this.credentials.user, this.credentials.password);
    }
    if (this.getUrl) {
      req.getUrlFunc = this.getUrl;
    }

    const resp = await req.send();

    let body: unknown;
    try {
      body = resp.bodyJson;
    } catch (err) {
      throw new RpcResponseError(method, `HTTP ${resp.statusCode} with non-JSON body`, { cause: err });
    }
    if (!isRecord(body)) {
      throw new RpcResponseError(method, 'response is not a JSON object');
    }

    // Nodes answer RPC errors with HTTP 500 and a structured error; check it first
    if (body.error !== null && body.error !== undefined) {
      if (isRpcErrorObject(body.error)) {
        throw new RpcError(method, body.error);
      }
      throw new RpcResponseError(method, `malformed error ${JSON.stringify(body.error)}`);
    }
    if (resp.statusCode < 200 || resp.statusCode >= 300) {
      throw new RpcResponseError(method, `HTTP ${resp.statusCode} ${resp.statusMessage}`);
    }
    return body.result;
  }

  async getBlockCount(): Promise<number> {
    return expectNumber('getblockcount', await this.request('getblockcount'));
  }

  async waitForBlockHeight(height: number, timeoutMs: number): Promise<ChainTip> {
    return parseChainTip(
      'waitforblockheight',
      await this.request('waitforblockheight', [height, timeoutMs])
    );
  }

  async getBestBlockHash(): Promise<string> {
    return expectString('getbestblockhash', await this.request('getbestblockhash'));
  }

  async getRawMempool(): Promise<string[]> {
    return expectStringArray('getrawmempool', await this.request('getrawmempool'));
  }

  async getPeerInfo(): Promise<PeerInfo[]> {
    return parsePeerInfo('getpeerinfo', await this.request('getpeerinfo'));
  }

  async addNode(address: string, command: AddNodeCommand): Promise<void> {
    await this.request('addnode', [address, command]);
  }

  async disconnectNode(peerId: number): Promise<void> {
    // Positional form: empty address selects by node id
    await this.request('disconnectnode', ['', peerId]);
  }

  async getNewAddress(): Promise<string> {
    return expectString('getnewaddress', await this.request('getnewaddress'));
  }

  async publishContract(artifactPath: string): Promise<PublishContractResult> {
    return parsePublishResult('publishcontract', await this.request('publishcontract', [artifactPath]));
  }

  async callContract(
    broadcast: boolean,
    amount: number,
    contractAddress: string,
    sender: string,
    functionName: string,
    args: readonly ContractArg[]
  ): Promise<CallContractPayload> {
    const result = await this.request('callcontract', [
      broadcast,
      amount,
      contractAddress,
      sender,
      functionName,
      ...args,
    ]);
    return expectRecord('callcontract', result);
  }

  async getBalanceOf(contractAddress: string): Promise<number> {
    return expectNumber('getbalanceof', await this.request('getbalanceof', [contractAddress]));
  }
}
