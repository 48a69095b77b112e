/**
 * Node RPC Boundary
 *
 * The harness never looks inside a node. Everything it knows arrives through
 * this interface, one request/response at a time.
 */

// =============================================================================
// PAYLOADS
// =============================================================================

export interface ChainTip {
  height: number;
  hash: string;
}

export interface PeerInfo {
  id: number;
  addr: string;
  /** Negotiated protocol version; 0 until the version handshake completes. */
  version: number;
  subver: string;
}

export type AddNodeCommand = 'add' | 'remove' | 'onetry';

export interface PublishContractResult {
  contractaddress: string;
  senderaddress: string;
  txid: string;
}

/** Arguments are forwarded to the node untouched. */
export type ContractArg = string | number | boolean | null;

/** Whatever the node returns for a contract call, passed through as-is. */
export type CallContractPayload = Record<string, unknown>;

// =============================================================================
// ENDPOINT
// =============================================================================

export interface NodeEndpoint {
  /** Position of the node in the test network (drives ports and peer identity). */
  readonly index: number;

  getBlockCount(): Promise<number>;

  /**
   * Block until the node reaches `height` or `timeoutMs` passes; returns the
   * node's tip at that moment either way.
   */
  waitForBlockHeight(height: number, timeoutMs: number): Promise<ChainTip>;

  getBestBlockHash(): Promise<string>;

  getRawMempool(): Promise<string[]>;

  getPeerInfo(): Promise<PeerInfo[]>;

  addNode(address: string, command: AddNodeCommand): Promise<void>;

  disconnectNode(peerId: number): Promise<void>;

  getNewAddress(): Promise<string>;

  publishContract(artifactPath: string): Promise<PublishContractResult>;

  callContract(
    broadcast: boolean,
    amount: number,
    contractAddress: string,
    sender: string,
    functionName: string,
    args: readonly ContractArg[]
  ): Promise<CallContractPayload>;

  getBalanceOf(contractAddress: string): Promise<number>;
}
