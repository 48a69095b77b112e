export type {
  AddNodeCommand,
  CallContractPayload,
  ChainTip,
  ContractArg,
  NodeEndpoint,
  PeerInfo,
  PublishContractResult,
} from './types.js';

export type { JsonRpcEndpointConfig, RpcCredentials } from './json-rpc-endpoint.js';
export { JsonRpcEndpoint } from './json-rpc-endpoint.js';

export { tryRpc, assertRpcError } from './expect-error.js';
