/**
 * Expected-RPC-failure helpers for test code.
 */

import { RpcError, RpcExpectationError } from '../errors/index.js';

/**
 * Run `fn` and report whether it failed with an RpcError.
 *
 * When it does, `code` (if given) must equal the node's error code and
 * `message` (if given) must be a substring of the node's message. Any other
 * thrown value is an unexpected failure.
 */
export async function tryRpc(
  code: number | null,
  message: string | null,
  fn: () => Promise<unknown>
): Promise<boolean> {
  try {
    await fn();
  } catch (err) {
    if (!(err instanceof RpcError)) {
      const name = err instanceof Error ? err.name : typeof err;
      throw new RpcExpectationError(`Unexpected exception raised: ${name}`, { cause: err });
    }
    if (code !== null && code !== err.rpcCode) {
      throw new RpcExpectationError(`Unexpected JSONRPC error code ${err.rpcCode}`, { cause: err });
    }
    if (message !== null && !err.rpcMessage.includes(message)) {
      throw new RpcExpectationError(`Expected substring not found: ${err.rpcMessage}`, { cause: err });
    }
    return true;
  }
  return false;
}

export async function assertRpcError(
  code: number | null,
  message: string | null,
  fn: () => Promise<unknown>
): Promise<void> {
  if (!(await tryRpc(code, message, fn))) {
    throw new RpcExpectationError('No exception raised');
  }
}
