/**
 * Caller — a bound handle for one contract function.
 *
 * Sender resolution per call:
 *   1. `sender` option
 *   2. a fresh address from `execEndpoint` (only when one is given)
 *   3. the caller's default sender (the contract publisher)
 */

import { describeError } from '../errors/index.js';
import { trackContractCall } from '../metrics/index.js';
import type { ContractArg, NodeEndpoint } from '../rpc/types.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { CallResult } from './call-result.js';

export const MIN_RANDOM_AMOUNT = 1;
export const MAX_RANDOM_AMOUNT = 10_000;

export interface CallOptions {
  sender?: string;
  /** Value sent with the call. Defaults to a random amount in [1, 10000] to vary load. */
  amount?: number;
  /** Rethrow the node's error instead of capturing it (default: true). */
  throwOnError?: boolean;
  broadcast?: boolean;
  /** Run the call on another node instead of the one the contract is bound to. */
  execEndpoint?: NodeEndpoint;
  /** Log call parameters at info level instead of debug. */
  debug?: boolean;
}

export interface CallerConfig {
  endpoint: NodeEndpoint;
  functionName: string;
  contractAddress: string;
  defaultSender: string;
  debug?: boolean;
  logger?: Logger;
}

export class Caller {
  readonly endpoint: NodeEndpoint;
  readonly functionName: string;
  readonly contractAddress: string;
  readonly defaultSender: string;
  private debug: boolean;
  private logger: Logger;
  private _lastSender: string | null = null;

  constructor(config: CallerConfig) {
    this.endpoint = config.endpoint;
    this.functionName = config.functionName;
    this.contractAddress = config.contractAddress;
    this.defaultSender = config.defaultSender;
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? defaultLogger;
  }

  /** Sender used by the most recent call, or null before the first one. */
  get lastSender(): string | null {
    return this._lastSender;
  }

  async call(args: readonly ContractArg[] = [], options: CallOptions = {}): Promise<CallResult> {
    const throwOnError = options.throwOnError ?? true;
    const broadcast = options.broadcast ?? true;
    const amount = options.amount ?? randomAmount();
    const target = options.execEndpoint ?? this.endpoint;

    try {
      const sender = await this.resolveSender(options);
      this._lastSender = sender;

      const context = {
        contract: this.contractAddress,
        fn: this.functionName,
        sender,
        amount,
        args,
        node: target.index,
      };
      if (options.debug ?? this.debug) {
        this.logger.info(context, 'Calling contract');
      } else {
        this.logger.debug(context, 'Calling contract');
      }

      const payload = await target.callContract(
        broadcast,
        amount,
        this.contractAddress,
        sender,
        this.functionName,
        args
      );
      trackContractCall('success');
      return CallResult.success(payload);
    } catch (err) {
      trackContractCall('failure');
      if (throwOnError) {
        throw err;
      }
      this.logger.warn({ fn: this.functionName, error: describeError(err) }, 'Contract call failed');
      return CallResult.failure(String(err));
    }
  }

  private async resolveSender(options: CallOptions): Promise<string> {
    if (options.sender) return options.sender;
    if (options.execEndpoint) return options.execEndpoint.getNewAddress();
    return this.defaultSender;
  }
}

export function randomAmount(): number {
  return MIN_RANDOM_AMOUNT + Math.floor(Math.random() * (MAX_RANDOM_AMOUNT - MIN_RANDOM_AMOUNT + 1));
}
