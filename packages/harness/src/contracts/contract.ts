/**
 * Contract Lifecycle
 *
 * Unpublished --publish()--> Published
 *
 * Construction does no I/O. `publish()` sends exactly one publish request and
 * records address, publisher and txid together from that single response;
 * later calls return the same record. Nothing can be called until then.
 */

import { NotPublishedError, UnknownAttributeError } from '../errors/index.js';
import { trackContractPublished } from '../metrics/index.js';
import type { NodeEndpoint } from '../rpc/types.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { Caller } from './caller.js';

export interface ContractDeployment {
  readonly address: string;
  readonly publisher: string;
  readonly txid: string;
}

export interface ContractConfig {
  endpoint: NodeEndpoint;
  artifactPath: string;
  /** Passed to every Caller this contract hands out. */
  debug?: boolean;
  logger?: Logger;
}

const CALL_PREFIX = 'call_';

export class Contract {
  readonly endpoint: NodeEndpoint;
  readonly artifactPath: string;
  private debug: boolean;
  private logger: Logger;
  private deployment: ContractDeployment | null = null;
  private pending: Promise<ContractDeployment> | null = null;

  constructor(config: ContractConfig) {
    this.endpoint = config.endpoint;
    this.artifactPath = config.artifactPath;
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? defaultLogger;
  }

  get isPublished(): boolean {
    return this.deployment !== null;
  }

  get address(): string {
    return this.requireDeployment().address;
  }

  get publisher(): string {
    return this.requireDeployment().publisher;
  }

  get publishTxid(): string {
    return this.requireDeployment().txid;
  }

  async publish(): Promise<ContractDeployment> {
    if (this.deployment) {
      return this.deployment;
    }
    // A second publish() while the first is in flight shares its request
    if (!this.pending) {
      this.pending = this.sendPublish().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Bound handle for one contract function.
   */
  caller(functionName: string): Caller {
    const deployment = this.requireDeployment();
    return new Caller({
      endpoint: this.endpoint,
      functionName,
      contractAddress: deployment.address,
      defaultSender: deployment.publisher,
      debug: this.debug,
      logger: this.logger,
    });
  }

  /**
   * Symbolic lookup: `call_<fn>` resolves to `caller('<fn>')`.
   */
  resolve(attribute: string): Caller {
    this.requireDeployment();
    if (!attribute.startsWith(CALL_PREFIX) || attribute.length === CALL_PREFIX.length) {
      throw new UnknownAttributeError(attribute);
    }
    return this.caller(attribute.slice(CALL_PREFIX.length));
  }

  async getBalance(execEndpoint?: NodeEndpoint): Promise<number> {
    const address = this.requireDeployment().address;
    return (execEndpoint ?? this.endpoint).getBalanceOf(address);
  }

  private async sendPublish(): Promise<ContractDeployment> {
    const result = await this.endpoint.publishContract(this.artifactPath);
    const deployment: ContractDeployment = Object.freeze({
      address: result.contractaddress,
      publisher: result.senderaddress,
      txid: result.txid,
    });
    this.deployment = deployment;
    trackContractPublished();
    this.logger.info(
      { address: deployment.address, publisher: deployment.publisher, txid: deployment.txid },
      'Contract published'
    );
    return deployment;
  }

  private requireDeployment(): ContractDeployment {
    if (!this.deployment) {
      throw new NotPublishedError(this.artifactPath);
    }
    return this.deployment;
  }
}

export interface PublishedContractRef {
  txid: string;
  address: string;
}

/**
 * Publish `count` copies of one artifact, e.g. to fill blocks with contract
 * transactions.
 */
export async function publishContracts(
  endpoint: NodeEndpoint,
  artifactPath: string,
  count: number
): Promise<PublishedContractRef[]> {
  const refs: PublishedContractRef[] = [];
  for (let i = 0; i < count; i++) {
    const result = await endpoint.publishContract(artifactPath);
    trackContractPublished();
    refs.push({ txid: result.txid, address: result.contractaddress });
  }
  return refs;
}
