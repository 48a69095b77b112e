/**
 * Harness Error Taxonomy
 *
 * Only the "not yet converged" condition inside a poll is retried. Every class
 * below propagates to the caller as soon as it is raised.
 *
 * - CONVERGENCE_TIMEOUT   bound exhausted without agreement (caller may retry)
 * - DIVERGENT_CHAIN_STATE equal height, different hashes (fork, never retried)
 * - DISCONNECT_TIMEOUT    peer removal not observed in time
 * - HALF_LINKED           one direction of a bidirectional connect failed
 * - NOT_PUBLISHED / UNKNOWN_ATTRIBUTE  contract usage errors
 * - RPC_ERROR             structured error returned by a node
 * - RPC_EXPECTATION       an expected RPC failure did not happen as described
 * - INVALID_CONFIG        harness configuration rejected at construction
 */

export type HarnessErrorCode =
  | 'CONVERGENCE_TIMEOUT'
  | 'DIVERGENT_CHAIN_STATE'
  | 'DISCONNECT_TIMEOUT'
  | 'HALF_LINKED'
  | 'NOT_PUBLISHED'
  | 'UNKNOWN_ATTRIBUTE'
  | 'INVALID_NODE_INDEX'
  | 'INVALID_PORT_SEED'
  | 'MISSING_CREDENTIALS'
  | 'RPC_ERROR'
  | 'RPC_RESPONSE'
  | 'RPC_EXPECTATION'
  | 'INVALID_CONFIG';

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(code: HarnessErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// CONVERGENCE
// =============================================================================

export type ExhaustedBound = 'attempts' | 'timeout';

export interface ConvergenceTimeoutDetails {
  check: string;
  bound: ExhaustedBound;
  attempts: number;
  elapsedMs: number;
  observed?: unknown;
}

export class ConvergenceTimeoutError extends HarnessError {
  readonly check: string;
  readonly bound: ExhaustedBound;
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly observed: unknown;

  constructor(details: ConvergenceTimeoutDetails) {
    super(
      'CONVERGENCE_TIMEOUT',
      `${details.check} did not converge: ${details.bound} exhausted after ` +
        `${details.attempts} attempt(s) in ${details.elapsedMs}ms` +
        (details.observed === undefined ? '' : `; observed ${formatObserved(details.observed)}`)
    );
    this.check = details.check;
    this.bound = details.bound;
    this.attempts = details.attempts;
    this.elapsedMs = details.elapsedMs;
    this.observed = details.observed;
  }
}

export interface ObservedTip {
  node: number;
  height: number;
  hash: string;
}

export class DivergentChainStateError extends HarnessError {
  readonly tips: readonly ObservedTip[];

  constructor(tips: readonly ObservedTip[]) {
    super(
      'DIVERGENT_CHAIN_STATE',
      'Block sync failed, mismatched block hashes:' +
        tips.map((t) => `\n  node${t.node}: height=${t.height} hash=${t.hash}`).join('')
    );
    this.tips = tips;
  }
}

// =============================================================================
// PEER LINKS
// =============================================================================

export class DisconnectTimeoutError extends HarnessError {
  readonly nodeIndex: number;
  readonly remaining: readonly number[];

  constructor(nodeIndex: number, remaining: readonly number[], options?: { cause?: unknown }) {
    super(
      'DISCONNECT_TIMEOUT',
      `timed out waiting for disconnect from node${nodeIndex} (peer ids still present: ${remaining.join(', ')})`,
      options
    );
    this.nodeIndex = nodeIndex;
    this.remaining = remaining;
  }
}

export class HalfLinkedError extends HarnessError {
  /** The direction that was established before the failure, as [from, to]. */
  readonly established: readonly [number, number];
  readonly failed: readonly [number, number];

  constructor(established: [number, number], failed: [number, number], cause: unknown) {
    super(
      'HALF_LINKED',
      `node${established[0]} -> node${established[1]} connected but ` +
        `node${failed[0]} -> node${failed[1]} failed: ${describeError(cause)}`,
      { cause }
    );
    this.established = established;
    this.failed = failed;
  }
}

// =============================================================================
// CONTRACTS
// =============================================================================

export class NotPublishedError extends HarnessError {
  constructor(artifactPath: string) {
    super('NOT_PUBLISHED', `contract ${artifactPath} not published, can not be called`);
  }
}

export class UnknownAttributeError extends HarnessError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('UNKNOWN_ATTRIBUTE', `'${attribute}' is not a call name (expected call_<function>)`);
    this.attribute = attribute;
  }
}

// =============================================================================
// PORTS & DATADIRS
// =============================================================================

export class InvalidNodeIndexError extends HarnessError {
  constructor(index: number, maxNodes: number) {
    super('INVALID_NODE_INDEX', `node index ${index} outside [0, ${maxNodes})`);
  }
}

export class InvalidPortSeedError extends HarnessError {
  constructor(seed: number, limit: number) {
    super('INVALID_PORT_SEED', `port seed ${seed} outside [0, ${limit})`);
  }
}

export class InvalidConfigError extends HarnessError {
  readonly setting: string;

  constructor(setting: string, value: unknown, expected: string) {
    super('INVALID_CONFIG', `invalid ${setting}: ${String(value)} (expected ${expected})`);
    this.setting = setting;
  }
}

export class MissingCredentialsError extends HarnessError {
  constructor(datadir: string) {
    super('MISSING_CREDENTIALS', `No RPC credentials in ${datadir}`);
  }
}

// =============================================================================
// RPC
// =============================================================================

export class RpcError extends HarnessError {
  readonly rpcCode: number;
  readonly rpcMessage: string;
  readonly method: string;

  constructor(method: string, error: { code: number; message: string }) {
    super('RPC_ERROR', `${error.message} (${error.code})`);
    this.method = method;
    this.rpcCode = error.code;
    this.rpcMessage = error.message;
  }
}

export class RpcResponseError extends HarnessError {
  readonly method: string;

  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super('RPC_RESPONSE', `${method}: ${message}`, options);
    this.method = method;
  }
}

/** A negative test's expectation about an RPC failure was not met. */
export class RpcExpectationError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RPC_EXPECTATION', message, options);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatObserved(observed: unknown): string {
  try {
    return JSON.stringify(observed);
  } catch {
    return String(observed);
  }
}
