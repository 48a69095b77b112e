/**
 * Contract call outcome.
 *
 * Holds either the node's response payload or a failure reason, never both.
 */

import type { CallContractPayload } from '../rpc/types.js';

export type CallOutcome =
  | { ok: true; payload: Readonly<CallContractPayload> }
  | { ok: false; reason: string };

export class CallResult {
  readonly outcome: CallOutcome;

  private constructor(outcome: CallOutcome) {
    this.outcome = outcome;
  }

  static success(payload: CallContractPayload): CallResult {
    return new CallResult({ ok: true, payload: Object.freeze({ ...payload }) });
  }

  static failure(reason: string): CallResult {
    return new CallResult({ ok: false, reason });
  }

  get ok(): boolean {
    return this.outcome.ok;
  }

  /** Response fields exactly as the node returned them; empty on failure. */
  get payload(): Readonly<CallContractPayload> {
    return this.outcome.ok ? this.outcome.payload : {};
  }

  /** Failure reason, or undefined for a successful call. */
  reason(): string | undefined {
    return this.outcome.ok ? undefined : this.outcome.reason;
  }

  get(field: string): unknown {
    return this.has(field) ? this.payload[field] : undefined;
  }

  has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.payload, field);
  }
}
