/**
 * Bounded polling.
 *
 * `waitUntil` evaluates a predicate until it holds, or until the attempt
 * budget or the wall-clock timeout runs out. Only a `false` result is retried;
 * an error thrown by the predicate ends the wait immediately.
 */

import { ConvergenceTimeoutError } from '../errors/index.js';
import { trackPollAttempt } from '../metrics/index.js';
import { sleep } from '../utils/compare.js';

export const DEFAULT_POLL_INTERVAL_MS = 50;
/** Applied when a caller leaves both bounds unbounded. */
export const DEFAULT_WAIT_TIMEOUT_MS = 60_000;

/**
 * Mutual-exclusion guard around a single predicate evaluation. Protects the
 * predicate's own captured state; the poller itself holds none.
 */
export interface PredicateLock {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
}

export type Predicate = () => boolean | Promise<boolean>;

export interface WaitUntilOptions {
  /** Maximum predicate evaluations (default: unbounded). */
  attempts?: number;
  /** Wall-clock budget in ms (default: unbounded). */
  timeoutMs?: number;
  intervalMs?: number;
  lock?: PredicateLock;
  /** Name reported in errors and metrics. */
  check?: string;
  /** Snapshot of the last observed state, attached to the timeout error. */
  observe?: () => unknown;
}

export async function waitUntil(predicate: Predicate, options: WaitUntilOptions = {}): Promise<void> {
  const attempts = options.attempts ?? Infinity;
  let timeoutMs = options.timeoutMs ?? Infinity;
  if (attempts === Infinity && timeoutMs === Infinity) {
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS;
  }
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const check = options.check ?? 'predicate';

  const start = Date.now();
  const deadline = start + timeoutMs;
  const evaluate = async (): Promise<boolean> => predicate();

  let attempt = 0;
  while (attempt < attempts && Date.now() < deadline) {
    const satisfied = options.lock ? await options.lock.runExclusive(evaluate) : await evaluate();
    trackPollAttempt(check);
    if (satisfied) {
      return;
    }
    attempt += 1;
    await sleep(intervalMs);
  }

  throw new ConvergenceTimeoutError({
    check,
    bound: attempt >= attempts ? 'attempts' : 'timeout',
    attempts: attempt,
    elapsedMs: Date.now() - start,
    observed: options.observe?.(),
  });
}
