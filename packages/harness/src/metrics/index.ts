/**
 * Prometheus Metrics — Internal Only
 *
 * Counters for polling rounds, convergence failures and contract calls.
 * Served on a separate port when the network is started with `metricsPort`.
 */

import { Counter, Registry, collectDefaultMetrics } from 'prom-client';
import { createServer, Server } from 'http';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

export const pollAttempts = new Counter({
  name: 'poll_attempts_total',
  help: 'Number of predicate evaluations made by bounded waits',
  labelNames: ['check'] as const,
  registers: [metricsRegistry],
});

export const convergenceFailures = new Counter({
  name: 'convergence_failures_total',
  help: 'Number of convergence checks that ended without agreement',
  labelNames: ['check', 'kind'] as const,
  registers: [metricsRegistry],
});

export const contractCalls = new Counter({
  name: 'contract_calls_total',
  help: 'Number of contract calls by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const contractsPublished = new Counter({
  name: 'contracts_published_total',
  help: 'Number of contracts published',
  registers: [metricsRegistry],
});

export type ConvergenceFailureKind = 'timeout' | 'divergent' | 'disconnect';

export function trackPollAttempt(check: string): void {
  pollAttempts.inc({ check });
}

export function trackConvergenceFailure(check: string, kind: ConvergenceFailureKind): void {
  convergenceFailures.inc({ check, kind });
}

export function trackContractCall(outcome: 'success' | 'failure'): void {
  contractCalls.inc({ outcome });
}

export function trackContractPublished(): void {
  contractsPublished.inc();
}

/**
 * Start the internal metrics HTTP server.
 * Serves /metrics in Prometheus exposition format. Resolves once listening;
 * rejects when the port cannot be bound (e.g. EADDRINUSE).
 */
export function startMetricsServer(port: number): Promise<Server> {
  const server = createServer(async (_req, res) => {
    if (_req.url === '/metrics') {
      res.setHeader('Content-Type', metricsRegistry.contentType);
      res.end(await metricsRegistry.metrics());
    } else {
      res.statusCode = 404;
      res.end('Not found');
    }
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
