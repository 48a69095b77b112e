#!/usr/bin/env -S npx tsx
/**
 * Local Network Smoke Run
 *
 * Attaches to NUM_NODES already-running regtest nodes, links them in a
 * chain, publishes a contract, calls it from two nodes and waits for the
 * network to converge.
 *
 * Usage:
 *   npm run local-network
 *
 * Environment: see .env.example (PORT_SEED, NUM_NODES, DATADIR_ROOT, ...)
 */

import 'dotenv/config';

import { TestNetwork, loadConfigFromEnv } from '../packages/harness/src/index.js';

function log(phase: string, msg: string) {
  console.log(`[${phase}] ${msg}`);
}

// =============================================================================
// MAIN
// =============================================================================

async function main() {
  const config = loadConfigFromEnv();
  const network = new TestNetwork(config);

  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  Ledger Harness — Local Network Smoke Run');
  console.log(`  Run: ${network.runId}`);
  console.log(`  Nodes: ${config.numNodes}  Port seed: ${network.ports.seed}`);
  console.log('═══════════════════════════════════════════════════════════════\n');

  try {
    // =========================================================================
    // PHASE 1: Attach & link
    // =========================================================================
    console.log('─── Phase 1: Attach & Link ───');
    const nodes = await network.attach();
    for (const node of nodes) {
      log('SETUP', `node${node.index}: p2p ${network.ports.p2pPort(node.index)}, rpc ${network.rpcUrl(node.index)}`);
    }
    await network.connectChain();
    log('LINK', 'All neighbour pairs connected');

    // =========================================================================
    // PHASE 2: Publish contract
    // =========================================================================
    console.log('\n─── Phase 2: Publish Contract ───');
    const contract = network.newContract(0);
    const deployment = await contract.publish();
    log('CONTRACT', `Address:   ${deployment.address}`);
    log('CONTRACT', `Publisher: ${deployment.publisher}`);
    log('CONTRACT', `Txid:      ${deployment.txid}`);

    // =========================================================================
    // PHASE 3: Calls
    // =========================================================================
    console.log('\n─── Phase 3: Contract Calls ───');
    const update = contract.caller('updateContract');
    const local = await update.call(['smoke', 'local'], { throwOnError: false });
    log('CALL', `node0 updateContract: ${local.ok ? 'ok' : local.reason()}`);

    const remoteNode = nodes[nodes.length - 1];
    const remote = await update.call(['smoke', 'remote'], {
      execEndpoint: remoteNode,
      throwOnError: false,
    });
    log('CALL', `node${remoteNode.index} updateContract as ${update.lastSender}: ${remote.ok ? 'ok' : remote.reason()}`);

    // =========================================================================
    // PHASE 4: Converge
    // =========================================================================
    console.log('\n─── Phase 4: Converge ───');
    await network.syncAll();
    log('SYNC', 'Tips and mempools agree across all nodes');

    console.log('\n═══════════════════════════════════════════════════════════════');
    console.log('  ✓ Smoke run complete.');
    console.log('═══════════════════════════════════════════════════════════════');
  } finally {
    await network.stop();
  }
}

main().catch((err) => {
  console.error('\n✗ Smoke run failed:', err instanceof Error ? err.message : String(err));
  if (err instanceof Error) console.error(err.stack);
  process.exit(1);
});
