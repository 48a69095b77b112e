/**
 * Node data directories.
 *
 * Writes the per-node config file that pins each node to its allocated ports,
 * and reads back the RPC credentials the node was started with.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { MissingCredentialsError } from '../errors/index.js';
import type { RpcCredentials } from '../rpc/json-rpc-endpoint.js';
import type { PortAllocator } from './allocator.js';

export const CONFIG_FILE_NAME = 'ledger.conf';
const COOKIE_PATH = ['regtest', '.cookie'];

export function getDatadirPath(root: string, nodeIndex: number): string {
  return path.join(root, `node${nodeIndex}`);
}

export function initializeDatadir(root: string, nodeIndex: number, ports: PortAllocator): string {
  const datadir = getDatadirPath(root, nodeIndex);
  fs.mkdirSync(datadir, { recursive: true });
  const lines = [
    'regtest=1',
    `port=${ports.p2pPort(nodeIndex)}`,
    `rpcport=${ports.rpcPort(nodeIndex)}`,
    'listenonion=0',
  ];
  fs.writeFileSync(path.join(datadir, CONFIG_FILE_NAME), lines.join('\n') + '\n', 'utf8');
  return datadir;
}

/**
 * Credentials from `rpcuser=`/`rpcpassword=` in the config file; a cookie file
 * written by the running node takes precedence.
 */
export function getAuthCookie(datadir: string): RpcCredentials {
  let user: string | undefined;
  let password: string | undefined;

  const confPath = path.join(datadir, CONFIG_FILE_NAME);
  if (fs.existsSync(confPath)) {
    for (const line of fs.readFileSync(confPath, 'utf8').split('\n')) {
      if (line.startsWith('rpcuser=')) user = line.slice('rpcuser='.length).trim();
      if (line.startsWith('rpcpassword=')) password = line.slice('rpcpassword='.length).trim();
    }
  }

  const cookiePath = path.join(datadir, ...COOKIE_PATH);
  if (fs.existsSync(cookiePath)) {
    const content = fs.readFileSync(cookiePath, 'utf8').trim();
    const sep = content.indexOf(':');
    if (sep > 0) {
      user = content.slice(0, sep);
      password = content.slice(sep + 1);
    }
  }

  if (user === undefined || password === undefined) {
    throw new MissingCredentialsError(datadir);
  }
  return { user, password };
}

/**
 * RPC base URL for a node. `rpcHost` may be `host` or `host:port`; without a
 * port the allocated RPC port is used.
 */
export function rpcUrl(nodeIndex: number, ports: PortAllocator, rpcHost?: string): string {
  let host = '127.0.0.1';
  let port = ports.rpcPort(nodeIndex);
  if (rpcHost) {
    const parts = rpcHost.split(':');
    if (parts.length === 2) {
      host = parts[0];
      port = parseInt(parts[1], 10);
    } else {
      host = rpcHost;
    }
  }
  return `http://${host}:${port}`;
}
