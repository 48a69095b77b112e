export {
  PortAllocator,
  assertNodeIndex,
  MAX_NODES,
  PORT_MIN,
  PORT_RANGE,
  PORT_SEED_LIMIT,
} from './allocator.js';
export {
  CONFIG_FILE_NAME,
  getDatadirPath,
  initializeDatadir,
  getAuthCookie,
  rpcUrl,
} from './datadir.js';
