export type { LinkOptions } from './links.js';
export {
  connectNodes,
  connectNodesBi,
  connectChain,
  disconnectNodes,
  peerIdentity,
  matchesPeer,
} from './links.js';
