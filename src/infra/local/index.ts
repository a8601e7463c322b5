import type { PoolPorts } from '../../pool/entropy-pool.js';
import type { ReservoirPorts } from '../../reservoir.js';
import { NodeChaCha20 } from './chacha20/index.js';
import { NodeRandomEntropy } from './random-entropy/index.js';
import { NodeSha256 } from './sha256/index.js';
import { NodeTimeClock } from './time-clock/index.js';

export { NodeChaCha20 } from './chacha20/index.js';
export { NodeRandomEntropy } from './random-entropy/index.js';
export { NodeSha256 } from './sha256/index.js';
export { NodeTimeClock } from './time-clock/index.js';
export { LocalPoolStateStore } from './pool-state-store/index.js';

/**
 * Pool ports backed by node:crypto and the process clock.
 */
export function createNodePoolPorts(): PoolPorts {
  return {
    sha256: new NodeSha256(),
    clock: new NodeTimeClock(),
    entropy: new NodeRandomEntropy(),
  };
}

/** Pool ports plus the keystream the HYBRID tap runs on. */
export function createNodeReservoirPorts(): ReservoirPorts {
  return { ...createNodePoolPorts(), chacha20: new NodeChaCha20() };
}
