import { randomBytes } from 'node:crypto';
import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';

/**
 * Node crypto adapter for random entropy generation.
 *
 * Uses Node.js crypto.randomBytes() which is cryptographically secure.
 * Based on OpenSSL's RAND_bytes() on most platforms.
 */
export class NodeRandomEntropy implements RandomEntropyPort {
  generateBytes(count: number): Uint8Array {
    return new Uint8Array(randomBytes(count));
  }
}
