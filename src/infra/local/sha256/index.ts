import { createHash } from 'crypto';
import type { Sha256Port } from '../../../ports/sha256.port.js';

export class NodeSha256 implements Sha256Port {
  digest(segments: readonly Uint8Array[]): Uint8Array {
    const hash = createHash('sha256');
    for (const segment of segments) {
      hash.update(segment);
    }
    return new Uint8Array(hash.digest());
  }
}
