import { createCipheriv } from 'crypto';
import type { ChaCha20Port, Keystream, KeystreamOptions } from '../../../ports/chacha20.port.js';
import { CHACHA20_KEY_BYTES, CHACHA20_NONCE_BYTES } from '../../../ports/chacha20.port.js';

const BLOCK_BYTES = 64;
const COUNTER_LIMIT = 2 ** 32;

/**
 * OpenSSL's chacha20 takes a 16-byte IV: the initial block counter as a
 * little-endian u32, then the 96-bit nonce. Encrypting zeros yields the keystream.
 */
export class NodeChaCha20 implements ChaCha20Port {
  open(key: Uint8Array, options: KeystreamOptions = {}): Keystream {
    if (key.length !== CHACHA20_KEY_BYTES) {
      throw new RangeError(`ChaCha20 key must be ${CHACHA20_KEY_BYTES} bytes, got ${key.length}`);
    }
    const nonce = options.nonce ?? new Uint8Array(CHACHA20_NONCE_BYTES);
    if (nonce.length !== CHACHA20_NONCE_BYTES) {
      throw new RangeError(`ChaCha20 nonce must be ${CHACHA20_NONCE_BYTES} bytes, got ${nonce.length}`);
    }
    const counter = options.initialCounter ?? 0;
    if (!Number.isInteger(counter) || counter < 0 || counter >= COUNTER_LIMIT) {
      throw new RangeError(`ChaCha20 initial counter must be a u32, got ${counter}`);
    }

    const iv = Buffer.alloc(4 + CHACHA20_NONCE_BYTES);
    iv.writeUInt32LE(counter, 0);
    iv.set(nonce, 4);
    const cipher = createCipheriv('chacha20', key, iv);
    return new NodeKeystream((zeros) => cipher.update(zeros), (COUNTER_LIMIT - counter) * BLOCK_BYTES);
  }
}

class NodeKeystream implements Keystream {
  constructor(
    private readonly encrypt: (zeros: Uint8Array) => Uint8Array,
    private remaining: number
  ) {}

  nextBytes(n: number): Uint8Array {
    if (n > this.remaining) {
      throw new RangeError('ChaCha20 block counter exhausted; rekey the stream');
    }
    this.remaining -= n;
    return new Uint8Array(this.encrypt(new Uint8Array(n)));
  }
}
