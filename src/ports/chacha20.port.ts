/**
 * Port: ChaCha20 keystream (RFC 8439 layout: 256-bit key, 96-bit nonce,
 * 32-bit block counter).
 *
 * Purpose:
 * - Output generator of the HYBRID tap, keyed by pool bytes
 *
 * Guarantees:
 * - Deterministic: same key, nonce and counter → same byte stream
 * - Consecutive `nextBytes` calls continue the stream where the last one stopped
 * - Throws RangeError on a malformed key, nonce or counter, and once the
 *   block counter would wrap
 *
 * Example:
 * ```typescript
 * const stream = chacha20.open(key);
 * const block = stream.nextBytes(64);
 * ```
 */
export interface ChaCha20Port {
  open(key: Uint8Array, options?: KeystreamOptions): Keystream;
}

export interface KeystreamOptions {
  /** 12 bytes. All zero when omitted. */
  readonly nonce?: Uint8Array;
  /** Block counter of the first block. 0 when omitted. */
  readonly initialCounter?: number;
}

export interface Keystream {
  nextBytes(n: number): Uint8Array;
}

export const CHACHA20_KEY_BYTES = 32;
export const CHACHA20_NONCE_BYTES = 12;
