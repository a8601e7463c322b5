import type { Sha256Port } from '../ports/sha256.port.js';
import { SHA256_DIGEST_BYTES } from '../ports/sha256.port.js';

/**
 * Hash-then-expand whitening and keyed output derivation.
 *
 * Both functions are pure: they never touch the buffer they are given.
 */

const OUTPUT_DOMAIN = new TextEncoder().encode('out');

export function u32be(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value >>> 0, false);
  return bytes;
}

export function u64be(value: bigint): Uint8Array {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, BigInt.asUintN(64, value), false);
  return bytes;
}

/**
 * New state = expand(SHA-256(state ‖ ...input), state.length).
 *
 * Expansion block i is SHA-256(digest ‖ u32be(i)); blocks are concatenated and
 * truncated to the state length.
 */
export function whiten(sha256: Sha256Port, state: Uint8Array, input: readonly Uint8Array[]): Uint8Array {
  const digest = sha256.digest([state, ...input]);
  return expand(sha256, digest, state.length);
}

export function expand(sha256: Sha256Port, digest: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  const blocks = Math.ceil(length / SHA256_DIGEST_BYTES);
  for (let i = 0; i < blocks; i++) {
    const block = sha256.digest([digest, u32be(i)]);
    const offset = i * SHA256_DIGEST_BYTES;
    out.set(block.subarray(0, Math.min(SHA256_DIGEST_BYTES, length - offset)), offset);
  }
  return out;
}

/**
 * Output stream for one extraction: SHA-256("out" ‖ state ‖ u64be(counter) ‖ u32be(block)).
 *
 * The domain tag keeps output blocks distinct from expansion blocks of the same state.
 */
export function deriveOutput(sha256: Sha256Port, state: Uint8Array, counter: bigint, length: number): Uint8Array {
  const out = new Uint8Array(length);
  const counterBytes = u64be(counter);
  const blocks = Math.ceil(length / SHA256_DIGEST_BYTES);
  for (let i = 0; i < blocks; i++) {
    const block = sha256.digest([OUTPUT_DOMAIN, state, counterBytes, u32be(i)]);
    const offset = i * SHA256_DIGEST_BYTES;
    out.set(block.subarray(0, Math.min(SHA256_DIGEST_BYTES, length - offset)), offset);
  }
  return out;
}
