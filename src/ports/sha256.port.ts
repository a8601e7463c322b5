/**
 * Port: SHA-256 over raw byte segments.
 *
 * Purpose:
 * - Whitening of the pool buffer (feed, re-mix after extraction)
 * - Output derivation for extractions
 *
 * Guarantees:
 * - Deterministic: same segments → same digest
 * - Segments are hashed as their concatenation (no framing added)
 * - Returns exactly 32 bytes
 *
 * Example:
 * ```typescript
 * const digest = sha256.digest([buffer, data, timestamp]);
 * ```
 */
export interface Sha256Port {
  digest(segments: readonly Uint8Array[]): Uint8Array;
}

export const SHA256_DIGEST_BYTES = 32;
