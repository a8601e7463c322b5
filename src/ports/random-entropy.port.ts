/**
 * Random entropy port for the pool's initial seed.
 *
 * Purpose:
 * - Give a fresh pool a non-zero, unpredictable starting state
 * - Abstracted for runtime neutrality and deterministic testing
 *
 * Guarantees:
 * - Synchronous (randomness is CPU-bound, no I/O)
 * - Cryptographically secure (not Math.random())
 * - Returns exactly the requested byte count
 *
 * The seed is never credited as entropy: credit only comes from harvesters.
 */
export interface RandomEntropyPort {
  /**
   * @param count - Number of bytes to generate (must be positive)
   * @returns Uint8Array of exactly `count` random bytes
   */
  generateBytes(count: number): Uint8Array;
}
