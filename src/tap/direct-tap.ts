import type { ResultAsync } from 'neverthrow';
import type { TapError } from '../errors/app-error.js';
import type { EntropyPool } from '../pool/entropy-pool.js';
import { BaseTap } from './tap.js';

/**
 * Every raw draw is a fresh pool extraction. Nothing is buffered between calls,
 * so each value reflects the pool at the moment it was requested.
 */
export class DirectTap extends BaseTap {
  readonly mode = 'DIRECT' as const;

  constructor(private readonly pool: Pick<EntropyPool, 'draw'>) {
    super();
  }

  protected nextBytes(n: number): ResultAsync<Uint8Array, TapError> {
    return this.pool.draw(n);
  }
}
