import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { TapError } from '../../src/errors/app-error.js';
import { BaseTap } from '../../src/tap/tap.js';

/**
 * Tap whose raw bytes come from a fixed script, for checking conversions exactly.
 *
 * Records the size of every raw draw. Fails the test (by throwing) when the
 * script runs out; `failWith` makes the next draw return an error instead.
 */
export class ScriptedTap extends BaseTap {
  readonly mode = 'DIRECT' as const;
  readonly draws: number[] = [];
  private offset = 0;
  private failure: TapError | null = null;

  constructor(private readonly script: Uint8Array) {
    super();
  }

  static of(...bytes: number[]): ScriptedTap {
    return new ScriptedTap(Uint8Array.from(bytes));
  }

  failWith(error: TapError): void {
    this.failure = error;
  }

  remaining(): number {
    return this.script.length - this.offset;
  }

  protected nextBytes(n: number): ResultAsync<Uint8Array, TapError> {
    this.draws.push(n);
    if (this.failure) {
      const error = this.failure;
      this.failure = null;
      return errAsync(error);
    }
    if (this.offset + n > this.script.length) {
      throw new Error(`ScriptedTap: asked for ${n} bytes with ${this.remaining()} left`);
    }
    const out = this.script.slice(this.offset, this.offset + n);
    this.offset += n;
    return okAsync(out);
  }
}

/** Eight big-endian bytes whose top 53 bits are `k`, so uniformFloat() yields k / 2^53. */
export function floatBytes(k: number): number[] {
  const hi = Math.floor(k / 2 ** 21);
  const lo = (k % 2 ** 21) * 2 ** 11;
  return [hi >>> 24, (hi >>> 16) & 0xff, (hi >>> 8) & 0xff, hi & 0xff, lo >>> 24, (lo >>> 16) & 0xff, (lo >>> 8) & 0xff, lo & 0xff];
}
