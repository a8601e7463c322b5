import { Buffer } from 'node:buffer';
import type { Result } from 'neverthrow';
import { ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { TapError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

export type TapMode = 'DIRECT' | 'HYBRID';

export type TokenEncoding = 'hex' | 'base64url';

/**
 * Typed random values over a byte source.
 *
 * Every call validates its arguments first; a rejected call never touches the pool.
 */
export interface Tap {
  readonly mode: TapMode;

  /** [0, 1) with 53 bits of resolution. */
  uniformFloat(): ResultAsync<number, TapError>;
  /** [low, high) */
  uniform(low: number, high: number): ResultAsync<number, TapError>;
  /** Inclusive on both ends. */
  uniformInt(low: number, high: number): ResultAsync<number, TapError>;
  boolean(): ResultAsync<boolean, TapError>;
  choice<T>(items: readonly T[]): ResultAsync<T, TapError>;
  bytes(n: number): ResultAsync<Uint8Array, TapError>;
  /** Shuffles in place and resolves with the same array. */
  shuffle<T>(items: T[]): ResultAsync<T[], TapError>;
  /** `k` distinct elements in random order; `items` is not modified. */
  sample<T>(items: readonly T[], k: number): ResultAsync<T[], TapError>;
  gaussian(mu: number, sigma: number): ResultAsync<number, TapError>;
  exponential(rate: number): ResultAsync<number, TapError>;
  triangular(low: number, high: number, mode: number): ResultAsync<number, TapError>;
  weightedChoice<T>(items: readonly T[], weights: readonly number[]): ResultAsync<T, TapError>;
  token(nBytes: number, encoding?: TokenEncoding): ResultAsync<string, TapError>;
}

type Step<T> = Promise<Result<T, TapError>>;

const TWO_POW_53 = 2 ** 53;
const TWO_POW_21 = 2 ** 21;

/**
 * Shared conversion algorithms. Subclasses only decide where raw bytes come from.
 */
export abstract class BaseTap implements Tap {
  abstract readonly mode: TapMode;

  /**
   * Exactly `n` raw bytes (`n` is already validated as a positive safe integer).
   */
  protected abstract nextBytes(n: number): ResultAsync<Uint8Array, TapError>;

  uniformFloat(): ResultAsync<number, TapError> {
    return new ResultAsync(this.drawFloat());
  }

  uniform(low: number, high: number): ResultAsync<number, TapError> {
    if (!Number.isFinite(low) || !Number.isFinite(high)) {
      return errAsync(Err.invalidParameter('uniform', 'low/high', 'bounds must be finite numbers'));
    }
    if (low > high) {
      return errAsync(Err.invalidParameter('uniform', 'low', `low (${low}) must not exceed high (${high})`));
    }
    if (!Number.isFinite(high - low)) {
      return errAsync(Err.invalidParameter('uniform', 'high', 'range is too wide to represent'));
    }
    if (low === high) return okAsync(low);

    return new ResultAsync(
      (async (): Step<number> => {
        for (;;) {
          const u = await this.drawFloat();
          if (u.isErr()) return err(u.error);
          const value = low + (high - low) * u.value;
          // rounding can land exactly on `high`
          if (value < high) return ok(value);
        }
      })()
    );
  }

  uniformInt(low: number, high: number): ResultAsync<number, TapError> {
    if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high)) {
      return errAsync(Err.invalidParameter('uniformInt', 'low/high', 'bounds must be safe integers'));
    }
    if (low > high) {
      return errAsync(Err.invalidParameter('uniformInt', 'low', `low (${low}) must not exceed high (${high})`));
    }
    const range = high - low + 1;
    if (range > TWO_POW_53) {
      return errAsync(Err.invalidParameter('uniformInt', 'high', 'range must not exceed 2^53 values'));
    }
    if (range === 1) return okAsync(low);

    return new ResultAsync(this.drawIndex(range).then((r) => r.map((offset) => low + offset)));
  }

  boolean(): ResultAsync<boolean, TapError> {
    return this.nextBytes(1).map((b) => (b[0] & 1) === 1);
  }

  choice<T>(items: readonly T[]): ResultAsync<T, TapError> {
    if (items.length === 0) return errAsync(Err.emptyInput('choice'));
    return new ResultAsync(this.drawIndex(items.length).then((r) => r.map((i) => items[i])));
  }

  bytes(n: number): ResultAsync<Uint8Array, TapError> {
    if (!Number.isSafeInteger(n) || n <= 0) {
      return errAsync(Err.invalidParameter('bytes', 'n', `must be a positive safe integer, got ${n}`));
    }
    return this.nextBytes(n);
  }

  shuffle<T>(items: T[]): ResultAsync<T[], TapError> {
    if (items.length === 0) return errAsync(Err.emptyInput('shuffle'));

    return new ResultAsync(
      (async (): Step<T[]> => {
        for (let i = items.length - 1; i >= 1; i--) {
          const j = await this.drawIndex(i + 1);
          if (j.isErr()) return err(j.error);
          swap(items, i, j.value);
        }
        return ok(items);
      })()
    );
  }

  sample<T>(items: readonly T[], k: number): ResultAsync<T[], TapError> {
    if (!Number.isSafeInteger(k) || k < 0 || k > items.length) {
      return errAsync(Err.invalidParameter('sample', 'k', `must be an integer in [0, ${items.length}], got ${k}`));
    }
    if (k === 0) return okAsync([]);

    const pool = [...items];
    return new ResultAsync(
      (async (): Step<T[]> => {
        // partial Fisher–Yates: the first k slots end up as the sample
        for (let i = 0; i < k; i++) {
          const j = await this.drawIndex(pool.length - i);
          if (j.isErr()) return err(j.error);
          swap(pool, i, i + j.value);
        }
        return ok(pool.slice(0, k));
      })()
    );
  }

  gaussian(mu: number, sigma: number): ResultAsync<number, TapError> {
    if (!Number.isFinite(mu)) {
      return errAsync(Err.invalidParameter('gaussian', 'mu', 'must be finite'));
    }
    if (!Number.isFinite(sigma) || sigma < 0) {
      return errAsync(Err.invalidParameter('gaussian', 'sigma', `must be finite and >= 0, got ${sigma}`));
    }

    return new ResultAsync(
      (async (): Step<number> => {
        const u1 = await this.drawOpenFloat();
        if (u1.isErr()) return err(u1.error);
        const u2 = await this.drawFloat();
        if (u2.isErr()) return err(u2.error);
        const z = Math.sqrt(-2 * Math.log(u1.value)) * Math.cos(2 * Math.PI * u2.value);
        return ok(mu + sigma * z);
      })()
    );
  }

  exponential(rate: number): ResultAsync<number, TapError> {
    if (!Number.isFinite(rate) || rate <= 0) {
      return errAsync(Err.invalidParameter('exponential', 'rate', `must be finite and > 0, got ${rate}`));
    }
    return new ResultAsync(this.drawOpenFloat().then((r) => r.map((u) => -Math.log(u) / rate)));
  }

  triangular(low: number, high: number, mode: number): ResultAsync<number, TapError> {
    if (!Number.isFinite(low) || !Number.isFinite(high) || !Number.isFinite(mode)) {
      return errAsync(Err.invalidParameter('triangular', 'low/high/mode', 'must be finite numbers'));
    }
    if (!(low <= mode && mode <= high)) {
      return errAsync(
        Err.invalidParameter('triangular', 'mode', `requires low <= mode <= high, got ${low}, ${mode}, ${high}`)
      );
    }
    if (low === high) return okAsync(low);

    const span = high - low;
    const cut = (mode - low) / span;
    return new ResultAsync(
      this.drawFloat().then((r) =>
        r.map((u) =>
          u < cut ? low + Math.sqrt(u * span * (mode - low)) : high - Math.sqrt((1 - u) * span * (high - mode))
        )
      )
    );
  }

  weightedChoice<T>(items: readonly T[], weights: readonly number[]): ResultAsync<T, TapError> {
    if (items.length === 0) return errAsync(Err.emptyInput('weightedChoice'));
    if (items.length !== weights.length) {
      return errAsync(
        Err.invalidParameter('weightedChoice', 'weights', `expected ${items.length} weights, got ${weights.length}`)
      );
    }

    let total = 0;
    let lastPositive = -1;
    for (const [i, w] of weights.entries()) {
      if (!Number.isFinite(w) || w < 0) {
        return errAsync(Err.invalidParameter('weightedChoice', 'weights', `weight at ${i} must be finite and >= 0`));
      }
      total += w;
      if (w > 0) lastPositive = i;
    }
    if (!(total > 0) || !Number.isFinite(total)) {
      return errAsync(Err.invalidParameter('weightedChoice', 'weights', 'total weight must be a positive finite number'));
    }

    return new ResultAsync(
      this.drawFloat().then((r) =>
        r.map((u) => {
          const target = u * total;
          let cumulative = 0;
          for (const [i, w] of weights.entries()) {
            cumulative += w;
            if (target < cumulative) return items[i];
          }
          // float drift in the running sum
          return items[lastPositive];
        })
      )
    );
  }

  token(nBytes: number, encoding: TokenEncoding = 'hex'): ResultAsync<string, TapError> {
    if (encoding !== 'hex' && encoding !== 'base64url') {
      return errAsync(Err.invalidParameter('token', 'encoding', `unsupported encoding ${String(encoding)}`));
    }
    if (!Number.isSafeInteger(nBytes) || nBytes <= 0) {
      return errAsync(Err.invalidParameter('token', 'nBytes', `must be a positive safe integer, got ${nBytes}`));
    }
    return this.nextBytes(nBytes).map((b) => Buffer.from(b).toString(encoding));
  }

  // --------------------------------------------------------------------------
  // Raw conversions (arguments already validated)
  // --------------------------------------------------------------------------

  /** Top 53 bits of a big-endian u64, divided by 2^53. */
  private async drawFloat(): Step<number> {
    const drawn = await this.nextBytes(8);
    if (drawn.isErr()) return err(drawn.error);
    const view = new DataView(drawn.value.buffer, drawn.value.byteOffset, 8);
    const hi = view.getUint32(0, false);
    const lo = view.getUint32(4, false);
    return ok((hi * TWO_POW_21 + (lo >>> 11)) / TWO_POW_53);
  }

  /** (0, 1): zero is redrawn. */
  private async drawOpenFloat(): Step<number> {
    for (;;) {
      const u = await this.drawFloat();
      if (u.isErr() || u.value > 0) return u;
    }
  }

  /**
   * Uniform integer in [0, range) by rejection sampling; 2 <= range <= 2^53.
   */
  private async drawIndex(range: number): Step<number> {
    if (range === 1) return ok(0);

    let bits = 0;
    while (2 ** bits < range) bits++;
    const byteCount = Math.ceil(bits / 8);
    const leadingBits = bits - 8 * (byteCount - 1);
    const leadingMask = (1 << leadingBits) - 1;

    for (;;) {
      const drawn = await this.nextBytes(byteCount);
      if (drawn.isErr()) return err(drawn.error);

      let value = 0;
      for (const [i, b] of drawn.value.entries()) {
        value = value * 256 + (i === 0 ? b & leadingMask : b);
      }
      if (value < range) return ok(value);
    }
  }
}

function swap<T>(items: T[], i: number, j: number): void {
  const tmp = items[i];
  items[i] = items[j];
  items[j] = tmp;
}
