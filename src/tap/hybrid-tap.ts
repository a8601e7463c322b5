import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, err, ok, okAsync } from 'neverthrow';
import type { DrawError, TapError } from '../errors/app-error.js';
import type { Logger } from '../core/logging/types.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { EntropyPool } from '../pool/entropy-pool.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { BaseTap } from './tap.js';
import type { ChaCha20Port, Keystream } from '../ports/chacha20.port.js';
import { CHACHA20_KEY_BYTES } from '../ports/chacha20.port.js';

export const DEFAULT_HYBRID_RESEED_INTERVAL_MS = 60_000;

const NS_PER_MS = 1_000_000n;

export interface HybridTapOptions {
  readonly chacha20: ChaCha20Port;
  /** Reseed age is measured on `monotonicNs()`, so wall-clock steps do not affect it. */
  readonly clock: TimeClockPort;
  readonly reseedIntervalMs?: number;
  readonly logger?: Logger;
}

/**
 * Raw bits from a ChaCha20 keystream keyed by 32 pool bytes.
 *
 * A request arriving `reseedIntervalMs` or more after the last keying draws a
 * fresh key first. Between reseeds the output is fully determined by the key.
 */
export class HybridTap extends BaseTap {
  readonly mode = 'HYBRID' as const;

  private pendingReseed: ResultAsync<void, DrawError> | null = null;
  private reseeds = 0;

  private constructor(
    private readonly pool: Pick<EntropyPool, 'draw'>,
    private generator: Keystream,
    private lastReseedNs: bigint,
    private readonly reseedIntervalMs: number,
    private readonly chacha20: ChaCha20Port,
    private readonly clock: TimeClockPort,
    private readonly logger: Logger
  ) {
    super();
  }

  /**
   * Key a new tap from the pool. Under the strict policy this waits for credit.
   */
  static create(pool: Pick<EntropyPool, 'draw'>, options: HybridTapOptions): ResultAsync<HybridTap, DrawError> {
    const reseedIntervalMs = options.reseedIntervalMs ?? DEFAULT_HYBRID_RESEED_INTERVAL_MS;
    if (!Number.isSafeInteger(reseedIntervalMs) || reseedIntervalMs <= 0) {
      throw new RangeError(`reseedIntervalMs must be a positive integer, got ${reseedIntervalMs}`);
    }
    const logger = options.logger ?? createBootstrapLogger('HybridTap');

    return pool
      .draw(CHACHA20_KEY_BYTES)
      .map(
        (seed) =>
          new HybridTap(
            pool,
            options.chacha20.open(seed),
            options.clock.monotonicNs(),
            reseedIntervalMs,
            options.chacha20,
            options.clock,
            logger
          )
      );
  }

  reseedIntervalMillis(): number {
    return this.reseedIntervalMs;
  }

  /** Reseeds performed since creation. */
  reseedCount(): number {
    return this.reseeds;
  }

  /**
   * Rekey from a fresh pool draw. Concurrent callers share one draw.
   */
  reseedNow(): ResultAsync<void, DrawError> {
    if (this.pendingReseed) return this.pendingReseed;

    const pending = new RA(
      (async (): Promise<Result<void, DrawError>> => {
        const seed = await this.pool.draw(CHACHA20_KEY_BYTES);
        this.pendingReseed = null;
        if (seed.isErr()) {
          this.logger.warn({ err: seed.error }, 'Hybrid reseed failed');
          return err(seed.error);
        }
        this.generator = this.chacha20.open(seed.value);
        this.lastReseedNs = this.clock.monotonicNs();
        this.reseeds += 1;
        this.logger.debug({ reseeds: this.reseeds }, 'Hybrid generator reseeded');
        return ok(undefined);
      })()
    );
    this.pendingReseed = pending;
    return pending;
  }

  protected nextBytes(n: number): ResultAsync<Uint8Array, TapError> {
    return this.ensureFresh().map(() => this.generator.nextBytes(n));
  }

  private ensureFresh(): ResultAsync<void, DrawError> {
    if (this.pendingReseed) return this.pendingReseed;
    const elapsedNs = this.clock.monotonicNs() - this.lastReseedNs;
    if (elapsedNs < BigInt(this.reseedIntervalMs) * NS_PER_MS) return okAsync(undefined);
    return this.reseedNow();
  }
}
