import type { Result } from 'neverthrow';
import { ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { DrawError, PoolStateInvalidError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import { SHA256_DIGEST_BYTES } from '../ports/sha256.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { DepletionPolicy, DrawOptions } from './depletion-policy.js';
import { PERMISSIVE } from './depletion-policy.js';
import type { PoolState } from './pool-state.js';
import { deriveOutput, u32be, u64be, whiten } from './mixer.js';

export const DEFAULT_POOL_SIZE_BYTES = 512;
const SEED_BYTES = 64;

/**
 * Runtime seams the pool needs. Supplied by `createNodePoolPorts()` in production.
 */
export interface PoolPorts {
  readonly sha256: Sha256Port;
  readonly clock: TimeClockPort;
  readonly entropy: RandomEntropyPort;
}

export interface EntropyPoolOptions {
  /** Buffer size; a positive multiple of 32. */
  readonly sizeBytes?: number;
  readonly initialCreditBits?: number;
  readonly depletionPolicy?: DepletionPolicy;
  readonly logger?: Logger;
}

interface Waiter {
  readonly bytes: number;
  readonly bits: number;
  readonly settle: (result: Result<Uint8Array, DrawError>) => void;
}

/**
 * Fixed-size whitened accumulator with an entropy-credit estimate.
 *
 * Every public method runs as one synchronous block, so feeds and extractions are
 * totally ordered on the event loop. The only suspension point is a queued strict
 * draw, which is served later inside feed()/importState()/setDepletionPolicy().
 */
export class EntropyPool {
  private buffer: Uint8Array;
  private creditBits: number;
  private extractionCounter = 0n;
  private policy: DepletionPolicy;
  private readonly waiters: Waiter[] = [];
  private readonly capacityBits: number;
  private readonly logger: Logger;

  constructor(
    private readonly ports: PoolPorts,
    options: EntropyPoolOptions = {}
  ) {
    const sizeBytes = options.sizeBytes ?? DEFAULT_POOL_SIZE_BYTES;
    if (!Number.isSafeInteger(sizeBytes) || sizeBytes <= 0 || sizeBytes % SHA256_DIGEST_BYTES !== 0) {
      throw new RangeError(`Pool size must be a positive multiple of ${SHA256_DIGEST_BYTES} bytes, got ${sizeBytes}`);
    }

    this.capacityBits = sizeBytes * 8;
    this.creditBits = clampCredit(options.initialCreditBits ?? 0, this.capacityBits);
    this.policy = options.depletionPolicy ?? PERMISSIVE;
    this.logger = options.logger ?? createBootstrapLogger('EntropyPool');

    const { clock, entropy } = ports;
    this.buffer = whiten(ports.sha256, new Uint8Array(sizeBytes), [
      entropy.generateBytes(SEED_BYTES),
      u64be(BigInt(Math.floor(clock.nowMs()))),
      u64be(clock.monotonicNs()),
      u32be(clock.getPid()),
    ]);
  }

  credit(): number {
    return this.creditBits;
  }

  capacity(): number {
    return this.capacityBits;
  }

  sizeBytes(): number {
    return this.buffer.length;
  }

  depletionPolicy(): DepletionPolicy {
    return this.policy;
  }

  /** Strict draws currently waiting for credit. */
  pendingDraws(): number {
    return this.waiters.length;
  }

  /**
   * Absorb `data` and credit up to `claimedEntropyBits`.
   *
   * Negative, NaN and infinite claims count as zero. Never fails.
   */
  feed(data: Uint8Array, claimedEntropyBits: number): void {
    this.mix(data);
    const claim = Number.isFinite(claimedEntropyBits) && claimedEntropyBits > 0 ? claimedEntropyBits : 0;
    this.creditBits = Math.min(this.capacityBits, this.creditBits + claim);
    this.serveWaiters();
  }

  /**
   * Derive `n` fresh bytes and re-mix the buffer so the same state is never read twice.
   *
   * Ignores the depletion policy: credit is debited and floored at zero.
   * @throws RangeError when `n` is not a positive safe integer
   */
  extract(n: number): Uint8Array {
    if (!isPositiveSafeInteger(n)) {
      throw new RangeError(`extract: byte count must be a positive safe integer, got ${n}`);
    }
    return this.extractUnchecked(n);
  }

  /**
   * Policy-aware extraction.
   *
   * permissive: resolves at once, like extract().
   * strict: resolves once credit covers 8n bits, in FIFO order with other waiters.
   */
  draw(n: number, options: DrawOptions = {}): ResultAsync<Uint8Array, DrawError> {
    if (!isPositiveSafeInteger(n)) {
      return errAsync(Err.invalidParameter('draw', 'n', `must be a positive safe integer, got ${n}`));
    }

    const policy = this.policy;
    if (policy.kind === 'permissive') {
      return okAsync(this.extractUnchecked(n));
    }

    const bits = n * 8;
    if (bits > this.capacityBits) {
      return errAsync(
        Err.invalidParameter('draw', 'n', `${bits} bits exceeds pool capacity of ${this.capacityBits} bits`)
      );
    }

    if (this.waiters.length === 0 && this.creditBits >= bits) {
      return okAsync(this.extractUnchecked(n));
    }

    const signal = options.signal;
    if (signal?.aborted) {
      return errAsync(Err.extractionCancelled(bits));
    }

    const timeoutMs = options.timeoutMs !== undefined ? options.timeoutMs : policy.timeoutMs;
    if (timeoutMs !== null && timeoutMs <= 0) {
      return errAsync(Err.depletionTimeout(bits, this.creditBits, 0));
    }

    return new ResultAsync(
      new Promise<Result<Uint8Array, DrawError>>((resolve) => {
        let timer: ReturnType<typeof setTimeout> | undefined;

        const release = (): void => {
          if (timer !== undefined) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        };

        const waiter: Waiter = {
          bytes: n,
          bits,
          settle: (result) => {
            release();
            resolve(result);
          },
        };

        const withdraw = (error: DrawError): void => {
          const index = this.waiters.indexOf(waiter);
          if (index === -1) return;
          this.waiters.splice(index, 1);
          waiter.settle(err(error));
          // A withdrawn head may have been blocking smaller requests behind it.
          this.serveWaiters();
        };

        const onAbort = (): void => {
          withdraw(Err.extractionCancelled(bits));
        };

        if (timeoutMs !== null) {
          timer = setTimeout(() => {
            this.logger.warn({ requestedBits: bits, availableBits: this.creditBits, timeoutMs }, 'Strict draw timed out');
            withdraw(Err.depletionTimeout(bits, this.creditBits, timeoutMs));
          }, timeoutMs);
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        this.waiters.push(waiter);
        this.logger.debug({ requestedBits: bits, availableBits: this.creditBits, queued: this.waiters.length }, 'Strict draw queued');
      })
    );
  }

  /**
   * Switching to permissive serves every queued draw immediately.
   */
  setDepletionPolicy(policy: DepletionPolicy): void {
    this.policy = policy;
    this.serveWaiters();
  }

  /**
   * Copy of buffer and credit. Sensitive: it predicts all output until the next feed.
   */
  exportState(): PoolState {
    this.logger.debug({ creditBits: this.creditBits }, 'Pool state exported');
    return { buffer: new Uint8Array(this.buffer), creditBits: this.creditBits };
  }

  /**
   * Replace buffer and credit together. Nothing changes when validation fails.
   */
  importState(state: PoolState): Result<void, PoolStateInvalidError> {
    if (state.buffer.length !== this.buffer.length) {
      return err(Err.poolStateInvalid(`buffer must be ${this.buffer.length} bytes, got ${state.buffer.length}`));
    }
    if (!Number.isFinite(state.creditBits) || state.creditBits < 0 || state.creditBits > this.capacityBits) {
      return err(Err.poolStateInvalid(`creditBits must be within [0, ${this.capacityBits}], got ${state.creditBits}`));
    }

    this.buffer = new Uint8Array(state.buffer);
    this.creditBits = state.creditBits;
    this.logger.debug({ creditBits: this.creditBits }, 'Pool state imported');
    this.serveWaiters();
    return ok(undefined);
  }

  private extractUnchecked(n: number): Uint8Array {
    const counter = this.extractionCounter;
    const output = deriveOutput(this.ports.sha256, this.buffer, counter, n);
    this.mix(output, u64be(counter));
    this.extractionCounter = counter + 1n;
    this.creditBits = Math.max(0, this.creditBits - n * 8);
    return output;
  }

  private mix(...data: Uint8Array[]): void {
    this.buffer = whiten(this.ports.sha256, this.buffer, [...data, u64be(this.ports.clock.monotonicNs())]);
  }

  private serveWaiters(): void {
    const permissive = this.policy.kind === 'permissive';
    let head = this.waiters[0];
    while (head && (permissive || this.creditBits >= head.bits)) {
      this.waiters.shift();
      head.settle(ok(this.extractUnchecked(head.bytes)));
      head = this.waiters[0];
    }
  }
}

function clampCredit(value: number, capacityBits: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.min(value, capacityBits);
}

function isPositiveSafeInteger(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0;
}
