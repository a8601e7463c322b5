import type { Result } from 'neverthrow';
import { ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { DrawError, InvalidParameterError, PoolStateInvalidError, TapError } from './errors/app-error.js';
import type { Logger } from './core/logging/types.js';
import { createBootstrapLogger } from './core/logging/bootstrap.js';
import type { EntropyPoolOptions, PoolPorts } from './pool/entropy-pool.js';
import type { PoolState } from './pool/pool-state.js';
import { EntropyPool } from './pool/entropy-pool.js';
import type { ChaCha20Port } from './ports/chacha20.port.js';
import { createNodeReservoirPorts } from './infra/local/index.js';
import type { Tap, TokenEncoding } from './tap/tap.js';
import { DirectTap } from './tap/direct-tap.js';
import { HybridTap } from './tap/hybrid-tap.js';
import { SourceHistory } from './health/source-history.js';
import type { HealthSnapshot } from './health/health-model.js';
import { HealthModel } from './health/health-model.js';
import type { Harvester } from './harvesters/harvester.js';
import { HARVESTER_NAMES, createHarvesters } from './harvesters/registry.js';
import { Collector } from './collector/collector.js';
import type { ReservoirConfiguration } from './config/reservoir-config.js';
import { DEFAULT_RESERVOIR_CONFIGURATION, resolveConfiguration } from './config/reservoir-config.js';

/** Pool ports plus the keystream the HYBRID tap runs on. */
export interface ReservoirPorts extends PoolPorts {
  readonly chacha20: ChaCha20Port;
}

export interface ReservoirOptions {
  /** Node crypto and clock when omitted. */
  readonly ports?: ReservoirPorts;
  readonly pool?: Omit<EntropyPoolOptions, 'logger'>;
  /** Saved state, imported before the initial tap is keyed. */
  readonly state?: PoolState;
  readonly configuration?: Partial<ReservoirConfiguration>;
  /** All built-in harvesters when omitted. */
  readonly harvesters?: readonly Harvester[];
  readonly historyWindow?: number;
  readonly logger?: Logger;
}

export type ReservoirCreateError = InvalidParameterError | DrawError | PoolStateInvalidError;

interface PendingBuild {
  readonly configuration: ReservoirConfiguration;
  readonly done: Promise<void>;
}

interface ReservoirParts {
  readonly pool: EntropyPool;
  readonly ports: ReservoirPorts;
  readonly history: SourceHistory;
  readonly collector: Collector;
  readonly tap: Tap;
  readonly configuration: ReservoirConfiguration;
  readonly logger: Logger;
}

/**
 * Public value-generation surface: one pool, one active tap, a collector and a
 * health model.
 *
 * Each call reads the active tap once, when it starts, and finishes on that tap
 * even if configure() swaps it meanwhile.
 */
export class Reservoir implements Tap {
  private tap: Tap;
  private config: ReservoirConfiguration;
  /** Latest accepted configuration, ahead of `config` while a tap is being built. */
  private requested: ReservoirConfiguration;
  private pendingBuild: PendingBuild | null = null;
  private generation = 0;
  private readonly healthModel: HealthModel;
  private readonly logger: Logger;
  readonly pool: EntropyPool;
  readonly collector: Collector;
  readonly history: SourceHistory;
  private readonly ports: ReservoirPorts;

  private constructor(parts: ReservoirParts) {
    this.pool = parts.pool;
    this.ports = parts.ports;
    this.history = parts.history;
    this.collector = parts.collector;
    this.tap = parts.tap;
    this.config = parts.configuration;
    this.requested = parts.configuration;
    this.logger = parts.logger;
    this.healthModel = new HealthModel(parts.pool, parts.history);
  }

  /**
   * Builds every part, imports `state` when given, then keys the initial tap
   * (a pool draw in HYBRID mode).
   */
  static create(options: ReservoirOptions = {}): ResultAsync<Reservoir, ReservoirCreateError> {
    const resolved = resolveConfiguration(DEFAULT_RESERVOIR_CONFIGURATION, options.configuration ?? {});
    if (resolved.isErr()) return errAsync(resolved.error);
    const configuration = resolved.value;

    const logger = options.logger ?? createBootstrapLogger('Reservoir');
    const ports = options.ports ?? createNodeReservoirPorts();
    const pool = new EntropyPool(ports, { ...options.pool, logger: logger.child({ component: 'EntropyPool' }) });
    if (options.state) {
      const imported = pool.importState(options.state);
      if (imported.isErr()) return errAsync(imported.error);
    }
    const history = new SourceHistory(options.historyWindow);
    const harvesters = options.harvesters ?? createHarvesters(HARVESTER_NAMES, { clock: ports.clock });
    const collector = new Collector(pool, history, harvesters, ports.clock, {
      offlineMode: configuration.offlineMode,
      logger: logger.child({ component: 'Collector' }),
    });

    return buildTap(pool, ports, configuration, logger).map(
      (tap) => new Reservoir({ pool, ports, history, collector, tap, configuration, logger })
    );
  }

  get mode(): Tap['mode'] {
    return this.tap.mode;
  }

  configuration(): ReservoirConfiguration {
    return this.config;
  }

  /** The tap currently serving calls. */
  activeTap(): Tap {
    return this.tap;
  }

  /**
   * Apply a partial update, merged over the latest accepted configuration.
   *
   * A new tap is built completely before it replaces the old one. While a build
   * is pending, an update that needs the same tap applies its other settings at
   * once and resolves when the build settles; only an update that needs a
   * different tap supersedes it. A superseded call resolves with the
   * configuration in effect once the newest build settles.
   */
  configure(update: Partial<ReservoirConfiguration>): ResultAsync<ReservoirConfiguration, TapError> {
    const resolved = resolveConfiguration(this.requested, update);
    if (resolved.isErr()) return errAsync(resolved.error);
    const next = resolved.value;
    this.requested = next;

    const target = this.pendingBuild?.configuration ?? this.config;
    if (!needsNewTap(target, next)) {
      if (this.pendingBuild) {
        this.config = { ...this.config, offlineMode: next.offlineMode };
        this.collector.setOfflineMode(next.offlineMode);
        return this.settled();
      }
      this.apply(next, this.tap);
      return okAsync(next);
    }

    return this.rebuild(next);
  }

  health(): HealthSnapshot {
    return { ...this.healthModel.snapshot(), mode: this.tap.mode };
  }

  feed(data: Uint8Array, claimedEntropyBits: number): void {
    this.pool.feed(data, claimedEntropyBits);
  }

  /** Stops the collector if it is running. */
  async close(): Promise<void> {
    await this.collector.stop();
  }

  // --------------------------------------------------------------------------
  // Tap surface
  // --------------------------------------------------------------------------

  uniformFloat(): ResultAsync<number, TapError> {
    return this.tap.uniformFloat();
  }

  uniform(low: number, high: number): ResultAsync<number, TapError> {
    return this.tap.uniform(low, high);
  }

  uniformInt(low: number, high: number): ResultAsync<number, TapError> {
    return this.tap.uniformInt(low, high);
  }

  boolean(): ResultAsync<boolean, TapError> {
    return this.tap.boolean();
  }

  choice<T>(items: readonly T[]): ResultAsync<T, TapError> {
    return this.tap.choice(items);
  }

  bytes(n: number): ResultAsync<Uint8Array, TapError> {
    return this.tap.bytes(n);
  }

  shuffle<T>(items: T[]): ResultAsync<T[], TapError> {
    return this.tap.shuffle(items);
  }

  sample<T>(items: readonly T[], k: number): ResultAsync<T[], TapError> {
    return this.tap.sample(items, k);
  }

  gaussian(mu: number, sigma: number): ResultAsync<number, TapError> {
    return this.tap.gaussian(mu, sigma);
  }

  exponential(rate: number): ResultAsync<number, TapError> {
    return this.tap.exponential(rate);
  }

  triangular(low: number, high: number, mode: number): ResultAsync<number, TapError> {
    return this.tap.triangular(low, high, mode);
  }

  weightedChoice<T>(items: readonly T[], weights: readonly number[]): ResultAsync<T, TapError> {
    return this.tap.weightedChoice(items, weights);
  }

  token(nBytes: number, encoding?: TokenEncoding): ResultAsync<string, TapError> {
    return this.tap.token(nBytes, encoding);
  }

  private rebuild(next: ReservoirConfiguration): ResultAsync<ReservoirConfiguration, TapError> {
    const generation = ++this.generation;
    const from = this.config.mode;

    const done = (async (): Promise<Result<ReservoirConfiguration, TapError>> => {
      const built = await buildTap(this.pool, this.ports, next, this.logger);
      if (generation !== this.generation) {
        if (built.isOk()) this.logger.debug({ mode: next.mode }, 'Superseded tap discarded');
        return await this.settled();
      }
      this.pendingBuild = null;
      if (built.isErr()) {
        this.requested = this.config;
        return err(built.error);
      }
      // carries settings accepted while the build was pending
      const applied = this.requested;
      this.apply(applied, built.value);
      this.logger.info({ from, to: applied.mode }, 'Tap switched');
      return ok(applied);
    })();

    this.pendingBuild = { configuration: next, done: done.then(() => undefined) };
    return new ResultAsync(done);
  }

  /** Resolves with the configuration in effect once no build is pending. */
  private settled(): ResultAsync<ReservoirConfiguration, TapError> {
    const pending = this.pendingBuild;
    if (!pending) return okAsync(this.config);
    return new ResultAsync(pending.done.then(async () => await this.settled()));
  }

  private apply(configuration: ReservoirConfiguration, tap: Tap): void {
    this.tap = tap;
    this.config = configuration;
    this.collector.setOfflineMode(configuration.offlineMode);
  }
}

export function createReservoir(options: ReservoirOptions = {}): ResultAsync<Reservoir, ReservoirCreateError> {
  return Reservoir.create(options);
}

function buildTap(
  pool: EntropyPool,
  ports: ReservoirPorts,
  configuration: ReservoirConfiguration,
  logger: Logger
): ResultAsync<Tap, DrawError> {
  if (configuration.mode === 'DIRECT') return okAsync(new DirectTap(pool));
  return HybridTap.create(pool, {
    chacha20: ports.chacha20,
    clock: ports.clock,
    reseedIntervalMs: configuration.hybridReseedIntervalMs,
    logger: logger.child({ component: 'HybridTap' }),
  }).map((tap): Tap => tap);
}

function needsNewTap(current: ReservoirConfiguration, next: ReservoirConfiguration): boolean {
  return (
    next.mode !== current.mode ||
    (next.mode === 'HYBRID' && next.hybridReseedIntervalMs !== current.hybridReseedIntervalMs)
  );
}
