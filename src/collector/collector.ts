import type { HarvesterFailure } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { EntropyPool } from '../pool/entropy-pool.js';
import type { SourceHistory } from '../health/source-history.js';
import type { Harvester, HarvestResult } from '../harvesters/harvester.js';
import { harvestFailed } from '../harvesters/harvester.js';

export interface HarvesterReport {
  readonly source: string;
  readonly success: boolean;
  readonly entropyBits: number;
  readonly latencyMs: number;
  readonly error?: string;
}

export interface CollectionReport {
  readonly startedAtMs: number;
  readonly outcomes: readonly HarvesterReport[];
  readonly failures: readonly HarvesterFailure[];
  /** Offline-skipped and disabled harvesters. */
  readonly skipped: readonly string[];
  /** Sum of the claims of successful harvests, before pool clamping. */
  readonly totalBitsFed: number;
}

export interface CollectorOptions {
  readonly offlineMode?: boolean;
  readonly logger?: Logger;
}

export const MIN_COLLECT_INTERVAL_MS = 10;

/**
 * Pulls harvesters and feeds the pool.
 *
 * A cycle never rejects: thrown errors and unsuccessful harvests are recorded in
 * the source history and logged, then the next harvester runs.
 */
export class Collector {
  private offline: boolean;
  private readonly disabled = new Set<string>();
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CollectionReport> | null = null;
  private latest: CollectionReport | null = null;

  constructor(
    private readonly pool: Pick<EntropyPool, 'feed'>,
    private readonly history: SourceHistory,
    private readonly harvesters: readonly Harvester[],
    private readonly clock: TimeClockPort,
    options: CollectorOptions = {}
  ) {
    this.offline = options.offlineMode ?? false;
    this.logger = options.logger ?? createBootstrapLogger('Collector');
  }

  harvesterNames(): readonly string[] {
    return this.harvesters.map((h) => h.name);
  }

  isOffline(): boolean {
    return this.offline;
  }

  setOfflineMode(offline: boolean): void {
    this.offline = offline;
  }

  setEnabled(name: string, enabled: boolean): void {
    if (enabled) this.disabled.delete(name);
    else this.disabled.add(name);
  }

  isEnabled(name: string): boolean {
    return !this.disabled.has(name);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  lastReport(): CollectionReport | null {
    return this.latest;
  }

  async collectOnce(): Promise<CollectionReport> {
    const startedAtMs = this.clock.nowMs();
    const outcomes: HarvesterReport[] = [];
    const failures: HarvesterFailure[] = [];
    const skipped: string[] = [];
    let totalBitsFed = 0;

    for (const harvester of this.harvesters) {
      if (!this.isEnabled(harvester.name) || (this.offline && harvester.requiresNetwork)) {
        skipped.push(harvester.name);
        continue;
      }

      const start = this.clock.monotonicNs();
      const result = await this.harvest(harvester);
      const latencyMs = Number(this.clock.monotonicNs() - start) / 1e6;
      const timestampMs = this.clock.nowMs();

      if (result.success) {
        const bits = Number.isFinite(result.entropyBits) && result.entropyBits > 0 ? result.entropyBits : 0;
        this.pool.feed(result.data, bits);
        totalBitsFed += bits;
        outcomes.push({ source: harvester.name, success: true, entropyBits: bits, latencyMs });
        this.history.record({ source: harvester.name, success: true, latencyMs, entropyBits: bits, timestampMs });
        continue;
      }

      const failure = Err.harvesterFailure(harvester.name, result.error ?? 'harvester reported failure');
      failures.push(failure);
      outcomes.push({ source: harvester.name, success: false, entropyBits: 0, latencyMs, error: failure.message });
      this.history.record({
        source: harvester.name,
        success: false,
        latencyMs,
        entropyBits: 0,
        timestampMs,
        error: failure.message,
      });
      this.logger.warn({ source: failure.source, error: failure.message }, 'Harvester failed');
    }

    const report: CollectionReport = { startedAtMs, outcomes, failures, skipped, totalBitsFed };
    this.latest = report;
    this.logger.debug(
      { fed: totalBitsFed, succeeded: outcomes.length - failures.length, failed: failures.length, skipped },
      'Collection cycle finished'
    );
    return report;
  }

  /**
   * Run a cycle every `intervalMs` on an unref'd timer. A tick that lands while
   * the previous cycle is still running is dropped.
   */
  start(intervalMs: number): void {
    if (!Number.isSafeInteger(intervalMs) || intervalMs < MIN_COLLECT_INTERVAL_MS) {
      throw new RangeError(`Collector interval must be an integer >= ${MIN_COLLECT_INTERVAL_MS}ms, got ${intervalMs}`);
    }
    this.clearTimer();

    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = this.collectOnce().finally(() => {
        this.inFlight = null;
      });
    }, intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs }, 'Collector started');
  }

  /** Stops the timer and waits for a running cycle to finish. */
  async stop(): Promise<void> {
    const wasRunning = this.timer !== null;
    this.clearTimer();
    if (this.inFlight) await this.inFlight;
    if (wasRunning) this.logger.info('Collector stopped');
  }

  private clearTimer(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private async harvest(harvester: Harvester): Promise<HarvestResult> {
    try {
      return await harvester.collect();
    } catch (e) {
      return harvestFailed(harvester.name, e instanceof Error ? e.message : String(e));
    }
  }
}
