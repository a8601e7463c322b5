import type { EntropyPool } from '../pool/entropy-pool.js';
import type { TapMode } from '../tap/tap.js';
import type { SourceHistory } from './source-history.js';

export type HealthStatus = 'critical' | 'low' | 'moderate' | 'good' | 'excellent';

export interface SourceHealth {
  readonly success: boolean;
  readonly latencyMs: number;
  readonly entropyBits: number;
  readonly lastSeenMs: number;
  /** Over the history window. */
  readonly successRate: number;
  readonly lastError?: string;
}

export interface HealthSnapshot {
  readonly score: number;
  readonly status: HealthStatus;
  readonly sources: Readonly<Record<string, SourceHealth>>;
  readonly entropyBits: number;
  readonly capacityBits: number;
  /** Percent of capacity currently credited, one decimal. */
  readonly utilization: number;
  readonly recommendation: string;
  /** Present when produced by a Reservoir. */
  readonly mode?: TapMode;
}

const CREDIT_WEIGHT = 70;
const SUCCESS_WEIGHT = 30;

/** Lower bound (inclusive) of each status, highest first. */
const STATUS_FLOORS: readonly (readonly [HealthStatus, number])[] = [
  ['excellent', 80],
  ['good', 60],
  ['moderate', 40],
  ['low', 20],
  ['critical', 0],
];

const RECOMMENDATIONS: Readonly<Record<HealthStatus, string>> = {
  excellent: 'Pool is well stocked. No action needed.',
  good: 'Pool is healthy. No action needed.',
  moderate: 'Credit is falling. Keep the collector running or lower the draw rate.',
  low: 'Credit is low. Start the collector or enable more harvesters.',
  critical: 'Pool is nearly depleted. Feed it before relying on DIRECT output, or use the strict policy.',
};

/**
 * score = round(70 * creditRatio + 30 * successRatio); with no recorded attempts,
 * round(100 * creditRatio).
 */
export function computeScore(creditRatio: number, successRatio: number | null): number {
  const credit = Math.min(1, Math.max(0, creditRatio));
  if (successRatio === null) return Math.round(100 * credit);
  const success = Math.min(1, Math.max(0, successRatio));
  return Math.round(CREDIT_WEIGHT * credit + SUCCESS_WEIGHT * success);
}

export function statusForScore(score: number): HealthStatus {
  for (const [status, floor] of STATUS_FLOORS) {
    if (score >= floor) return status;
  }
  return 'critical';
}

export function recommendationFor(status: HealthStatus): string {
  return RECOMMENDATIONS[status];
}

/**
 * Derives health from pool credit and harvester history. Reads only.
 */
export class HealthModel {
  constructor(
    private readonly pool: Pick<EntropyPool, 'credit' | 'capacity'>,
    private readonly history: SourceHistory
  ) {}

  snapshot(): HealthSnapshot {
    const entropyBits = this.pool.credit();
    const capacityBits = this.pool.capacity();
    const creditRatio = capacityBits > 0 ? entropyBits / capacityBits : 0;
    const score = computeScore(creditRatio, this.history.overallSuccessRate());
    const status = statusForScore(score);

    const sources: Record<string, SourceHealth> = {};
    for (const name of this.history.sources()) {
      const last = this.history.last(name);
      if (!last) continue;
      sources[name] = {
        success: last.success,
        latencyMs: last.latencyMs,
        entropyBits: last.entropyBits,
        lastSeenMs: last.timestampMs,
        successRate: this.history.successRate(name) ?? 0,
        ...(last.error !== undefined ? { lastError: last.error } : {}),
      };
    }

    return {
      score,
      status,
      sources,
      entropyBits,
      capacityBits,
      utilization: Math.round(creditRatio * 1000) / 10,
      recommendation: recommendationFor(status),
    };
  }
}
