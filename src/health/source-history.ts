/**
 * Rolling record of harvester attempts, per source.
 *
 * Written by the collector, read by the health model.
 */

export const DEFAULT_HISTORY_WINDOW = 20;

export interface HarvestOutcome {
  readonly source: string;
  readonly success: boolean;
  readonly latencyMs: number;
  /** Bits credited to the pool; 0 on failure. */
  readonly entropyBits: number;
  readonly timestampMs: number;
  readonly error?: string;
}

export class SourceHistory {
  private readonly bySource = new Map<string, HarvestOutcome[]>();

  constructor(private readonly windowSize: number = DEFAULT_HISTORY_WINDOW) {
    if (!Number.isSafeInteger(windowSize) || windowSize <= 0) {
      throw new RangeError(`History window must be a positive integer, got ${windowSize}`);
    }
  }

  record(outcome: HarvestOutcome): void {
    const window = this.bySource.get(outcome.source) ?? [];
    window.push(outcome);
    if (window.length > this.windowSize) window.shift();
    this.bySource.set(outcome.source, window);
  }

  sources(): readonly string[] {
    return [...this.bySource.keys()];
  }

  /** Oldest first. */
  outcomes(source: string): readonly HarvestOutcome[] {
    return [...(this.bySource.get(source) ?? [])];
  }

  last(source: string): HarvestOutcome | undefined {
    const window = this.bySource.get(source);
    return window ? window[window.length - 1] : undefined;
  }

  successRate(source: string): number | null {
    return ratio(this.bySource.get(source) ?? []);
  }

  /**
   * Fraction of successful attempts across every source's window, or null when
   * nothing has been attempted.
   */
  overallSuccessRate(): number | null {
    return ratio([...this.bySource.values()].flat());
  }

  clear(): void {
    this.bySource.clear();
  }
}

function ratio(outcomes: readonly HarvestOutcome[]): number | null {
  if (outcomes.length === 0) return null;
  return outcomes.filter((o) => o.success).length / outcomes.length;
}
