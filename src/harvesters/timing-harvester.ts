import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { Harvester, HarvestResult } from './harvester.js';
import { harvestFailed, harvestSucceeded, u64beBytes } from './harvester.js';

export interface TimingHarvesterOptions {
  readonly samples?: number;
}

const DEFAULT_SAMPLES = 64;

/**
 * Scheduler and cache jitter: the duration of a tiny fixed workload, measured
 * with the monotonic clock, many times over.
 *
 * Credits one bit per sample whose duration differs from the previous one.
 */
export class TimingHarvester implements Harvester {
  readonly name = 'timing';
  readonly requiresNetwork = false;
  private readonly samples: number;

  constructor(
    private readonly clock: TimeClockPort,
    options: TimingHarvesterOptions = {}
  ) {
    this.samples = options.samples ?? DEFAULT_SAMPLES;
    if (!Number.isSafeInteger(this.samples) || this.samples < 2) {
      throw new RangeError(`Timing harvester needs at least 2 samples, got ${this.samples}`);
    }
  }

  async collect(): Promise<HarvestResult> {
    const deltas: bigint[] = [];
    let sink = 0;
    for (let i = 0; i < this.samples; i++) {
      const start = this.clock.monotonicNs();
      for (let j = 0; j < 32; j++) sink = (sink + Math.imul(j, 0x9e3779b1)) | 0;
      deltas.push(this.clock.monotonicNs() - start);
    }

    let changes = 0;
    for (let i = 1; i < deltas.length; i++) {
      if (deltas[i] !== deltas[i - 1]) changes++;
    }
    if (changes === 0) {
      return harvestFailed(this.name, 'timer showed no jitter across samples');
    }

    // the sink goes in too so the workload cannot be optimised away
    return harvestSucceeded(this.name, u64beBytes([...deltas, BigInt(sink)]), changes);
  }
}
