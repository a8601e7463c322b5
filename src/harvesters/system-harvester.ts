import * as os from 'os';
import type { Harvester, HarvestResult } from './harvester.js';
import { f64beBytes, harvestFailed, harvestSucceeded } from './harvester.js';

/**
 * A vector of fast-moving process and OS counters.
 */
export interface SystemProbe {
  sample(): readonly number[];
}

export const nodeSystemProbe: SystemProbe = {
  sample() {
    const memory = process.memoryUsage();
    const cpu = process.cpuUsage();
    return [
      memory.rss,
      memory.heapUsed,
      memory.heapTotal,
      memory.external,
      cpu.user,
      cpu.system,
      ...os.loadavg(),
      os.freemem(),
      os.uptime(),
      process.uptime(),
    ];
  },
};

const BITS_PER_CHANGED_VALUE = 2;

/**
 * Memory, CPU, load and uptime counters. Their low-order digits move with
 * everything else running on the host.
 *
 * Credits two bits per value that changed since the previous collection (all
 * values on the first one).
 */
export class SystemHarvester implements Harvester {
  readonly name = 'system';
  readonly requiresNetwork = false;
  private previous: readonly number[] | null = null;

  constructor(private readonly probe: SystemProbe = nodeSystemProbe) {}

  async collect(): Promise<HarvestResult> {
    const values = this.probe.sample().filter((v) => Number.isFinite(v));
    if (values.length === 0) {
      return harvestFailed(this.name, 'no readable system metrics');
    }

    const previous = this.previous;
    const changed = previous === null ? values.length : values.filter((v, i) => v !== previous[i]).length;
    this.previous = values;

    return harvestSucceeded(this.name, f64beBytes(values), changed * BITS_PER_CHANGED_VALUE);
  }
}
