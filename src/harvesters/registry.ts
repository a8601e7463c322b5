import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { Harvester } from './harvester.js';
import { NetworkHarvester } from './network-harvester.js';
import { SystemHarvester } from './system-harvester.js';
import { TimingHarvester } from './timing-harvester.js';

export const HARVESTER_NAMES = ['timing', 'system', 'network'] as const;

export type HarvesterName = (typeof HARVESTER_NAMES)[number];

export function isHarvesterName(value: string): value is HarvesterName {
  return HARVESTER_NAMES.some((name) => name === value);
}

export interface HarvesterDeps {
  readonly clock: TimeClockPort;
}

/**
 * Built-in harvesters by name. Embedders add their own by passing Harvester
 * instances to the collector directly.
 */
export const HARVESTER_FACTORIES: Readonly<Record<HarvesterName, (deps: HarvesterDeps) => Harvester>> = {
  timing: (deps) => new TimingHarvester(deps.clock),
  system: () => new SystemHarvester(),
  network: (deps) => new NetworkHarvester(deps.clock),
};

export function createHarvesters(names: readonly HarvesterName[], deps: HarvesterDeps): Harvester[] {
  return [...new Set(names)].map((name) => HARVESTER_FACTORIES[name](deps));
}
