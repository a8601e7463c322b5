import { describe, it, expect } from 'vitest';
import { TimingHarvester } from '../../src/harvesters/timing-harvester.js';
import { SystemHarvester, nodeSystemProbe } from '../../src/harvesters/system-harvester.js';
import type { SystemProbe } from '../../src/harvesters/system-harvester.js';
import { NetworkHarvester } from '../../src/harvesters/network-harvester.js';
import type { ConnectProbe } from '../../src/harvesters/network-harvester.js';
import { HARVESTER_NAMES, createHarvesters, isHarvesterName } from '../../src/harvesters/registry.js';
import { FakeTimeClock } from '../fakes/index.js';

class ScriptedProbe implements SystemProbe {
  constructor(private readonly samples: (readonly number[])[]) {}

  sample(): readonly number[] {
    return this.samples.shift() ?? [];
  }
}

describe('TimingHarvester', () => {
  it('credits one bit per change between consecutive durations', async () => {
    const clock = new FakeTimeClock();
    // durations 10, 10, 15, 10
    clock.scriptMonotonic([0n, 10n, 20n, 30n, 40n, 55n, 60n, 70n]);
    const harvester = new TimingHarvester(clock, { samples: 4 });

    const result = await harvester.collect();

    expect(result.success).toBe(true);
    expect(result.entropyBits).toBe(2);
    expect(result.source).toBe('timing');
    // four durations plus the workload sink, as u64
    expect(result.data).toHaveLength(40);
    expect([...result.data.subarray(0, 8)]).toEqual([0, 0, 0, 0, 0, 0, 0, 10]);
  });

  it('fails when every duration is identical', async () => {
    const clock = new FakeTimeClock(5n);
    const harvester = new TimingHarvester(clock, { samples: 8 });

    const result = await harvester.collect();

    expect(result).toEqual({
      data: new Uint8Array(0),
      entropyBits: 0,
      source: 'timing',
      success: false,
      error: 'timer showed no jitter across samples',
    });
  });

  it('needs at least two samples', () => {
    expect(() => new TimingHarvester(new FakeTimeClock(), { samples: 1 })).toThrow(RangeError);
  });

  it('runs locally', () => {
    expect(new TimingHarvester(new FakeTimeClock()).requiresNetwork).toBe(false);
  });
});

describe('SystemHarvester', () => {
  it('credits every value on the first collection and changed values afterwards', async () => {
    const harvester = new SystemHarvester(new ScriptedProbe([[1, 2, Number.NaN, 3], [1, 5, 3]]));

    const first = await harvester.collect();
    const second = await harvester.collect();

    expect(first.entropyBits).toBe(6);
    expect(first.data).toHaveLength(24);
    expect(second.entropyBits).toBe(2);
  });

  it('fails when nothing readable comes back', async () => {
    const harvester = new SystemHarvester(new ScriptedProbe([[Number.NaN, Number.POSITIVE_INFINITY]]));

    const result = await harvester.collect();

    expect(result.success).toBe(false);
    expect(result.error).toBe('no readable system metrics');
  });

  it('reads finite process and OS counters by default', () => {
    const values = nodeSystemProbe.sample();

    expect(values).toHaveLength(12);
    expect(values.every((v) => Number.isFinite(v))).toBe(true);
  });
});

describe('NetworkHarvester', () => {
  it('credits four bits per completed handshake and reports the others', async () => {
    const clock = new FakeTimeClock();
    const seen: number[] = [];
    const probe: ConnectProbe = async (target, timeoutMs) => {
      seen.push(timeoutMs);
      if (target.host === 'down.test') throw new Error('ECONNREFUSED');
      clock.advance(25);
    };
    const harvester = new NetworkHarvester(clock, {
      targets: [
        { host: 'a.test', port: 443 },
        { host: 'down.test', port: 443 },
        { host: 'b.test', port: 80 },
      ],
      probe,
    });

    const result = await harvester.collect();

    expect(result.success).toBe(true);
    expect(result.entropyBits).toBe(8);
    expect(result.data).toHaveLength(16);
    expect(seen).toEqual([2000, 2000, 2000]);
    expect(harvester.requiresNetwork).toBe(true);
  });

  it('fails with every target error when nothing connects', async () => {
    const probe: ConnectProbe = async (target) => {
      throw new Error(`refused by ${target.host}`);
    };
    const harvester = new NetworkHarvester(new FakeTimeClock(), {
      targets: [
        { host: 'a.test', port: 1 },
        { host: 'b.test', port: 2 },
      ],
      timeoutMs: 50,
      probe,
    });

    const result = await harvester.collect();

    expect(result.success).toBe(false);
    expect(result.error).toBe('a.test:1 refused by a.test; b.test:2 refused by b.test');
  });

  it('fails without targets', async () => {
    const result = await new NetworkHarvester(new FakeTimeClock(), { targets: [] }).collect();

    expect(result.error).toBe('no targets configured');
  });
});

describe('harvester registry', () => {
  it('knows the built-in names', () => {
    expect(HARVESTER_NAMES).toEqual(['timing', 'system', 'network']);
    expect(isHarvesterName('system')).toBe(true);
    expect(isHarvesterName('gps')).toBe(false);
  });

  it('builds each named harvester once, in order', () => {
    const harvesters = createHarvesters(['system', 'timing', 'system'], { clock: new FakeTimeClock() });

    expect(harvesters.map((h) => h.name)).toEqual(['system', 'timing']);
  });
});
