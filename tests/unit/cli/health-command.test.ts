import { describe, it, expect } from 'vitest';
import { executeHealthCommand } from '../../../src/cli/commands/health.js';
import type { HealthSnapshot } from '../../../src/health/health-model.js';
import type { CollectionReport } from '../../../src/collector/collector.js';
import { Err } from '../../../src/errors/factories.js';

const LOW: HealthSnapshot = {
  score: 35,
  status: 'low',
  sources: {
    timing: { success: true, latencyMs: 2.5, entropyBits: 2, lastSeenMs: 0, successRate: 0.5 },
    network: { success: false, latencyMs: 2000, entropyBits: 0, lastSeenMs: 0, successRate: 0, lastError: 'timeout' },
  },
  entropyBits: 1000,
  capacityBits: 4096,
  utilization: 24.4,
  recommendation: 'Credit is low. Start the collector or enable more harvesters.',
  mode: 'HYBRID',
};

function report(failures: CollectionReport['failures'] = []): CollectionReport {
  return { startedAtMs: 0, outcomes: [], failures, skipped: [], totalBitsFed: 0 };
}

describe('executeHealthCommand', () => {
  it('reports the snapshot with a suggestion when credit is low', async () => {
    let cycles = 0;
    const result = await executeHealthCommand(
      {
        collectOnce: async () => {
          cycles += 1;
          return report([Err.harvesterFailure('network', 'timeout')]);
        },
        health: () => LOW,
      },
      { collect: '2' }
    );

    expect(cycles).toBe(2);
    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Health: 35/100 (low)',
        details: [
          'Mode: HYBRID',
          'Entropy: 1000/4096 bits (24.4%)',
          'timing: ok, 2.5ms, success rate 50%',
          'network: failed, 2000.0ms, success rate 0%',
        ],
        warnings: ['cycle 1: network failed (timeout)', 'cycle 2: network failed (timeout)'],
        suggestions: ['Credit is low. Start the collector or enable more harvesters.'],
      },
    });
  });

  it('skips collection by default and omits suggestions when healthy', async () => {
    let cycles = 0;
    const result = await executeHealthCommand({
      collectOnce: async () => {
        cycles += 1;
        return report();
      },
      health: () => ({ ...LOW, score: 90, status: 'excellent', sources: {} }),
    });

    expect(cycles).toBe(0);
    expect(result.kind === 'success' ? result.output?.suggestions : undefined).toEqual([]);
    expect(result.kind === 'success' ? result.output?.message : undefined).toBe('Health: 90/100 (excellent)');
  });

  it('rejects a bad cycle count', async () => {
    const result = await executeHealthCommand({ collectOnce: async () => report(), health: () => LOW }, { collect: 'x' });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: '--collect must be an integer between 0 and 1000, got "x"', suggestions: undefined },
    });
  });
});
