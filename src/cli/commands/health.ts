/**
 * Health Command
 *
 * Optionally runs collection cycles, then reports the health snapshot.
 */

import type { CliResult } from '../types/cli-result.js';
import { misuse, success } from '../types/cli-result.js';
import type { HealthSnapshot } from '../../health/health-model.js';
import type { CollectionReport } from '../../collector/collector.js';

export interface HealthCommandDeps {
  readonly collectOnce: () => Promise<CollectionReport>;
  readonly health: () => HealthSnapshot;
}

export interface HealthCommandOptions {
  readonly collect?: string;
}

const MAX_CYCLES = 1_000;

export async function executeHealthCommand(
  deps: HealthCommandDeps,
  options: HealthCommandOptions = {}
): Promise<CliResult> {
  const cycles = options.collect === undefined ? 0 : Number(options.collect);
  if (!Number.isSafeInteger(cycles) || cycles < 0 || cycles > MAX_CYCLES) {
    return misuse(`--collect must be an integer between 0 and ${MAX_CYCLES}, got "${options.collect}"`);
  }

  const warnings: string[] = [];
  for (let i = 0; i < cycles; i++) {
    const report = await deps.collectOnce();
    for (const failed of report.failures) {
      warnings.push(`cycle ${i + 1}: ${failed.source} failed (${failed.message})`);
    }
  }

  const snapshot = deps.health();
  const details = [
    ...(snapshot.mode ? [`Mode: ${snapshot.mode}`] : []),
    `Entropy: ${snapshot.entropyBits}/${snapshot.capacityBits} bits (${snapshot.utilization}%)`,
    ...Object.entries(snapshot.sources).map(
      ([name, source]) =>
        `${name}: ${source.success ? 'ok' : 'failed'}, ${source.latencyMs.toFixed(1)}ms, ` +
        `success rate ${Math.round(source.successRate * 100)}%`
    ),
  ];

  return success({
    message: `Health: ${snapshot.score}/100 (${snapshot.status})`,
    details,
    warnings,
    suggestions: snapshot.status === 'critical' || snapshot.status === 'low' ? [snapshot.recommendation] : [],
  });
}
