import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { InvalidParameterError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { TapMode } from '../tap/tap.js';
import { DEFAULT_HYBRID_RESEED_INTERVAL_MS } from '../tap/hybrid-tap.js';

export const TAP_MODES: readonly TapMode[] = ['DIRECT', 'HYBRID'];

export function isTapMode(value: string): value is TapMode {
  return TAP_MODES.some((mode) => mode === value);
}

/**
 * Runtime configuration of one Reservoir. Changing it affects later calls only.
 */
export interface ReservoirConfiguration {
  readonly mode: TapMode;
  readonly hybridReseedIntervalMs: number;
  /** Collector only: network harvesters are skipped. */
  readonly offlineMode: boolean;
}

export const DEFAULT_RESERVOIR_CONFIGURATION: ReservoirConfiguration = {
  mode: 'DIRECT',
  hybridReseedIntervalMs: DEFAULT_HYBRID_RESEED_INTERVAL_MS,
  offlineMode: false,
};

/**
 * Merge a partial update over `current` and check the result.
 */
export function resolveConfiguration(
  current: ReservoirConfiguration,
  update: Partial<ReservoirConfiguration>
): Result<ReservoirConfiguration, InvalidParameterError> {
  const next: ReservoirConfiguration = { ...current, ...update };

  if (!isTapMode(next.mode)) {
    return err(Err.invalidParameter('configure', 'mode', `expected DIRECT or HYBRID, got ${String(next.mode)}`));
  }
  if (!Number.isSafeInteger(next.hybridReseedIntervalMs) || next.hybridReseedIntervalMs <= 0) {
    return err(
      Err.invalidParameter(
        'configure',
        'hybridReseedIntervalMs',
        `must be a positive integer, got ${next.hybridReseedIntervalMs}`
      )
    );
  }
  if (typeof next.offlineMode !== 'boolean') {
    return err(Err.invalidParameter('configure', 'offlineMode', 'must be a boolean'));
  }
  return ok(next);
}
