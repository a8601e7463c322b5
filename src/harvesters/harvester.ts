/**
 * A source of unpredictable measurements.
 *
 * `collect()` should resolve with `success: false` rather than reject; the
 * collector tolerates both.
 */
export interface Harvester {
  readonly name: string;
  /** Skipped while the collector is offline. */
  readonly requiresNetwork: boolean;
  collect(): Promise<HarvestResult>;
}

export interface HarvestResult {
  readonly data: Uint8Array;
  /** Self-reported, conservative estimate. Never treated as certified. */
  readonly entropyBits: number;
  readonly source: string;
  readonly success: boolean;
  readonly error?: string;
}

export function harvestSucceeded(source: string, data: Uint8Array, entropyBits: number): HarvestResult {
  return { data, entropyBits, source, success: true };
}

export function harvestFailed(source: string, error: string): HarvestResult {
  return { data: new Uint8Array(0), entropyBits: 0, source, success: false, error };
}

export function u64beBytes(values: readonly bigint[]): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setBigUint64(i * 8, BigInt.asUintN(64, v), false));
  return out;
}

export function f64beBytes(values: readonly number[]): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setFloat64(i * 8, v, false));
  return out;
}
