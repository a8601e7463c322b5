/**
 * Time and process info port.
 *
 * Purpose:
 * - Wall-clock time for reseed scheduling and harvester timestamps
 * - Monotonic nanoseconds for mixing timestamps and latency measurement
 * - Process ID for the initial pool seed
 *
 * Guarantees:
 * - Synchronous (time lookup is instant)
 * - monotonicNs() never goes backwards within the same process
 * - Injectable for testing
 */
export interface TimeClockPort {
  /**
   * Current time in milliseconds since Unix epoch.
   */
  nowMs(): number;

  /**
   * High-resolution monotonic time in nanoseconds.
   */
  monotonicNs(): bigint;

  /**
   * Current process ID.
   */
  getPid(): number;
}
