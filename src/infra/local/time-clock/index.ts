import type { TimeClockPort } from '../../../ports/time-clock.port.js';

/**
 * Node time/process adapter using platform APIs.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  monotonicNs(): bigint {
    return process.hrtime.bigint();
  }

  getPid(): number {
    return process.pid;
  }
}
