import * as net from 'net';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { Harvester, HarvestResult } from './harvester.js';
import { harvestFailed, harvestSucceeded, u64beBytes } from './harvester.js';

export interface NetworkTarget {
  readonly host: string;
  readonly port: number;
}

/**
 * Opens a connection and resolves once it is established. Rejects on error or timeout.
 */
export type ConnectProbe = (target: NetworkTarget, timeoutMs: number) => Promise<void>;

export const tcpConnectProbe: ConnectProbe = (target, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = net.createConnection({ host: target.host, port: target.port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error(`connect to ${target.host}:${target.port} timed out after ${timeoutMs}ms`));
    });
    socket.once('error', (e) => {
      socket.destroy();
      reject(e);
    });
  });

export const DEFAULT_NETWORK_TARGETS: readonly NetworkTarget[] = [
  { host: '1.1.1.1', port: 443 },
  { host: '8.8.8.8', port: 443 },
  { host: '9.9.9.9', port: 443 },
];

export interface NetworkHarvesterOptions {
  readonly targets?: readonly NetworkTarget[];
  readonly timeoutMs?: number;
  readonly probe?: ConnectProbe;
}

const BITS_PER_RTT = 4;

/**
 * Round-trip jitter of TCP handshakes to a few well-known hosts.
 *
 * Credits four bits per completed handshake; fails when none complete.
 */
export class NetworkHarvester implements Harvester {
  readonly name = 'network';
  readonly requiresNetwork = true;
  private readonly targets: readonly NetworkTarget[];
  private readonly timeoutMs: number;
  private readonly probe: ConnectProbe;

  constructor(
    private readonly clock: TimeClockPort,
    options: NetworkHarvesterOptions = {}
  ) {
    this.targets = options.targets ?? DEFAULT_NETWORK_TARGETS;
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.probe = options.probe ?? tcpConnectProbe;
  }

  async collect(): Promise<HarvestResult> {
    const rtts: bigint[] = [];
    const errors: string[] = [];

    for (const target of this.targets) {
      const start = this.clock.monotonicNs();
      try {
        await this.probe(target, this.timeoutMs);
        rtts.push(this.clock.monotonicNs() - start);
      } catch (e) {
        errors.push(`${target.host}:${target.port} ${e instanceof Error ? e.message : String(e)}`);
      }
    }

    if (rtts.length === 0) {
      return harvestFailed(this.name, errors.length ? errors.join('; ') : 'no targets configured');
    }
    return harvestSucceeded(this.name, u64beBytes(rtts), rtts.length * BITS_PER_RTT);
  }
}
