import { describe, it, expect, beforeAll } from 'vitest';
import { HybridTap } from '../../src/tap/hybrid-tap.js';
import { DirectTap } from '../../src/tap/direct-tap.js';
import { NodeChaCha20 } from '../../src/infra/local/index.js';
import { createTestPool } from '../helpers/pool-fixtures.js';
import { expectOk } from '../helpers/result-helpers.js';

/**
 * Distribution checks. Critical values sit near p = 1e-6, so a correct
 * implementation essentially never fails them.
 */

function chiSquare(counts: readonly number[], expected: number): number {
  return counts.reduce((sum, c) => sum + (c - expected) ** 2 / expected, 0);
}

describe('Tap statistics', () => {
  let tap: HybridTap;

  beforeAll(async () => {
    const { pool, clock } = createTestPool();
    pool.feed(new TextEncoder().encode('statistics'), 0);
    tap = expectOk(await HybridTap.create(pool, { chacha20: new NodeChaCha20(), clock }), 'create');
  });

  it('uniformFloat fills 20 equal bins evenly', async () => {
    const counts = new Array<number>(20).fill(0);
    const n = 50_000;

    for (let i = 0; i < n; i++) {
      const u = expectOk(await tap.uniformFloat(), 'float');
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
      counts[Math.floor(u * 20)] += 1;
    }

    expect(chiSquare(counts, n / 20)).toBeLessThan(65); // df 19
  });

  it('uniformInt(1, 100) hits every value close to n/100 times', async () => {
    const counts = new Array<number>(101).fill(0);

    for (let i = 0; i < 100_000; i++) {
      const v = expectOk(await tap.uniformInt(1, 100), 'int');
      counts[v] += 1;
    }

    expect(counts[0]).toBe(0);
    for (let v = 1; v <= 100; v++) {
      expect(counts[v]).toBeGreaterThan(800);
      expect(counts[v]).toBeLessThan(1200);
    }
  });

  it('shuffle yields all 24 orderings of four elements equally often', async () => {
    const counts = new Map<string, number>();
    const n = 24_000;

    for (let i = 0; i < n; i++) {
      const order = expectOk(await tap.shuffle([1, 2, 3, 4]), 'shuffle').join('');
      counts.set(order, (counts.get(order) ?? 0) + 1);
    }

    expect(counts.size).toBe(24);
    for (const count of counts.values()) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
    expect(chiSquare([...counts.values()], n / 24)).toBeLessThan(72); // df 23
  });

  it('gaussian(0, 1) has mean 0 and variance 1', async () => {
    const n = 50_000;
    let sum = 0;
    let sumSq = 0;

    for (let i = 0; i < n; i++) {
      const x = expectOk(await tap.gaussian(0, 1), 'gaussian');
      sum += x;
      sumSq += x * x;
    }

    const mean = sum / n;
    const variance = sumSq / n - mean * mean;
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.1);
  });

  it('exponential(2) has mean 1/2', async () => {
    const n = 20_000;
    let sum = 0;

    for (let i = 0; i < n; i++) {
      const x = expectOk(await tap.exponential(2), 'exponential');
      expect(x).toBeGreaterThan(0);
      sum += x;
    }

    // sd of the mean is 0.5 / sqrt(n) ~ 0.0035
    expect(Math.abs(sum / n - 0.5)).toBeLessThan(0.02);
  });

  it('weightedChoice follows the weights', async () => {
    const counts = { a: 0, b: 0, c: 0 };
    const n = 20_000;

    for (let i = 0; i < n; i++) {
      const pick = expectOk(await tap.weightedChoice(['a', 'b', 'c'] as const, [1, 0, 3]), 'weighted');
      counts[pick] += 1;
    }

    expect(counts.b).toBe(0);
    // expected 5000 / 15000, sd ~61
    expect(Math.abs(counts.a - 5_000)).toBeLessThan(400);
  });

  it('DirectTap rolls an unbiased die', async () => {
    const { pool } = createTestPool();
    const direct = new DirectTap(pool);
    const counts = new Array<number>(6).fill(0);
    const n = 12_000;

    for (let i = 0; i < n; i++) {
      counts[expectOk(await direct.uniformInt(1, 6), 'die') - 1] += 1;
    }

    expect(chiSquare(counts, n / 6)).toBeLessThan(38); // df 5
  });
});
