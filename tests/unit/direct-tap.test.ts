import { describe, it, expect } from 'vitest';
import { DirectTap } from '../../src/tap/direct-tap.js';
import { strict } from '../../src/pool/depletion-policy.js';
import { createTestPool, toHex } from '../helpers/pool-fixtures.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('DirectTap', () => {
  it('extracts from the pool on every call', async () => {
    const { pool } = createTestPool({ initialCreditBits: 1000 });
    const tap = new DirectTap(pool);

    expectOk(await tap.uniformFloat(), 'float');
    expect(pool.credit()).toBe(936);

    expectOk(await tap.bytes(10), 'bytes');
    expect(pool.credit()).toBe(856);
    expect(tap.mode).toBe('DIRECT');
  });

  it('returns exactly what the pool would have extracted', async () => {
    const a = createTestPool().pool;
    const b = createTestPool().pool;

    const viaTap = expectOk(await new DirectTap(a).bytes(24), 'tap');

    expect(toHex(viaTap)).toBe(toHex(b.extract(24)));
  });

  it('passes depletion errors through under the strict policy', async () => {
    const { pool } = createTestPool({ depletionPolicy: strict(0), initialCreditBits: 32 });
    const tap = new DirectTap(pool);

    const error = expectErr(await tap.uniformFloat(), 'depleted');

    expect(error).toMatchObject({ _tag: 'DepletionTimeout', requestedBits: 64, availableBits: 32 });
    expect(pool.credit()).toBe(32);
  });
});
