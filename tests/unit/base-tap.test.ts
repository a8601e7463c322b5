import { describe, it, expect } from 'vitest';
import { Err } from '../../src/errors/factories.js';
import { ScriptedTap, floatBytes } from '../fakes/index.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

const HALF = 2 ** 52;

describe('BaseTap conversions', () => {
  describe('uniformFloat', () => {
    it('uses the top 53 bits of a big-endian u64', async () => {
      const tap = new ScriptedTap(
        Uint8Array.from([...floatBytes(0), ...floatBytes(HALF), 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff])
      );

      expect(expectOk(await tap.uniformFloat(), 'zero')).toBe(0);
      expect(expectOk(await tap.uniformFloat(), 'half')).toBe(0.5);
      expect(expectOk(await tap.uniformFloat(), 'max')).toBe((2 ** 53 - 1) / 2 ** 53);
      expect(tap.draws).toEqual([8, 8, 8]);
    });
  });

  describe('uniform', () => {
    it('scales the float into [low, high)', async () => {
      const tap = ScriptedTap.of(...floatBytes(HALF));

      expect(expectOk(await tap.uniform(10, 20), 'uniform')).toBe(15);
    });

    it('returns low for an empty range without drawing', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.uniform(5, 5), 'degenerate')).toBe(5);
      expect(tap.draws).toEqual([]);
    });

    it('rejects bad bounds without drawing', async () => {
      const tap = ScriptedTap.of();

      expect(expectErr(await tap.uniform(3, 1), 'inverted').message).toBe(
        'uniform: invalid low (low (3) must not exceed high (1))'
      );
      expect(expectErr(await tap.uniform(Number.NaN, 1), 'nan')).toMatchObject({ parameter: 'low/high' });
      expect(expectErr(await tap.uniform(-1e308, 1e308), 'overflow')).toMatchObject({ parameter: 'high' });
      expect(tap.draws).toEqual([]);
    });
  });

  describe('uniformInt', () => {
    it('rejects out-of-range candidates instead of reducing them modulo the range', async () => {
      // range 6 -> 3-bit mask: 0xff -> 7 (reject), 0x0e -> 6 (reject), 0x02 -> 2
      const tap = ScriptedTap.of(0xff, 0x0e, 0x02);

      expect(expectOk(await tap.uniformInt(1, 6), 'die roll')).toBe(3);
      expect(tap.draws).toEqual([1, 1, 1]);
    });

    it('draws the minimal number of bytes for the range', async () => {
      const tap = ScriptedTap.of(0xab, 0x01, 0x00);

      expect(expectOk(await tap.uniformInt(0, 255), 'one byte')).toBe(0xab);
      expect(expectOk(await tap.uniformInt(0, 256), 'nine bits')).toBe(256);
      expect(tap.draws).toEqual([1, 2]);
    });

    it('covers a full 2^53 range', async () => {
      const tap = ScriptedTap.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff);

      expect(expectOk(await tap.uniformInt(0, 2 ** 53 - 1), 'full range')).toBe(2 ** 53 - 1);
      expect(tap.draws).toEqual([7]);
    });

    it('returns the only value of a one-value range without drawing', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.uniformInt(7, 7), 'single')).toBe(7);
      expect(tap.draws).toEqual([]);
    });

    it('validates its bounds', async () => {
      const tap = ScriptedTap.of();

      expect(expectErr(await tap.uniformInt(1.5, 3), 'fraction')).toMatchObject({
        _tag: 'InvalidParameter',
        operation: 'uniformInt',
        parameter: 'low/high',
      });
      expect(expectErr(await tap.uniformInt(5, 1), 'inverted')).toMatchObject({ parameter: 'low' });
      expect(
        expectErr(await tap.uniformInt(-Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER), 'too wide')
      ).toMatchObject({ parameter: 'high' });
      expect(tap.draws).toEqual([]);
    });
  });

  describe('boolean', () => {
    it('reads the low bit of one byte', async () => {
      const tap = ScriptedTap.of(0x01, 0x02);

      expect(expectOk(await tap.boolean(), 'odd')).toBe(true);
      expect(expectOk(await tap.boolean(), 'even')).toBe(false);
    });
  });

  describe('choice', () => {
    it('picks by rejection-sampled index', async () => {
      // range 3 -> 2-bit mask: 0x03 -> 3 (reject), 0x06 -> 2
      const tap = ScriptedTap.of(0x03, 0x06);

      expect(expectOk(await tap.choice(['a', 'b', 'c']), 'choice')).toBe('c');
    });

    it('returns the single element without drawing', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.choice(['only']), 'single')).toBe('only');
      expect(tap.draws).toEqual([]);
    });

    it('fails on an empty list', async () => {
      const error = expectErr(await ScriptedTap.of().choice([]), 'empty');

      expect(error).toEqual({
        _tag: 'EmptyInput',
        operation: 'choice',
        message: 'choice: cannot operate on an empty collection',
      });
    });
  });

  describe('bytes', () => {
    it('passes raw bytes through', async () => {
      const tap = ScriptedTap.of(1, 2, 3);

      expect([...expectOk(await tap.bytes(3), 'bytes')]).toEqual([1, 2, 3]);
    });

    it.each([0, -1, 2.5])('rejects a count of %s', async (n) => {
      const error = expectErr(await ScriptedTap.of().bytes(n), 'bad count');

      expect(error).toMatchObject({ _tag: 'InvalidParameter', operation: 'bytes', parameter: 'n' });
    });
  });

  describe('shuffle', () => {
    it('runs Fisher-Yates from the top index down, in place', async () => {
      // i=3: j=0, i=2: j=1, i=1: j=1
      const tap = ScriptedTap.of(0x00, 0x01, 0x01);
      const items = [1, 2, 3, 4];

      const shuffled = expectOk(await tap.shuffle(items), 'shuffle');

      expect(shuffled).toBe(items);
      expect(items).toEqual([4, 3, 2, 1]);
      expect(tap.draws).toEqual([1, 1, 1]);
    });

    it('leaves a single element alone', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.shuffle(['x']), 'single')).toEqual(['x']);
      expect(tap.draws).toEqual([]);
    });

    it('fails on an empty list', async () => {
      expect(expectErr(await ScriptedTap.of().shuffle([]), 'empty')._tag).toBe('EmptyInput');
    });
  });

  describe('sample', () => {
    it('takes k distinct elements without touching the input', async () => {
      // i=0: index 4 of 5, i=1: index 2 of 4 (-> slot 3)
      const tap = ScriptedTap.of(0x04, 0x02);
      const items = ['a', 'b', 'c', 'd', 'e'];

      expect(expectOk(await tap.sample(items, 2), 'sample')).toEqual(['e', 'd']);
      expect(items).toEqual(['a', 'b', 'c', 'd', 'e']);
    });

    it('returns nothing for k = 0 without drawing', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.sample([1, 2], 0), 'k=0')).toEqual([]);
      expect(tap.draws).toEqual([]);
    });

    it.each([-1, 3, 1.5])('rejects k = %s for a two-element list', async (k) => {
      const error = expectErr(await ScriptedTap.of().sample([1, 2], k), 'bad k');

      expect(error).toMatchObject({ _tag: 'InvalidParameter', operation: 'sample', parameter: 'k' });
    });
  });

  describe('gaussian', () => {
    it('applies Box-Muller to two uniforms, redrawing a zero first uniform', async () => {
      const tap = new ScriptedTap(Uint8Array.from([...floatBytes(0), ...floatBytes(HALF), ...floatBytes(0)]));

      const value = expectOk(await tap.gaussian(10, 2), 'gaussian');

      expect(value).toBe(10 + 2 * Math.sqrt(-2 * Math.log(0.5)));
      expect(tap.draws).toEqual([8, 8, 8]);
    });

    it('returns mu when sigma is zero', async () => {
      const tap = new ScriptedTap(Uint8Array.from([...floatBytes(HALF), ...floatBytes(HALF)]));

      expect(expectOk(await tap.gaussian(3, 0), 'sigma 0')).toBe(3);
    });

    it('validates mu and sigma', async () => {
      const tap = ScriptedTap.of();

      expect(expectErr(await tap.gaussian(Number.NaN, 1), 'mu')).toMatchObject({ parameter: 'mu' });
      expect(expectErr(await tap.gaussian(0, -1), 'sigma')).toMatchObject({ parameter: 'sigma' });
      expect(tap.draws).toEqual([]);
    });
  });

  describe('exponential', () => {
    it('inverts the CDF', async () => {
      const tap = ScriptedTap.of(...floatBytes(HALF));

      expect(expectOk(await tap.exponential(2), 'exponential')).toBe(-Math.log(0.5) / 2);
    });

    it.each([0, -1, Number.POSITIVE_INFINITY])('rejects rate %s', async (rate) => {
      expect(expectErr(await ScriptedTap.of().exponential(rate), 'rate')).toMatchObject({ parameter: 'rate' });
    });
  });

  describe('triangular', () => {
    it('uses the left branch below the mode cut and the right branch above it', async () => {
      const tap = new ScriptedTap(Uint8Array.from([...floatBytes(2 ** 51), ...floatBytes(3 * 2 ** 51)]));

      expect(expectOk(await tap.triangular(0, 10, 5), 'left')).toBe(Math.sqrt(12.5));
      expect(expectOk(await tap.triangular(0, 10, 5), 'right')).toBe(10 - Math.sqrt(12.5));
    });

    it('returns low for a degenerate range', async () => {
      const tap = ScriptedTap.of();

      expect(expectOk(await tap.triangular(1, 1, 1), 'degenerate')).toBe(1);
      expect(tap.draws).toEqual([]);
    });

    it('requires low <= mode <= high', async () => {
      const error = expectErr(await ScriptedTap.of().triangular(0, 10, 11), 'mode');

      expect(error.message).toBe('triangular: invalid mode (requires low <= mode <= high, got 0, 11, 10)');
    });
  });

  describe('weightedChoice', () => {
    it('maps the float onto cumulative weights and never picks a zero weight', async () => {
      const tap = new ScriptedTap(
        Uint8Array.from([...floatBytes(HALF), ...floatBytes(2 ** 50), ...floatBytes(2 ** 51)])
      );
      const items = ['a', 'b', 'c'];
      const weights = [1, 0, 3];

      // targets 2, 0.5 and 1 against cumulative 1, 1, 4
      expect(expectOk(await tap.weightedChoice(items, weights), 'target 2')).toBe('c');
      expect(expectOk(await tap.weightedChoice(items, weights), 'target 0.5')).toBe('a');
      expect(expectOk(await tap.weightedChoice(items, weights), 'target 1')).toBe('c');
    });

    it('validates items and weights', async () => {
      const tap = ScriptedTap.of();

      expect(expectErr(await tap.weightedChoice([], []), 'empty')._tag).toBe('EmptyInput');
      expect(expectErr(await tap.weightedChoice(['a', 'b', 'c'], [1, 2]), 'length').message).toBe(
        'weightedChoice: invalid weights (expected 3 weights, got 2)'
      );
      expect(expectErr(await tap.weightedChoice(['a'], [-1]), 'negative').message).toBe(
        'weightedChoice: invalid weights (weight at 0 must be finite and >= 0)'
      );
      expect(expectErr(await tap.weightedChoice(['a', 'b'], [0, 0]), 'zero total').message).toBe(
        'weightedChoice: invalid weights (total weight must be a positive finite number)'
      );
      expect(tap.draws).toEqual([]);
    });
  });

  describe('token', () => {
    it('encodes as hex by default', async () => {
      const tap = ScriptedTap.of(0xde, 0xad, 0xbe, 0xef);

      expect(expectOk(await tap.token(4), 'hex')).toBe('deadbeef');
    });

    it('encodes as unpadded base64url', async () => {
      const tap = ScriptedTap.of(0xfb, 0xff, 0x00);

      expect(expectOk(await tap.token(3, 'base64url'), 'base64url')).toBe('-_8A');
    });

    it('rejects a non-positive size', async () => {
      expect(expectErr(await ScriptedTap.of().token(0), 'size')).toMatchObject({ parameter: 'nBytes' });
    });
  });

  describe('source errors', () => {
    it('propagates a depletion error from the byte source', async () => {
      const tap = ScriptedTap.of();
      tap.failWith(Err.depletionTimeout(64, 0, 10));

      const error = expectErr(await tap.uniformFloat(), 'depleted');

      expect(error._tag).toBe('DepletionTimeout');
    });

    it('stops a shuffle at the first failed draw', async () => {
      const tap = ScriptedTap.of();
      tap.failWith(Err.extractionCancelled(8));
      const items = [1, 2, 3];

      expect(expectErr(await tap.shuffle(items), 'cancelled')._tag).toBe('ExtractionCancelled');
      expect(items).toEqual([1, 2, 3]);
      expect(tap.draws).toEqual([1]);
    });
  });
});
