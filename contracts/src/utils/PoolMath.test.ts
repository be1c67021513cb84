/**
 * PoolMath Tests
 *
 * Odds and payout arithmetic: floor division, zero-volume defaults,
 * charity split and overflow/underflow failures.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { UInt64 } from 'o1js';
import { PoolMath, mulDiv, safeAdd, safeSub } from './PoolMath.js';
import { isWagerError } from '../types/WagerError.js';

const u = (value: number | bigint) => UInt64.from(value);

describe('PoolMath', () => {
  describe('calculateOdds', () => {
    it('should default to 500/500 at zero volume', () => {
      const { oddsA, oddsB } = PoolMath.calculateOdds(UInt64.zero, UInt64.zero);
      assert.strictEqual(oddsA.toString(), '500');
      assert.strictEqual(oddsB.toString(), '500');
    });

    it('should report the opposing share of the pool', () => {
      const { oddsA, oddsB } = PoolMath.calculateOdds(u(300), u(100));
      assert.strictEqual(oddsA.toString(), '250', 'A gets B share: 100 * 1000 / 400');
      assert.strictEqual(oddsB.toString(), '750', 'B gets A share: 300 * 1000 / 400');
    });

    it('should floor both sides independently', () => {
      const { oddsA, oddsB } = PoolMath.calculateOdds(u(1), u(2));
      assert.strictEqual(oddsA.toString(), '666');
      assert.strictEqual(oddsB.toString(), '333');
    });

    it('should give a one-sided pool 0/1000', () => {
      const { oddsA, oddsB } = PoolMath.calculateOdds(u(50), UInt64.zero);
      assert.strictEqual(oddsA.toString(), '0');
      assert.strictEqual(oddsB.toString(), '1000');
    });
  });

  describe('quotePayout', () => {
    it('should split profit with the charity (300/100 pool, stake 100 on A)', () => {
      const quote = PoolMath.quotePayout(u(100), u(300), u(100), true);
      assert.strictEqual(quote.grossPayout.toString(), '133');
      assert.strictEqual(quote.profit.toString(), '33');
      assert.strictEqual(quote.charityShare.toString(), '16');
      assert.strictEqual(quote.userShare.toString(), '117');
    });

    it('should pay the full gross amount without a charity', () => {
      const quote = PoolMath.quotePayout(u(100), u(300), u(100), false);
      assert.strictEqual(quote.userShare.toString(), '133');
      assert.strictEqual(quote.charityShare.toString(), '0');
    });

    it('should return just the stake when the losing side is empty', () => {
      const quote = PoolMath.quotePayout(u(40), u(40), UInt64.zero, true);
      assert.strictEqual(quote.grossPayout.toString(), '40');
      assert.strictEqual(quote.profit.toString(), '0');
      assert.strictEqual(quote.userShare.toString(), '40');
    });

    it('should reject an empty winning pool before dividing', () => {
      assert.throws(
        () => PoolMath.calculateGrossPayout(u(10), UInt64.zero, u(100)),
        (error) => isWagerError(error, 'EmptyWinningPool')
      );
    });
  });

  describe('safe arithmetic', () => {
    it('should fail on underflow instead of wrapping', () => {
      assert.throws(() => safeSub(u(1), u(2)), (error) => isWagerError(error, 'ArithmeticUnderflow'));
    });

    it('should fail on overflow', () => {
      const max = u((1n << 64n) - 1n);
      assert.throws(() => safeAdd(max, u(1)), (error) => isWagerError(error, 'ArithmeticOverflow'));
    });

    it('should not overflow on large intermediate products', () => {
      const result = mulDiv(u(1n << 40n), u(1n << 40n), u(1n << 30n));
      assert.strictEqual(result.toBigInt(), 1n << 50n);
    });
  });
});
