/**
 * PoolMath.ts - Odds and pro-rata payout calculations
 *
 * All math is integer math with floor division. Intermediate products are
 * computed as bigint so that s * L cannot overflow before the division;
 * only the final result must fit in 64 bits.
 */

import { UInt64 } from 'o1js';
import { CHARITY_PROFIT_DIVISOR, ODDS_MIDPOINT, ODDS_SCALE } from '../types/Constants.js';
import { WagerError } from '../types/WagerError.js';

export const MAX_UINT64 = (1n << 64n) - 1n;

export interface OddsQuote {
  oddsA: UInt64;
  oddsB: UInt64;
}

/**
 * PayoutQuote - Breakdown of one winning claim
 *
 * grossPayout = stake + stake * losingTotal / winningTotal
 * profit = grossPayout - stake
 * charityShare = profit / 2 (0 when no beneficiary is configured)
 * userShare = grossPayout - charityShare
 */
export interface PayoutQuote {
  stake: UInt64;
  grossPayout: UInt64;
  profit: UInt64;
  userShare: UInt64;
  charityShare: UInt64;
}

function toUInt64(value: bigint): UInt64 {
  if (value > MAX_UINT64) {
    throw new WagerError('ArithmeticOverflow', `Value ${value} exceeds 64 bits`);
  }
  return UInt64.from(value);
}

/**
 * Safe UInt64 addition with overflow check
 */
export function safeAdd(a: UInt64, b: UInt64): UInt64 {
  return toUInt64(a.toBigInt() + b.toBigInt());
}

/**
 * Safe UInt64 subtraction with underflow check
 */
export function safeSub(a: UInt64, b: UInt64): UInt64 {
  if (a.lessThan(b).toBoolean()) {
    throw new WagerError('ArithmeticUnderflow', `Cannot subtract ${b.toString()} from ${a.toString()}`);
  }
  return a.sub(b);
}

/**
 * Floor of a * b / c, computed without intermediate overflow
 */
export function mulDiv(a: UInt64, b: UInt64, c: UInt64): UInt64 {
  const divisor = c.toBigInt();
  if (divisor === 0n) {
    throw new WagerError('ArithmeticOverflow', 'Division by zero');
  }
  return toUInt64((a.toBigInt() * b.toBigInt()) / divisor);
}

export class PoolMath {
  /**
   * Odds as the opposing side's share of the combined pool
   *
   * oddsA = totalB * 1000 / (totalA + totalB)
   * oddsB = totalA * 1000 / (totalA + totalB)
   * Zero volume -> 500 / 500
   */
  static calculateOdds(totalA: UInt64, totalB: UInt64): OddsQuote {
    const total = safeAdd(totalA, totalB);
    if (total.equals(UInt64.zero).toBoolean()) {
      return { oddsA: ODDS_MIDPOINT, oddsB: ODDS_MIDPOINT };
    }
    return {
      oddsA: mulDiv(totalB, ODDS_SCALE, total),
      oddsB: mulDiv(totalA, ODDS_SCALE, total),
    };
  }

  /**
   * Stake plus a proportional share of the losing pool
   *
   * @param stake - Bettor's stake on the winning side
   * @param winningTotal - Total staked on the winning side (W)
   * @param losingTotal - Total staked on the losing side (L)
   */
  static calculateGrossPayout(stake: UInt64, winningTotal: UInt64, losingTotal: UInt64): UInt64 {
    if (winningTotal.equals(UInt64.zero).toBoolean()) {
      throw new WagerError('EmptyWinningPool', 'Winning side has no stake');
    }
    return safeAdd(stake, mulDiv(stake, losingTotal, winningTotal));
  }

  /**
   * Full claim breakdown, with or without the charity split
   */
  static quotePayout(
    stake: UInt64,
    winningTotal: UInt64,
    losingTotal: UInt64,
    withCharity: boolean
  ): PayoutQuote {
    const grossPayout = PoolMath.calculateGrossPayout(stake, winningTotal, losingTotal);
    const profit = safeSub(grossPayout, stake);
    const charityShare = withCharity ? profit.div(CHARITY_PROFIT_DIVISOR) : UInt64.zero;
    const userShare = safeAdd(stake, safeSub(profit, charityShare));

    return { stake, grossPayout, profit, userShare, charityShare };
  }
}
