/**
 * StakeRecord.ts - Per-bettor stake tracking
 *
 * Stores a bettor's cumulative stake on each side of one event.
 * Records are immutable: every change produces a new record.
 */

import { Struct, UInt64, Bool } from 'o1js';
import { SIDE, type Side } from './Constants.js';

/**
 * StakeRecord: A bettor's position in one event
 *
 * @property amountA - Cumulative stake on side A (nano-units)
 * @property amountB - Cumulative stake on side B (nano-units)
 * @property claimed - Whether the stake has been paid out or refunded
 *
 * Example:
 * - Bettor stakes 5 units on A: amountA = 5000000000, amountB = 0, claimed = false
 * - Bettor claims after A wins:  amountA = 0, amountB = 0, claimed = true
 */
export class StakeRecord extends Struct({
  amountA: UInt64,
  amountB: UInt64,
  claimed: Bool,
}) {
  static empty(): StakeRecord {
    return new StakeRecord({
      amountA: UInt64.zero,
      amountB: UInt64.zero,
      claimed: Bool(false),
    });
  }

  amountOn(side: Side): UInt64 {
    return side === SIDE.A ? this.amountA : this.amountB;
  }

  hasStake(): boolean {
    return this.amountA.greaterThan(UInt64.zero).or(this.amountB.greaterThan(UInt64.zero)).toBoolean();
  }

  isClaimed(): boolean {
    return this.claimed.toBoolean();
  }

  /**
   * Side holding a positive stake; side A wins ties (including 0/0)
   */
  primarySide(): Side {
    if (this.amountA.greaterThan(UInt64.zero).toBoolean()) return SIDE.A;
    if (this.amountB.greaterThan(UInt64.zero).toBoolean()) return SIDE.B;
    return SIDE.A;
  }

  withAmount(side: Side, amount: UInt64): StakeRecord {
    return new StakeRecord({
      amountA: side === SIDE.A ? amount : this.amountA,
      amountB: side === SIDE.B ? amount : this.amountB,
      claimed: this.claimed,
    });
  }

  /**
   * Zeroed, claimed copy. Used for both winning claims and refunds.
   */
  settled(): StakeRecord {
    return new StakeRecord({
      amountA: UInt64.zero,
      amountB: UInt64.zero,
      claimed: Bool(true),
    });
  }
}
