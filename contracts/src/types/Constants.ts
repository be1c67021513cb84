/**
 * Constants for the pooled wagering engine
 *
 * Amounts are unsigned 64-bit integers in the smallest currency unit.
 * Timestamps are milliseconds.
 */

import { UInt64 } from 'o1js';

/**
 * ODDS_SCALE: Fixed precision of the displayed odds
 * oddsA + oddsB == ODDS_SCALE whenever the pool is non-empty (up to floor rounding)
 */
export const ODDS_SCALE = UInt64.from(1000);

/**
 * ODDS_MIDPOINT: Odds reported for both sides at zero volume
 */
export const ODDS_MIDPOINT = UInt64.from(500);

/**
 * CHARITY_PROFIT_DIVISOR: charityShare = profit / CHARITY_PROFIT_DIVISOR (floor)
 */
export const CHARITY_PROFIT_DIVISOR = UInt64.from(2);

/**
 * MINIMUM_BET: Absolute minimum stake (1 nano-unit)
 * Configured minimums below this are raised to it; zero stakes are never admitted.
 */
export const MINIMUM_BET = UInt64.from(1);

/**
 * EVENT_STATUS: Lifecycle states of an event
 * Open -> Resolved | Cancelled, both terminal
 */
export const EVENT_STATUS = {
  OPEN: 'Open',           // Accepting bets
  RESOLVED: 'Resolved',   // Outcome recorded, claims available
  CANCELLED: 'Cancelled', // Every stake refunded
} as const;

export type EventStatus = (typeof EVENT_STATUS)[keyof typeof EVENT_STATUS];

/**
 * SIDE: The two outcomes a bettor can back
 * outcome === true means side A won
 */
export const SIDE = {
  A: 'A',
  B: 'B',
} as const;

export type Side = (typeof SIDE)[keyof typeof SIDE];

export function isSide(value: unknown): value is Side {
  return value === SIDE.A || value === SIDE.B;
}

export function opposite(side: Side): Side {
  return side === SIDE.A ? SIDE.B : SIDE.A;
}

export function sideForOutcome(outcome: boolean): Side {
  return outcome ? SIDE.A : SIDE.B;
}
