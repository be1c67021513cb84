/**
 * EventInfo.ts - Ledger record of one betting round
 *
 * Records are replaced, never mutated in place, so a ledger snapshot can hold
 * references to them safely.
 */

import { UInt64 } from 'o1js';
import { EVENT_STATUS, ODDS_MIDPOINT, SIDE, type EventStatus, type Side } from './Constants.js';

/**
 * EventInfo: Aggregate state of one event
 *
 * @property id - Monotonic id, first event is 1
 * @property startTime - Creation timestamp (ms)
 * @property status - Open / Resolved / Cancelled
 * @property outcome - true when side A won; null unless Resolved
 * @property totalStakeA - Sum of all side A stake records
 * @property totalStakeB - Sum of all side B stake records
 * @property oddsA - totalStakeB share of the pool, scaled by ODDS_SCALE
 * @property oddsB - totalStakeA share of the pool, scaled by ODDS_SCALE
 * @property paidOut - Value already paid out or refunded
 */
export interface EventInfo {
  readonly id: number;
  readonly startTime: UInt64;
  readonly status: EventStatus;
  readonly outcome: boolean | null;
  readonly totalStakeA: UInt64;
  readonly totalStakeB: UInt64;
  readonly oddsA: UInt64;
  readonly oddsB: UInt64;
  readonly paidOut: UInt64;
}

export function createEventInfo(id: number, startTime: UInt64): EventInfo {
  return {
    id,
    startTime,
    status: EVENT_STATUS.OPEN,
    outcome: null,
    totalStakeA: UInt64.zero,
    totalStakeB: UInt64.zero,
    oddsA: ODDS_MIDPOINT,
    oddsB: ODDS_MIDPOINT,
    paidOut: UInt64.zero,
  };
}

export function isOpen(event: EventInfo): boolean {
  return event.status === EVENT_STATUS.OPEN;
}

export function isTerminal(event: EventInfo): boolean {
  return event.status === EVENT_STATUS.RESOLVED || event.status === EVENT_STATUS.CANCELLED;
}

export function totalOn(event: EventInfo, side: Side): UInt64 {
  return side === SIDE.A ? event.totalStakeA : event.totalStakeB;
}

/**
 * Winning side of a resolved event, null otherwise
 */
export function winningSide(event: EventInfo): Side | null {
  if (event.status !== EVENT_STATUS.RESOLVED || event.outcome === null) return null;
  return event.outcome ? SIDE.A : SIDE.B;
}
