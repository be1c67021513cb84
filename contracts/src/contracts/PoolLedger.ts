/**
 * PoolLedger.ts - Per-event stake bookkeeping
 *
 * Tracks every event ever created (id -> record), each bettor's stake record,
 * the ordered participant registry and the derived odds. Moves no value.
 *
 * Key responsibilities:
 * - Allocate monotonic event ids
 * - Admit bets (bounds, side conflicts) and keep side totals equal to the
 *   sum of stake records
 * - Recompute odds after every admitted bet
 * - Freeze events on resolution / cancellation
 * - Settle each stake record at most once
 *
 * Changes made inside a checkpoint are journaled and can be reverted, which is
 * how the SettlementEngine keeps its operations all-or-nothing.
 */

import { PublicKey, UInt64 } from 'o1js';
import {
  EVENT_STATUS,
  MINIMUM_BET,
  SIDE,
  opposite,
  type Side,
} from '../types/Constants.js';
import { createEventInfo, isOpen, type EventInfo } from '../types/EventInfo.js';
import { StakeRecord } from '../types/StakeRecord.js';
import { WagerError } from '../types/WagerError.js';
import { PoolMath, safeAdd, safeSub } from '../utils/PoolMath.js';

/**
 * Bet amount bounds; maxBet null means unbounded
 */
export interface BetBounds {
  minBet: UInt64;
  maxBet: UInt64 | null;
}

export interface StakeView {
  side: Side;
  amount: UInt64;
}

interface EventPool {
  event: EventInfo;
  stakes: Map<string, StakeRecord>;
  participants: PublicKey[];
}

export class PoolLedger {
  readonly bounds: BetBounds;

  private pools = new Map<number, EventPool>();
  private latestId = 0;
  private undo: Array<() => void> = [];
  private depth = 0;

  constructor(bounds: Partial<BetBounds> = {}) {
    const minBet = bounds.minBet ?? MINIMUM_BET;
    this.bounds = {
      minBet: minBet.lessThan(MINIMUM_BET).toBoolean() ? MINIMUM_BET : minBet,
      maxBet: bounds.maxBet ?? null,
    };
  }

  // ========== Queries ==========

  /** 0 until the first event is opened */
  get latestEventId(): number {
    return this.latestId;
  }

  getEvent(eventId: number): EventInfo {
    return this.pool(eventId).event;
  }

  findEvent(eventId: number): EventInfo | undefined {
    return this.pools.get(eventId)?.event;
  }

  currentEvent(): EventInfo | undefined {
    return this.findEvent(this.latestId);
  }

  listEvents(): EventInfo[] {
    return [...this.pools.values()].map((pool) => pool.event);
  }

  getStakeRecord(eventId: number, bettor: PublicKey): StakeRecord {
    return this.pool(eventId).stakes.get(bettor.toBase58()) ?? StakeRecord.empty();
  }

  /**
   * Side with a positive stake and its amount; side A wins ties,
   * { A, 0 } when the bettor has nothing staked
   */
  getStake(eventId: number, bettor: PublicKey): StakeView {
    const record = this.getStakeRecord(eventId, bettor);
    const side = record.primarySide();
    return { side, amount: record.amountOn(side) };
  }

  /** Bettors in order of their first bet */
  participants(eventId: number): PublicKey[] {
    return [...this.pool(eventId).participants];
  }

  /** totalStakeA + totalStakeB - paidOut */
  heldValue(eventId: number): UInt64 {
    const { event } = this.pool(eventId);
    return safeSub(safeAdd(event.totalStakeA, event.totalStakeB), event.paidOut);
  }

  // ========== Lifecycle ==========

  openEvent(startTime: UInt64): EventInfo {
    const id = this.latestId + 1;
    const event = createEventInfo(id, startTime);

    this.pools.set(id, { event, stakes: new Map(), participants: [] });
    this.latestId = id;
    this.record(() => {
      this.pools.delete(id);
      this.latestId = id - 1;
    });

    return event;
  }

  markResolved(eventId: number, outcome: boolean): EventInfo {
    const event = this.getEvent(eventId);
    this.requireOpenForTransition(event);
    return this.setEvent({ ...event, status: EVENT_STATUS.RESOLVED, outcome });
  }

  markCancelled(eventId: number): EventInfo {
    const event = this.getEvent(eventId);
    this.requireOpenForTransition(event);
    return this.setEvent({ ...event, status: EVENT_STATUS.CANCELLED, outcome: null });
  }

  // ========== Bets ==========

  validateAmount(amount: UInt64): void {
    const { minBet, maxBet } = this.bounds;
    if (amount.lessThan(minBet).toBoolean()) {
      throw new WagerError('InvalidAmount', `Bet ${amount.toString()} is below the minimum of ${minBet.toString()}`);
    }
    if (maxBet && amount.greaterThan(maxBet).toBoolean()) {
      throw new WagerError('InvalidAmount', `Bet ${amount.toString()} exceeds the maximum of ${maxBet.toString()}`);
    }
  }

  /**
   * Admit a stake. The caller has already taken custody of the value.
   */
  recordBet(eventId: number, bettor: PublicKey, side: Side, amount: UInt64): EventInfo {
    const pool = this.pool(eventId);
    if (!isOpen(pool.event)) {
      throw new WagerError('EventNotOpen', `Event ${eventId} is ${pool.event.status}`);
    }
    this.validateAmount(amount);

    const key = bettor.toBase58();
    const existing = pool.stakes.get(key);
    const current = existing ?? StakeRecord.empty();
    if (current.amountOn(opposite(side)).greaterThan(UInt64.zero).toBoolean()) {
      throw new WagerError('SideConflict', `Bettor already holds a stake on side ${opposite(side)}`);
    }

    const updated = current.withAmount(side, safeAdd(current.amountOn(side), amount));
    const event = pool.event;
    const totals =
      side === SIDE.A
        ? { totalStakeA: safeAdd(event.totalStakeA, amount) }
        : { totalStakeB: safeAdd(event.totalStakeB, amount) };

    this.setStake(pool, key, updated);
    if (!existing) this.addParticipant(pool, bettor);
    this.setEvent({ ...event, ...totals });

    return this.recomputeOdds(eventId);
  }

  recomputeOdds(eventId: number): EventInfo {
    const event = this.getEvent(eventId);
    const { oddsA, oddsB } = PoolMath.calculateOdds(event.totalStakeA, event.totalStakeB);
    return this.setEvent({ ...event, oddsA, oddsB });
  }

  // ========== Settlement ==========

  /**
   * Mark a stake record claimed and zero it. Returns the record as it was.
   */
  settleStake(eventId: number, bettor: PublicKey): StakeRecord {
    const pool = this.pool(eventId);
    const key = bettor.toBase58();
    const record = pool.stakes.get(key) ?? StakeRecord.empty();
    if (record.isClaimed()) {
      throw new WagerError('AlreadyClaimed', `Stake of ${key.slice(0, 12)}... in event ${eventId} already settled`);
    }
    this.setStake(pool, key, record.settled());
    return record;
  }

  addPaidOut(eventId: number, amount: UInt64): EventInfo {
    const event = this.getEvent(eventId);
    const paidOut = safeAdd(event.paidOut, amount);
    // Never pay out more than was staked
    safeSub(safeAdd(event.totalStakeA, event.totalStakeB), paidOut);
    return this.setEvent({ ...event, paidOut });
  }

  // ========== Journal ==========

  checkpoint(): number {
    this.depth++;
    return this.undo.length;
  }

  commit(): void {
    this.closeCheckpoint();
  }

  revertTo(checkpoint: number): void {
    while (this.undo.length > checkpoint) {
      const step = this.undo.pop();
      if (step) step();
    }
    this.closeCheckpoint();
  }

  // ========== Internals ==========

  private pool(eventId: number): EventPool {
    const pool = this.pools.get(eventId);
    if (!pool) {
      throw new WagerError('UnknownEvent', `Event ${eventId} does not exist`);
    }
    return pool;
  }

  private requireOpenForTransition(event: EventInfo): void {
    if (event.status === EVENT_STATUS.RESOLVED) {
      throw new WagerError('AlreadyResolved', `Event ${event.id} is already resolved`);
    }
    if (event.status === EVENT_STATUS.CANCELLED) {
      throw new WagerError('AlreadyTerminal', `Event ${event.id} is already cancelled`);
    }
  }

  private setEvent(event: EventInfo): EventInfo {
    const pool = this.pool(event.id);
    const previous = pool.event;
    pool.event = event;
    this.record(() => {
      pool.event = previous;
    });
    return event;
  }

  private setStake(pool: EventPool, key: string, record: StakeRecord): void {
    const previous = pool.stakes.get(key);
    pool.stakes.set(key, record);
    this.record(() => {
      if (previous) pool.stakes.set(key, previous);
      else pool.stakes.delete(key);
    });
  }

  private addParticipant(pool: EventPool, bettor: PublicKey): void {
    pool.participants.push(bettor);
    this.record(() => {
      pool.participants.pop();
    });
  }

  private record(step: () => void): void {
    if (this.depth > 0) this.undo.push(step);
  }

  private closeCheckpoint(): void {
    if (this.depth > 0) this.depth--;
    if (this.depth === 0) this.undo = [];
  }
}
