/**
 * SettlementEngine.ts - Event lifecycle and pro-rata settlement
 *
 * Implements a two-sided pooled wager with:
 * - One open event at a time (create -> bet -> resolve | cancel)
 * - Optional betting window measured from the event's start time
 * - Operator resolution, or public resolution after the window when enabled
 * - Pro-rata payouts with half of each winner's profit routed to a charity
 * - Full refunds on cancellation through the participant registry
 *
 * Every state-mutating operation:
 * 1. checks authorization / pause,
 * 2. enters the reentrancy lock,
 * 3. applies all ledger effects,
 * 4. moves value last,
 * and reverts the ledger and the custody journal entirely if any step fails.
 */

import { PublicKey, UInt64 } from 'o1js';
import { EVENT_STATUS, sideForOutcome, opposite, type Side } from '../types/Constants.js';
import { isOpen, isTerminal, totalOn, type EventInfo } from '../types/EventInfo.js';
import type { StakeRecord } from '../types/StakeRecord.js';
import { WagerError } from '../types/WagerError.js';
import type { AccessControl, Clock, PauseControl, ReentrancyLock } from '../utils/Capabilities.js';
import type { ValueTransfer } from '../utils/LocalAccounts.js';
import type { OutcomeOracle } from '../utils/OutcomeOracle.js';
import { PoolMath, safeAdd, type OddsQuote, type PayoutQuote } from '../utils/PoolMath.js';
import { PoolLedger, type StakeView } from './PoolLedger.js';

export interface EngineConfig {
  minBet?: UInt64;
  /** null or omitted: no upper bound */
  maxBet?: UInt64 | null;
  /** null, zero or omitted: no betting window, startTime is informational */
  bettingDurationMs?: UInt64 | null;
  /** Fixed beneficiary of half of each winner's profit; null disables the split */
  charityAddress?: PublicKey | null;
  /** Let any caller resolve through the oracle once the window has elapsed */
  publicResolution?: boolean;
}

export interface EngineCapabilities {
  access: AccessControl;
  pause: PauseControl;
  lock: ReentrancyLock;
  vault: ValueTransfer;
  clock: Clock;
  oracle: OutcomeOracle;
}

export type EngineNotification =
  | { type: 'EventCreated'; eventId: number; startTime: UInt64 }
  | { type: 'BetPlaced'; eventId: number; bettor: PublicKey; side: Side; amount: UInt64; oddsA: UInt64; oddsB: UInt64 }
  | { type: 'EventResolved'; eventId: number; outcome: boolean }
  | { type: 'EventCancelled'; eventId: number; refunded: UInt64 }
  | { type: 'Refunded'; eventId: number; bettor: PublicKey; amount: UInt64 }
  | { type: 'WinningsClaimed'; eventId: number; bettor: PublicKey; userShare: UInt64; charityShare: UInt64 }
  | { type: 'EmergencyWithdrawal'; recipient: PublicKey; amount: UInt64 };

export type NotificationListener = (notification: EngineNotification) => void;

export interface PoolTotals {
  totalStakeA: UInt64;
  totalStakeB: UInt64;
  total: UInt64;
}

interface Refund {
  bettor: PublicKey;
  amount: UInt64;
}

export class SettlementEngine {
  readonly ledger: PoolLedger;
  readonly charityAddress: PublicKey | null;
  readonly bettingDuration: UInt64 | null;
  readonly publicResolution: boolean;

  private listeners = new Set<NotificationListener>();
  private pending: EngineNotification[] = [];

  constructor(private capabilities: EngineCapabilities, config: EngineConfig = {}) {
    this.ledger = new PoolLedger({ minBet: config.minBet, maxBet: config.maxBet ?? null });
    this.charityAddress = config.charityAddress ?? null;
    const duration = config.bettingDurationMs ?? null;
    this.bettingDuration = duration && duration.greaterThan(UInt64.zero).toBoolean() ? duration : null;
    this.publicResolution = config.publicResolution ?? false;
  }

  // ========== Lifecycle ==========

  /**
   * Open the next event. The previous event, if any, must be terminal.
   */
  createEvent(operator: PublicKey): EventInfo {
    this.requireOperator(operator);

    return this.execute(() => {
      const latest = this.ledger.currentEvent();
      if (latest && !isTerminal(latest)) {
        throw new WagerError('PriorEventUnterminated', `Event ${latest.id} is still ${latest.status}`);
      }

      const event = this.ledger.openEvent(this.capabilities.clock.now());
      this.notify({ type: 'EventCreated', eventId: event.id, startTime: event.startTime });
      return event;
    });
  }

  /**
   * Stake `value` on `side` of the current event. `value` is pulled from the
   * caller into custody.
   */
  placeBet(caller: PublicKey, side: Side, value: UInt64): EventInfo {
    if (this.capabilities.pause.isPaused()) {
      throw new WagerError('SystemPaused', 'Betting is paused');
    }

    return this.execute(() => {
      const current = this.ledger.currentEvent();
      if (!current || !isOpen(current)) {
        throw new WagerError('NoActiveEvent', 'No event is accepting bets');
      }

      const deadline = this.bettingDeadline(current);
      if (deadline && this.capabilities.clock.now().greaterThanOrEqual(deadline).toBoolean()) {
        throw new WagerError('BettingWindowClosed', `Betting on event ${current.id} closed at ${deadline.toString()}`);
      }

      const event = this.ledger.recordBet(current.id, caller, side, value);

      if (!this.capabilities.vault.receive(caller, value)) {
        throw new WagerError('PaymentFailed', `Could not collect ${value.toString()} from bettor`);
      }

      this.notify({
        type: 'BetPlaced',
        eventId: event.id,
        bettor: caller,
        side,
        amount: value,
        oddsA: event.oddsA,
        oddsB: event.oddsB,
      });
      return event;
    });
  }

  /**
   * Record the outcome of an open event.
   *
   * Operators may supply the outcome; otherwise the oracle decides. When public
   * resolution is enabled, any caller may trigger oracle resolution once the
   * betting window has elapsed.
   */
  resolveEvent(caller: PublicKey, eventId: number, outcome?: boolean): EventInfo {
    const isOperator = this.capabilities.access.isAuthorizedOperator(caller);
    if (!isOperator) {
      if (!this.publicResolution || !this.bettingDuration) {
        throw new WagerError('Unauthorized', 'Only operators may resolve events');
      }
      if (outcome !== undefined) {
        throw new WagerError('Unauthorized', 'Only operators may supply an outcome');
      }
    }

    return this.execute(() => {
      const event = this.ledger.findEvent(eventId);
      if (!event) {
        throw new WagerError('NoActiveEvent', `Event ${eventId} does not exist`);
      }
      if (event.status === EVENT_STATUS.RESOLVED) {
        throw new WagerError('AlreadyResolved', `Event ${eventId} is already resolved`);
      }
      if (event.status === EVENT_STATUS.CANCELLED) {
        throw new WagerError('AlreadyTerminal', `Event ${eventId} is cancelled`);
      }

      const now = this.capabilities.clock.now();
      const deadline = this.bettingDeadline(event);
      if (deadline && now.lessThan(deadline).toBoolean()) {
        throw new WagerError('WindowNotElapsed', `Event ${eventId} accepts bets until ${deadline.toString()}`);
      }

      const decided = outcome ?? this.capabilities.oracle.decide(event, now);
      const resolved = this.ledger.markResolved(eventId, decided);
      this.notify({ type: 'EventResolved', eventId, outcome: decided });
      return resolved;
    });
  }

  /**
   * Cancel an open event and refund every participant's full stake.
   * A single failed refund fails the whole cancellation.
   */
  cancelEvent(operator: PublicKey, eventId: number): EventInfo {
    this.requireOperator(operator);

    return this.execute(() => {
      const event = this.ledger.findEvent(eventId);
      if (!event) {
        throw new WagerError('NoActiveEvent', `Event ${eventId} does not exist`);
      }
      if (isTerminal(event)) {
        throw new WagerError('AlreadyTerminal', `Event ${eventId} is already ${event.status}`);
      }

      this.ledger.markCancelled(eventId);

      // Effects first: settle every record, then pay
      const refunds: Refund[] = [];
      let refunded = UInt64.zero;
      for (const bettor of this.ledger.participants(eventId)) {
        const record = this.ledger.settleStake(eventId, bettor);
        const amount = safeAdd(record.amountA, record.amountB);
        if (amount.equals(UInt64.zero).toBoolean()) continue;
        refunds.push({ bettor, amount });
        refunded = safeAdd(refunded, amount);
      }
      const cancelled = this.ledger.addPaidOut(eventId, refunded);

      for (const { bettor, amount } of refunds) {
        if (!this.capabilities.vault.transfer(bettor, amount)) {
          throw new WagerError('PayoutFailed', `Refund of ${amount.toString()} to ${bettor.toBase58()} failed`);
        }
        this.notify({ type: 'Refunded', eventId, bettor, amount });
      }

      this.notify({ type: 'EventCancelled', eventId, refunded });
      return cancelled;
    });
  }

  /**
   * Pay the caller's share of a resolved event, at most once.
   */
  claimWinnings(caller: PublicKey, eventId: number): PayoutQuote {
    return this.execute(() => {
      const event = this.ledger.findEvent(eventId);
      if (!event || event.status !== EVENT_STATUS.RESOLVED || event.outcome === null) {
        throw new WagerError('EventNotResolved', `Event ${eventId} is not resolved`);
      }

      const record = this.ledger.getStakeRecord(eventId, caller);
      if (record.isClaimed()) {
        throw new WagerError('AlreadyClaimed', `Winnings for event ${eventId} already claimed`);
      }

      const quote = this.computeQuote(event, event.outcome, record);

      // Effects
      this.ledger.settleStake(eventId, caller);
      this.ledger.addPaidOut(eventId, quote.grossPayout);

      // Interactions
      if (!this.capabilities.vault.transfer(caller, quote.userShare)) {
        throw new WagerError('PayoutFailed', `Payout of ${quote.userShare.toString()} to winner failed`);
      }
      if (this.charityAddress && quote.charityShare.greaterThan(UInt64.zero).toBoolean()) {
        if (!this.capabilities.vault.transfer(this.charityAddress, quote.charityShare)) {
          throw new WagerError('PayoutFailed', `Charity transfer of ${quote.charityShare.toString()} failed`);
        }
      }

      this.notify({
        type: 'WinningsClaimed',
        eventId,
        bettor: caller,
        userShare: quote.userShare,
        charityShare: quote.charityShare,
      });
      return quote;
    });
  }

  /**
   * Break-glass: move the whole custody balance to `recipient`.
   *
   * Only while paused. This bypasses the ledger, so afterwards custody no longer
   * covers the held value of open or unclaimed events. Operator-trusted.
   */
  emergencyWithdraw(operator: PublicKey, recipient: PublicKey): UInt64 {
    this.requireOperator(operator);
    if (!this.capabilities.pause.isPaused()) {
      throw new WagerError('NotPaused', 'Emergency withdrawal requires the system to be paused');
    }

    return this.execute(() => {
      const amount = this.capabilities.vault.balance();
      if (amount.equals(UInt64.zero).toBoolean()) return amount;

      if (!this.capabilities.vault.transfer(recipient, amount)) {
        throw new WagerError('PayoutFailed', `Emergency withdrawal of ${amount.toString()} failed`);
      }
      console.warn(`[SettlementEngine] Emergency withdrawal of ${amount.toString()} to ${recipient.toBase58()}`);
      this.notify({ type: 'EmergencyWithdrawal', recipient, amount });
      return amount;
    });
  }

  // ========== Queries ==========

  getEvent(eventId: number): EventInfo {
    return this.ledger.getEvent(eventId);
  }

  getCurrentEvent(): EventInfo | null {
    return this.ledger.currentEvent() ?? null;
  }

  listEvents(): EventInfo[] {
    return this.ledger.listEvents();
  }

  getStake(eventId: number, bettor: PublicKey): StakeView {
    return this.ledger.getStake(eventId, bettor);
  }

  getStakeRecord(eventId: number, bettor: PublicKey): StakeRecord {
    return this.ledger.getStakeRecord(eventId, bettor);
  }

  getPoolTotals(eventId: number): PoolTotals {
    const { totalStakeA, totalStakeB } = this.ledger.getEvent(eventId);
    return { totalStakeA, totalStakeB, total: safeAdd(totalStakeA, totalStakeB) };
  }

  getOdds(eventId: number): OddsQuote {
    const { oddsA, oddsB } = this.ledger.getEvent(eventId);
    return { oddsA, oddsB };
  }

  getHeldValue(eventId: number): UInt64 {
    return this.ledger.heldValue(eventId);
  }

  participants(eventId: number): PublicKey[] {
    return this.ledger.participants(eventId);
  }

  /**
   * What `bettor` would receive by claiming now; null when a claim would fail
   */
  quotePayout(eventId: number, bettor: PublicKey): PayoutQuote | null {
    const event = this.ledger.findEvent(eventId);
    if (!event || event.outcome === null || event.status !== EVENT_STATUS.RESOLVED) return null;

    const record = this.ledger.getStakeRecord(eventId, bettor);
    if (record.isClaimed()) return null;
    try {
      return this.computeQuote(event, event.outcome, record);
    } catch (error) {
      if (error instanceof WagerError) return null;
      throw error;
    }
  }

  /**
   * startTime + duration, or null when no window is configured
   */
  bettingDeadline(event: EventInfo): UInt64 | null {
    return this.bettingDuration ? safeAdd(event.startTime, this.bettingDuration) : null;
  }

  onNotification(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ========== Internals ==========

  private requireOperator(caller: PublicKey): void {
    if (!this.capabilities.access.isAuthorizedOperator(caller)) {
      throw new WagerError('Unauthorized', `${caller.toBase58()} is not an operator`);
    }
  }

  private computeQuote(event: EventInfo, outcome: boolean, record: StakeRecord): PayoutQuote {
    const winner = sideForOutcome(outcome);
    const stake = record.amountOn(winner);
    if (stake.equals(UInt64.zero).toBoolean()) {
      throw new WagerError('NoWinningStake', `No stake on winning side ${winner} of event ${event.id}`);
    }
    return PoolMath.quotePayout(
      stake,
      totalOn(event, winner),
      totalOn(event, opposite(winner)),
      this.charityAddress !== null
    );
  }

  /**
   * Run `body` as one all-or-nothing operation under the reentrancy lock.
   * Notifications raised by `body` are delivered only after it commits and
   * the lock is released.
   */
  private execute<T>(body: () => T): T {
    const result = this.transact(body);
    this.flush();
    return result;
  }

  private transact<T>(body: () => T): T {
    const { lock, vault } = this.capabilities;
    lock.enter();

    const ledgerCheckpoint = this.ledger.checkpoint();
    const vaultCheckpoint = vault.checkpoint();
    const queued = this.pending.length;
    try {
      const result = body();
      this.ledger.commit();
      vault.commit();
      return result;
    } catch (error) {
      this.ledger.revertTo(ledgerCheckpoint);
      vault.revertTo(vaultCheckpoint);
      this.pending.length = queued;
      throw error;
    } finally {
      lock.exit();
    }
  }

  private notify(notification: EngineNotification): void {
    this.pending.push(notification);
  }

  private flush(): void {
    const delivered = this.pending;
    this.pending = [];
    for (const notification of delivered) {
      for (const listener of this.listeners) {
        try {
          listener(notification);
        } catch (error) {
          console.error(`[SettlementEngine] ${notification.type} listener failed:`, error);
        }
      }
    }
  }
}
