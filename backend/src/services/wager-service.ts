/**
 * Wager Service
 *
 * Owns the in-process settlement engine, the custody accounts and the weather
 * condition attached to each event. Routes and the settlement monitor share
 * one instance.
 */

import type { PublicKey, UInt64 } from 'o1js';
import {
  createLocalEngine,
  winningSide,
  type EventInfo,
  type LocalEngine,
  type LocalEngineOptions,
  type PayoutQuote,
  type StakeRecord,
} from '@pooled-wager/contracts';
import { config, getCharityAddress, getCustodyAddress, getOperatorKeys, getWageringRules } from '../config.js';
import { describeCondition, type WeatherCondition } from './weather-client.js';

export interface EventView {
  id: number;
  status: string;
  startTime: string;
  bettingDeadline: string | null;
  outcome: boolean | null;
  winningSide: string | null;
  totalStakeA: string;
  totalStakeB: string;
  oddsA: string;
  oddsB: string;
  heldValue: string;
  participants: number;
  condition: WeatherCondition | null;
}

export interface StakeView {
  eventId: number;
  address: string;
  side: string;
  amount: string;
  amountA: string;
  amountB: string;
  claimed: boolean;
}

export interface QuoteView {
  stake: string;
  grossPayout: string;
  profit: string;
  userShare: string;
  charityShare: string;
}

export class WagerService {
  private conditions = new Map<number, WeatherCondition>();

  constructor(readonly local: LocalEngine) {}

  get engine() {
    return this.local.engine;
  }

  get accounts() {
    return this.local.accounts;
  }

  /**
   * Operator that automated settlement acts as
   */
  get primaryOperator(): PublicKey | null {
    return this.local.access.list()[0] ?? null;
  }

  createEvent(operator: PublicKey, condition?: WeatherCondition): EventInfo {
    const event = this.engine.createEvent(operator);
    if (condition) {
      this.conditions.set(event.id, condition);
      console.log(`[WagerService] Event #${event.id} settles on: ${describeCondition(condition)}`);
    } else {
      console.log(`[WagerService] Event #${event.id} created (manual resolution)`);
    }
    return event;
  }

  conditionFor(eventId: number): WeatherCondition | null {
    return this.conditions.get(eventId) ?? null;
  }

  isPastDeadline(event: EventInfo): boolean {
    const deadline = this.engine.bettingDeadline(event);
    return deadline !== null && this.local.clock.now().greaterThanOrEqual(deadline).toBoolean();
  }

  // ========== Views ==========

  toEventView(event: EventInfo): EventView {
    return {
      id: event.id,
      status: event.status,
      startTime: event.startTime.toString(),
      bettingDeadline: this.engine.bettingDeadline(event)?.toString() ?? null,
      outcome: event.outcome,
      winningSide: winningSide(event),
      totalStakeA: event.totalStakeA.toString(),
      totalStakeB: event.totalStakeB.toString(),
      oddsA: event.oddsA.toString(),
      oddsB: event.oddsB.toString(),
      heldValue: this.engine.getHeldValue(event.id).toString(),
      participants: this.engine.participants(event.id).length,
      condition: this.conditionFor(event.id),
    };
  }

  toStakeView(eventId: number, bettor: PublicKey): StakeView {
    const { side, amount } = this.engine.getStake(eventId, bettor);
    const record: StakeRecord = this.engine.getStakeRecord(eventId, bettor);
    return {
      eventId,
      address: bettor.toBase58(),
      side,
      amount: amount.toString(),
      amountA: record.amountA.toString(),
      amountB: record.amountB.toString(),
      claimed: record.isClaimed(),
    };
  }

  toQuoteView(quote: PayoutQuote): QuoteView {
    return {
      stake: quote.stake.toString(),
      grossPayout: quote.grossPayout.toString(),
      profit: quote.profit.toString(),
      userShare: quote.userShare.toString(),
      charityShare: quote.charityShare.toString(),
    };
  }

  balanceOf(account: PublicKey): UInt64 {
    return this.accounts.balanceOf(account);
  }
}

/**
 * Build the service from environment configuration
 */
export function createWagerService(overrides: Partial<LocalEngineOptions> = {}): WagerService {
  const local = createLocalEngine({
    operators: getOperatorKeys(),
    custody: getCustodyAddress(),
    charityAddress: getCharityAddress(),
    ...getWageringRules(),
    ...overrides,
  });

  const { bettingDurationMs, publicResolution } = getWageringRules();
  console.log(`[WagerService] ${config.operatorKeys.length} operator(s), custody ${config.custodyAddress.slice(0, 12)}...`);
  console.log(`[WagerService] Betting window: ${bettingDurationMs ? `${bettingDurationMs.toString()}ms` : 'none'}`);
  console.log(`[WagerService] Charity split: ${config.charityAddress ? 'enabled' : 'disabled'}`);
  console.log(`[WagerService] Public resolution: ${publicResolution ? 'enabled' : 'disabled'}`);

  return new WagerService(local);
}
