/**
 * Settlement Monitoring Service
 *
 * Watches the current event and, once its betting window has elapsed,
 * resolves it from its weather condition as the primary operator.
 * Events without a condition are left for manual resolution.
 */

import { EVENT_STATUS } from '@pooled-wager/contracts';
import { config } from '../config.js';
import type { WagerService } from './wager-service.js';
import type { WeatherOutcomeClient } from './weather-client.js';

export type SettlementCheckResult =
  | { action: 'idle'; reason: string }
  | { action: 'resolved'; eventId: number; outcome: boolean }
  | { action: 'failed'; eventId: number; reason: string };

/**
 * One monitor pass over the current event
 */
export async function runSettlementCheck(
  service: WagerService,
  weather: WeatherOutcomeClient
): Promise<SettlementCheckResult> {
  const event = service.engine.getCurrentEvent();
  if (!event || event.status !== EVENT_STATUS.OPEN) {
    return { action: 'idle', reason: 'no open event' };
  }

  const condition = service.conditionFor(event.id);
  if (!condition) {
    return { action: 'idle', reason: `event #${event.id} has no weather condition` };
  }
  if (!service.isPastDeadline(event)) {
    return { action: 'idle', reason: `event #${event.id} is still accepting bets` };
  }

  const operator = service.primaryOperator;
  if (!operator) {
    return { action: 'failed', eventId: event.id, reason: 'no operator configured' };
  }

  console.log(`\n[Settlement] Settling Event #${event.id}...`);
  try {
    const outcome = await weather.fetchOutcome(condition);

    // The event may have been resolved or cancelled while the request was in flight
    const latest = service.engine.getEvent(event.id);
    if (latest.status !== EVENT_STATUS.OPEN) {
      return { action: 'idle', reason: `event #${event.id} is already ${latest.status}` };
    }

    service.engine.resolveEvent(operator, event.id, outcome);
    console.log(`[Settlement] Event #${event.id} resolved: side ${outcome ? 'A' : 'B'} won`);
    return { action: 'resolved', eventId: event.id, outcome };
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Settlement] Event #${event.id} not settled:`, reason);
    return { action: 'failed', eventId: event.id, reason };
  }
}

export function startSettlementMonitor(
  service: WagerService,
  weather: WeatherOutcomeClient,
  intervalMs: number = config.settlement.checkInterval
) {
  console.log(`   Check interval: ${intervalMs / 1000}s`);
  console.log(`   Watching for events past their betting window...\n`);

  let running = false;
  const intervalId = setInterval(() => {
    // Skip a tick while the previous pass is still waiting on the weather service
    if (running) return;
    running = true;
    runSettlementCheck(service, weather)
      .catch((error: unknown) => {
        console.error('[Settlement] Monitor error:', error);
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);

  // Return cleanup function
  return () => clearInterval(intervalId);
}
