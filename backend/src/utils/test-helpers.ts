/**
 * In-process stand-ins shared by the backend tests
 */

import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { PrivateKey, PublicKey, UInt64 } from 'o1js';
import { FixedOutcomeOracle, ManualClock, createLocalEngine } from '@pooled-wager/contracts';
import { WagerService } from '../services/wager-service.js';

export const TEST_START_MS = 1_700_000_000_000;
export const TEST_WINDOW_MS = 60_000;

/**
 * axios instance answering from a route table instead of the network
 */
export function stubWeatherHttp(routes: Record<string, unknown>, requests: InternalAxiosRequestConfig[] = []) {
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const url = config.url ?? '';
    if (!(url in routes)) {
      throw new Error(`No stubbed response for ${url}`);
    }
    return { data: routes[url], status: 200, statusText: 'OK', headers: {}, config };
  };
  return axios.create({ adapter });
}

export function newKey(): PublicKey {
  return PrivateKey.random().toPublicKey();
}

export interface TestService {
  service: WagerService;
  clock: ManualClock;
  operator: PublicKey;
  charity: PublicKey;
}

/**
 * Service on a manual clock with one operator, a charity and a 60s window
 */
export function createTestService(): TestService {
  const operator = newKey();
  const charity = newKey();
  const clock = new ManualClock(TEST_START_MS);

  const local = createLocalEngine({
    operators: [operator],
    custody: newKey(),
    charityAddress: charity,
    bettingDurationMs: UInt64.from(TEST_WINDOW_MS),
    clock,
    oracle: new FixedOutcomeOracle(true),
  });

  return { service: new WagerService(local), clock, operator, charity };
}
