/**
 * createEngine.ts - Wire a SettlementEngine to the in-process capabilities
 */

import type { PublicKey } from 'o1js';
import {
  CircuitBreaker,
  OperatorAccess,
  ReentrancyGuard,
  SystemClock,
  type Clock,
} from '../utils/Capabilities.js';
import { LocalAccounts } from '../utils/LocalAccounts.js';
import { PseudoRandomOracle, type OutcomeOracle } from '../utils/OutcomeOracle.js';
import { SettlementEngine, type EngineConfig } from './SettlementEngine.js';

export interface LocalEngineOptions extends EngineConfig {
  operators: PublicKey[];
  /** Account holding pooled value */
  custody: PublicKey;
  accounts?: LocalAccounts;
  clock?: Clock;
  oracle?: OutcomeOracle;
}

export interface LocalEngine {
  engine: SettlementEngine;
  accounts: LocalAccounts;
  access: OperatorAccess;
  breaker: CircuitBreaker;
  guard: ReentrancyGuard;
  clock: Clock;
  custody: PublicKey;
}

export function createLocalEngine(options: LocalEngineOptions): LocalEngine {
  const { operators, custody, accounts = new LocalAccounts(), clock = new SystemClock(), oracle, ...config } = options;

  const access = new OperatorAccess(operators);
  const breaker = new CircuitBreaker(access);
  const guard = new ReentrancyGuard();

  const engine = new SettlementEngine(
    {
      access,
      pause: breaker,
      lock: guard,
      vault: accounts.vault(custody),
      clock,
      oracle: oracle ?? new PseudoRandomOracle(),
    },
    config
  );

  return { engine, accounts, access, breaker, guard, clock, custody };
}
