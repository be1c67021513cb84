/**
 * OutcomeOracle.ts - Pluggable source of event outcomes
 *
 * Trust model: whoever controls the oracle controls the result. Operators
 * resolving with an explicit outcome act as a trusted oracle themselves.
 */

import { Field, Poseidon, UInt64 } from 'o1js';
import type { EventInfo } from '../types/EventInfo.js';

export interface OutcomeOracle {
  /** true when side A won */
  decide(event: EventInfo, now: UInt64): boolean;
}

/**
 * PseudoRandomOracle - Coin flip from Poseidon(timestamp, previous, eventId) mod 2
 *
 * NOT unpredictable: anyone who can choose the resolution time can choose the
 * outcome. Placeholder until a real randomness source is wired in; do not use
 * it as a fairness guarantee.
 */
export class PseudoRandomOracle implements OutcomeOracle {
  private previous: Field;

  constructor(seed: Field = Field(0)) {
    this.previous = seed;
  }

  decide(event: EventInfo, now: UInt64): boolean {
    const digest = Poseidon.hash([Field(now.toBigInt()), this.previous, Field(event.id)]);
    this.previous = digest;
    return digest.toBigInt() % 2n === 0n;
  }

  lastRandomness(): Field {
    return this.previous;
  }
}

/**
 * Always reports the same outcome
 */
export class FixedOutcomeOracle implements OutcomeOracle {
  constructor(private outcome: boolean) {}

  decide(): boolean {
    return this.outcome;
  }
}
