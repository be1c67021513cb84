/**
 * Capabilities.ts - Boundary contracts consumed by the SettlementEngine
 *
 * The engine never decides who is an operator, whether the system is paused,
 * or what time it is. It asks these capabilities. Simple in-process
 * implementations are provided for services and tests.
 */

import { PublicKey, UInt64 } from 'o1js';
import { WagerError } from '../types/WagerError.js';

export interface AccessControl {
  isAuthorizedOperator(caller: PublicKey): boolean;
}

export interface PauseControl {
  isPaused(): boolean;
}

export interface ReentrancyLock {
  /** Throws ReentrantCall when already entered */
  enter(): void;
  exit(): void;
}

export interface Clock {
  /** Milliseconds since epoch */
  now(): UInt64;
}

/**
 * Fixed operator set, compared by base58 encoding
 */
export class OperatorAccess implements AccessControl {
  private operators: Set<string>;

  constructor(private keys: PublicKey[]) {
    this.operators = new Set(keys.map((key) => key.toBase58()));
  }

  list(): PublicKey[] {
    return [...this.keys];
  }

  isAuthorizedOperator(caller: PublicKey): boolean {
    return this.operators.has(caller.toBase58());
  }

  requireOperator(caller: PublicKey): void {
    if (!this.isAuthorizedOperator(caller)) {
      throw new WagerError('Unauthorized', `${caller.toBase58()} is not an operator`);
    }
  }
}

/**
 * Operator-controlled pause switch
 */
export class CircuitBreaker implements PauseControl {
  private paused = false;

  constructor(private access: OperatorAccess) {}

  isPaused(): boolean {
    return this.paused;
  }

  pause(caller: PublicKey): void {
    this.access.requireOperator(caller);
    this.paused = true;
  }

  unpause(caller: PublicKey): void {
    this.access.requireOperator(caller);
    this.paused = false;
  }
}

/**
 * Single global in-operation flag
 */
export class ReentrancyGuard implements ReentrancyLock {
  private entered = false;

  enter(): void {
    if (this.entered) {
      throw new WagerError('ReentrantCall', 'Operation already in progress');
    }
    this.entered = true;
  }

  exit(): void {
    this.entered = false;
  }

  isEntered(): boolean {
    return this.entered;
  }
}

export class SystemClock implements Clock {
  now(): UInt64 {
    return UInt64.from(Date.now());
  }
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(startMs: number | bigint = 0) {
    this.current = BigInt(startMs);
  }

  now(): UInt64 {
    return UInt64.from(this.current);
  }

  advance(ms: number | bigint): void {
    this.current += BigInt(ms);
  }

  set(ms: number | bigint): void {
    this.current = BigInt(ms);
  }
}
