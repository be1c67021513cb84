/**
 * LocalAccounts.ts - In-process balance book and value-transfer capability
 *
 * Holds account balances and hands control to recipient hooks on every
 * incoming transfer, the way a payable recipient regains control mid-call.
 * Balance changes made inside a checkpoint are journaled so the caller can
 * revert them when the surrounding operation fails.
 */

import { PublicKey, UInt64 } from 'o1js';
import { safeAdd, safeSub } from './PoolMath.js';

/**
 * ValueTransfer - What the SettlementEngine needs to move value
 *
 * receive/transfer return false on failure; the engine turns that into an
 * operation failure. checkpoint/commit/revertTo bracket one operation.
 */
export interface ValueTransfer {
  /** Pull attached value from a caller into custody */
  receive(from: PublicKey, amount: UInt64): boolean;
  /** Pay out of custody */
  transfer(to: PublicKey, amount: UInt64): boolean;
  /** Value currently held in custody */
  balance(): UInt64;
  checkpoint(): number;
  commit(): void;
  revertTo(checkpoint: number): void;
}

/**
 * Called after the recipient has been credited. Returning false (or throwing)
 * rejects the transfer.
 */
export type ReceiveHook = (amount: UInt64, from: PublicKey) => boolean | void;

interface JournalEntry {
  account: string;
  previous: UInt64;
}

export class LocalAccounts {
  private balances = new Map<string, UInt64>();
  private hooks = new Map<string, ReceiveHook>();
  private journal: JournalEntry[] = [];
  private depth = 0;

  balanceOf(account: PublicKey): UInt64 {
    return this.balances.get(account.toBase58()) ?? UInt64.zero;
  }

  /**
   * Mint value into an account (deposit gateway / test funding)
   */
  credit(account: PublicKey, amount: UInt64): void {
    this.setBalance(account.toBase58(), safeAdd(this.balanceOf(account), amount));
  }

  onReceive(account: PublicKey, hook: ReceiveHook): void {
    this.hooks.set(account.toBase58(), hook);
  }

  clearHook(account: PublicKey): void {
    this.hooks.delete(account.toBase58());
  }

  /**
   * Move value between accounts, then hand control to the recipient's hook.
   * Returns false, with balances unchanged, when the sender is short or the
   * recipient rejects.
   */
  move(from: PublicKey, to: PublicKey, amount: UInt64): boolean {
    if (this.balanceOf(from).lessThan(amount).toBoolean()) return false;

    const checkpoint = this.checkpoint();
    this.setBalance(from.toBase58(), safeSub(this.balanceOf(from), amount));
    this.setBalance(to.toBase58(), safeAdd(this.balanceOf(to), amount));

    const hook = this.hooks.get(to.toBase58());
    let accepted = true;
    if (hook) {
      try {
        accepted = hook(amount, from) !== false;
      } catch (error) {
        // A throwing recipient is a rejecting recipient
        console.warn(`[LocalAccounts] Receive hook of ${to.toBase58().slice(0, 12)}... threw:`, error);
        accepted = false;
      }
    }

    if (!accepted) {
      this.revertTo(checkpoint);
      return false;
    }
    this.commit();
    return true;
  }

  checkpoint(): number {
    this.depth++;
    return this.journal.length;
  }

  commit(): void {
    this.closeCheckpoint();
  }

  revertTo(checkpoint: number): void {
    while (this.journal.length > checkpoint) {
      const entry = this.journal.pop();
      if (!entry) break;
      this.balances.set(entry.account, entry.previous);
    }
    this.closeCheckpoint();
  }

  /**
   * ValueTransfer view with `custody` as the pool's own account
   */
  vault(custody: PublicKey): ValueTransfer {
    return {
      receive: (from, amount) => this.move(from, custody, amount),
      transfer: (to, amount) => this.move(custody, to, amount),
      balance: () => this.balanceOf(custody),
      checkpoint: () => this.checkpoint(),
      commit: () => this.commit(),
      revertTo: (checkpoint) => this.revertTo(checkpoint),
    };
  }

  private setBalance(account: string, value: UInt64): void {
    if (this.depth > 0) {
      this.journal.push({ account, previous: this.balances.get(account) ?? UInt64.zero });
    }
    this.balances.set(account, value);
  }

  private closeCheckpoint(): void {
    if (this.depth > 0) this.depth--;
    if (this.depth === 0) this.journal = [];
  }
}
