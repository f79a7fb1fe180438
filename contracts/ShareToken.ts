// ShareToken.ts - Fungible share ledger for vault depositors
// Balances are only minted and burned by the vault; holders may transfer freely.

import type { AtomicRuntime, Journaled } from './AtomicRuntime';
import { InsufficientSharesError } from './errors';
import { assert, assertAddress, assertUint64 } from './math';
import type { ShareLedger } from './types';

interface ShareTokenState {
  balances: Map<string, bigint>;
  totalSupply: bigint;
}

export class ShareToken implements ShareLedger, Journaled<ShareTokenState> {
  private balances = new Map<string, bigint>();
  private supply = 0n;

  constructor(runtime: AtomicRuntime, readonly name: string, readonly symbol: string) {
    runtime.register(this);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Every account holding a non-zero balance */
  holders(): string[] {
    return [...this.balances.keys()];
  }

  mint(account: string, amount: bigint): void {
    assertAddress(account, 'Share recipient');
    assertUint64(amount, 'Share amount');
    this.setBalance(account, this.balanceOf(account) + amount);
    this.supply += amount;
  }

  burn(account: string, amount: bigint): void {
    assertUint64(amount, 'Share amount');
    const balance = this.balanceOf(account);
    assert(amount <= balance, InsufficientSharesError, 'Burn amount exceeds share balance');
    this.setBalance(account, balance - amount);
    this.supply -= amount;
  }

  transfer(from: string, to: string, amount: bigint): void {
    assertAddress(to, 'Share recipient');
    assertUint64(amount, 'Share amount');
    const balance = this.balanceOf(from);
    assert(amount <= balance, InsufficientSharesError, 'Transfer amount exceeds share balance');
    this.setBalance(from, balance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  snapshot(): ShareTokenState {
    return { balances: new Map(this.balances), totalSupply: this.supply };
  }

  restore(state: ShareTokenState): void {
    this.balances = new Map(state.balances);
    this.supply = state.totalSupply;
  }

  private setBalance(account: string, balance: bigint): void {
    if (balance === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, balance);
    }
  }
}
